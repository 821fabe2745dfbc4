/**
 * Centralized environment variable loader
 *
 * Locates the repo root and loads .env / .env.local deterministically.
 * Diagnostics never include secret values.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

const ROOT_PACKAGE_NAME = 'knowledge-expiry-monorepo';

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  maskedValue?: string;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  keys: EnvKeyStatus[];
  warnings: string[];
}

export interface InitEnvResult {
  repoRoot: string;
  envFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>;
}

/**
 * Parsed package.json, or null when it cannot be read
 */
function readPackageJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return null;
  }
}

/**
 * Find repository root by walking up from the start directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  while (true) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath)) {
      const pkg = readPackageJson(packageJsonPath);
      if (typeof pkg === 'object' && pkg !== null && ('workspaces' in pkg || ('name' in pkg && pkg.name === ROOT_PACKAGE_NAME))) {
        return current;
      }
    }

    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

/**
 * Mask sensitive values for logging
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function isSecretKey(key: string): boolean {
  return ['TOKEN', 'SECRET', 'PASSWORD', 'KEY'].some((marker) => key.includes(marker));
}

let cachedResult: InitEnvResult | null = null;

function loadFile(path: string, label: string, keysLoaded: string[], keySources: Record<string, string>): boolean {
  const result = config({ path, override: true });
  if (result.parsed) {
    for (const [key, value] of Object.entries(result.parsed)) {
      if (value.trim().length === 0) continue;
      keySources[key] = label;
      if (!keysLoaded.includes(key)) keysLoaded.push(key);
    }
  }
  if (result.error) {
    console.warn(`[env] Warning: Error loading ${label} file: ${result.error.message}`);
    return false;
  }
  return true;
}

/**
 * Initialize environment variables. Call before anything reads process.env.
 *
 * Loads <repo-root>/.env, then <repo-root>/.env.local on top of it. A value
 * already set in the process is never replaced by an empty one from a file.
 */
export function initEnv(envFileOverride?: string): InitEnvResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot();
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadFile(envFilePath, '.env', keysLoaded, keySources);
  } else {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = { repoRoot, envFilePath, loaded, localLoaded, keysLoaded, keySources };
  return cachedResult;
}

/**
 * Environment diagnostics (safe for logging, no secrets)
 */
export function getEnvDiagnostics(keys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources ?? {};
  const warnings: string[] = [];

  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  const statuses = keys.map((key): EnvKeyStatus => {
    const value = process.env[key];
    const present = !!value && value.trim().length > 0;
    if (!value || !present) {
      return { key, present };
    }
    if (/[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
    return {
      key,
      present,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  return { cwd, repoRoot, envFilePath, envFileExists, keys: statuses, warnings };
}

/**
 * Read a required variable, trimmed
 * @throws Error naming the missing key
 */
export function requireEnv(key: string): string {
  const value = process.env[key];

  if (!value || value.trim().length === 0) {
    throw new Error(
      `Missing or empty required environment variable: ${key}\n` +
        `Please check your .env file and ensure ${key} is set with a non-empty value.`
    );
  }

  return value.trim();
}
