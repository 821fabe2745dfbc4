/**
 * Environment diagnostics script
 *
 * Usage: npm run env:diag
 *
 * Prints which settings are present and where they came from, then checks
 * that they validate. Secret values are masked.
 */

import { initEnv, getEnvDiagnostics, loadSettings, SETTINGS_KEYS } from '@kexp/config';

const { repoRoot, envFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local loaded: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from files: ${keysLoaded.length}`);

const diagnostics = getEnvDiagnostics(SETTINGS_KEYS);

console.log('\n📋 Settings:');
for (const key of diagnostics.keys) {
  const status = key.present ? '✅' : '➖';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${masked}${source}`);
}

let valid = true;
try {
  loadSettings();
} catch (error: unknown) {
  valid = false;
  console.log(`\n❌ ${error instanceof Error ? error.message : String(error)}`);
}

console.log(
  JSON.stringify({
    event: 'env.diagnostics',
    envFilePath,
    envFileExists: loaded,
    keysLoadedCount: keysLoaded.length,
    settingsValid: valid,
    variables: diagnostics.keys.map((key) => ({ key: key.key, present: key.present, source: key.source })),
    warnings: diagnostics.warnings,
  })
);

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}

if (!valid) {
  process.exitCode = 1;
}
