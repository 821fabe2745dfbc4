/**
 * Hand-rolled argument parsing for the kexp commands
 */

import { decodeReportType, errorMessage, type ReportType } from '@kexp/core';

export const USAGE = `Usage:
  kexp analyze <path> [--no-recursive] [--types pdf,docx,txt,md] [--batch-size N] [--timeout-ms N]
  kexp report [--output file] [--format excel|json|csv] [--type comprehensive|executive|detailed] [--urgency level]
  kexp status`;

export interface AnalyzeArgs {
  command: 'analyze';
  path: string;
  recursive: boolean;
  types: string[];
  batchSize?: number;
  timeoutMs?: number;
}

export interface ReportArgs {
  command: 'report';
  output?: string;
  format: string;
  reportType: ReportType;
  urgency?: string;
}

export type CliArgs = AnalyzeArgs | ReportArgs | { command: 'status' } | { command: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function positiveInt(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${value ?? ''}"`);
  }
  return parsed;
}

function valueOf(flag: string, args: string[], index: number): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} expects a value`);
  }
  return value;
}

function parseAnalyze(args: string[]): AnalyzeArgs {
  const parsed: AnalyzeArgs = { command: 'analyze', path: '', recursive: true, types: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--no-recursive') {
      parsed.recursive = false;
    } else if (arg === '--types') {
      parsed.types = valueOf(arg, args, i).split(',');
      i++;
    } else if (arg === '--batch-size') {
      parsed.batchSize = positiveInt(arg, valueOf(arg, args, i));
      i++;
    } else if (arg === '--timeout-ms') {
      parsed.timeoutMs = positiveInt(arg, valueOf(arg, args, i));
      i++;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option for analyze: ${arg}`);
    } else if (parsed.path) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    } else {
      parsed.path = arg;
    }
  }

  if (!parsed.path) {
    throw new UsageError('analyze needs a directory path');
  }
  return parsed;
}

function parseReport(args: string[]): ReportArgs {
  const parsed: ReportArgs = { command: 'report', format: 'excel', reportType: 'comprehensive' };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '--output':
        parsed.output = valueOf(arg, args, i);
        i++;
        break;
      case '--format':
        parsed.format = valueOf(arg, args, i);
        i++;
        break;
      case '--type':
        try {
          parsed.reportType = decodeReportType(valueOf(arg, args, i));
        } catch (error: unknown) {
          throw new UsageError(errorMessage(error));
        }
        i++;
        break;
      case '--urgency':
        parsed.urgency = valueOf(arg, args, i);
        i++;
        break;
      default:
        throw new UsageError(`Unknown option for report: ${arg}`);
    }
  }

  return parsed;
}

/**
 * Parse argv without the node and script entries
 * @throws UsageError
 */
export function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  switch (command) {
    case 'analyze':
      return parseAnalyze(rest);
    case 'report':
      return parseReport(rest);
    case 'status':
      return { command: 'status' };
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
