import { describe, expect, it } from 'vitest';
import { parseArgs, UsageError } from './args.js';

describe('parseArgs', () => {
  it('parses analyze options', () => {
    expect(parseArgs(['analyze', './docs', '--no-recursive', '--types', 'pdf,md', '--batch-size', '5', '--timeout-ms', '60000'])).toEqual({
      command: 'analyze',
      path: './docs',
      recursive: false,
      types: ['pdf', 'md'],
      batchSize: 5,
      timeoutMs: 60000,
    });
  });

  it('defaults analyze to a recursive scan of every type', () => {
    expect(parseArgs(['analyze', 'docs'])).toEqual({ command: 'analyze', path: 'docs', recursive: true, types: [] });
  });

  it('requires a path for analyze', () => {
    expect(() => parseArgs(['analyze', '--no-recursive'])).toThrow('analyze needs a directory path');
  });

  it('rejects a non-numeric batch size', () => {
    expect(() => parseArgs(['analyze', 'docs', '--batch-size', 'ten'])).toThrow(
      '--batch-size expects a positive integer, got "ten"'
    );
  });

  it('parses report options and keeps the format tag as given', () => {
    expect(
      parseArgs(['report', '--output', 'out.json', '--format', 'JSON', '--type', 'Executive', '--urgency', 'high'])
    ).toEqual({
      command: 'report',
      output: 'out.json',
      format: 'JSON',
      reportType: 'executive',
      urgency: 'high',
    });
  });

  it('defaults to a comprehensive Excel report', () => {
    expect(parseArgs(['report'])).toEqual({ command: 'report', format: 'excel', reportType: 'comprehensive' });
  });

  it('reports an unknown report type as a usage error', () => {
    expect(() => parseArgs(['report', '--type', 'summary'])).toThrow(UsageError);
    expect(() => parseArgs(['report', '--type', 'summary'])).toThrow(
      'Unknown report type "summary" (expected one of: executive, detailed, comprehensive)'
    );
  });

  it('requires a value after an option', () => {
    expect(() => parseArgs(['report', '--output'])).toThrow('--output expects a value');
  });

  it('recognizes status and help', () => {
    expect(parseArgs(['status'])).toEqual({ command: 'status' });
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['--help'])).toEqual({ command: 'help' });
  });

  it('rejects unknown commands', () => {
    expect(() => parseArgs(['purge'])).toThrow('Unknown command: purge');
  });
});
