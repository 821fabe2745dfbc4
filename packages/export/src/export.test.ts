/**
 * Unit tests for report export
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import ExcelJS from 'exceljs';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { UnsupportedFormatError, type ExportSink, type ReportCriticalPoint, type ReportTree } from '@kexp/core';
import { buildWorkbook } from './excel.js';
import { FileExportSink } from './sink.js';
import { defaultReportPath, exportReport } from './boundary.js';
import { titleCase } from './styles.js';

const runtimePoint: ReportCriticalPoint = {
  id: 1,
  description: 'Node 16 runtime',
  category: 'technical',
  urgency: 'critical',
  last_updated_date: '2021-03-01T00:00:00.000Z',
  confidence_score: 0.9,
  document_filename: 'runtime.md',
  document_path: '/docs/runtime.md',
  context_snippet: 'Runs on Node 16',
  expiry_indicators: ['Node 16'],
};

const policyPoint: ReportCriticalPoint = {
  id: 2,
  description: 'Quarterly review policy',
  category: 'policy',
  urgency: 'low',
  last_updated_date: null,
  confidence_score: null,
  document_filename: 'policy.txt',
  document_path: '/docs/policy.txt',
  context_snippet: null,
  expiry_indicators: [],
};

function makeTree(points: ReportCriticalPoint[] = [runtimePoint, policyPoint]): ReportTree {
  return {
    metadata: {
      report_type: 'comprehensive',
      generated_at: '2024-06-01T12:00:00.000Z',
      total_documents: 2,
      total_critical_points: points.length,
      analysis_model: 'test-model',
      filter: { urgency: null },
    },
    executive_summary: {
      overview: 'Runtime documentation is out of date.',
      key_metrics: {
        documents_analyzed: 2,
        critical_points_identified: points.length,
        expired_knowledge_items: 1,
        high_priority_items: 1,
        average_confidence: 0.45,
      },
    },
    critical_findings: [{ finding: 'Unsupported runtime', impact: 'Security patches missing' }],
    critical_points: {
      by_urgency: {
        critical: points.filter((p) => p.urgency === 'critical'),
        high: [],
        medium: [],
        low: points.filter((p) => p.urgency === 'low'),
      },
      by_category: { technical: [runtimePoint], policy: [policyPoint] },
      detailed_list: points,
    },
    document_analysis: {
      file_type_distribution: { md: 1, txt: 1 },
      average_confidence_score: 0.45,
      confidence_distribution: { 'high (>0.8)': 1, 'medium (0.5-0.8)': 0, 'low (<0.5)': 0 },
      document_age_distribution: { recent: 1, moderate: 1, old: 0 },
    },
    expiry_analysis: {
      total_points_with_indicators: 1,
      most_common_indicators: [['Node 16', 1]],
      indicator_distribution: { 'Node 16': 1 },
    },
    timeline_analysis: {
      timeline_categories: {
        immediate_attention: 1,
        next_30_days: 0,
        next_90_days: 0,
        next_6_months: 0,
        annual_review: 1,
      },
      detailed_timeline: {
        immediate_attention: [runtimePoint],
        next_30_days: [],
        next_90_days: [],
        next_6_months: [],
        annual_review: [policyPoint],
      },
    },
    recommendations: {
      strategic: ['Upgrade the runtime'],
      action_items: [{ task: 'Move to Node 20', priority: 'High', owner: 'Platform' }],
    },
    appendix: {
      database_statistics: {
        total_documents: 2,
        analyzed_documents: 2,
        average_confidence: 0.45,
        analysis_completion_rate: 100,
      },
      critical_point_statistics: {
        total_critical_points: 2,
        by_urgency: { low: 1, medium: 0, high: 0, critical: 1 },
        by_category: { technical: 1, policy: 1 },
      },
      vector_db_statistics: { error: 'unavailable' },
    },
  };
}

describe('titleCase', () => {
  it('turns snake_case keys into labels', () => {
    expect(titleCase('next_30_days')).toBe('Next 30 Days');
    expect(titleCase('documents_analyzed')).toBe('Documents Analyzed');
  });
});

describe('buildWorkbook', () => {
  it('selects sheets by report type', () => {
    const names = (type: 'executive' | 'detailed' | 'comprehensive') =>
      buildWorkbook(makeTree(), type).worksheets.map((sheet) => sheet.name);

    expect(names('executive')).toEqual(['Executive Summary', 'Critical Findings', 'Action Items']);
    expect(names('detailed')).toEqual(['All Critical Points', 'Document Analysis', 'Timeline Analysis']);
    expect(names('comprehensive')).toEqual([
      'Executive Summary',
      'Critical Findings',
      'Action Items',
      'All Critical Points',
      'Document Analysis',
      'Timeline Analysis',
      'Expiry Analysis',
      'Statistics',
    ]);
  });

  it('lays out the executive summary metrics', () => {
    const sheet = buildWorkbook(makeTree(), 'executive').getWorksheet('Executive Summary');

    expect(sheet?.getCell('A1').value).toBe('Knowledge Expiry Report - Executive Summary');
    expect(sheet?.getCell('B3').value).toBe('2024-06-01T12:00:00.000Z');
    expect(sheet?.getCell('B4').value).toBe('test-model');
    expect(sheet?.getCell('A6').value).toBe('Key Metrics');
    expect(sheet?.getCell('A7').value).toBe('Documents Analyzed');
    expect(sheet?.getCell('B7').value).toBe(2);
    expect(sheet?.getCell('A14').value).toBe('Runtime documentation is out of date.');
  });

  it('colours critical point rows by urgency and trims context', () => {
    const sheet = buildWorkbook(makeTree(), 'detailed').getWorksheet('All Critical Points');

    expect(sheet?.getCell('A1').value).toBe('Description');
    expect(sheet?.getCell('B2').value).toBe('Technical');
    expect(sheet?.getCell('C2').value).toBe('Critical');
    expect(sheet?.getCell('F2').value).toBe('Runs on Node 16...');
    expect(sheet?.getCell('F3').value).toBe('');
    expect(sheet?.getCell('E3').value).toBe(0);
    expect(sheet?.getCell('A2').fill).toEqual({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFC5504B' } });
    expect(sheet?.getCell('A3').fill).toEqual({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF90EE90' } });
  });

  it('fills action item defaults', () => {
    const sheet = buildWorkbook(makeTree(), 'executive').getWorksheet('Action Items');

    expect(sheet?.getRow(2).values).toEqual([undefined, 'Move to Node 20', 'High', 'Platform', 'TBD', 'Pending']);
  });

  it('lists every timeline bucket in order', () => {
    const sheet = buildWorkbook(makeTree(), 'detailed').getWorksheet('Timeline Analysis');

    expect(sheet?.getCell('A4').value).toBe('Immediate Attention');
    expect(sheet?.getCell('B4').value).toBe(1);
    expect(sheet?.getCell('A8').value).toBe('Annual Review');
  });
});

describe('FileExportSink', () => {
  let dir: string;
  const sink = new FileExportSink();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kexp-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes JSON that reads back as the same tree', async () => {
    const tree = makeTree();
    const path = join(dir, 'nested', 'report.json');

    await expect(sink.writeJson(tree, path)).resolves.toBe(true);
    const reloaded: unknown = JSON.parse(await readFile(path, 'utf-8'));
    expect(reloaded).toEqual(tree);
  });

  it('writes a workbook with the comprehensive sheet set', async () => {
    const path = join(dir, 'report.xlsx');

    await expect(sink.writeExcel(makeTree(), path, 'comprehensive')).resolves.toBe(true);
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(path);
    expect(workbook.worksheets).toHaveLength(8);
    expect(workbook.getWorksheet('Statistics')?.getCell('A1').value).toBe('Database Statistics');
  });

  it('flattens the detailed list into CSV rows', async () => {
    const path = join(dir, 'report.csv');

    await expect(sink.writeCsv(makeTree(), path)).resolves.toBe(true);
    const lines = (await readFile(path, 'utf-8'))
      .replace(/^\uFEFF/, '')
      .split(/\r?\n/)
      .filter((line) => line.length > 0);

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(
      'description,category,urgency,document_filename,confidence_score,context_snippet,last_updated_date'
    );
    expect(lines[1]).toBe('Node 16 runtime,technical,critical,runtime.md,0.9,Runs on Node 16...,2021-03-01T00:00:00.000Z');
    expect(lines[2]?.startsWith('Quarterly review policy,policy,low,policy.txt')).toBe(true);
  });

  it('refuses to write an empty CSV', async () => {
    const path = join(dir, 'empty.csv');

    await expect(sink.writeCsv(makeTree([]), path)).resolves.toBe(false);
    await expect(readFile(path, 'utf-8')).rejects.toThrow();
  });
});

describe('exportReport', () => {
  function fakeSink(result = true): ExportSink {
    return {
      writeExcel: vi.fn(async () => result),
      writeJson: vi.fn(async () => result),
      writeCsv: vi.fn(async () => result),
    };
  }

  it('dispatches on a case-insensitive format tag', async () => {
    const sink = fakeSink();
    const tree = makeTree();

    const outcome = await exportReport(sink, tree, { format: 'JSON', outputPath: 'out.json', reportType: 'executive' });

    expect(outcome).toEqual({ success: true, format: 'json', outputPath: 'out.json' });
    expect(sink.writeJson).toHaveBeenCalledWith(tree, 'out.json');
    expect(sink.writeExcel).not.toHaveBeenCalled();
  });

  it('passes the report type to the workbook writer', async () => {
    const sink = fakeSink();
    const tree = makeTree();

    await exportReport(sink, tree, { format: 'excel', outputPath: 'out.xlsx', reportType: 'detailed' });

    expect(sink.writeExcel).toHaveBeenCalledWith(tree, 'out.xlsx', 'detailed');
  });

  it('reports an unknown format as a structured failure', async () => {
    const sink = fakeSink();

    const outcome = await exportReport(sink, makeTree(), { format: 'pdf', outputPath: 'out.pdf', reportType: 'executive' });

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBeInstanceOf(UnsupportedFormatError);
      expect(outcome.error.message).toBe('Unsupported output format "pdf". Use one of: excel, json, csv');
    }
  });

  it('turns a sink refusal into a failure', async () => {
    const outcome = await exportReport(fakeSink(false), makeTree(), {
      format: 'csv',
      outputPath: 'out.csv',
      reportType: 'executive',
    });

    expect(outcome).toEqual({ success: false, error: new Error('Failed to export report as csv to out.csv') });
  });

  it('derives default file names from the format', () => {
    expect(defaultReportPath('excel')).toBe('knowledge_expiry_report.xlsx');
    expect(defaultReportPath('csv')).toBe('knowledge_expiry_report.csv');
  });
});
