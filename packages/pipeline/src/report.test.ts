/**
 * Unit tests for the report workflow
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ExportSink, ReportTree, ReportType } from '@kexp/core';
import { SqliteStructuredStore } from '@kexp/db';
import { FileExportSink } from '@kexp/export';
import { AnalyzeWorkflow } from './analyze.js';
import { ReportWorkflow, reportTitle } from './report.js';
import { InMemoryDocumentSource, InMemoryVectorStore, ScriptedInference, analysisText } from './__tests__/fakes.js';

const NOW = new Date('2024-06-01T00:00:00.000Z');

const NARRATIVE = [
  '**EXECUTIVE_SUMMARY:**',
  'Two documents need attention.',
  '',
  '**EXPIRED_KNOWLEDGE_COUNT:**',
  '3',
  '',
  '**CRITICAL_FINDINGS:**',
  '- Finding: Runtime is end-of-life',
  '- Impact: Security patches stop',
  '- Recommendation: Upgrade',
  '',
  '**RECOMMENDATIONS:**',
  '- Schedule quarterly reviews',
  '- Assign owners',
  '',
  '**ACTION_ITEMS:**',
  '- Task: Move to Node 20',
  '- Priority: High',
  '- Owner: Platform',
].join('\n');

const ANALYSES = {
  'runtime.md': analysisText({
    summary: 'Runtime guide',
    points: [
      { point: 'Node 16 runtime', category: 'technical', urgency: 'critical' },
      { point: 'Legacy CI', category: 'process', urgency: 'low', lastUpdated: '2020-01-01' },
    ],
    indicators: ['Node 16'],
    confidence: '0.9',
  }),
  'policy.md': analysisText({
    summary: 'Refund policy',
    points: [{ point: 'Refund window', category: 'policy', urgency: 'high' }],
    confidence: '0.6',
  }),
};

interface RecordedExport {
  format: string;
  tree: ReportTree;
  path: string;
  reportType?: ReportType;
}

class RecordingSink implements ExportSink {
  readonly exports: RecordedExport[] = [];
  result = true;

  async writeExcel(tree: ReportTree, path: string, reportType: ReportType): Promise<boolean> {
    this.exports.push({ format: 'excel', tree, path, reportType });
    return this.result;
  }

  async writeJson(tree: ReportTree, path: string): Promise<boolean> {
    this.exports.push({ format: 'json', tree, path });
    return this.result;
  }

  async writeCsv(tree: ReportTree, path: string): Promise<boolean> {
    this.exports.push({ format: 'csv', tree, path });
    return this.result;
  }
}

function lastTree(sink: RecordingSink): ReportTree {
  const recorded = sink.exports.at(-1);
  if (!recorded) throw new Error('nothing exported');
  return recorded.tree;
}

describe('ReportWorkflow', () => {
  let store: SqliteStructuredStore;
  let vectors: InMemoryVectorStore;
  let sink: RecordingSink;

  beforeEach(() => {
    store = SqliteStructuredStore.open(':memory:', { now: () => NOW });
    vectors = new InMemoryVectorStore();
    sink = new RecordingSink();
  });

  afterEach(() => {
    store.close();
  });

  async function populate(inference: ScriptedInference): Promise<void> {
    const source = new InMemoryDocumentSource([
      { filename: 'runtime.md', content: 'Runs on Node 16', createdAt: new Date('2024-05-25T00:00:00.000Z') },
      { filename: 'policy.md', content: 'Refunds within 14 days', createdAt: new Date('2024-05-28T00:00:00.000Z') },
    ]);
    await new AnalyzeWorkflow({ source, inference, vectors, store }, { now: () => NOW }).run({
      root: '/docs',
      extensions: ['.md'],
    });
  }

  function workflow(inference: ScriptedInference): ReportWorkflow {
    return new ReportWorkflow({ store, vectors, inference, sink }, { now: () => NOW });
  }

  it('assembles and exports the full report', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
    await populate(inference);

    const summary = await workflow(inference).run({ outputPath: '/out/report.json', format: 'json' });

    expect(summary).toMatchObject({
      status: 'completed',
      outputFile: '/out/report.json',
      documentsAnalyzed: 2,
      expiredKnowledge: 3,
      criticalFindings: 1,
      recommendations: 2,
      errors: [],
      durationSeconds: 0,
    });

    expect(sink.exports).toHaveLength(1);
    expect(sink.exports[0]?.format).toBe('json');
    const tree = lastTree(sink);
    expect(Object.keys(tree)).toEqual([
      'metadata',
      'executive_summary',
      'critical_findings',
      'critical_points',
      'document_analysis',
      'expiry_analysis',
      'timeline_analysis',
      'recommendations',
      'appendix',
    ]);
    expect(tree.metadata).toMatchObject({
      report_type: 'comprehensive',
      generated_at: '2024-06-01T00:00:00.000Z',
      total_documents: 2,
      total_critical_points: 3,
      analysis_model: 'test-model',
      filter: { urgency: null },
    });
    expect(tree.executive_summary.overview).toBe('Two documents need attention.');
    expect(tree.executive_summary.key_metrics.high_priority_items).toBe(2);
    expect(tree.executive_summary.key_metrics.average_confidence).toBeCloseTo(0.75);
    expect(tree.critical_findings).toEqual([
      { finding: 'Runtime is end-of-life', impact: 'Security patches stop', recommendation: 'Upgrade' },
    ]);
    expect(tree.timeline_analysis.timeline_categories).toEqual({
      immediate_attention: 1,
      next_30_days: 1,
      next_90_days: 0,
      next_6_months: 1,
      annual_review: 0,
    });
    expect(tree.document_analysis.document_age_distribution).toEqual({ recent: 2, moderate: 0, old: 0 });
    expect(tree.expiry_analysis.most_common_indicators).toEqual([['Node 16', 2]]);
    expect(tree.recommendations).toEqual({
      strategic: ['Schedule quarterly reviews', 'Assign owners'],
      action_items: [{ task: 'Move to Node 20', priority: 'High', owner: 'Platform' }],
    });
    expect(tree.appendix.critical_point_statistics.by_urgency).toEqual({ low: 1, medium: 0, high: 1, critical: 1 });
    expect(tree.appendix.vector_db_statistics).toMatchObject({ vectors_count: 2, status: 'green' });

    expect(inference.reportRequests[0]?.documents).toHaveLength(2);
    expect(inference.reportRequests[0]?.points).toHaveLength(3);

    const record = await store.getReport(summary.reportId);
    expect(record).toMatchObject({
      status: 'completed',
      outputFormat: 'json',
      outputPath: '/out/report.json',
      reportType: 'comprehensive',
      documentsIncluded: 2,
      expiredKnowledgeCount: 3,
      criticalFindingsCount: 1,
      recommendationsCount: 2,
      generatedByModel: 'test-model',
    });
  });

  it('passes the report type to the spreadsheet writer', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
    await populate(inference);

    await workflow(inference).run({ outputPath: '/out/report.xlsx', format: 'Excel', reportType: 'executive' });

    expect(sink.exports[0]).toMatchObject({ format: 'excel', path: '/out/report.xlsx', reportType: 'executive' });
  });

  it('filters critical points by urgency', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
    await populate(inference);

    const summary = await workflow(inference).run({ outputPath: '/out/r.json', format: 'json', urgency: 'CRITICAL' });

    expect(summary.status).toBe('completed');
    const tree = lastTree(sink);
    expect(tree.metadata.filter).toEqual({ urgency: 'critical' });
    expect(tree.critical_points.detailed_list.map((point) => point.description)).toEqual(['Node 16 runtime']);
    expect(tree.critical_points.by_urgency.high).toEqual([]);
    expect(tree.appendix.critical_point_statistics.total_critical_points).toBe(3);
  });

  it('fails the run on an unknown urgency filter', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
    await populate(inference);

    const summary = await workflow(inference).run({ outputPath: '/out/r.json', format: 'json', urgency: 'urgent' });

    expect(summary.status).toBe('error');
    expect(summary.errors).toEqual(['Workflow error: Unknown urgency "urgent" (expected one of: low, medium, high, critical)']);
    expect(sink.exports).toEqual([]);
    expect((await store.getReport(summary.reportId))?.status).toBe('error');
  });

  it('completes without exporting when nothing has been analyzed', async () => {
    const inference = new ScriptedInference({ report: NARRATIVE });

    const summary = await workflow(inference).run({ outputPath: '/out/r.json', format: 'json' });

    expect(summary.status).toBe('no_data');
    expect(summary.durationSeconds).toBeUndefined();
    expect(sink.exports).toEqual([]);
    expect(inference.reportRequests).toEqual([]);
    const record = await store.getReport(summary.reportId);
    expect(record?.status).toBe('completed');
    expect(record?.outputPath).toBeNull();
  });

  it('reports an unsupported format as an export failure', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
    await populate(inference);

    const summary = await workflow(inference).run({ outputPath: '/out/r.pdf', format: 'pdf' });

    expect(summary.status).toBe('export_failed');
    expect(summary.errors).toEqual([
      'Failed to export report: Unsupported output format "pdf". Use one of: excel, json, csv',
    ]);
    const record = await store.getReport(summary.reportId);
    expect(record?.status).toBe('error');
    expect(record?.outputPath).toBeNull();
    expect(record?.outputFormat).toBe('pdf');
  });

  it('reports a sink that could not write', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
    await populate(inference);
    sink.result = false;

    const summary = await workflow(inference).run({ outputPath: '/out/r.csv', format: 'csv' });

    expect(summary.status).toBe('export_failed');
    expect(summary.errors).toEqual(['Failed to export report: Failed to export report as csv to /out/r.csv']);
  });

  it('still exports when the narrative call fails', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, failReport: true });
    await populate(inference);

    const summary = await workflow(inference).run({ outputPath: '/out/r.json', format: 'json' });

    expect(summary.status).toBe('completed');
    expect(summary.expiredKnowledge).toBe(0);
    expect(lastTree(sink).executive_summary.overview).toBe('Report generation failed');
  });

  it('records unavailable vector statistics in the appendix', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
    await populate(inference);
    vectors.failStats = true;

    const summary = await workflow(inference).run({ outputPath: '/out/r.json', format: 'json' });

    expect(summary.status).toBe('completed');
    expect(lastTree(sink).appendix.vector_db_statistics).toEqual({ error: 'collection missing' });
  });

  it('derives the same analytics on repeated runs', async () => {
    const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
    await populate(inference);

    await workflow(inference).run({ outputPath: '/out/a.json', format: 'json' });
    await workflow(inference).run({ outputPath: '/out/b.json', format: 'json' });

    const [first, second] = sink.exports.map((recorded) => recorded.tree);
    expect(second?.critical_points).toEqual(first?.critical_points);
    expect(second?.document_analysis).toEqual(first?.document_analysis);
    expect(second?.expiry_analysis).toEqual(first?.expiry_analysis);
    expect(second?.timeline_analysis).toEqual(first?.timeline_analysis);
  });

  it('writes a readable JSON file through the file sink', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'kexp-report-'));
    try {
      const inference = new ScriptedInference({ analyses: ANALYSES, report: NARRATIVE });
      await populate(inference);
      const outputPath = join(dir, 'nested', 'report.json');

      const summary = await new ReportWorkflow(
        { store, vectors, inference, sink: new FileExportSink() },
        { now: () => NOW }
      ).run({ outputPath, format: 'json', reportType: 'detailed' });

      expect(summary.status).toBe('completed');
      const written: unknown = JSON.parse(await readFile(outputPath, 'utf8'));
      expect(written).toMatchObject({ metadata: { report_type: 'detailed', total_critical_points: 3 } });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('reportTitle', () => {
  it('formats the local date and time', () => {
    expect(reportTitle(new Date(2024, 5, 1, 9, 5))).toBe('Knowledge Expiry Report - 2024-06-01 09:05');
  });
});
