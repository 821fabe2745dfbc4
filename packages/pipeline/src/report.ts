/**
 * Report aggregator: gathers stored analysis, asks the model for a narrative,
 * derives analytics and hands the assembled tree to the export boundary
 */

import pino from 'pino';
import {
  decodeUrgency,
  errorMessage,
  type CriticalPointsSummary,
  type CriticalPointWithDocument,
  type DocumentsSummary,
  type ExportSink,
  type ReportTree,
  type ReportType,
  type StructuredStore,
  type UrgencyLevel,
  type VectorDbStatistics,
  type VectorRecord,
  type VectorStore,
} from '@kexp/core';
import { exportReport } from '@kexp/export';
import {
  failedReport,
  MAX_REPORT_DOCUMENTS,
  MAX_REPORT_POINTS,
  parseReportResponse,
  type InferenceProvider,
  type ReportAnalysis,
} from '@kexp/llm';
import {
  analyzeDocuments,
  analyzeExpiryIndicators,
  averagePayloadConfidence,
  buildTimeline,
  groupByCategory,
  groupByUrgency,
  toReportPoint,
} from './analytics.js';
import { createReportJournal, type ReportJournal } from './journal.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/** Upper bound on vector records read for one report */
export const MAX_REPORT_VECTOR_RECORDS = 1000;

export interface ReportData {
  documents: VectorRecord[];
  criticalPoints: CriticalPointWithDocument[];
  documentsSummary: DocumentsSummary;
  criticalPointsSummary: CriticalPointsSummary;
  vectorStats: VectorDbStatistics;
}

export interface ReportTreeInput extends ReportData {
  reportType: ReportType;
  urgencyFilter: UrgencyLevel | null;
  analysisModel: string;
  narrative: ReportAnalysis;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * "Knowledge Expiry Report - YYYY-MM-DD HH:MM" in local time
 */
export function reportTitle(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `Knowledge Expiry Report - ${day} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function buildReportTree(input: ReportTreeInput, now: Date): ReportTree {
  const points = input.criticalPoints.map(toReportPoint);
  const byUrgency = groupByUrgency(points);
  const { documentsSummary, criticalPointsSummary, narrative } = input;

  return {
    metadata: {
      report_type: input.reportType,
      generated_at: now.toISOString(),
      total_documents: input.documents.length,
      total_critical_points: points.length,
      analysis_model: input.analysisModel,
      filter: { urgency: input.urgencyFilter },
    },
    executive_summary: {
      overview: narrative.executiveSummary,
      key_metrics: {
        documents_analyzed: input.documents.length,
        critical_points_identified: points.length,
        expired_knowledge_items: narrative.expiredKnowledgeCount,
        high_priority_items: byUrgency.high.length + byUrgency.critical.length,
        average_confidence: averagePayloadConfidence(input.documents),
      },
    },
    critical_findings: narrative.criticalFindings.map((finding) => ({ ...finding })),
    critical_points: {
      by_urgency: byUrgency,
      by_category: groupByCategory(points),
      detailed_list: points,
    },
    document_analysis: analyzeDocuments(input.documents, now),
    expiry_analysis: analyzeExpiryIndicators(points),
    timeline_analysis: buildTimeline(points, now),
    recommendations: {
      strategic: [...narrative.recommendations],
      action_items: narrative.actionItems.map((item) => ({ ...item })),
    },
    appendix: {
      database_statistics: {
        total_documents: documentsSummary.totalDocuments,
        analyzed_documents: documentsSummary.analyzedDocuments,
        average_confidence: documentsSummary.averageConfidence,
        analysis_completion_rate: documentsSummary.analysisCompletionRate,
      },
      critical_point_statistics: {
        total_critical_points: criticalPointsSummary.totalCriticalPoints,
        by_urgency: { ...criticalPointsSummary.byUrgency },
        by_category: { ...criticalPointsSummary.byCategory },
      },
      vector_db_statistics: input.vectorStats,
    },
  };
}

export interface ReportDeps {
  store: StructuredStore;
  vectors: VectorStore;
  inference: InferenceProvider;
  sink: ExportSink;
}

export interface ReportWorkflowOptions {
  now?: () => Date;
}

export interface ReportRequest {
  outputPath: string;
  /** Format tag, checked by the export boundary */
  format: string;
  reportType?: ReportType;
  /** Only include critical points of this urgency */
  urgency?: string | null;
}

export type ReportWorkflowStatus = 'completed' | 'no_data' | 'export_failed' | 'error';

export interface ReportSummary {
  reportId: string;
  outputFile: string;
  documentsAnalyzed: number;
  expiredKnowledge: number;
  criticalFindings: number;
  recommendations: number;
  status: ReportWorkflowStatus;
  errors: string[];
  durationSeconds?: number;
}

export class ReportWorkflow {
  private readonly deps: ReportDeps;
  private readonly now: () => Date;

  constructor(deps: ReportDeps, options: ReportWorkflowOptions = {}) {
    this.deps = deps;
    this.now = options.now ?? (() => new Date());
  }

  async run(request: ReportRequest): Promise<ReportSummary> {
    const startedAt = this.now();
    const reportType = request.reportType ?? 'comprehensive';
    const journal = createReportJournal(this.deps.store);
    const report = await journal.open({
      title: reportTitle(startedAt),
      reportType,
      outputFormat: request.format.trim().toLowerCase(),
      generatedByModel: this.deps.inference.modelName,
    });

    const log = logger.child({ reportId: report.reportId });
    log.info({ event: 'report.start', reportType, format: request.format }, 'Starting report workflow');

    const summary: ReportSummary = {
      reportId: report.reportId,
      outputFile: request.outputPath,
      documentsAnalyzed: 0,
      expiredKnowledge: 0,
      criticalFindings: 0,
      recommendations: 0,
      status: 'error',
      errors: [],
    };

    try {
      const urgency = request.urgency ? decodeUrgency(request.urgency) : null;
      const data = await this.gather(urgency);

      if (data.documents.length === 0 && data.criticalPoints.length === 0) {
        log.warn({ event: 'report.no_data' }, 'No data found for report generation');
        summary.status = 'no_data';
      } else {
        summary.documentsAnalyzed = data.documents.length;
        const narrative = await this.narrate(data);
        summary.expiredKnowledge = narrative.expiredKnowledgeCount;
        summary.criticalFindings = narrative.criticalFindings.length;
        summary.recommendations = narrative.recommendations.length;

        const tree = buildReportTree(
          { ...data, reportType, urgencyFilter: urgency, analysisModel: this.deps.inference.modelName, narrative },
          this.now()
        );

        const exported = await exportReport(this.deps.sink, tree, {
          format: request.format,
          outputPath: request.outputPath,
          reportType,
        });
        if (exported.success) {
          summary.status = 'completed';
        } else {
          summary.status = 'export_failed';
          summary.errors.push(`Failed to export report: ${exported.error.message}`);
        }
      }
    } catch (error: unknown) {
      summary.status = 'error';
      summary.errors.push(`Workflow error: ${errorMessage(error)}`);
      log.error({ event: 'report.fail', error: errorMessage(error) }, 'Report workflow failed');
    }

    const durationSeconds = (this.now().getTime() - startedAt.getTime()) / 1000;
    await this.closeReport(journal, summary, request.outputPath, durationSeconds);
    if (summary.status === 'completed') {
      summary.durationSeconds = durationSeconds;
      log.info(
        { event: 'report.done', durationSeconds, outputFile: request.outputPath },
        `Report workflow completed in ${durationSeconds.toFixed(2)} seconds`
      );
    }
    return summary;
  }

  private async gather(urgency: UrgencyLevel | null): Promise<ReportData> {
    const page = await this.deps.vectors.scrollAll(MAX_REPORT_VECTOR_RECORDS);
    const criticalPoints = await this.deps.store.listCriticalPoints(urgency ? { urgency } : {});
    const documentsSummary = await this.deps.store.getDocumentsSummary();
    const criticalPointsSummary = await this.deps.store.getCriticalPointsSummary();

    return {
      documents: page.records,
      criticalPoints,
      documentsSummary,
      criticalPointsSummary,
      vectorStats: await this.vectorStats(),
    };
  }

  private async vectorStats(): Promise<VectorDbStatistics> {
    try {
      const stats = await this.deps.vectors.stats();
      return {
        vectors_count: stats.vectorsCount,
        indexed_vectors_count: stats.indexedVectorsCount,
        points_count: stats.pointsCount,
        segments_count: stats.segmentsCount,
        status: stats.status,
        optimizer_status: stats.optimizerStatus,
      };
    } catch (error: unknown) {
      logger.warn({ event: 'report.vector_stats.fail', error: errorMessage(error) }, 'Vector store statistics unavailable');
      return { error: errorMessage(error) };
    }
  }

  private async narrate(data: ReportData): Promise<ReportAnalysis> {
    const documents = data.documents.slice(0, MAX_REPORT_DOCUMENTS).map(({ payload }) => ({
      filename: payload.filename,
      summary: payload.content_summary,
    }));
    const points = data.criticalPoints.slice(0, MAX_REPORT_POINTS).map((point) => ({
      description: point.description,
      urgency: point.urgency,
    }));

    try {
      return parseReportResponse(await this.deps.inference.summarizeReport(documents, points));
    } catch (error: unknown) {
      logger.error({ event: 'report.narrative.fail', error: errorMessage(error) }, 'Report narrative generation failed');
      return failedReport();
    }
  }

  private async closeReport(
    journal: ReportJournal,
    summary: ReportSummary,
    outputPath: string,
    durationSeconds: number
  ): Promise<void> {
    const succeeded = summary.status === 'completed' || summary.status === 'no_data';
    try {
      await journal.close({
        status: succeeded ? 'completed' : 'error',
        outputPath: summary.status === 'completed' ? outputPath : null,
        documentsIncluded: summary.documentsAnalyzed,
        expiredKnowledgeCount: summary.expiredKnowledge,
        criticalFindingsCount: summary.criticalFindings,
        recommendationsCount: summary.recommendations,
        generationDurationSeconds: durationSeconds,
      });
    } catch (error: unknown) {
      summary.errors.push(`Report record update failed: ${errorMessage(error)}`);
      logger.error(
        { event: 'report.journal.close_fail', reportId: summary.reportId, error: errorMessage(error) },
        'Could not close report record'
      );
    }
  }
}
