/**
 * Per-document pipeline: load, analyze, embed, then write the vector store
 * followed by the relational store
 */

import pino from 'pino';
import {
  emptyUrgencyCounts,
  errorMessage,
  MissingEmbeddingError,
  PartialWriteError,
  type DocumentDescriptor,
  type DocumentSource,
  type DocumentVectorPayload,
  type LoadedDocument,
  type NewCriticalPoint,
  type StructuredStore,
  type UrgencyCounts,
  type VectorStore,
} from '@kexp/core';
import type { EnumDecoding } from '@kexp/config';
import { failedAnalysis, parseAnalysisResponse, type AnalysisResult, type InferenceProvider } from '@kexp/llm';
import { toNewCriticalPoints } from './drafts.js';
import { buildDefaultRecommendations } from './recommendations.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

/** Characters of content sent to the embedding model */
export const EMBEDDING_INPUT_CHARS = 8000;

export interface DocumentStageDeps {
  source: DocumentSource;
  inference: InferenceProvider;
  vectors: VectorStore;
  store: StructuredStore;
}

export interface DocumentStageOptions {
  enumDecoding: EnumDecoding;
  now?: () => Date;
}

export interface DocumentStageResult {
  documentId: number;
  vectorId: string;
  criticalPointCount: number;
  recommendationsCreated: number;
  confidenceScore: number;
  urgencyCounts: UrgencyCounts;
}

export type DocumentStageOutcome =
  | { status: 'stored'; result: DocumentStageResult }
  | { status: 'skipped'; reason: string };

export class DocumentStage {
  private readonly deps: DocumentStageDeps;
  private readonly enumDecoding: EnumDecoding;
  private readonly now: () => Date;

  constructor(deps: DocumentStageDeps, options: DocumentStageOptions) {
    this.deps = deps;
    this.enumDecoding = options.enumDecoding;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Skips (without writing) on empty content or a missing embedding; throws
   * on undecodable output in strict mode and on any store failure. A
   * relational failure after the upsert throws `PartialWriteError`.
   */
  async process(descriptor: DocumentDescriptor, sessionId: string): Promise<DocumentStageOutcome> {
    const log = logger.child({ filename: descriptor.filename, sessionId });
    log.info({ event: 'pipeline.document.start' }, `Processing document: ${descriptor.filename}`);

    const document = await this.deps.source.load(descriptor);
    if (document.content.trim().length === 0) {
      log.warn({ event: 'pipeline.document.empty' }, `No content loaded for ${descriptor.filename}`);
      return { status: 'skipped', reason: 'No content loaded' };
    }

    const analysis = await this.analyze(document);
    const embedding = await this.deps.inference.embed(document.content.slice(0, EMBEDDING_INPUT_CHARS));
    if (!embedding) {
      const reason = new MissingEmbeddingError(descriptor.filename).message;
      log.warn({ event: 'pipeline.document.no_embedding' }, reason);
      return { status: 'skipped', reason };
    }

    const model = this.deps.inference.modelName;
    const points = toNewCriticalPoints(analysis, this.enumDecoding, model);

    const vectorId = await this.deps.vectors.upsert({
      vector: embedding,
      payload: this.buildPayload(document, analysis, points, sessionId),
    });

    const record = await this.deps.store
      .createDocument({
        vectorId,
        filePath: document.filePath,
        filename: document.filename,
        fileType: document.fileType,
        fileSize: document.fileSize,
        mimeType: document.mimeType,
        modifiedAt: document.modifiedAt,
        status: 'processing',
      })
      .catch((error: unknown) => {
        log.error(
          { event: 'pipeline.document.create_fail', vectorId, error: errorMessage(error) },
          `Error recording document ${descriptor.filename}`
        );
        throw new PartialWriteError(error, vectorId);
      });

    try {
      const created = await this.deps.store.createCriticalPoints(record.id, points);
      const recommendations = buildDefaultRecommendations(created, model);
      const createdRecommendations =
        recommendations.length > 0 ? await this.deps.store.createRecommendations(recommendations) : [];

      await this.deps.store.updateDocumentAnalysis(record.id, {
        contentSummary: analysis.summary,
        analysisConfidence: analysis.confidenceScore,
      });

      const urgencyCounts = emptyUrgencyCounts();
      for (const point of created) {
        urgencyCounts[point.urgency]++;
      }

      const result: DocumentStageResult = {
        documentId: record.id,
        vectorId,
        criticalPointCount: created.length,
        recommendationsCreated: createdRecommendations.length,
        confidenceScore: analysis.confidenceScore,
        urgencyCounts,
      };
      log.info(
        { event: 'pipeline.document.done', documentId: record.id, criticalPoints: result.criticalPointCount },
        `Successfully processed ${descriptor.filename} - ${result.criticalPointCount} critical points found`
      );
      return { status: 'stored', result };
    } catch (error: unknown) {
      log.error(
        { event: 'pipeline.document.fail', documentId: record.id, vectorId, error: errorMessage(error) },
        `Error processing document ${descriptor.filename}`
      );
      await this.markFailed(record.id);
      throw new PartialWriteError(error, vectorId);
    }
  }

  private async analyze(document: LoadedDocument): Promise<AnalysisResult> {
    try {
      const response = await this.deps.inference.analyze(document.content, {
        filename: document.filename,
        fileType: document.fileType,
        fileSize: document.fileSize,
        modifiedAt: document.modifiedAt,
      });
      return parseAnalysisResponse(response);
    } catch (error: unknown) {
      logger.error(
        { event: 'pipeline.analysis.fail', filename: document.filename, error: errorMessage(error) },
        'Document analysis failed, continuing with empty result'
      );
      return failedAnalysis();
    }
  }

  private buildPayload(
    document: LoadedDocument,
    analysis: AnalysisResult,
    points: NewCriticalPoint[],
    sessionId: string
  ): DocumentVectorPayload {
    const at = this.now().toISOString();
    return {
      document_path: document.filePath,
      filename: document.filename,
      content_summary: analysis.summary,
      analysis_result: {
        critical_points: points.map((point, index) => ({
          description: point.description,
          category: point.category,
          urgency: point.urgency,
          source: analysis.criticalPoints[index]?.source ?? 'current',
        })),
        expiry_indicators: analysis.expiryIndicators,
        recommendations: analysis.recommendations,
        confidence_score: analysis.confidenceScore,
      },
      metadata: {
        file_size: document.fileSize,
        mime_type: document.mimeType,
        session_id: sessionId,
        file_created_at: document.createdAt ? document.createdAt.toISOString() : null,
        file_modified_at: document.modifiedAt ? document.modifiedAt.toISOString() : null,
      },
      created_at: at,
      updated_at: at,
    };
  }

  private async markFailed(documentId: number): Promise<void> {
    try {
      await this.deps.store.markDocumentFailed(documentId);
    } catch (error: unknown) {
      logger.error(
        { event: 'pipeline.document.status_fail', documentId, error: errorMessage(error) },
        'Could not mark document as failed'
      );
    }
  }
}
