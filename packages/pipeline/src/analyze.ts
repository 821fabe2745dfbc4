/**
 * Analyze orchestrator
 *
 * Opens an analysis session, discovers documents, runs them through the
 * document stage in sequential batches (documents within a batch run
 * concurrently) and closes the session once with the final counts.
 */

import pino from 'pino';
import {
  emptyUrgencyCounts,
  errorMessage,
  partition,
  URGENCY_LEVELS,
  type DocumentDescriptor,
  type DocumentSource,
  type StructuredStore,
  type UrgencyCounts,
  type VectorStore,
} from '@kexp/core';
import type { EnumDecoding } from '@kexp/config';
import type { InferenceProvider } from '@kexp/llm';
import { DocumentStage, type DocumentStageOutcome } from './document-stage.js';
import { createSessionJournal, type SessionJournal } from './journal.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const DEFAULT_BATCH_SIZE = 10;

export interface AnalyzeDeps {
  source: DocumentSource;
  inference: InferenceProvider;
  vectors: VectorStore;
  store: StructuredStore;
}

export interface AnalyzeWorkflowOptions {
  batchSize?: number;
  enumDecoding?: EnumDecoding;
  now?: () => Date;
}

export interface AnalyzeRequest {
  root: string;
  recursive?: boolean;
  /** Lower-case extensions with the leading dot */
  extensions: readonly string[];
  /** Checked before each batch; remaining batches are abandoned once aborted */
  signal?: AbortSignal;
}

export interface AnalyzeSummary {
  sessionId: string;
  filesProcessed: number;
  filesFailed: number;
  criticalPointsFound: number;
  documentsStored: number;
  batchesRun: number;
  errors: string[];
}

export class AnalyzeWorkflow {
  private readonly deps: AnalyzeDeps;
  private readonly batchSize: number;
  private readonly stage: DocumentStage;

  constructor(deps: AnalyzeDeps, options: AnalyzeWorkflowOptions = {}) {
    this.deps = deps;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.stage = new DocumentStage(deps, {
      enumDecoding: options.enumDecoding ?? 'strict',
      now: options.now,
    });
  }

  async run(request: AnalyzeRequest): Promise<AnalyzeSummary> {
    const journal = createSessionJournal(this.deps.store);
    const session = await journal.open({
      analysisModel: this.deps.inference.modelName,
      fileTypesAnalyzed: [...request.extensions],
      directoriesScanned: [request.root],
    });

    const log = logger.child({ sessionId: session.sessionId });
    log.info({ event: 'pipeline.analyze.start', root: request.root }, `Starting analyze workflow for: ${request.root}`);

    const summary: AnalyzeSummary = {
      sessionId: session.sessionId,
      filesProcessed: 0,
      filesFailed: 0,
      criticalPointsFound: 0,
      documentsStored: 0,
      batchesRun: 0,
      errors: [],
    };
    const urgencyCounts = emptyUrgencyCounts();
    let status: 'completed' | 'error' = 'completed';

    try {
      const documents = await this.discover(request);
      if (documents.length === 0) {
        log.warn({ event: 'pipeline.analyze.empty', root: request.root }, 'No documents found to analyze');
      } else {
        log.info({ event: 'pipeline.analyze.discovered', count: documents.length }, `Found ${documents.length} documents to analyze`);
      }

      const batches = partition(documents, this.batchSize);
      for (const [index, batch] of batches.entries()) {
        if (request.signal?.aborted) {
          throw new Error(`Analysis aborted after ${index} of ${batches.length} batches`);
        }

        const settled = await Promise.allSettled(batch.map((document) => this.stage.process(document, session.sessionId)));
        summary.batchesRun++;
        settled.forEach((outcome, position) => {
          const document = batch[position];
          if (document) this.record(summary, urgencyCounts, document, outcome);
        });

        log.info(
          { event: 'pipeline.batch.done', batch: index + 1, batches: batches.length, documents: batch.length },
          `Processed batch ${index + 1}/${batches.length}`
        );
      }
    } catch (error: unknown) {
      status = 'error';
      summary.errors.push(`Workflow error: ${errorMessage(error)}`);
      log.error({ event: 'pipeline.analyze.fail', error: errorMessage(error) }, 'Analyze workflow failed');
    }

    await this.closeSession(journal, summary, urgencyCounts, status);
    log.info(
      {
        event: 'pipeline.analyze.done',
        status,
        processed: summary.filesProcessed,
        failed: summary.filesFailed,
        criticalPoints: summary.criticalPointsFound,
      },
      `Analyze workflow ${status}`
    );
    return summary;
  }

  private async discover(request: AnalyzeRequest): Promise<DocumentDescriptor[]> {
    const documents: DocumentDescriptor[] = [];
    for await (const descriptor of this.deps.source.discover(request.root, {
      recursive: request.recursive ?? true,
      extensions: request.extensions,
    })) {
      documents.push(descriptor);
    }
    return documents;
  }

  private record(
    summary: AnalyzeSummary,
    urgencyCounts: UrgencyCounts,
    document: DocumentDescriptor,
    outcome: PromiseSettledResult<DocumentStageOutcome>
  ): void {
    if (outcome.status === 'rejected') {
      summary.filesFailed++;
      summary.errors.push(`Document ${document.filename}: ${errorMessage(outcome.reason)}`);
      return;
    }
    if (outcome.value.status === 'skipped') {
      summary.filesFailed++;
      summary.errors.push(`Document ${document.filename}: ${outcome.value.reason}`);
      return;
    }

    const result = outcome.value.result;
    summary.filesProcessed++;
    summary.documentsStored++;
    summary.criticalPointsFound += result.criticalPointCount;
    for (const level of URGENCY_LEVELS) {
      urgencyCounts[level] += result.urgencyCounts[level];
    }
  }

  /**
   * A failed close is reported in the summary; the counts are still returned
   */
  private async closeSession(
    journal: SessionJournal,
    summary: AnalyzeSummary,
    urgencyCounts: UrgencyCounts,
    status: 'completed' | 'error'
  ): Promise<void> {
    try {
      await journal.close({
        status,
        documentsAnalyzed: summary.filesProcessed,
        criticalPointsFound: summary.criticalPointsFound,
        urgencyCounts,
        errorDetails: [...summary.errors],
      });
    } catch (error: unknown) {
      summary.errors.push(`Session update failed: ${errorMessage(error)}`);
      logger.error(
        { event: 'pipeline.session.close_fail', sessionId: summary.sessionId, error: errorMessage(error) },
        'Could not close analysis session'
      );
    }
  }
}
