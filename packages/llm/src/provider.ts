/**
 * Inference provider backed by the LLM client
 */

import pino from 'pino';
import { buildAnalysisPrompt, buildReportPrompt, ANALYSIS_SYSTEM_PROMPT, REPORT_SYSTEM_PROMPT } from './prompts.js';
import type {
  AnalysisMetadata,
  InferenceProvider,
  LlmClient,
  ReportDocumentInput,
  ReportPointInput,
} from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ANALYSIS_MAX_TOKENS = 2000;
const REPORT_MAX_TOKENS = 3000;
const TEMPERATURE = 0.1;

export function createInferenceProvider(client: LlmClient): InferenceProvider {
  return {
    modelName: client.model,

    async analyze(content: string, metadata: AnalysisMetadata): Promise<string> {
      logger.debug(
        { event: 'inference.analyze', filename: metadata.filename, contentLength: content.length },
        'Requesting document analysis'
      );
      return client.complete({
        system: ANALYSIS_SYSTEM_PROMPT,
        user: buildAnalysisPrompt(content, metadata),
        temperature: TEMPERATURE,
        maxTokens: ANALYSIS_MAX_TOKENS,
      });
    },

    async embed(text: string): Promise<number[] | null> {
      try {
        const vector = await client.embed(text);
        return vector.length > 0 ? vector : null;
      } catch (error: unknown) {
        logger.error(
          { event: 'inference.embed.fail', error: error instanceof Error ? error.message : String(error) },
          'Error generating embedding'
        );
        return null;
      }
    },

    async summarizeReport(documents: ReportDocumentInput[], points: ReportPointInput[]): Promise<string> {
      logger.debug(
        { event: 'inference.report', documents: documents.length, criticalPoints: points.length },
        'Requesting report narrative'
      );
      return client.complete({
        system: REPORT_SYSTEM_PROMPT,
        user: buildReportPrompt(documents, points),
        temperature: TEMPERATURE,
        maxTokens: REPORT_MAX_TOKENS,
      });
    },
  };
}
