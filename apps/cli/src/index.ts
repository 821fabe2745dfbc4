/**
 * kexp command-line entry
 *
 * Usage: kexp analyze ./docs --types md,pdf
 *        kexp report --format json --output report.json
 *        kexp status
 */

import './env.js';
import { resolve } from 'path';
import pino from 'pino';
import { loadSettings, requireEnv, type Settings } from '@kexp/config';
import { errorMessage } from '@kexp/core';
import { SqliteStructuredStore } from '@kexp/db';
import { defaultReportPath, FileExportSink, resolveExportFormat } from '@kexp/export';
import { FileSystemDocumentSource, normalizeExtensions } from '@kexp/knowledge';
import { createInferenceProvider, createLlmClient, type InferenceProvider } from '@kexp/llm';
import { AnalyzeWorkflow, ReportWorkflow } from '@kexp/pipeline';
import { QdrantVectorStore } from '@kexp/vectors';
import { parseArgs, USAGE, UsageError, type AnalyzeArgs, type ReportArgs } from './args.js';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  },
});

function createInference(settings: Settings, timeoutMs?: number): InferenceProvider {
  const client = createLlmClient({
    apiKey: settings.ai.apiKey ?? requireEnv('OPENAI_API_KEY'),
    baseUrl: settings.ai.baseUrl,
    model: settings.ai.model,
    embeddingModel: settings.ai.embeddingModel,
    timeout: timeoutMs ?? settings.ai.timeoutMs,
    maxRetries: settings.ai.maxRetries,
  });
  return createInferenceProvider(client);
}

function createVectorStore(settings: Settings): QdrantVectorStore {
  return new QdrantVectorStore({
    url: settings.qdrant.url,
    collection: settings.qdrant.collection,
    apiKey: settings.qdrant.apiKey,
    timeoutMs: settings.qdrant.timeoutMs,
  });
}

async function runAnalyze(args: AnalyzeArgs, settings: Settings): Promise<number> {
  const root = resolve(args.path);
  const extensions = normalizeExtensions(args.types);
  console.log(`🔍 Analyzing documents in: ${root}`);
  console.log(`   File types: ${extensions.join(', ')}`);

  const store = SqliteStructuredStore.open(settings.database.path);
  try {
    const vectors = createVectorStore(settings);
    await vectors.ensureCollection(settings.qdrant.vectorSize);

    const workflow = new AnalyzeWorkflow(
      {
        source: new FileSystemDocumentSource({ maxFileSizeMb: settings.maxFileSizeMb }),
        inference: createInference(settings, args.timeoutMs),
        vectors,
        store,
      },
      { batchSize: args.batchSize ?? settings.batchSize, enumDecoding: settings.enumDecoding }
    );

    const startTime = Date.now();
    const summary = await workflow.run({ root, recursive: args.recursive, extensions });
    const duration = Date.now() - startTime;

    console.log(`\n${summary.errors.length === 0 ? '✅' : '⚠️'} Analysis finished`);
    console.log(`   Session: ${summary.sessionId}`);
    console.log(`   Files processed: ${summary.filesProcessed}`);
    console.log(`   Files failed: ${summary.filesFailed}`);
    console.log(`   Critical points found: ${summary.criticalPointsFound}`);
    console.log(`   Batches: ${summary.batchesRun}`);
    console.log(`   Duration: ${duration}ms`);
    printErrors(summary.errors);

    return summary.errors.some((error) => error.startsWith('Workflow error:')) ? 1 : 0;
  } finally {
    store.close();
  }
}

async function runReport(args: ReportArgs, settings: Settings): Promise<number> {
  const format = resolveExportFormat(args.format);
  const outputPath = resolve(args.output ?? defaultReportPath(format));
  console.log(`📊 Generating ${args.reportType} report (${format})`);

  const store = SqliteStructuredStore.open(settings.database.path);
  try {
    const workflow = new ReportWorkflow({
      store,
      vectors: createVectorStore(settings),
      inference: createInference(settings),
      sink: new FileExportSink(),
    });

    const summary = await workflow.run({ outputPath, format, reportType: args.reportType, urgency: args.urgency });

    switch (summary.status) {
      case 'completed':
        console.log(`\n✅ Report written to: ${summary.outputFile}`);
        console.log(`   Documents analyzed: ${summary.documentsAnalyzed}`);
        console.log(`   Expired knowledge: ${summary.expiredKnowledge}`);
        console.log(`   Critical findings: ${summary.criticalFindings}`);
        console.log(`   Recommendations: ${summary.recommendations}`);
        return 0;
      case 'no_data':
        console.log('\nℹ️  No analyzed documents found. Run "kexp analyze <path>" first.');
        return 0;
      case 'export_failed':
      case 'error':
        console.error(`\n❌ Report generation failed (${summary.status})`);
        printErrors(summary.errors);
        return 1;
    }
  } finally {
    store.close();
  }
}

async function runStatus(settings: Settings): Promise<number> {
  const store = SqliteStructuredStore.open(settings.database.path);
  try {
    const documents = await store.getDocumentsSummary();
    const points = await store.getCriticalPointsSummary();
    const sessions = await store.listAnalysisSessions(5);

    console.log('📚 Knowledge base status');
    console.log(`   Database: ${resolve(settings.database.path)}`);
    console.log(`   Documents: ${documents.totalDocuments} (${documents.analyzedDocuments} analyzed)`);
    console.log(`   Average confidence: ${documents.averageConfidence.toFixed(2)}`);
    console.log(
      `   Critical points: ${points.totalCriticalPoints} ` +
        `(critical ${points.byUrgency.critical}, high ${points.byUrgency.high}, ` +
        `medium ${points.byUrgency.medium}, low ${points.byUrgency.low})`
    );

    try {
      const stats = await createVectorStore(settings).stats();
      console.log(`   Vector collection: ${settings.qdrant.collection} (${stats.pointsCount} points, ${stats.status})`);
    } catch (error: unknown) {
      console.log(`   Vector collection: unavailable (${errorMessage(error)})`);
    }

    if (sessions.length > 0) {
      console.log('\n   Recent sessions:');
      for (const session of sessions) {
        console.log(
          `     - ${session.startedAt} ${session.status}: ${session.documentsAnalyzed} documents, ` +
            `${session.criticalPointsFound} critical points, ${session.errorsEncountered} errors`
        );
      }
    }
    return 0;
  } finally {
    store.close();
  }
}

function printErrors(errors: string[]): void {
  if (errors.length === 0) return;
  console.log(`\n   Errors (${errors.length}):`);
  for (const error of errors.slice(0, 10)) {
    console.log(`     - ${error}`);
  }
  if (errors.length > 10) {
    console.log(`     ... and ${errors.length - 10} more`);
  }
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const settings = loadSettings();
  switch (args.command) {
    case 'analyze':
      return runAnalyze(args, settings);
    case 'report':
      return runReport(args, settings);
    case 'status':
      return runStatus(settings);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`❌ ${error.message}\n\n${USAGE}`);
    } else {
      console.error(`❌ ${errorMessage(error)}`);
      logger.error({ event: 'cli.fail', error: errorMessage(error) }, 'Command failed');
    }
    process.exitCode = 1;
  });
