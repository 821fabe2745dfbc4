/**
 * In-process stand-ins for the pipeline's collaborators
 */

import type {
  DiscoverOptions,
  DocumentDescriptor,
  DocumentSource,
  LoadedDocument,
  VectorPage,
  VectorRecord,
  VectorSearchHit,
  VectorStore,
  VectorStoreStats,
  VectorUpsert,
} from '@kexp/core';
import type { AnalysisMetadata, InferenceProvider, ReportDocumentInput, ReportPointInput } from '@kexp/llm';

export class InMemoryVectorStore implements VectorStore {
  readonly records = new Map<string, VectorRecord>();
  upserts = 0;
  failUpserts = false;
  failStats = false;
  private nextId = 1;

  async upsert(input: VectorUpsert): Promise<string> {
    if (this.failUpserts) {
      throw new Error('vector store unavailable');
    }
    this.upserts++;
    const id = input.id ?? `vec-${this.nextId++}`;
    this.records.set(id, { id, payload: input.payload });
    return id;
  }

  async get(id: string): Promise<VectorRecord | null> {
    return this.records.get(id) ?? null;
  }

  async scrollAll(limit: number): Promise<VectorPage> {
    return { records: [...this.records.values()].slice(0, limit), nextOffset: null };
  }

  async search(_vector: number[], limit: number): Promise<VectorSearchHit[]> {
    return [...this.records.values()].slice(0, limit).map((record) => ({ ...record, score: 1 }));
  }

  async deleteById(id: string): Promise<void> {
    this.records.delete(id);
  }

  async stats(): Promise<VectorStoreStats> {
    if (this.failStats) {
      throw new Error('collection missing');
    }
    return {
      vectorsCount: this.records.size,
      indexedVectorsCount: 0,
      pointsCount: this.records.size,
      segmentsCount: 1,
      status: 'green',
      optimizerStatus: 'ok',
    };
  }
}

export interface ScriptedInferenceOptions {
  /** Analysis text per filename; unknown files get an empty response */
  analyses?: Record<string, string>;
  /** Filenames whose analysis call rejects */
  failAnalysisFor?: string[];
  /** Filenames (matched by content) that get no embedding */
  noEmbeddingFor?: string[];
  report?: string;
  failReport?: boolean;
}

export class ScriptedInference implements InferenceProvider {
  readonly modelName = 'test-model';
  readonly reportRequests: Array<{ documents: ReportDocumentInput[]; points: ReportPointInput[] }> = [];
  readonly embedInputs: string[] = [];
  active = 0;
  maxActive = 0;
  private readonly options: ScriptedInferenceOptions;

  constructor(options: ScriptedInferenceOptions = {}) {
    this.options = options;
  }

  async analyze(_content: string, metadata: AnalysisMetadata): Promise<string> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise<void>((resolve) => setImmediate(resolve));
      if (this.options.failAnalysisFor?.includes(metadata.filename)) {
        throw new Error('model unavailable');
      }
      return this.options.analyses?.[metadata.filename] ?? '';
    } finally {
      this.active--;
    }
  }

  async embed(text: string): Promise<number[] | null> {
    this.embedInputs.push(text);
    if (this.options.noEmbeddingFor?.some((marker) => text.includes(marker))) {
      return null;
    }
    return [0.1, 0.2, 0.3];
  }

  async summarizeReport(documents: ReportDocumentInput[], points: ReportPointInput[]): Promise<string> {
    this.reportRequests.push({ documents, points });
    if (this.options.failReport) {
      throw new Error('model unavailable');
    }
    return this.options.report ?? '';
  }
}

export interface SourceFile {
  filename: string;
  content: string;
  createdAt?: Date;
}

export class InMemoryDocumentSource implements DocumentSource {
  private readonly files: SourceFile[];

  constructor(files: SourceFile[]) {
    this.files = files;
  }

  async *discover(root: string, options: DiscoverOptions): AsyncIterable<DocumentDescriptor> {
    for (const file of this.files) {
      const dot = file.filename.lastIndexOf('.');
      const fileType = dot === -1 ? '' : file.filename.slice(dot).toLowerCase();
      if (!options.extensions.includes(fileType)) continue;
      yield {
        filePath: `${root}/${file.filename}`,
        filename: file.filename,
        fileSize: file.content.length,
        fileType,
        mimeType: 'text/plain',
        createdAt: file.createdAt ?? null,
        modifiedAt: file.createdAt ?? null,
      };
    }
  }

  async load(descriptor: DocumentDescriptor): Promise<LoadedDocument> {
    const file = this.files.find((candidate) => candidate.filename === descriptor.filename);
    return { ...descriptor, content: file?.content ?? '' };
  }
}

export interface ScriptedPoint {
  point: string;
  category?: string;
  urgency?: string;
  lastUpdated?: string;
}

/**
 * Render an analysis response in the sectioned format the parser reads
 */
export function analysisText(options: {
  summary: string;
  points?: ScriptedPoint[];
  indicators?: string[];
  recommendations?: string[];
  confidence?: string;
}): string {
  const lines = ['**DOCUMENT_SUMMARY:**', options.summary, '', '**CRITICAL_POINTS:**'];
  for (const point of options.points ?? []) {
    lines.push(`- Point: ${point.point}`);
    if (point.category) lines.push(`- Category: ${point.category}`);
    if (point.urgency) lines.push(`- Urgency: ${point.urgency}`);
    if (point.lastUpdated) lines.push(`- Last_Updated: ${point.lastUpdated}`);
  }
  lines.push('', '**EXPIRY_INDICATORS:**', ...(options.indicators ?? []).map((item) => `- ${item}`));
  lines.push('', '**RECOMMENDATIONS:**', ...(options.recommendations ?? []).map((item) => `- ${item}`));
  if (options.confidence !== undefined) {
    lines.push('', '**CONFIDENCE_SCORE:**', options.confidence);
  }
  return lines.join('\n');
}
