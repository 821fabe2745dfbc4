/**
 * Qdrant REST client and the vector store built on it
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import pino from 'pino';
import type {
  VectorPage,
  VectorRecord,
  VectorSearchHit,
  VectorStore,
  VectorStoreStats,
  VectorUpsert,
} from '@kexp/core';
import { parsePayload } from './payload.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface QdrantConfig {
  url: string;
  collection: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

const PointIdSchema = z.union([z.string(), z.number()]).transform((id) => String(id));

const PointSchema = z.object({
  id: PointIdSchema,
  payload: z.unknown().optional(),
});

const GetPointResponse = z.object({ result: PointSchema.nullable() });

const ScrollResponse = z.object({
  result: z.object({
    points: z.array(PointSchema),
    next_page_offset: PointIdSchema.nullable().optional(),
  }),
});

const SearchResponse = z.object({
  result: z.array(PointSchema.extend({ score: z.number() })),
});

const CollectionInfoResponse = z.object({
  result: z.object({
    status: z.string(),
    optimizer_status: z.union([z.string(), z.record(z.unknown())]).optional(),
    vectors_count: z.number().nullable().optional(),
    indexed_vectors_count: z.number().nullable().optional(),
    points_count: z.number().nullable().optional(),
    segments_count: z.number().nullable().optional(),
  }),
});

const AnyResponse = z.unknown();

export class QdrantRequestError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'QdrantRequestError';
    this.status = status;
  }
}

/**
 * Vector store over one Qdrant collection
 */
export class QdrantVectorStore implements VectorStore {
  private readonly baseUrl: string;
  private readonly collection: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: QdrantConfig) {
    this.baseUrl = config.url.replace(/\/+$/, '');
    this.collection = config.collection;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.fetchFn = config.fetchFn ?? fetch;
  }

  private get collectionPath(): string {
    return `/collections/${encodeURIComponent(this.collection)}`;
  }

  /**
   * Create the collection when it does not exist yet
   */
  async ensureCollection(vectorSize: number): Promise<void> {
    const existing = await this.send('GET', this.collectionPath, undefined, { allowNotFound: true });
    if (existing !== null) return;

    await this.request('PUT', this.collectionPath, AnyResponse, {
      vectors: { size: vectorSize, distance: 'Cosine' },
    });
    logger.info({ event: 'vectors.collection.created', collection: this.collection, vectorSize }, 'Created collection');
  }

  async upsert(input: VectorUpsert): Promise<string> {
    const id = input.id ?? randomUUID();
    await this.request('PUT', `${this.collectionPath}/points?wait=true`, AnyResponse, {
      points: [{ id, vector: input.vector, payload: input.payload }],
    });
    logger.debug({ event: 'vectors.upsert', id, filename: input.payload.filename }, 'Stored document vector');
    return id;
  }

  async get(id: string): Promise<VectorRecord | null> {
    const raw = await this.send('GET', `${this.collectionPath}/points/${encodeURIComponent(id)}`, undefined, {
      allowNotFound: true,
    });
    if (raw === null) return null;

    const point = GetPointResponse.parse(raw).result;
    return point ? { id: point.id, payload: parsePayload(point.payload) } : null;
  }

  async scrollAll(limit: number, offset?: string | null): Promise<VectorPage> {
    const body: Record<string, unknown> = { limit, with_payload: true, with_vector: false };
    if (offset !== undefined && offset !== null) {
      body.offset = offset;
    }

    const response = await this.request('POST', `${this.collectionPath}/points/scroll`, ScrollResponse, body);
    return {
      records: response.result.points.map((point) => ({ id: point.id, payload: parsePayload(point.payload) })),
      nextOffset: response.result.next_page_offset ?? null,
    };
  }

  async search(vector: number[], limit: number, threshold?: number): Promise<VectorSearchHit[]> {
    const body: Record<string, unknown> = { vector, limit, with_payload: true };
    if (threshold !== undefined) {
      body.score_threshold = threshold;
    }

    const response = await this.request('POST', `${this.collectionPath}/points/search`, SearchResponse, body);
    return response.result.map((hit) => ({ id: hit.id, score: hit.score, payload: parsePayload(hit.payload) }));
  }

  async deleteById(id: string): Promise<void> {
    await this.request('POST', `${this.collectionPath}/points/delete?wait=true`, AnyResponse, { points: [id] });
    logger.debug({ event: 'vectors.delete', id }, 'Deleted document vector');
  }

  async stats(): Promise<VectorStoreStats> {
    const { result } = await this.request('GET', this.collectionPath, CollectionInfoResponse);
    const optimizer = result.optimizer_status;

    return {
      vectorsCount: result.vectors_count ?? result.points_count ?? 0,
      indexedVectorsCount: result.indexed_vectors_count ?? 0,
      pointsCount: result.points_count ?? 0,
      segmentsCount: result.segments_count ?? 0,
      status: result.status,
      optimizerStatus: typeof optimizer === 'string' ? optimizer : optimizer ? JSON.stringify(optimizer) : 'unknown',
    };
  }

  private async request<T>(method: string, path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body?: unknown): Promise<T> {
    const raw = await this.send(method, path, body, { allowNotFound: false });
    return schema.parse(raw);
  }

  /**
   * Raw HTTP call; resolves null on 404 when allowNotFound is set
   */
  private async send(
    method: string,
    path: string,
    body: unknown,
    options: { allowNotFound: boolean }
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? { 'api-key': this.apiKey } : {}),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      if (response.status === 404 && options.allowNotFound) {
        await response.text().catch(() => '');
        return null;
      }

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        throw new QdrantRequestError(
          `Qdrant request failed (${response.status} ${response.statusText}): ${errorText}`,
          response.status
        );
      }

      return await response.json();
    } catch (error: unknown) {
      logger.error(
        { event: 'vectors.request.fail', method, path, error: error instanceof Error ? error.message : String(error) },
        'Qdrant request failed'
      );
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
