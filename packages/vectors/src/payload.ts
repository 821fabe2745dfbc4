/**
 * Schema for document payloads read back from the vector store
 *
 * Points written by older runs may lack fields, so everything has a default.
 */

import { z } from 'zod';
import type { DocumentVectorPayload } from '@kexp/core';

const nullableString = z.string().nullable().catch(null);
const nullableNumber = z.number().nullable().catch(null);

const CriticalPointSchema = z.object({
  description: z.string().catch(''),
  category: z.string().catch('technical'),
  urgency: z.string().catch('medium'),
  source: z.string().catch('current'),
});

export const DocumentVectorPayloadSchema = z.object({
  document_path: z.string().catch(''),
  filename: z.string().catch(''),
  content_summary: z.string().catch(''),
  analysis_result: z
    .object({
      critical_points: z.array(CriticalPointSchema).catch([]),
      expiry_indicators: z.array(z.string()).catch([]),
      recommendations: z.array(z.string()).catch([]),
      confidence_score: nullableNumber,
    })
    .catch({ critical_points: [], expiry_indicators: [], recommendations: [], confidence_score: null }),
  metadata: z
    .object({
      file_size: nullableNumber,
      mime_type: nullableString,
      session_id: nullableString,
      file_created_at: nullableString,
      file_modified_at: nullableString,
    })
    .catch({ file_size: null, mime_type: null, session_id: null, file_created_at: null, file_modified_at: null }),
  created_at: nullableString,
  updated_at: nullableString,
});

export function parsePayload(raw: unknown): DocumentVectorPayload {
  const parsed = DocumentVectorPayloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : DocumentVectorPayloadSchema.parse({});
}
