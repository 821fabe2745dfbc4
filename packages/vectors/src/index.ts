export { QdrantVectorStore, QdrantRequestError, type QdrantConfig } from './qdrant.js';
export { DocumentVectorPayloadSchema, parsePayload } from './payload.js';
