// ──────────────────────────────────────────────
// JobPulse - Retrieval Package
// ──────────────────────────────────────────────

export { HashingEmbeddingProvider, HASHING_EMBEDDING_MODEL, DEFAULT_HASHING_DIMENSIONS } from "./hashing-embedding-provider.js";
export { VectorIndex } from "./vector-index.js";
export { EmbeddingIndexer, DEFAULT_INDEXER_OPTIONS } from "./embedding-indexer.js";
export type { EmbeddingIndexerOptions } from "./embedding-indexer.js";
export { LexicalIndex, DEFAULT_BM25 } from "./lexical-index.js";
export type { Bm25Parameters } from "./lexical-index.js";
export { DocumentStore } from "./document-store.js";
export type { RestoredStore } from "./document-store.js";
export { Retriever, normalizeScores, DEFAULT_HYBRID_WEIGHTS, DEFAULT_CANDIDATE_MULTIPLIER } from "./retriever.js";
export type { RetrieverOptions } from "./retriever.js";
export { parseStoreSnapshot, saveStoreSnapshot, loadStoreSnapshot, removeStoreSnapshot } from "./snapshot-file.js";
