// ──────────────────────────────────────────────
// JobPulse - Retrieval Types
// ──────────────────────────────────────────────

export interface Document {
  readonly id: string;
  readonly text: string;
  readonly metadata: Readonly<Record<string, string>>;
  readonly vector?: readonly number[];
}

export interface NewDocument {
  id?: string;
  text: string;
  metadata?: Record<string, string>;
}

export type MetadataFilter =
  | Record<string, string>
  | ((metadata: Readonly<Record<string, string>>) => boolean);

export type RetrievalMode = "semantic" | "lexical" | "hybrid";

export interface RetrievalQuery {
  text: string;
  topK: number;
  mode: RetrievalMode;
}

export interface VectorSearchHit {
  id: string;
  score: number;
}

export interface RetrievalMatch {
  document: Document;
  score: number;
  // 1-based; null when the document was absent from that ranked list
  semanticRank: number | null;
  lexicalRank: number | null;
}

export interface HybridWeights {
  semantic: number;
  lexical: number;
}

export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

export interface DocumentStoreSnapshot {
  version: 1;
  embeddingModel: string;
  dimensions: number;
  documents: Array<{
    id: string;
    text: string;
    metadata: Record<string, string>;
    vector: number[];
  }>;
}
