// ──────────────────────────────────────────────
// JobPulse - Retriever
// Semantic, lexical and hybrid ranking over one store
// ──────────────────────────────────────────────

import type {
  Document,
  HybridWeights,
  RetrievalMatch,
  RetrievalQuery,
  VectorSearchHit,
} from "@jobpulse/types";
import type { DocumentStore } from "./document-store.js";

export interface RetrieverOptions {
  weights?: HybridWeights;
  candidateMultiplier?: number;
}

export const DEFAULT_HYBRID_WEIGHTS: HybridWeights = { semantic: 0.5, lexical: 0.5 };
export const DEFAULT_CANDIDATE_MULTIPLIER = 4;

interface HybridCandidate {
  id: string;
  semantic: number;
  lexical: number;
  semanticRank: number | null;
  lexicalRank: number | null;
}

export class Retriever {
  private readonly weights: HybridWeights;
  private readonly candidateMultiplier: number;

  constructor(
    private readonly store: DocumentStore,
    options: RetrieverOptions = {}
  ) {
    this.weights = options.weights ?? DEFAULT_HYBRID_WEIGHTS;
    this.candidateMultiplier = options.candidateMultiplier ?? DEFAULT_CANDIDATE_MULTIPLIER;
  }

  async retrieve(query: RetrievalQuery): Promise<Document[]> {
    const matches = await this.search(query);
    return matches.map((match) => match.document);
  }

  async search(query: RetrievalQuery): Promise<RetrievalMatch[]> {
    if (query.topK <= 0) return [];

    switch (query.mode) {
      case "semantic": {
        const hits = await this.semanticHits(query.text, query.topK);
        return this.toMatches(hits, (hit, rank) => ({ score: hit.score, semanticRank: rank, lexicalRank: null }));
      }
      case "lexical": {
        const hits = this.store.lexicalSearch(query.text, query.topK);
        return this.toMatches(hits, (hit, rank) => ({ score: hit.score, semanticRank: null, lexicalRank: rank }));
      }
      case "hybrid":
        return await this.hybrid(query.text, query.topK);
      default:
        throw new Error(`Unsupported retrieval mode: ${String(query.mode)}`);
    }
  }

  private async semanticHits(text: string, topK: number): Promise<VectorSearchHit[]> {
    const vector = await this.store.indexer.embed(text);
    return this.store.indexer.search(vector, topK);
  }

  private async hybrid(text: string, topK: number): Promise<RetrievalMatch[]> {
    const depth = Math.max(topK, topK * this.candidateMultiplier);
    const semanticHits = await this.semanticHits(text, depth);
    const lexicalHits = this.store.lexicalSearch(text, depth);

    const candidates = new Map<string, HybridCandidate>();
    const candidateFor = (id: string): HybridCandidate => {
      let candidate = candidates.get(id);
      if (!candidate) {
        candidate = { id, semantic: 0, lexical: 0, semanticRank: null, lexicalRank: null };
        candidates.set(id, candidate);
      }
      return candidate;
    };

    const semanticScores = normalizeScores(semanticHits);
    semanticHits.forEach((hit, index) => {
      const candidate = candidateFor(hit.id);
      candidate.semantic = semanticScores[index] ?? 0;
      candidate.semanticRank = index + 1;
    });
    const lexicalScores = normalizeScores(lexicalHits);
    lexicalHits.forEach((hit, index) => {
      const candidate = candidateFor(hit.id);
      candidate.lexical = lexicalScores[index] ?? 0;
      candidate.lexicalRank = index + 1;
    });

    const scored = [...candidates.values()].map((candidate) => ({
      candidate,
      score: this.weights.semantic * candidate.semantic + this.weights.lexical * candidate.lexical,
    }));

    scored.sort(
      (a, b) =>
        b.score - a.score ||
        compareRank(a.candidate.semanticRank, b.candidate.semanticRank) ||
        compareRank(a.candidate.lexicalRank, b.candidate.lexicalRank) ||
        this.store.positionOf(a.candidate.id) - this.store.positionOf(b.candidate.id)
    );

    const matches: RetrievalMatch[] = [];
    for (const { candidate, score } of scored.slice(0, topK)) {
      const document = this.store.find(candidate.id);
      if (!document) continue;
      matches.push({
        document,
        score,
        semanticRank: candidate.semanticRank,
        lexicalRank: candidate.lexicalRank,
      });
    }
    return matches;
  }

  private toMatches(
    hits: VectorSearchHit[],
    describe: (hit: VectorSearchHit, rank: number) => Omit<RetrievalMatch, "document">
  ): RetrievalMatch[] {
    const matches: RetrievalMatch[] = [];
    hits.forEach((hit, index) => {
      const document = this.store.find(hit.id);
      if (document) {
        matches.push({ document, ...describe(hit, index + 1) });
      }
    });
    return matches;
  }
}

/** Min-max to [0, 1] within the list; a list of equal scores maps to 1. */
export function normalizeScores(hits: readonly VectorSearchHit[]): number[] {
  if (hits.length === 0) return [];
  const scores = hits.map((hit) => hit.score);
  const min = Math.min(...scores);
  const max = Math.max(...scores);
  if (max === min) return scores.map(() => 1);
  return scores.map((score) => (score - min) / (max - min));
}

function compareRank(left: number | null, right: number | null): number {
  if (left === right) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  return left - right;
}
