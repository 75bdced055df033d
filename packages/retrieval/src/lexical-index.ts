// ──────────────────────────────────────────────
// JobPulse - Lexical Index
// Okapi BM25 over the shared tokenizer
// ──────────────────────────────────────────────

import type { VectorSearchHit } from "@jobpulse/types";
import { tokenize } from "@jobpulse/utils";

export interface Bm25Parameters {
  k1: number;
  b: number;
}

export const DEFAULT_BM25: Bm25Parameters = { k1: 1.2, b: 0.75 };

interface LexicalEntry {
  termFreqs: Map<string, number>;
  length: number;
}

export class LexicalIndex {
  private readonly entries = new Map<string, LexicalEntry>();
  private readonly docFreqs = new Map<string, number>();
  private totalLength = 0;

  constructor(private readonly params: Bm25Parameters = DEFAULT_BM25) {}

  get size(): number {
    return this.entries.size;
  }

  /** Ids come from the document store and are never re-added. */
  add(id: string, text: string): void {
    const tokens = tokenize(text);
    const termFreqs = new Map<string, number>();
    for (const token of tokens) {
      termFreqs.set(token, (termFreqs.get(token) ?? 0) + 1);
    }
    for (const term of termFreqs.keys()) {
      this.docFreqs.set(term, (this.docFreqs.get(term) ?? 0) + 1);
    }

    this.entries.set(id, { termFreqs, length: tokens.length });
    this.totalLength += tokens.length;
  }

  /** Documents with a positive score only; ties keep insertion order. */
  search(text: string, topK: number): VectorSearchHit[] {
    if (topK <= 0 || this.entries.size === 0) return [];

    const terms = [...new Set(tokenize(text))];
    if (terms.length === 0) return [];

    const { k1, b } = this.params;
    const documentCount = this.entries.size;
    const avgLength = this.totalLength / documentCount || 1;

    const idf = new Map<string, number>();
    for (const term of terms) {
      const df = this.docFreqs.get(term) ?? 0;
      idf.set(term, Math.log((documentCount - df + 0.5) / (df + 0.5) + 1));
    }

    const scored: Array<VectorSearchHit & { position: number }> = [];
    let position = 0;
    for (const [id, entry] of this.entries) {
      let score = 0;
      for (const term of terms) {
        const tf = entry.termFreqs.get(term) ?? 0;
        if (tf === 0) continue;
        const norm = k1 * (1 - b + b * (entry.length / avgLength));
        score += (idf.get(term) ?? 0) * ((tf * (k1 + 1)) / (tf + norm));
      }
      if (score > 0) {
        scored.push({ id, score, position });
      }
      position += 1;
    }

    scored.sort((a, b2) => b2.score - a.score || a.position - b2.position);
    return scored.slice(0, topK).map(({ id, score }) => ({ id, score }));
  }
}
