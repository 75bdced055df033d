// ──────────────────────────────────────────────
// JobPulse - Text & Vector Utilities
// Shared tokenizing/embedding/similarity helpers
// ──────────────────────────────────────────────

import { createHash } from "node:crypto";

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}+#]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Feature-hashed bag-of-words vector. Each token lands in one bucket chosen
 * from its SHA-256 digest, with a digest-derived sign, and the result is
 * L2-normalised. Identical text always yields an identical vector.
 */
export function buildHashedEmbedding(text: string, dimensions = 512): number[] {
  const values = new Array<number>(dimensions).fill(0);

  for (const token of tokenize(text)) {
    const digest = createHash("sha256").update(token).digest();
    const bucket = digest.readUInt32BE(0) % dimensions;
    const sign = (digest[4] ?? 0) & 1 ? -1 : 1;
    values[bucket] = (values[bucket] ?? 0) + sign;
  }

  return normalizeVector(values);
}

export function normalizeVector(values: number[]): number[] {
  let norm = 0;
  for (const value of values) {
    norm += value * value;
  }
  if (norm === 0) return values;
  const scale = 1 / Math.sqrt(norm);
  return values.map((value) => value * scale);
}

export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  if (left.length === 0 || right.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (let i = 0; i < left.length; i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    dot += l * r;
    leftNorm += l * l;
    rightNorm += r * r;
  }

  const denom = Math.sqrt(leftNorm) * Math.sqrt(rightNorm);
  if (denom === 0) {
    return 0;
  }

  return dot / denom;
}

export function parseEmbedding(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  const out: number[] = [];

  for (const item of value) {
    if (typeof item === "number" && Number.isFinite(item)) {
      out.push(item);
    }
  }

  return out;
}
