/**
 * Similarity module — cosine similarity and nearest-neighbour ranking.
 *
 * Pure math, no external dependencies. Used by the in-process stores to
 * answer nearest-neighbour queries and by discovery to average embeddings.
 */

import type { EmbeddingVector, Neighbor, NoteId, SemanticPair } from "@/types";

// ---------------------------------------------------------------------------
// Cosine Similarity
// ---------------------------------------------------------------------------

/**
 * Compute the cosine similarity between two vectors.
 *
 * Returns a value in [-1, 1] where 1 means identical direction,
 * 0 means orthogonal, and -1 means opposite direction.
 *
 * Throws if vectors have different lengths or either has zero magnitude.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new Error(
      `Vector length mismatch: ${a.length} vs ${b.length}`,
    );
  }

  if (a.length === 0) {
    throw new Error("Cannot compute similarity of empty vectors");
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(magA) * Math.sqrt(magB);

  if (magnitude === 0) {
    throw new Error("Cannot compute similarity: zero magnitude vector");
  }

  return dot / magnitude;
}

// ---------------------------------------------------------------------------
// Nearest neighbours
// ---------------------------------------------------------------------------

/** A note that carries a completed embedding. */
export interface EmbeddedCandidate {
  id: NoteId;
  title: string;
  vector: EmbeddingVector;
}

export interface NeighborOptions {
  limit: number;
  /** Inclusive similarity floor. */
  minSimilarity: number;
  excludeIds?: Iterable<NoteId>;
}

/** Similarity descending, ID ascending on ties. */
function byScore(a: Neighbor, b: Neighbor): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function hasMagnitude(vector: EmbeddingVector): boolean {
  return vector.some((v) => v !== 0);
}

/**
 * Score every candidate against the target, best first. A candidate whose
 * vector is all zeros or differs in length from the target has no
 * similarity and is left out; a degenerate target scores nothing.
 */
function scoreAll(
  target: EmbeddingVector,
  candidates: EmbeddedCandidate[],
  exclude: Set<NoteId>,
): Neighbor[] {
  if (target.length === 0 || !hasMagnitude(target)) return [];
  const scored: Neighbor[] = [];
  for (const candidate of candidates) {
    if (exclude.has(candidate.id)) continue;
    if (candidate.vector.length !== target.length || !hasMagnitude(candidate.vector)) continue;
    scored.push({
      id: candidate.id,
      title: candidate.title,
      similarity: cosineSimilarity(target, candidate.vector),
    });
  }
  return scored.sort(byScore);
}

/**
 * Find the `limit` candidates closest to `target` whose similarity is at
 * least `minSimilarity`, sorted by similarity descending.
 */
export function findNeighbors(
  target: EmbeddingVector,
  candidates: EmbeddedCandidate[],
  options: NeighborOptions,
): Neighbor[] {
  const exclude = new Set(options.excludeIds ?? []);
  return scoreAll(target, candidates, exclude)
    .filter((n) => n.similarity >= options.minSimilarity)
    .slice(0, options.limit);
}

/**
 * For every candidate, take its `perNoteLimit` nearest other candidates and
 * keep the pairs scoring strictly above `minSimilarity`.
 *
 * Each candidate's neighbour set is computed independently, so a mutual
 * pair appears once from each side.
 */
export function topNeighborPairs(
  candidates: EmbeddedCandidate[],
  perNoteLimit: number,
  minSimilarity: number,
): SemanticPair[] {
  const pairs: SemanticPair[] = [];
  for (const source of candidates) {
    const nearest = scoreAll(source.vector, candidates, new Set([source.id]))
      .slice(0, perNoteLimit);
    for (const neighbor of nearest) {
      if (neighbor.similarity > minSimilarity) {
        pairs.push({
          sourceId: source.id,
          targetId: neighbor.id,
          similarity: neighbor.similarity,
        });
      }
    }
  }
  return pairs;
}

/**
 * Element-wise mean of a set of equally sized vectors.
 * Throws when the set is empty or the lengths differ.
 */
export function meanVector(vectors: EmbeddingVector[]): EmbeddingVector {
  if (vectors.length === 0) {
    throw new Error("Cannot average an empty set of vectors");
  }
  const dim = vectors[0].length;
  const sum = new Array<number>(dim).fill(0);
  for (const vector of vectors) {
    if (vector.length !== dim) {
      throw new Error(`Vector length mismatch: ${dim} vs ${vector.length}`);
    }
    for (let i = 0; i < dim; i++) {
      sum[i] += vector[i];
    }
  }
  return sum.map((v) => v / vectors.length);
}
