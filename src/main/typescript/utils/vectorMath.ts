/**
 * INPUT: numeric vectors
 * OUTPUT: norms, normalized copies, cosine similarity
 * POS: utility module for the embedding providers and the semantic retriever
 */

export function l2Norm(v: readonly number[]): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

/** Zero vectors are returned unchanged */
export function l2Normalize(v: readonly number[]): number[] {
  const norm = l2Norm(v);
  return norm === 0 ? [...v] : v.map((x) => x / norm);
}

/** 0 when either vector is zero or the lengths differ */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];
  const denom = l2Norm(a) * l2Norm(b);
  return denom === 0 ? 0 : dot / denom;
}
