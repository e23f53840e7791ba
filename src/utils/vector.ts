/**
 * Vector helpers shared by the product index and the embedding providers.
 *
 * All similarity math assumes dense float vectors of equal length; inputs are
 * validated once when a record enters the index so queries can stay tight.
 */
export function assertFiniteVector(vector: readonly number[], label = "vector"): void {
  if (!Array.isArray(vector)) {
    throw new TypeError(`${label} expected an array`);
  }

  if (vector.length === 0) {
    throw new Error(`${label} is empty`);
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error(`${label} contains a non-finite value`);
  }
}

export function l2Norm(vector: readonly number[]): number {
  let sum = 0;
  for (const v of vector) {
    sum += v * v;
  }
  return Math.sqrt(sum);
}

export function normalizeVector(vector: readonly number[]): number[] {
  const norm = l2Norm(vector);
  if (norm === 0) {
    return vector.slice();
  }
  return vector.map((v) => v / norm);
}

/**
 * Cosine similarity in [-1, 1]. Zero vectors and mismatched dimensions score 0
 * rather than throwing, so one malformed record cannot fail a whole query.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
