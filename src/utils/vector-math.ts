/**
 * Vector math for embedding comparison.
 *
 * The store ranks by cosine similarity, which equals the dot product once
 * vectors are unit length. Normalization divides by (‖x‖ + eps) so zero
 * vectors stay zero instead of producing NaN.
 */

/** Added to the norm before dividing. */
export const NORM_EPSILON = 1e-12;

/**
 * Compute the dot product of two vectors.
 */
export function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Compute the L2 norm of a vector.
 */
export function norm(a: number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity between two vectors. Returns [-1, 1].
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  const d = dot(a, b);
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to handle floating point errors
  return Math.max(-1, Math.min(1, d / (na * nb)));
}

/**
 * Scale a vector to unit length. Values are rounded to float32.
 */
export function l2Normalize(vector: number[], eps: number = NORM_EPSILON): number[] {
  const denom = norm(vector) + eps;
  return Array.from(Float32Array.from(vector, (v) => v / denom));
}

/**
 * Row-wise L2 normalization.
 */
export function l2NormalizeRows(rows: number[][], eps: number = NORM_EPSILON): number[][] {
  return rows.map((row) => l2Normalize(row, eps));
}
