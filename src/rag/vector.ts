// Plain-loop vector math. Index vectors are stored unit length, so cosine
// similarity reduces to a dot product.

export const dotProduct = (x: readonly number[], y: readonly number[]): number => {
  if (x.length !== y.length) {
    throw new Error('Array length mismatch');
  }

  let sum = 0;
  for (let i = 0; i < x.length; i += 1) {
    sum += x[i] * y[i];
  }
  return sum;
};

export const euclideanLength = (x: readonly number[]): number => Math.sqrt(dotProduct(x, x));

export const isFiniteVector = (x: readonly number[]): boolean => x.every((value) => Number.isFinite(value));

/**
 * Returns a unit-length copy, or undefined for a zero vector.
 */
export const normalize = (x: readonly number[]): number[] | undefined => {
  const length = euclideanLength(x);
  if (length === 0 || !Number.isFinite(length)) {
    return undefined;
  }
  return x.map((value) => value / length);
};

export const clampScore = (similarity: number): number => Math.min(Math.max(similarity, 0), 1);
