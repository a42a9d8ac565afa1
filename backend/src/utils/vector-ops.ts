export function cosineSimilarity(vectorA: ArrayLike<number>, vectorB: ArrayLike<number>): number {
  if (vectorA.length !== vectorB.length || vectorA.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let index = 0; index < vectorA.length; index += 1) {
    const a = vectorA[index];
    const b = vectorB[index];

    dotProduct += a * b;
    normA += a * a;
    normB += b * b;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    return 0;
  }

  return dotProduct / denominator;
}

/**
 * `1 - cos`, floored at 0 so float error on identical vectors never yields a
 * negative distance. Lower is closer.
 */
export function cosineDistance(vectorA: ArrayLike<number>, vectorB: ArrayLike<number>): number {
  return Math.max(0, 1 - cosineSimilarity(vectorA, vectorB));
}

export function toEmbeddingBlob(vector: readonly number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

export function fromEmbeddingBlob(buffer: Buffer): Float32Array {
  // Copy: the Buffer may be a view into a shared pool with an unaligned offset.
  const bytes = new Uint8Array(buffer);
  return new Float32Array(bytes.buffer, 0, bytes.byteLength / Float32Array.BYTES_PER_ELEMENT);
}
