/**
 * Vector math and BLOB encoding for stored embeddings.
 */

import { DimensionMismatchError } from '../core/errors.js';

const FLOAT_BYTES = 4;

/**
 * Cosine similarity in [-1, 1]. A zero vector has similarity 0 with everything.
 *
 * @throws {DimensionMismatchError} If the vectors differ in length
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Normalize a vector to unit length. The zero vector stays zero.
 */
export function l2Normalize(vector: Float32Array): Float32Array {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  const norm = Math.sqrt(sum);
  const result = new Float32Array(vector.length);
  if (norm === 0) return result;

  for (let i = 0; i < vector.length; i++) {
    result[i] = vector[i] / norm;
  }
  return result;
}

/**
 * Little-endian float32 BLOB
 */
export function vectorToBuffer(vector: Float32Array): Buffer {
  const buffer = Buffer.alloc(vector.length * FLOAT_BYTES);
  for (let i = 0; i < vector.length; i++) {
    buffer.writeFloatLE(vector[i], i * FLOAT_BYTES);
  }
  return buffer;
}

export function bufferToVector(buffer: Buffer): Float32Array {
  const vector = new Float32Array(Math.floor(buffer.length / FLOAT_BYTES));
  for (let i = 0; i < vector.length; i++) {
    vector[i] = buffer.readFloatLE(i * FLOAT_BYTES);
  }
  return vector;
}
