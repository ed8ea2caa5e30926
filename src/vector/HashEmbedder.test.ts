/**
 * HashEmbedder Tests
 */

import { describe, it, expect } from 'vitest';
import { HashEmbedder, LITE_DIMENSIONS } from './HashEmbedder.js';
import { bufferToVector, cosineSimilarity, vectorToBuffer } from './similarity.js';
import { DimensionMismatchError } from '../core/errors.js';

function norm(vector: Float32Array): number {
  return Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
}

describe('HashEmbedder', () => {
  const embedder = new HashEmbedder();

  it('should produce unit vectors of the configured size', () => {
    const vector = embedder.vectorize('MACD crossover momentum');
    expect(vector.length).toBe(LITE_DIMENSIONS);
    expect(norm(vector)).toBeCloseTo(1, 5);
  });

  it('should be deterministic and case-insensitive', () => {
    expect(Array.from(embedder.vectorize('Volume spikes'))).toEqual(Array.from(embedder.vectorize('volume spikes')));
  });

  it('should map empty text to the zero vector', () => {
    expect(norm(embedder.vectorize('   '))).toBe(0);
  });

  it('should score lexical overlap above unrelated text', () => {
    const query = embedder.vectorize('MACD crossover signal');
    const related = embedder.vectorize('MACD crossover signals lag in ranging markets');
    const unrelated = embedder.vectorize('volume spikes at the opening bell');

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('should report itself as the lite model without fallback', async () => {
    const result = await embedder.embed('anything');
    expect(result.model).toBe('lite');
    expect(result.fallback).toBe(false);

    const batch = await embedder.embedBatch(['a b c', 'd e f']);
    expect(batch).toHaveLength(2);
  });

  it('should honour a custom dimensionality', () => {
    expect(new HashEmbedder(64).vectorize('short text').length).toBe(64);
  });
});

describe('similarity', () => {
  it('should return 1 for identical and 0 for orthogonal vectors', () => {
    expect(cosineSimilarity(new Float32Array([1, 2, 3]), new Float32Array([1, 2, 3]))).toBeCloseTo(1, 6);
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([0, 1]))).toBe(0);
    expect(cosineSimilarity(new Float32Array([0, 0]), new Float32Array([1, 1]))).toBe(0);
  });

  it('should refuse vectors of different lengths', () => {
    expect(() => cosineSimilarity(new Float32Array(3), new Float32Array(4))).toThrow(DimensionMismatchError);
  });

  it('should store vectors as little-endian float32', () => {
    const buffer = vectorToBuffer(new Float32Array([1, -0.5]));
    expect(buffer.toString('hex')).toBe('0000803f000000bf');
    expect(Array.from(bufferToVector(buffer))).toEqual([1, -0.5]);
  });
});
