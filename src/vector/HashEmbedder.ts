/**
 * HashEmbedder
 *
 * Dependency-free embedding by feature hashing. Every character trigram adds
 * 1.0 and every whitespace-separated word adds 2.0 to the bucket selected by
 * its md5 digest (read as an unsigned 128-bit integer) modulo the dimension.
 * The result is L2-normalized. Lexical overlap stands in for meaning.
 */

import { createHash } from 'crypto';
import { l2Normalize } from './similarity.js';
import type { EmbeddingProvider, EmbeddingResult } from './types.js';

export const LITE_MODEL = 'lite';
export const LITE_DIMENSIONS = 384;

const TRIGRAM_WEIGHT = 1.0;
const WORD_WEIGHT = 2.0;

export class HashEmbedder implements EmbeddingProvider {
  readonly name = 'lite' as const;
  readonly model = LITE_MODEL;
  readonly dimensions: number;
  private readonly modulus: bigint;

  constructor(dimensions: number = LITE_DIMENSIONS) {
    this.dimensions = dimensions;
    this.modulus = BigInt(dimensions);
  }

  /**
   * Synchronous form used by the server runtime and by search fallbacks
   */
  vectorize(text: string): Float32Array {
    const normalized = text.toLowerCase().trim();
    const vector = new Float32Array(this.dimensions);

    // Index by code point so multi-byte characters form one unit
    const chars = Array.from(normalized);
    for (let i = 0; i + 3 <= chars.length; i++) {
      vector[this.bucket(chars.slice(i, i + 3).join(''))] += TRIGRAM_WEIGHT;
    }

    for (const word of normalized.split(/\s+/)) {
      if (word.length === 0) continue;
      vector[this.bucket(word)] += WORD_WEIGHT;
    }

    return l2Normalize(vector);
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return { vector: this.vectorize(text), model: this.model, fallback: false };
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    return texts.map(text => ({ vector: this.vectorize(text), model: this.model, fallback: false }));
  }

  private bucket(gram: string): number {
    const digest = createHash('md5').update(gram, 'utf-8').digest('hex');
    return Number(BigInt(`0x${digest}`) % this.modulus);
  }
}
