/**
 * Model backends for the embedding daemon: one loaded model answering batches.
 */

import { ServerStartFailureError, getErrorMessage } from '../core/errors.js';
import { EmbeddingService } from '../vector/EmbeddingService.js';
import { HashEmbedder } from '../vector/HashEmbedder.js';
import type { ModelSpec } from './models.js';

export const DEFAULT_API_BASE = 'http://localhost:11434/v1';
const PLACEHOLDER_API_KEY = 'local';
const WARM_UP_TEXT = 'warm up';

export interface ModelBackend {
  readonly spec: ModelSpec;
  /**
   * Prepare the model and verify it returns vectors of the registered size
   *
   * @throws {ServerStartFailureError}
   */
  load(): Promise<void>;
  embed(texts: string[]): Promise<Float32Array[]>;
}

export class LiteBackend implements ModelBackend {
  readonly spec: ModelSpec;
  private embedder: HashEmbedder;

  constructor(spec: ModelSpec) {
    this.spec = spec;
    this.embedder = new HashEmbedder(spec.dimensions);
  }

  async load(): Promise<void> {
    // Nothing to load
  }

  async embed(texts: string[]): Promise<Float32Array[]> {
    return texts.map(text => this.embedder.vectorize(text));
  }
}

export class OpenAIBackend implements ModelBackend {
  readonly spec: ModelSpec;
  private service: EmbeddingService;

  constructor(spec: ModelSpec, env: NodeJS.ProcessEnv = process.env) {
    this.spec = spec;
    this.service = new EmbeddingService({
      model: spec.model,
      dimensions: spec.dimensions,
      baseURL: env.ARBOR_EMBEDDING_API_BASE || DEFAULT_API_BASE,
      apiKey: env.ARBOR_EMBEDDING_API_KEY || env.OPENAI_API_KEY || PLACEHOLDER_API_KEY,
      batchSize: 64,
      sendDimensions: spec.shortenable ?? false
    });
  }

  async load(): Promise<void> {
    try {
      await this.service.embed(WARM_UP_TEXT);
    } catch (error) {
      throw new ServerStartFailureError(`could not load model '${this.spec.alias}': ${getErrorMessage(error)}`, {
        cause: error
      });
    }
  }

  embed(texts: string[]): Promise<Float32Array[]> {
    return this.service.embedBatch(texts);
  }
}

export function createBackend(spec: ModelSpec, env: NodeJS.ProcessEnv = process.env): ModelBackend {
  switch (spec.runtime) {
    case 'lite':
      return new LiteBackend(spec);
    case 'openai':
      return new OpenAIBackend(spec, env);
  }
}
