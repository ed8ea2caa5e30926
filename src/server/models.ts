/**
 * Model registry
 *
 * Fixed, versioned table of the model aliases the embedding daemon can load.
 * Bump REGISTRY_VERSION whenever an entry's identity or dimensionality changes.
 */

import { InvalidModelError } from '../core/errors.js';

export const REGISTRY_VERSION = 2;

export type ModelRuntime = 'lite' | 'openai';

export interface ModelSpec {
  alias: string;
  /** Identity passed to the runtime */
  model: string;
  runtime: ModelRuntime;
  dimensions: number;
  /** Approximate resident memory of the loaded model */
  footprint: string;
  description: string;
  /** The endpoint accepts a `dimensions` parameter for this model */
  shortenable?: boolean;
}

export const MODEL_REGISTRY: readonly ModelSpec[] = [
  {
    alias: 'lite',
    model: 'lite',
    runtime: 'lite',
    dimensions: 384,
    footprint: '<1 MB',
    description: 'Character n-gram hashing, no model download'
  },
  {
    alias: 'minilm',
    model: 'all-minilm',
    runtime: 'openai',
    dimensions: 384,
    footprint: '~90 MB',
    description: 'Small general-purpose sentence model'
  },
  {
    alias: 'nomic',
    model: 'nomic-embed-text',
    runtime: 'openai',
    dimensions: 768,
    footprint: '~550 MB',
    description: 'Balanced quality and speed, long context'
  },
  {
    alias: 'mxbai-large',
    model: 'mxbai-embed-large',
    runtime: 'openai',
    dimensions: 1024,
    footprint: '~1.3 GB',
    description: 'High-quality English retrieval model'
  },
  {
    alias: 'bge-m3',
    model: 'bge-m3',
    runtime: 'openai',
    dimensions: 1024,
    footprint: '~2.2 GB',
    description: 'Multilingual retrieval model'
  },
  {
    alias: 'openai-small',
    model: 'text-embedding-3-small',
    runtime: 'openai',
    dimensions: 1536,
    footprint: 'hosted',
    description: 'Hosted OpenAI embedding model (needs an API key)',
    shortenable: true
  }
];

export function knownAliases(): string[] {
  return MODEL_REGISTRY.map(spec => spec.alias);
}

export function findModel(alias: string): ModelSpec | undefined {
  return MODEL_REGISTRY.find(spec => spec.alias === alias);
}

/**
 * @throws {InvalidModelError} If the alias is not in the registry
 */
export function resolveModel(alias: string): ModelSpec {
  const spec = findModel(alias);
  if (!spec) {
    throw new InvalidModelError(alias, knownAliases());
  }
  return spec;
}
