/**
 * Selects the embedding provider a store is configured for.
 */

import type { ServerClientConfig, StoreSettings } from '../core/types.js';
import { EmbeddingClient, socketPathFor } from '../server/EmbeddingClient.js';
import { HashEmbedder } from './HashEmbedder.js';
import { ServerEmbedder } from './ServerEmbedder.js';
import type { EmbeddingProvider } from './types.js';

export function createEmbeddingProvider(settings: StoreSettings, serverConfig: ServerClientConfig): EmbeddingProvider {
  if (settings.provider === 'lite') {
    return new HashEmbedder(settings.dimensions);
  }

  const client = new EmbeddingClient({
    socketPath: socketPathFor(serverConfig.runtimeDir),
    pingTimeoutMs: serverConfig.pingTimeoutMs,
    requestTimeoutMs: serverConfig.requestTimeoutMs
  });

  return new ServerEmbedder({
    client,
    model: settings.model,
    dimensions: settings.dimensions,
    retryIntervalMs: serverConfig.retryIntervalMs
  });
}

export type { EmbeddingProvider, EmbeddingResult } from './types.js';
