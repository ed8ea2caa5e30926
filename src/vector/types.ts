/**
 * Vector Types
 *
 * Type definitions for embedding providers and model runtimes.
 */

export interface EmbeddingResult {
  vector: Float32Array;
  /** Model that produced the vector (a registry alias) */
  model: string;
  /** True when the server was unavailable and the hashing embedder answered instead */
  fallback: boolean;
}

/**
 * One contract for every embedding backend. Call sites never branch on which
 * variant they hold.
 */
export interface EmbeddingProvider {
  readonly name: 'lite' | 'server';
  /** Alias whose vectors this provider produces when healthy */
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<EmbeddingResult>;
  embedBatch(texts: string[]): Promise<EmbeddingResult[]>;
  close?(): Promise<void>;
}

export interface EmbeddingServiceConfig {
  /** Model identity sent to the endpoint */
  model: string;
  dimensions: number;
  /** OpenAI-compatible base URL, e.g. http://localhost:11434/v1 */
  baseURL: string;
  apiKey: string;
  batchSize: number;
  /** Send `dimensions` with each request (only models that support shortening accept it) */
  sendDimensions?: boolean;
  /** Timeout in milliseconds (default 30000) */
  timeoutMs?: number;
  /** Max retries on transient errors (default 3) */
  maxRetries?: number;
  /** Base delay between retries in ms (default 1000, uses exponential backoff) */
  retryDelayMs?: number;
}
