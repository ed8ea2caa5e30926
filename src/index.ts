/**
 * Arbor
 *
 * Persistent, tree-structured knowledge base. Markdown files are the source
 * of truth; a SQLite index mirrors them for semantic search and graph queries.
 */

export { KnowledgeBase } from './core/KnowledgeBase.js';
export type { KnowledgeBaseOptions } from './core/KnowledgeBase.js';
export * from './core/types.js';
export * from './core/errors.js';
export {
  TIERS,
  DEFAULT_TIER,
  DEFAULT_CONFIDENCE,
  isTier,
  parseTier,
  tierRank,
  compareTiers,
  validateConfidence
} from './core/tiers.js';
export { findStorePath, getDefaultConfig } from './core/config.js';

export { SearchEngine } from './search/SearchEngine.js';
export { RankingPolicy, DEFAULT_RANKING_WEIGHTS } from './search/RankingPolicy.js';
export type { RankingWeights, RankingInput } from './search/RankingPolicy.js';
export { KnowledgeGraph, KNOWN_RELATIONS, DEFAULT_RELATION, validateRelation } from './graph/KnowledgeGraph.js';
export type { LinkResult, LeafRepository } from './graph/KnowledgeGraph.js';
export { PruneAnalyzer, PRUNE_DEFAULTS } from './analysis/PruneAnalyzer.js';
export type { PruneOptions, PruneReport, PruneCandidate, PruneReason } from './analysis/PruneAnalyzer.js';

export { createEmbeddingProvider } from './vector/EmbeddingProvider.js';
export type { EmbeddingProvider, EmbeddingResult } from './vector/types.js';
export { HashEmbedder } from './vector/HashEmbedder.js';
export { ServerEmbedder } from './vector/ServerEmbedder.js';
export { cosineSimilarity } from './vector/similarity.js';

export { ServerManager } from './server/ServerManager.js';
export type { ServerStatus, StartResult, SetModelResult } from './server/ServerManager.js';
export { MODEL_REGISTRY, resolveModel } from './server/models.js';
export type { ModelSpec } from './server/models.js';
