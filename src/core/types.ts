/**
 * Knowledge Base Core Types
 *
 * Central type definitions for the tree/branch/leaf knowledge store.
 */

// ==========================================
// TIERS
// ==========================================

/**
 * Validation stage of a leaf, in ascending order of trust.
 */
export type Tier = 'leaves' | 'branches' | 'trunk' | 'roots';

// ==========================================
// STRUCTURE TYPES
// ==========================================

export interface Tree {
  name: string;
  description: string;
  createdAt: string;
}

export interface Branch {
  tree: string;
  name: string;
  description: string;
  createdAt: string;
}

export interface LeafLink {
  to: string;
  relation: string;
  createdAt: string;
}

export interface Leaf {
  id: string;
  /** Canonical path: tree/branch/name.md */
  path: string;
  tree: string;
  branch: string;
  name: string;
  title: string;
  content: string;
  tier: Tier;
  confidence: number; // 0.0 - 1.0
  tags: string[];
  /** Outgoing links, stored canonically with the leaf */
  links: LeafLink[];
  createdAt: string;
  updatedAt: string;
}

export interface AddLeafInput {
  branch: string;
  content: string;
  tree?: string;
  name?: string;
  tier?: Tier | string;
  confidence?: number;
  tags?: string[];
}

export interface UpdateLeafInput {
  tier?: Tier | string;
  confidence?: number;
  tags?: string[];
}

// ==========================================
// INDEX TYPES
// ==========================================

export interface IndexedLeaf {
  path: string;
  id: string;
  tree: string;
  branch: string;
  name: string;
  title: string;
  content: string;
  tier: Tier;
  confidence: number;
  tags: string[];
  contentHash: string;
  embedding: Float32Array | null;
  embeddingModel: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Link {
  from: string;
  to: string;
  relation: string;
  createdAt: string;
}

export interface LeafFilter {
  tiers?: Tier[];
  /** At least one listed tag must be present */
  tags?: string[];
  tree?: string;
  branch?: string;
  minConfidence?: number;
}

// ==========================================
// SEARCH TYPES
// ==========================================

export interface SearchOptions {
  tier?: Tier | string | Array<Tier | string>;
  /** Tag filters match leaves carrying any of the given tags */
  tag?: string;
  tags?: string[];
  tree?: string;
  /** Bare branch name or tree/branch */
  branch?: string;
  minConfidence?: number;
  limit?: number;
}

/**
 * Leaf as shown in listings: content reduced to a single-line excerpt
 */
export interface LeafSummary {
  path: string;
  title: string;
  excerpt: string;
  tier: Tier;
  confidence: number;
  tags: string[];
  updatedAt: string;
}

export interface SearchResult extends LeafSummary {
  score: number;
}

export type ContextMode = 'semantic' | 'tags';

export interface ContextOptions {
  mode?: ContextMode;
  limit?: number;
  threshold?: number;
}

export interface ContextMatch {
  path: string;
  /** Matched tag count in tags mode, ranked score in semantic mode */
  score: number;
  matchedTags?: string[];
}

export interface PrimeOptions {
  query?: string;
  limit?: number;
}

export interface PrimeReport {
  trees: Array<{ name: string; branches: number }>;
  leafCount: number;
  byTier: Record<Tier, number>;
  tags: string[];
  /** Roots-tier leaves */
  foundational: LeafSummary[];
  /** Most recently updated leaves */
  recent: LeafSummary[];
  highlights: SearchResult[];
}

// ==========================================
// GRAPH TYPES
// ==========================================

export interface RelatedLeaf {
  direction: 'outgoing' | 'incoming';
  relation: string;
  path: string;
  title: string;
  excerpt: string;
  tier: Tier;
}

// ==========================================
// MAINTENANCE TYPES
// ==========================================

export interface ReindexResult {
  trees: number;
  branches: number;
  leaves: number;
  links: number;
  /** Leaves stored without an embedding */
  pending: number;
  /** Files that could not be parsed and were left out */
  skipped: string[];
  durationMs: number;
}

export interface ConsistencyReport {
  /** Canonical files without an index row */
  missing: string[];
  /** Index rows without a canonical file */
  orphaned: string[];
  /** Index rows whose content hash differs from the file */
  stale: string[];
  /** Leaves whose embedding is null or from another model */
  pending: string[];
  /** Files whose frontmatter cannot be parsed */
  invalid: string[];
  indexModel: string | null;
  indexDimensions: number | null;
  activeModel: string;
  activeDimensions: number;
}

export interface RepairResult {
  added: number;
  updated: number;
  removed: number;
  /** Pending leaves that received an embedding */
  embedded: number;
}

export interface KnowledgeStats {
  trees: number;
  branches: number;
  leaves: number;
  links: number;
  tags: number;
  byTier: Record<Tier, number>;
  pendingEmbeddings: number;
  provider: string;
  model: string;
  dimensions: number;
  indexModel: string | null;
  storePath: string;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface BranchOverview {
  name: string;
  description: string;
  leaves: LeafSummary[];
}

export interface TreeOverview {
  name: string;
  description: string;
  branches: BranchOverview[];
}

export interface InitResult {
  storePath: string;
  /** False when the store already existed */
  created: boolean;
  settings: StoreSettings;
}

export interface ModelChange {
  settings: StoreSettings;
  /** Stored vectors were built with another model or size */
  reindexRequired: boolean;
}

// ==========================================
// CONFIGURATION TYPES
// ==========================================

export type ProviderKind = 'lite' | 'server';

/**
 * Store-local settings persisted in <store>/_config.yaml
 */
export interface StoreSettings {
  version: number;
  provider: ProviderKind;
  model: string;
  dimensions: number;
}

export interface ServerClientConfig {
  runtimeDir: string;
  pingTimeoutMs: number;
  requestTimeoutMs: number;
  startTimeoutMs: number;
  /** How long a provider keeps using the hashing fallback before asking the daemon again */
  retryIntervalMs: number;
}

export interface SearchConfig {
  defaultLimit: number;
  excerptLength: number;
}

export interface KnowledgeBaseConfig {
  storePath: string;
  indexPath: string;
  configPath: string;
  lockPath: string;
  /** Re-sync stale index rows before searching */
  autoRepair: boolean;
  searchConfig: SearchConfig;
  serverConfig: ServerClientConfig;
}
