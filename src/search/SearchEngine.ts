/**
 * Search Engine
 *
 * Ranks leaves against a query. Structural filters (tier, tags, tree, branch,
 * confidence) run in SQL first; only the survivors are scored.
 *
 * Scoring rules:
 * - A healthy query vector is compared with stored vectors of the same model.
 *   Leaves whose embedding is pending (missing, or from another model) are
 *   left out of semantic results.
 * - A query answered by the hashing fallback is compared with each candidate's
 *   content hashed on the fly, so fallback results depend only on the files
 *   and not on what the index happens to hold.
 */

import { DimensionMismatchError } from '../core/errors.js';
import { parseTier, tierRank, validateConfidence } from '../core/tiers.js';
import type {
  ContextMatch,
  ContextOptions,
  IndexedLeaf,
  Leaf,
  LeafFilter,
  LeafSummary,
  PrimeOptions,
  PrimeReport,
  SearchConfig,
  SearchOptions,
  SearchResult,
  StoreSettings,
  TagCount,
  Tier
} from '../core/types.js';
import type { IndexStore } from '../storage/IndexStore.js';
import { createLogger } from '../utils/logger.js';
import { HashEmbedder, LITE_MODEL } from '../vector/HashEmbedder.js';
import { cosineSimilarity } from '../vector/similarity.js';
import type { EmbeddingProvider } from '../vector/types.js';
import { RankingPolicy } from './RankingPolicy.js';

const log = createLogger('SearchEngine');

export const DEFAULT_CONTEXT_LIMIT = 3;
export const DEFAULT_CONTEXT_THRESHOLD = 0.5;
/** Hashed vectors score lower than model vectors for the same overlap */
export const HASHED_CONTEXT_THRESHOLD = 0.3;

const PRIME_SECTION_LIMIT = 5;
const PRIME_TAG_LIMIT = 15;
const PROMPT_PUNCTUATION = /^[.,!?"'()[\]{}:;]+|[.,!?"'()[\]{}:;]+$/g;

export interface SearchEngineOptions {
  index: IndexStore;
  provider: EmbeddingProvider;
  settings: StoreSettings;
  searchConfig: SearchConfig;
  ranking?: RankingPolicy;
  now?: () => Date;
}

interface Scored {
  leaf: IndexedLeaf;
  similarity: number;
}

interface QueryScores {
  scored: Scored[];
  /** The query vector came from the hashing embedder */
  hashed: boolean;
}

/**
 * Collapse whitespace and cut to `maxLength` characters, marking the cut
 */
export function makeExcerpt(content: string, maxLength: number): string {
  const flat = content.replace(/\s+/g, ' ').trim();
  if (flat.length <= maxLength) return flat;
  return `${flat.slice(0, Math.max(0, maxLength - 3))}...`;
}

export function summarizeLeaf(
  leaf: Pick<Leaf, 'path' | 'title' | 'content' | 'tier' | 'confidence' | 'tags' | 'updatedAt'>,
  excerptLength: number
): LeafSummary {
  return {
    path: leaf.path,
    title: leaf.title,
    excerpt: makeExcerpt(leaf.content, excerptLength),
    tier: leaf.tier,
    confidence: leaf.confidence,
    tags: leaf.tags,
    updatedAt: leaf.updatedAt
  };
}

/**
 * Turn user-facing search options into an index filter.
 *
 * @throws {InvalidTierError}
 * @throws {InvalidConfidenceError} If minConfidence is not a number in [0, 1]
 */
export function toLeafFilter(options: SearchOptions): LeafFilter {
  const filter: LeafFilter = {};

  if (options.tier !== undefined) {
    const tiers = Array.isArray(options.tier) ? options.tier : [options.tier];
    filter.tiers = tiers.map(tier => parseTier(tier));
  }

  const tags = [...(options.tags ?? []), ...(options.tag !== undefined ? [options.tag] : [])]
    .map(tag => tag.trim())
    .filter(tag => tag.length > 0);
  if (tags.length > 0) {
    filter.tags = [...new Set(tags)];
  }

  if (options.tree !== undefined) {
    filter.tree = options.tree;
  }
  if (options.branch !== undefined) {
    const slash = options.branch.indexOf('/');
    if (slash >= 0) {
      filter.tree = options.branch.slice(0, slash);
      filter.branch = options.branch.slice(slash + 1);
    } else {
      filter.branch = options.branch;
    }
  }
  if (options.minConfidence !== undefined) {
    filter.minConfidence = validateConfidence(options.minConfidence);
  }

  return filter;
}

/**
 * Words of a prompt that can match a tag: longer than two characters,
 * lowercased, surrounding punctuation removed.
 */
export function promptWords(prompt: string): Set<string> {
  const words = new Set<string>();
  for (const raw of prompt.split(/\s+/)) {
    if (raw.length <= 2) continue;
    const word = raw.toLowerCase().replace(PROMPT_PUNCTUATION, '');
    if (word.length > 0) words.add(word);
  }
  return words;
}

function byRecencyThenPath(a: { updatedAt: string; path: string }, b: { updatedAt: string; path: string }): number {
  if (a.updatedAt !== b.updatedAt) return a.updatedAt < b.updatedAt ? 1 : -1;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

export class SearchEngine {
  private readonly index: IndexStore;
  private readonly provider: EmbeddingProvider;
  private readonly settings: StoreSettings;
  private readonly config: SearchConfig;
  private readonly ranking: RankingPolicy;
  private readonly now: () => Date;
  private hasher: HashEmbedder | null = null;

  constructor(options: SearchEngineOptions) {
    this.index = options.index;
    this.provider = options.provider;
    this.settings = options.settings;
    this.config = options.searchConfig;
    this.ranking = options.ranking ?? new RankingPolicy();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Semantic search under structural filters. An empty result is not an error.
   *
   * @throws {DimensionMismatchError} If the index was built with another dimensionality
   * @throws {InvalidTierError | InvalidConfidenceError}
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const limit = this.resolveLimit(options.limit, this.config.defaultLimit);
    const candidates = this.index.queryLeaves(toLeafFilter(options));
    if (candidates.length === 0 || limit === 0) return [];

    const { scored } = await this.scoreQuery(query, candidates);

    return scored
      .map(({ leaf, similarity }) => ({ ...this.summarize(leaf), score: similarity }))
      .sort((a, b) => (b.score !== a.score ? b.score - a.score : byRecencyThenPath(a, b)))
      .slice(0, limit);
  }

  /**
   * Exact tag lookup, pending embeddings included. Ordered by path.
   */
  getByTag(tag: string): LeafSummary[] {
    return this.index.queryLeaves({ tags: [tag.trim()] }).map(leaf => this.summarize(leaf));
  }

  /**
   * @throws {InvalidTierError}
   */
  getByTier(tier: Tier | string): LeafSummary[] {
    return this.index.queryLeaves({ tiers: [parseTier(tier)] }).map(leaf => this.summarize(leaf));
  }

  listTags(): TagCount[] {
    return this.index.listTags();
  }

  /**
   * Leaves relevant to a free-form prompt, for injecting ahead of a request.
   *
   * `tags` mode matches prompt words against tags and needs no embedding.
   * `semantic` mode keeps leaves whose similarity reaches the threshold and
   * orders them with the ranking policy.
   */
  async context(prompt: string, options: ContextOptions = {}): Promise<ContextMatch[]> {
    const limit = this.resolveLimit(options.limit, DEFAULT_CONTEXT_LIMIT);
    if (limit === 0) return [];

    if ((options.mode ?? 'semantic') === 'tags') {
      return this.contextByTags(prompt, limit);
    }

    const candidates = this.index.queryLeaves();
    if (candidates.length === 0) return [];

    const { scored, hashed } = await this.scoreQuery(prompt, candidates);
    const threshold = options.threshold ?? (hashed ? HASHED_CONTEXT_THRESHOLD : DEFAULT_CONTEXT_THRESHOLD);
    const now = this.now();

    return scored
      .filter(({ similarity }) => similarity >= threshold)
      .map(({ leaf, similarity }) => ({
        path: leaf.path,
        updatedAt: leaf.updatedAt,
        score: this.ranking.score({ similarity, tier: leaf.tier, confidence: leaf.confidence, updatedAt: leaf.updatedAt }, now)
      }))
      .sort((a, b) => (b.score !== a.score ? b.score - a.score : byRecencyThenPath(a, b)))
      .slice(0, limit)
      .map(({ path, score }) => ({ path, score }));
  }

  /**
   * Session primer: what the store holds, its foundational leaves, what
   * changed recently, and the leaves the ranking policy puts first.
   */
  async prime(options: PrimeOptions = {}): Promise<PrimeReport> {
    const limit = this.resolveLimit(options.limit, PRIME_SECTION_LIMIT);
    const leaves = this.index.queryLeaves();
    const counts = this.index.counts(this.settings.model);

    const trees = this.index.listTrees().map(tree => ({
      name: tree.name,
      branches: this.index.listBranches(tree.name).length
    }));

    const tags = this.index
      .listTags()
      .map(entry => entry.tag)
      .sort()
      .slice(0, PRIME_TAG_LIMIT);

    const foundational = leaves
      .filter(leaf => leaf.tier === 'roots')
      .slice(0, PRIME_SECTION_LIMIT)
      .map(leaf => this.summarize(leaf));

    const recent = [...leaves]
      .sort(byRecencyThenPath)
      .slice(0, PRIME_SECTION_LIMIT)
      .map(leaf => this.summarize(leaf));

    let scored: Scored[];
    const query = options.query?.trim();
    if (query && leaves.length > 0) {
      scored = (await this.scoreQuery(query, leaves)).scored;
    } else {
      scored = leaves.map(leaf => ({ leaf, similarity: 0 }));
    }

    const now = this.now();
    const highlights = scored
      .map(({ leaf, similarity }) => ({
        ...this.summarize(leaf),
        score: this.ranking.score({ similarity, tier: leaf.tier, confidence: leaf.confidence, updatedAt: leaf.updatedAt }, now)
      }))
      .sort((a, b) => (b.score !== a.score ? b.score - a.score : byRecencyThenPath(a, b)))
      .slice(0, limit);

    return {
      trees,
      leafCount: counts.leaves,
      byTier: counts.byTier,
      tags,
      foundational,
      recent,
      highlights
    };
  }

  summarize(leaf: IndexedLeaf): LeafSummary {
    return summarizeLeaf(leaf, this.config.excerptLength);
  }

  // ==========================================
  // INTERNALS
  // ==========================================

  private async scoreQuery(query: string, candidates: IndexedLeaf[]): Promise<QueryScores> {
    this.assertIndexDimensions();

    const result = await this.provider.embed(query);

    if (result.fallback) {
      const hasher = this.hasherFor(result.vector.length);
      log.debug(`Scoring ${candidates.length} candidates from content (hashing fallback)`);
      return {
        hashed: true,
        scored: candidates.map(leaf => ({
          leaf,
          similarity: cosineSimilarity(result.vector, hasher.vectorize(leaf.content))
        }))
      };
    }

    if (result.vector.length !== this.settings.dimensions) {
      throw new DimensionMismatchError(
        this.settings.dimensions,
        result.vector.length,
        `Provider '${result.model}' does not match the store configuration`
      );
    }

    const scored: Scored[] = [];
    for (const leaf of candidates) {
      if (leaf.embedding === null || leaf.embeddingModel !== result.model) continue;
      scored.push({ leaf, similarity: cosineSimilarity(result.vector, leaf.embedding) });
    }

    return { hashed: result.model === LITE_MODEL, scored };
  }

  private contextByTags(prompt: string, limit: number): ContextMatch[] {
    const words = promptWords(prompt);
    if (words.size === 0) return [];

    const matches: Array<ContextMatch & { tier: Tier; updatedAt: string; matchedTags: string[] }> = [];
    for (const leaf of this.index.queryLeaves()) {
      const matchedTags = leaf.tags.filter(tag => words.has(tag.toLowerCase()));
      if (matchedTags.length > 0) {
        matches.push({ path: leaf.path, score: matchedTags.length, matchedTags, tier: leaf.tier, updatedAt: leaf.updatedAt });
      }
    }

    return matches
      .sort((a, b) => {
        if (b.score !== a.score) return b.score - a.score;
        const tiers = tierRank(b.tier) - tierRank(a.tier);
        return tiers !== 0 ? tiers : byRecencyThenPath(a, b);
      })
      .slice(0, limit)
      .map(({ path, score, matchedTags }) => ({ path, score, matchedTags }));
  }

  /**
   * @throws {DimensionMismatchError} If the stored vectors were built with another size
   */
  private assertIndexDimensions(): void {
    const { dimensions } = this.index.getEmbeddingInfo();
    if (dimensions !== null && dimensions !== this.settings.dimensions) {
      throw new DimensionMismatchError(
        this.settings.dimensions,
        dimensions,
        "The index was built for another model; run 'arbor reindex'"
      );
    }
  }

  private hasherFor(dimensions: number): HashEmbedder {
    if (this.hasher === null || this.hasher.dimensions !== dimensions) {
      this.hasher = new HashEmbedder(dimensions);
    }
    return this.hasher;
  }

  private resolveLimit(limit: number | undefined, fallback: number): number {
    if (limit === undefined || !Number.isFinite(limit)) return fallback;
    return Math.max(0, Math.floor(limit));
  }
}
