/**
 * Search Engine Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DimensionMismatchError, InvalidConfidenceError, InvalidTierError } from '../core/errors.js';
import type { IndexedLeaf, StoreSettings, Tier } from '../core/types.js';
import { IndexStore } from '../storage/IndexStore.js';
import { HashEmbedder } from '../vector/HashEmbedder.js';
import type { EmbeddingProvider, EmbeddingResult } from '../vector/types.js';
import { SearchEngine, makeExcerpt, promptWords, toLeafFilter } from './SearchEngine.js';

const NOW = new Date('2026-06-01T00:00:00.000Z');
const LITE: StoreSettings = { version: 1, provider: 'lite', model: 'lite', dimensions: 384 };
const SEARCH_CONFIG = { defaultLimit: 5, excerptLength: 200 };

const MACD = 'trading/indicators/macd.md';
const VOLUME = 'trading/gotchas/volume-spikes.md';
const MOMENTUM = 'research/papers/momentum.md';

const hasher = new HashEmbedder();

interface LeafSeed {
  path: string;
  content: string;
  tier: Tier;
  confidence: number;
  tags: string[];
  updatedAt: string;
  embedded?: boolean;
}

function indexedLeaf(seed: LeafSeed): IndexedLeaf {
  const [tree, branch, file] = seed.path.split('/');
  const embedded = seed.embedded ?? true;
  return {
    path: seed.path,
    id: `id-${seed.path}`,
    tree,
    branch,
    name: file.replace(/\.md$/, ''),
    title: seed.content,
    content: seed.content,
    tier: seed.tier,
    confidence: seed.confidence,
    tags: seed.tags,
    contentHash: `hash-${seed.path}`,
    embedding: embedded ? hasher.vectorize(seed.content) : null,
    embeddingModel: embedded ? 'lite' : null,
    createdAt: seed.updatedAt,
    updatedAt: seed.updatedAt
  };
}

/**
 * Answers like a server provider whose daemon is down
 */
class FallbackProvider implements EmbeddingProvider {
  readonly name = 'server' as const;
  readonly model = 'nomic';
  readonly dimensions = 384;

  async embed(text: string): Promise<EmbeddingResult> {
    return { vector: hasher.vectorize(text), model: 'lite', fallback: true };
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    return Promise.all(texts.map(text => this.embed(text)));
  }
}

/**
 * A healthy provider for another model
 */
class OtherModelProvider extends FallbackProvider {
  async embed(text: string): Promise<EmbeddingResult> {
    return { vector: hasher.vectorize(text), model: 'nomic', fallback: false };
  }
}

describe('SearchEngine', () => {
  let dir: string;
  let index: IndexStore;

  function engine(provider: EmbeddingProvider = new HashEmbedder(), settings: StoreSettings = LITE): SearchEngine {
    return new SearchEngine({ index, provider, settings, searchConfig: SEARCH_CONFIG, now: () => NOW });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-search-'));
    index = IndexStore.create(join(dir, '_index.db'));

    index.transaction(() => {
      index.upsertTree({ name: 'trading', description: '', createdAt: NOW.toISOString() });
      index.upsertTree({ name: 'research', description: '', createdAt: NOW.toISOString() });
      index.upsertBranch({ tree: 'trading', name: 'indicators', description: '', createdAt: NOW.toISOString() });
      index.upsertBranch({ tree: 'trading', name: 'gotchas', description: '', createdAt: NOW.toISOString() });
      index.upsertBranch({ tree: 'research', name: 'papers', description: '', createdAt: NOW.toISOString() });

      index.upsertLeaf(indexedLeaf({
        path: MACD,
        content: 'MACD crossover signals lag in ranging markets',
        tier: 'trunk',
        confidence: 0.8,
        tags: ['indicators', 'MACD'],
        updatedAt: '2026-05-31T00:00:00.000Z'
      }));
      index.upsertLeaf(indexedLeaf({
        path: VOLUME,
        content: 'Volume spikes at the opening bell are noise',
        tier: 'leaves',
        confidence: 0.4,
        tags: ['volume', 'macd'],
        updatedAt: '2026-05-30T00:00:00.000Z'
      }));
      index.upsertLeaf(indexedLeaf({
        path: MOMENTUM,
        content: 'Momentum factor decays after twelve months',
        tier: 'roots',
        confidence: 0.9,
        tags: ['momentum'],
        updatedAt: '2026-05-22T00:00:00.000Z',
        embedded: false
      }));
      index.setEmbeddingInfo('lite', 384);
    });
  });

  afterEach(() => {
    index.close();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('search', () => {
    it('should rank the lexically closest leaf first', async () => {
      const results = await engine().search('MACD crossover');

      expect(results[0].path).toBe(MACD);
      expect(results[0].score).toBeGreaterThan(results[1].score);
      expect(results[0].excerpt).toBe('MACD crossover signals lag in ranging markets');
    });

    it('should apply structural filters before scoring', async () => {
      const search = engine();

      expect((await search.search('signals', { tier: 'trunk' })).map(r => r.path)).toEqual([MACD]);
      expect((await search.search('signals', { tag: 'volume' })).map(r => r.path)).toEqual([VOLUME]);
      expect((await search.search('signals', { tags: ['volume', 'MACD'] })).map(r => r.path).sort()).toEqual([VOLUME, MACD]);
      expect((await search.search('signals', { tags: ['indicators', 'absent'] })).map(r => r.path)).toEqual([MACD]);
      expect((await search.search('signals', { branch: 'trading/gotchas' })).map(r => r.path)).toEqual([VOLUME]);
      expect((await search.search('signals', { minConfidence: 0.5 })).map(r => r.path)).toEqual([MACD]);
      expect(await search.search('signals', { tree: 'nowhere' })).toEqual([]);
      expect(await search.search('signals', { limit: 1 })).toHaveLength(1);
      await expect(search.search('signals', { tier: 'gold' })).rejects.toBeInstanceOf(InvalidTierError);
      await expect(search.search('signals', { minConfidence: Number('abc') })).rejects.toBeInstanceOf(InvalidConfidenceError);
      await expect(search.search('signals', { minConfidence: 1.5 })).rejects.toBeInstanceOf(InvalidConfidenceError);
    });

    it('should leave pending leaves out of semantic results', async () => {
      const results = await engine().search('Momentum factor decays after twelve months');
      expect(results.map(r => r.path).sort()).toEqual([VOLUME, MACD]);
    });

    it('should hash candidate contents when the query fell back', async () => {
      const results = await engine(new FallbackProvider(), { ...LITE, provider: 'server', model: 'nomic' })
        .search('Momentum factor decays after twelve months');

      expect(results).toHaveLength(3);
      expect(results[0].path).toBe(MOMENTUM);
      expect(results[0].score).toBeCloseTo(1, 5);
    });

    it('should only compare vectors of the same model', async () => {
      const results = await engine(new OtherModelProvider(), { ...LITE, provider: 'server', model: 'nomic' })
        .search('MACD crossover');
      expect(results).toEqual([]);
    });

    it('should break score ties by recency, then path', async () => {
      const content = 'Duplicate insight about bid ask spreads';
      index.upsertLeaf(indexedLeaf({ path: 'notes/inbox/a.md', content, tier: 'leaves', confidence: 0.5, tags: [], updatedAt: '2026-05-01T00:00:00.000Z' }));
      index.upsertLeaf(indexedLeaf({ path: 'notes/inbox/b.md', content, tier: 'leaves', confidence: 0.5, tags: [], updatedAt: '2026-05-02T00:00:00.000Z' }));
      index.upsertLeaf(indexedLeaf({ path: 'notes/inbox/c.md', content, tier: 'leaves', confidence: 0.5, tags: [], updatedAt: '2026-05-02T00:00:00.000Z' }));

      const results = await engine().search(content, { limit: 3 });
      expect(results.map(r => r.path)).toEqual(['notes/inbox/b.md', 'notes/inbox/c.md', 'notes/inbox/a.md']);
    });

    it('should refuse an index built with another dimensionality', async () => {
      index.setEmbeddingInfo('lite', 128);
      await expect(engine().search('MACD')).rejects.toBeInstanceOf(DimensionMismatchError);
    });
  });

  describe('lookups', () => {
    it('should find leaves by exact tag, pending ones included', () => {
      expect(engine().getByTag('momentum').map(l => l.path)).toEqual([MOMENTUM]);
      expect(engine().getByTag('MACD').map(l => l.path)).toEqual([MACD]);
      expect(engine().getByTag('missing')).toEqual([]);
    });

    it('should find leaves by tier', () => {
      expect(engine().getByTier('roots').map(l => l.path)).toEqual([MOMENTUM]);
      expect(() => engine().getByTier('gold')).toThrow(InvalidTierError);
    });

    it('should count tags', () => {
      expect(engine().listTags()).toEqual([
        { tag: 'MACD', count: 1 },
        { tag: 'indicators', count: 1 },
        { tag: 'macd', count: 1 },
        { tag: 'momentum', count: 1 },
        { tag: 'volume', count: 1 }
      ]);
    });
  });

  describe('context', () => {
    it('should match prompt words against tags', async () => {
      const matches = await engine().context('How do I read MACD, volume?', { mode: 'tags' });

      expect(matches).toEqual([
        { path: VOLUME, score: 2, matchedTags: ['volume', 'macd'] },
        { path: MACD, score: 1, matchedTags: ['MACD'] }
      ]);
    });

    it('should prefer higher tiers when tag matches tie', async () => {
      const matches = await engine().context('indicators and momentum', { mode: 'tags' });
      expect(matches.map(m => m.path)).toEqual([MOMENTUM, MACD]);
    });

    it('should rank semantic matches with the ranking policy', async () => {
      const matches = await engine().context('MACD crossover signals lag in ranging markets', { limit: 1 });

      expect(matches).toHaveLength(1);
      expect(matches[0].path).toBe(MACD);
      // similarity 1 + tier 2/3 * 0.1 + confidence 0.8 * 0.05 + one day of recency decay
      const expected = 1 + 0.1 * (2 / 3) + 0.05 * 0.8 + 0.05 * Math.pow(0.5, 1 / 30);
      expect(matches[0].score).toBeCloseTo(expected, 5);
    });

    it('should drop matches under the threshold', async () => {
      expect(await engine().context('MACD crossover', { threshold: 1.5 })).toEqual([]);
      expect(await engine().context('MACD crossover', { limit: 0 })).toEqual([]);
    });
  });

  describe('prime', () => {
    it('should summarize the store without a query', async () => {
      const report = await engine().prime();

      expect(report.trees).toEqual([
        { name: 'research', branches: 1 },
        { name: 'trading', branches: 2 }
      ]);
      expect(report.leafCount).toBe(3);
      expect(report.byTier).toEqual({ leaves: 1, branches: 0, trunk: 1, roots: 1 });
      expect(report.tags).toEqual(['MACD', 'indicators', 'macd', 'momentum', 'volume']);
      expect(report.foundational.map(l => l.path)).toEqual([MOMENTUM]);
      expect(report.recent.map(l => l.path)).toEqual([MACD, VOLUME, MOMENTUM]);
      expect(report.highlights.map(l => l.path)).toEqual([MOMENTUM, MACD, VOLUME]);
    });

    it('should put the closest leaf first when given a query', async () => {
      const report = await engine().prime({ query: 'Volume spikes at the opening bell are noise', limit: 1 });
      expect(report.highlights.map(l => l.path)).toEqual([VOLUME]);
    });
  });
});

describe('search helpers', () => {
  it('should build excerpts', () => {
    expect(makeExcerpt('a  b\n c', 100)).toBe('a b c');
    expect(makeExcerpt('abcdefghij', 5)).toBe('ab...');
  });

  it('should turn options into an index filter', () => {
    expect(toLeafFilter({ tier: ['trunk', 'roots'], tag: ' x ', tags: ['x', 'y'], branch: 't/b', minConfidence: 0.2 })).toEqual({
      tiers: ['trunk', 'roots'],
      tags: ['x', 'y'],
      tree: 't',
      branch: 'b',
      minConfidence: 0.2
    });
    expect(toLeafFilter({})).toEqual({});
  });

  it('should extract prompt words', () => {
    expect([...promptWords('How do I read MACD, volume?')]).toEqual(['how', 'read', 'macd', 'volume']);
  });
});
