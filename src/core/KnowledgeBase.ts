/**
 * Knowledge Base
 *
 * Unified API facade for the knowledge store. Coordinates the canonical leaf
 * files, the SQLite index mirror, the embedding provider, search and the
 * link graph.
 *
 * Write protocol (add, update, link, delete):
 * 1. Compute embeddings first; a provider failure leaves the leaf pending.
 * 2. Write each canonical file through temp-file + rename.
 * 3. Commit every index change in one transaction.
 * 4. If the transaction fails, put the previous files back.
 * A crash between 2 and 3 leaves a file the index does not know yet, which
 * check()/repair() and lazy repair on read pick up.
 */

import { existsSync, rmSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { getDefaultConfig, mergeConfig, validateConfig } from './config.js';
import {
  AlreadyExistsError,
  AmbiguousBranchError,
  IndexCorruptError,
  InvalidConfigError,
  InvalidNameError,
  KnowledgeBaseError,
  NotFoundError,
  StoreLockedError,
  getErrorMessage
} from './errors.js';
import { DEFAULT_CONFIDENCE, DEFAULT_TIER, parseTier, validateConfidence } from './tiers.js';
import type {
  AddLeafInput,
  Branch,
  ConsistencyReport,
  ContextMatch,
  ContextOptions,
  IndexedLeaf,
  InitResult,
  KnowledgeBaseConfig,
  KnowledgeStats,
  Leaf,
  LeafSummary,
  ModelChange,
  PrimeOptions,
  PrimeReport,
  RelatedLeaf,
  ReindexResult,
  RepairResult,
  SearchOptions,
  SearchResult,
  StoreSettings,
  TagCount,
  Tier,
  Tree,
  TreeOverview,
  UpdateLeafInput
} from './types.js';
import { PruneAnalyzer, type PruneOptions, type PruneReport } from '../analysis/PruneAnalyzer.js';
import { loadStoreSettings, saveStoreSettings, STORE_CONFIG_VERSION } from '../config/ConfigLoader.js';
import { DEFAULT_RELATION, KnowledgeGraph, type LinkResult } from '../graph/KnowledgeGraph.js';
import { SearchEngine, summarizeLeaf } from '../search/SearchEngine.js';
import { resolveModel } from '../server/models.js';
import { FileStore, type StoredLeaf } from '../storage/FileStore.js';
import { IndexStore } from '../storage/IndexStore.js';
import {
  generateLeafName,
  generateTitle,
  normalizeTags,
  parseLeafPath,
  validateName,
  type LeafLocation
} from '../storage/LeafDocument.js';
import { WriteLock } from '../storage/WriteLock.js';
import { createLogger } from '../utils/logger.js';
import { createEmbeddingProvider, type EmbeddingProvider } from '../vector/EmbeddingProvider.js';

const log = createLogger('KnowledgeBase');

const MAX_NAME_SUFFIX = 1000;

interface EmbeddingSlot {
  embedding: Float32Array | null;
  embeddingModel: string | null;
}

function locationOf(leaf: Leaf): LeafLocation {
  return { tree: leaf.tree, branch: leaf.branch, name: leaf.name, path: leaf.path };
}

function toIndexedLeaf(leaf: Leaf, contentHash: string, slot: EmbeddingSlot): IndexedLeaf {
  return {
    path: leaf.path,
    id: leaf.id,
    tree: leaf.tree,
    branch: leaf.branch,
    name: leaf.name,
    title: leaf.title,
    content: leaf.content,
    tier: leaf.tier,
    confidence: leaf.confidence,
    tags: leaf.tags,
    contentHash,
    embedding: slot.embedding,
    embeddingModel: slot.embeddingModel,
    createdAt: leaf.createdAt,
    updatedAt: leaf.updatedAt
  };
}

export interface KnowledgeBaseOptions {
  /** Clock used for timestamps and age calculations */
  now?: () => Date;
}

export class KnowledgeBase {
  private readonly config: KnowledgeBaseConfig;
  private readonly files: FileStore;
  private readonly lock: WriteLock;
  private readonly now: () => Date;
  private settings: StoreSettings;
  private provider: EmbeddingProvider;
  private indexStore: IndexStore | null = null;
  /** Set when the index failed to open; everything but reindex reports it */
  private indexError: IndexCorruptError | null = null;
  private searchEngine: SearchEngine | null = null;
  private graph: KnowledgeGraph;
  private initialized: boolean = false;

  constructor(configOverrides?: Partial<KnowledgeBaseConfig>, options: KnowledgeBaseOptions = {}) {
    const defaultConfig = getDefaultConfig(configOverrides?.storePath);
    this.config = configOverrides ? mergeConfig(defaultConfig, configOverrides) : defaultConfig;

    const errors = validateConfig(this.config);
    if (errors.length > 0) {
      throw new InvalidConfigError('configuration', errors.join(', '));
    }

    this.now = options.now ?? (() => new Date());
    this.files = new FileStore(this.config.storePath);
    this.lock = new WriteLock(this.config.lockPath);
    this.settings = loadStoreSettings(this.config.configPath);
    this.provider = createEmbeddingProvider(this.settings, this.config.serverConfig);
    this.graph = new KnowledgeGraph(
      {
        index: () => this.index,
        loadLeaf: (path, held) => this.readLeaf(path, held),
        saveLeaves: leaves => this.commit(leaves)
      },
      { excerptLength: this.config.searchConfig.excerptLength, now: this.now }
    );
  }

  /**
   * Construct and initialize in one step
   */
  static async open(configOverrides?: Partial<KnowledgeBaseConfig>, options: KnowledgeBaseOptions = {}): Promise<KnowledgeBase> {
    const kb = new KnowledgeBase(configOverrides, options);
    await kb.initialize();
    return kb;
  }

  /**
   * Open the index and finish any write a previous process left half done.
   * A corrupt index does not fail here: every operation except reindex
   * reports IndexCorrupt until the index is rebuilt.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    this.files.ensureRoot();
    try {
      this.bindIndex(IndexStore.open(this.config.indexPath));
    } catch (error) {
      if (!(error instanceof IndexCorruptError)) throw error;
      log.warn(error.message);
      this.indexError = error;
    }

    await this.recoverInterruptedWrites();
    this.initialized = true;
  }

  async close(): Promise<void> {
    this.indexStore?.close();
    this.indexStore = null;
    this.searchEngine = null;
    await this.provider.close?.();
    this.initialized = false;
  }

  get storePath(): string {
    return this.config.storePath;
  }

  get storeSettings(): StoreSettings {
    return { ...this.settings };
  }

  get embeddingProvider(): EmbeddingProvider {
    return this.provider;
  }

  /**
   * @throws {IndexCorruptError} If the index could not be opened
   */
  get index(): IndexStore {
    if (this.indexStore) return this.indexStore;
    if (this.indexError) throw this.indexError;

    const index = IndexStore.open(this.config.indexPath);
    this.bindIndex(index);
    return index;
  }

  /**
   * Write the store settings, creating the store if needed. Without a model
   * an existing store keeps its settings.
   *
   * @throws {InvalidModelError}
   */
  async init(options: { model?: string } = {}): Promise<InitResult> {
    await this.initialize();
    const created = !existsSync(this.config.configPath);

    if (options.model !== undefined) {
      const change = await this.setModel(options.model);
      return { storePath: this.storePath, created, settings: change.settings };
    }
    if (created) {
      await this.lock.runExclusive(() => saveStoreSettings(this.config.configPath, this.settings));
    }
    return { storePath: this.storePath, created, settings: this.storeSettings };
  }

  // ==========================================
  // TREES AND BRANCHES
  // ==========================================

  /**
   * @throws {InvalidNameError | AlreadyExistsError}
   */
  async createTree(name: string, description: string = ''): Promise<Tree> {
    validateName(name, 'tree');
    return this.lock.runExclusive(() => {
      if (this.files.treeExists(name)) {
        throw new AlreadyExistsError('tree', name);
      }
      return this.plantTree(name, description);
    });
  }

  /**
   * @throws {InvalidNameError | AlreadyExistsError}
   * @throws {NotFoundError} If the tree is missing and `createTree` is not set
   */
  async createBranch(
    tree: string,
    name: string,
    description: string = '',
    options: { createTree?: boolean } = {}
  ): Promise<Branch> {
    validateName(tree, 'tree');
    validateName(name, 'branch');

    return this.lock.runExclusive(() => {
      if (!this.files.treeExists(tree)) {
        if (!options.createTree) throw new NotFoundError('tree', tree);
        this.plantTree(tree, '');
      }
      if (this.files.branchExists(tree, name)) {
        throw new AlreadyExistsError('branch', `${tree}/${name}`);
      }
      return this.growBranch(tree, name, description);
    });
  }

  listTrees(): Tree[] {
    return this.files.listTreeNames().map(name => this.files.readTree(name));
  }

  /**
   * @throws {NotFoundError} If the tree does not exist
   */
  listBranches(tree: string): Branch[] {
    if (!this.files.treeExists(tree)) {
      throw new NotFoundError('tree', tree);
    }
    return this.files.listBranchNames(tree).map(name => this.files.readBranch(tree, name));
  }

  /**
   * Leaves of one branch read from their files, ordered by name
   *
   * @throws {NotFoundError} If the branch does not exist
   */
  listLeaves(tree: string, branch: string): LeafSummary[] {
    if (!this.files.branchExists(tree, branch)) {
      throw new NotFoundError('branch', `${tree}/${branch}`);
    }

    const summaries: LeafSummary[] = [];
    for (const name of this.files.listLeafNames(tree, branch)) {
      const stored = this.files.readLeaf(parseLeafPath(`${tree}/${branch}/${name}`));
      if (stored) {
        summaries.push(summarizeLeaf(stored.leaf, this.config.searchConfig.excerptLength));
      }
    }
    return summaries;
  }

  /**
   * Trees with their branches and leaves; one tree when a name is given
   *
   * @throws {NotFoundError}
   */
  showTree(tree?: string): TreeOverview[] {
    const trees = tree === undefined ? this.listTrees() : [this.requireTree(tree)];

    return trees.map(entry => ({
      name: entry.name,
      description: entry.description,
      branches: this.listBranches(entry.name).map(branch => ({
        name: branch.name,
        description: branch.description,
        leaves: this.listLeaves(entry.name, branch.name)
      }))
    }));
  }

  // ==========================================
  // LEAVES
  // ==========================================

  /**
   * Create a leaf. `branch` may be qualified as `tree/branch`; a qualified
   * location is created on demand, a bare branch must exist in exactly one tree.
   *
   * @throws {NotFoundError | AmbiguousBranchError | AlreadyExistsError}
   * @throws {InvalidNameError | InvalidTierError | InvalidConfidenceError}
   */
  async addLeaf(input: AddLeafInput): Promise<Leaf> {
    const tier = parseTier(input.tier ?? DEFAULT_TIER);
    const confidence = validateConfidence(input.confidence ?? DEFAULT_CONFIDENCE);
    const tags = normalizeTags(input.tags ?? []);
    if (input.name !== undefined) validateName(input.name, 'leaf');

    return this.lock.runExclusive(async () => {
      const { tree, branch } = this.resolveBranch(input.branch, input.tree);
      const name = this.chooseLeafName(tree, branch, input.name, input.content);
      const timestamp = this.now().toISOString();
      const location = parseLeafPath(`${tree}/${branch}/${name}`);

      const leaf: Leaf = {
        id: uuidv4(),
        ...location,
        title: generateTitle(input.content),
        content: input.content,
        tier,
        confidence,
        tags,
        links: [],
        createdAt: timestamp,
        updatedAt: timestamp
      };

      await this.commit([leaf], index => {
        index.upsertTree(this.files.readTree(tree));
        index.upsertBranch(this.files.readBranch(tree, branch));
      });
      log.info(`Added ${leaf.path}`);
      return leaf;
    });
  }

  /**
   * Read a leaf from its file. An index row that disagrees with the file is
   * repaired on the way.
   *
   * @throws {NotFoundError}
   * @throws {InvalidNameError} If the path is malformed
   */
  async getLeaf(path: string): Promise<Leaf> {
    return this.readLeaf(path, false);
  }

  /**
   * Change tier, confidence or tags. Validation happens before anything is
   * written, so a rejected value leaves the leaf as it was.
   *
   * @throws {NotFoundError | InvalidTierError | InvalidConfidenceError}
   */
  async updateLeaf(path: string, changes: UpdateLeafInput): Promise<Leaf> {
    const tier = changes.tier === undefined ? undefined : parseTier(changes.tier);
    const confidence = changes.confidence === undefined ? undefined : validateConfidence(changes.confidence);
    const tags = changes.tags === undefined ? undefined : normalizeTags(changes.tags);

    return this.lock.runExclusive(async () => {
      const leaf = await this.readLeaf(path, true);
      if (tier === undefined && confidence === undefined && tags === undefined) {
        return leaf;
      }

      const updated: Leaf = {
        ...leaf,
        tier: tier ?? leaf.tier,
        confidence: confidence ?? leaf.confidence,
        tags: tags ?? leaf.tags,
        updatedAt: this.now().toISOString()
      };
      await this.commit([updated]);
      return updated;
    });
  }

  /**
   * Remove a leaf, its index row, its tags and every link touching it.
   * Links pointing at it are stripped from their source files too.
   *
   * @throws {NotFoundError}
   */
  async deleteLeaf(path: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      const leaf = await this.readLeaf(path, true);
      const detached = await this.graph.detachIncoming(leaf.path);

      const tombstone = this.files.tombstoneLeaf(locationOf(leaf));
      try {
        await this.commit(detached, index => {
          index.deleteLeaf(leaf.path);
        });
      } catch (error) {
        this.files.restoreTombstone(tombstone);
        throw error;
      }
      this.files.purgeTombstone(tombstone);
      log.info(`Deleted ${leaf.path}`);
    });
  }

  // ==========================================
  // SEARCH
  // ==========================================

  /**
   * @throws {DimensionMismatchError | InvalidTierError | IndexCorruptError}
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    await this.refreshIndex();
    return this.searcher().search(query, options);
  }

  async getByTag(tag: string): Promise<LeafSummary[]> {
    await this.refreshIndex();
    return this.searcher().getByTag(tag);
  }

  async getByTier(tier: Tier | string): Promise<LeafSummary[]> {
    await this.refreshIndex();
    return this.searcher().getByTier(tier);
  }

  async listTags(): Promise<TagCount[]> {
    await this.refreshIndex();
    return this.searcher().listTags();
  }

  async context(prompt: string, options: ContextOptions = {}): Promise<ContextMatch[]> {
    await this.refreshIndex();
    return this.searcher().context(prompt, options);
  }

  async prime(options: PrimeOptions = {}): Promise<PrimeReport> {
    await this.refreshIndex();
    return this.searcher().prime(options);
  }

  // ==========================================
  // GRAPH
  // ==========================================

  async link(from: string, to: string, relation: string = DEFAULT_RELATION): Promise<LinkResult> {
    return this.lock.runExclusive(() => this.graph.link(from, to, relation));
  }

  async unlink(from: string, to: string, relation: string): Promise<void> {
    await this.lock.runExclusive(() => this.graph.unlink(from, to, relation));
  }

  async related(path: string): Promise<RelatedLeaf[]> {
    return this.graph.related(path);
  }

  // ==========================================
  // MAINTENANCE
  // ==========================================

  /**
   * Rebuild the index from the canonical files into `_index.db.next`, then
   * rename it over the live index. Readers see the old or the new index,
   * never a mix; an interrupted rebuild leaves the old one in place.
   */
  async reindex(): Promise<ReindexResult> {
    return this.lock.runExclusive(async () => {
      const started = Date.now();
      const nextPath = `${this.config.indexPath}.next`;
      const next = IndexStore.create(nextPath);

      try {
        const skipped: string[] = [];
        const stored: StoredLeaf[] = [];
        for (const location of this.files.scanLeaves()) {
          const leaf = this.tryReadLeaf(location, skipped);
          if (leaf) stored.push(leaf);
        }

        const slots = await this.embedContents(stored.map(entry => entry.leaf.content), true);
        const known = new Set(stored.map(entry => entry.leaf.path));

        next.transaction(() => {
          for (const tree of this.listTrees()) {
            next.upsertTree(tree);
            for (const branch of this.listBranches(tree.name)) {
              next.upsertBranch(branch);
            }
          }
          stored.forEach((entry, i) => next.upsertLeaf(toIndexedLeaf(entry.leaf, entry.hash, slots[i])));
          for (const { leaf } of stored) {
            for (const link of leaf.links) {
              if (!known.has(link.to)) continue;
              next.insertLink({ from: leaf.path, to: link.to, relation: link.relation, createdAt: link.createdAt });
            }
          }
          next.setEmbeddingInfo(this.settings.model, this.settings.dimensions);
        });

        const counts = next.counts(this.settings.model);
        this.indexStore?.close();
        next.moveTo(this.config.indexPath);
        this.bindIndex(IndexStore.open(this.config.indexPath));
        this.indexError = null;

        const result: ReindexResult = {
          trees: counts.trees,
          branches: counts.branches,
          leaves: counts.leaves,
          links: counts.links,
          pending: counts.pending,
          skipped,
          durationMs: Date.now() - started
        };
        log.info(`Reindexed ${result.leaves} leaves in ${result.durationMs}ms`);
        return result;
      } catch (error) {
        next.close();
        rmSync(nextPath, { force: true });
        throw error;
      }
    });
  }

  /**
   * Compare the index with the canonical files without changing either
   */
  check(): ConsistencyReport {
    const index = this.index;
    const hashes = index.leafHashes();
    const missing: string[] = [];
    const stale: string[] = [];
    const invalid: string[] = [];
    const seen = new Set<string>();

    for (const location of this.files.scanLeaves()) {
      seen.add(location.path);
      const stored = this.tryReadLeaf(location, invalid);
      if (!stored) continue;

      const indexed = hashes.get(location.path);
      if (indexed === undefined) {
        missing.push(location.path);
      } else if (indexed !== stored.hash) {
        stale.push(location.path);
      }
    }

    const orphaned = [...hashes.keys()].filter(path => !seen.has(path));
    const info = index.getEmbeddingInfo();

    return {
      missing,
      orphaned,
      stale,
      pending: index.pendingPaths(this.settings.model),
      invalid,
      indexModel: info.model,
      indexDimensions: info.dimensions,
      activeModel: this.settings.model,
      activeDimensions: this.settings.dimensions
    };
  }

  /**
   * Bring the index in line with the files row by row, and embed pending
   * leaves when the provider can
   */
  async repair(): Promise<RepairResult> {
    return this.lock.runExclusive(() => this.repairRows());
  }

  stats(): KnowledgeStats {
    const index = this.index;
    const counts = index.counts(this.settings.model);
    return {
      trees: counts.trees,
      branches: counts.branches,
      leaves: counts.leaves,
      links: counts.links,
      tags: counts.tags,
      byTier: counts.byTier,
      pendingEmbeddings: counts.pending,
      provider: this.settings.provider,
      model: this.settings.model,
      dimensions: this.settings.dimensions,
      indexModel: index.getEmbeddingInfo().model,
      storePath: this.storePath
    };
  }

  /**
   * Switch the store to another model alias. Stored vectors stay as they
   * are until a reindex; the result says whether one is needed.
   *
   * @throws {InvalidModelError}
   */
  async setModel(alias: string): Promise<ModelChange> {
    const spec = resolveModel(alias);
    const settings: StoreSettings = {
      version: STORE_CONFIG_VERSION,
      provider: spec.runtime === 'lite' ? 'lite' : 'server',
      model: spec.alias,
      dimensions: spec.dimensions
    };

    await this.lock.runExclusive(() => saveStoreSettings(this.config.configPath, settings));
    await this.provider.close?.();
    this.settings = settings;
    this.provider = createEmbeddingProvider(settings, this.config.serverConfig);
    if (this.indexStore) this.bindIndex(this.indexStore);

    const info = this.indexStore?.getEmbeddingInfo() ?? { model: null, dimensions: null };
    const hasLeaves = (this.indexStore?.counts(settings.model).leaves ?? 0) > 0;
    const reindexRequired = hasLeaves && (info.model !== settings.model || info.dimensions !== settings.dimensions);

    return { settings: { ...settings }, reindexRequired };
  }

  analyzePrune(options: PruneOptions = {}): PruneReport {
    return new PruneAnalyzer(this.index, this.settings.model, this.now).analyze(options);
  }

  // ==========================================
  // INTERNALS
  // ==========================================

  /**
   * Read a leaf file and bring its index row in line. `held` says whether
   * the caller already holds the write lock; without it the repair is
   * skipped when another writer is busy.
   *
   * @throws {NotFoundError}
   */
  private async readLeaf(path: string, held: boolean): Promise<Leaf> {
    const location = parseLeafPath(path);
    const stored = this.files.readLeaf(location);
    const index = this.index;
    const row = index.getLeaf(location.path);

    if (!stored) {
      if (row) {
        await this.repairWith(held, () => {
          index.transaction(() => index.deleteLeaf(location.path));
        });
      }
      throw new NotFoundError('leaf', location.path);
    }

    if (!row || row.contentHash !== stored.hash) {
      log.debug(`Index row for ${location.path} is out of date, repairing`);
      await this.repairWith(held, () => this.reconcile([stored]));
    }
    return stored.leaf;
  }

  /**
   * Row-level repair of the whole index; the caller holds the write lock
   */
  private async repairRows(): Promise<RepairResult> {
    const report = this.check();
    const index = this.index;

    const changed: StoredLeaf[] = [];
    for (const path of [...report.missing, ...report.stale]) {
      const stored = this.files.readLeaf(parseLeafPath(path));
      if (stored) changed.push(stored);
    }
    await this.reconcile(changed, index => {
      for (const path of report.orphaned) index.deleteLeaf(path);
      for (const tree of this.listTrees()) {
        index.upsertTree(tree);
        for (const branch of this.listBranches(tree.name)) index.upsertBranch(branch);
      }
    });

    const touched = new Set(changed.map(entry => entry.leaf.path));
    const embedded = await this.embedPending(index.pendingPaths(this.settings.model).filter(path => !touched.has(path)));

    return {
      added: report.missing.length,
      updated: report.stale.length,
      removed: report.orphaned.length,
      embedded
    };
  }

  private bindIndex(index: IndexStore): SearchEngine {
    this.indexStore = index;
    this.searchEngine = new SearchEngine({
      index,
      provider: this.provider,
      settings: this.settings,
      searchConfig: this.config.searchConfig,
      now: this.now
    });
    return this.searchEngine;
  }

  private searcher(): SearchEngine {
    const index = this.index;
    return this.searchEngine ?? this.bindIndex(index);
  }

  private plantTree(name: string, description: string): Tree {
    const tree: Tree = { name, description, createdAt: this.now().toISOString() };
    this.files.writeTree(tree);
    this.indexStore?.upsertTree(tree);
    return tree;
  }

  private growBranch(tree: string, name: string, description: string): Branch {
    const branch: Branch = { tree, name, description, createdAt: this.now().toISOString() };
    this.files.writeBranch(branch);
    this.indexStore?.upsertBranch(branch);
    return branch;
  }

  private requireTree(name: string): Tree {
    if (!this.files.treeExists(name)) {
      throw new NotFoundError('tree', name);
    }
    return this.files.readTree(name);
  }

  /**
   * Find (or create, when qualified) the branch a new leaf goes to
   */
  private resolveBranch(reference: string, explicitTree?: string): { tree: string; branch: string } {
    const parts = reference.split('/');
    let tree = explicitTree;
    let branch = reference;

    if (parts.length === 2) {
      [tree, branch] = parts;
      if (explicitTree !== undefined && explicitTree !== tree) {
        throw new InvalidNameError(reference, `branch is qualified with tree '${tree}' but tree '${explicitTree}' was given`);
      }
    } else if (parts.length > 2) {
      throw new InvalidNameError(reference, 'branch references have the form <branch> or <tree>/<branch>');
    }

    validateName(branch, 'branch');

    if (tree !== undefined) {
      validateName(tree, 'tree');
      if (!this.files.treeExists(tree)) this.plantTree(tree, '');
      if (!this.files.branchExists(tree, branch)) this.growBranch(tree, branch, '');
      return { tree, branch };
    }

    const owners = this.files.listTreeNames().filter(name => this.files.branchExists(name, branch));
    if (owners.length === 0) {
      throw new NotFoundError('branch', branch);
    }
    if (owners.length > 1) {
      throw new AmbiguousBranchError(branch, owners);
    }
    return { tree: owners[0], branch };
  }

  private chooseLeafName(tree: string, branch: string, explicit: string | undefined, content: string): string {
    const taken = (name: string): boolean => this.files.leafExists(parseLeafPath(`${tree}/${branch}/${name}`));

    if (explicit !== undefined) {
      if (taken(explicit)) throw new AlreadyExistsError('leaf', `${tree}/${branch}/${explicit}.md`);
      return explicit;
    }

    const base = generateLeafName(content);
    if (!taken(base)) return base;
    for (let suffix = 2; suffix < MAX_NAME_SUFFIX; suffix++) {
      const candidate = `${base}-${suffix}`;
      if (!taken(candidate)) return candidate;
    }
    return `${base}-${uuidv4().slice(0, 8)}`;
  }

  /**
   * Whether vectors from the active provider can be stored next to the
   * ones already in the index
   */
  private embeddingsUsable(index: IndexStore): boolean {
    const info = index.getEmbeddingInfo();
    return info.model === null || (info.model === this.settings.model && info.dimensions === this.settings.dimensions);
  }

  /**
   * Embed contents with the active provider. Fallback vectors and failures
   * become pending slots; nothing here throws for availability reasons.
   */
  private async embedContents(contents: string[], usable: boolean): Promise<EmbeddingSlot[]> {
    const pending: EmbeddingSlot[] = contents.map(() => ({ embedding: null, embeddingModel: null }));
    if (contents.length === 0 || !usable) return pending;

    try {
      const results = await this.provider.embedBatch(contents);
      return results.map(result => {
        if (result.fallback || result.vector.length !== this.settings.dimensions) {
          return { embedding: null, embeddingModel: null };
        }
        return { embedding: result.vector, embeddingModel: result.model };
      });
    } catch (error) {
      if (!(error instanceof KnowledgeBaseError)) throw error;
      log.warn(`Embedding failed, storing as pending: ${error.message}`);
      return pending;
    }
  }

  /**
   * Slots for leaves about to be written, reusing a stored vector when the
   * content has not changed
   */
  private async embedLeaves(leaves: Leaf[], index: IndexStore): Promise<EmbeddingSlot[]> {
    const slots: Array<EmbeddingSlot | null> = leaves.map(leaf => {
      const row = index.getLeaf(leaf.path);
      if (row && row.content === leaf.content && row.embedding && row.embeddingModel === this.settings.model) {
        return { embedding: row.embedding, embeddingModel: row.embeddingModel };
      }
      return null;
    });

    const todo = leaves.filter((_, i) => slots[i] === null);
    const fresh = await this.embedContents(todo.map(leaf => leaf.content), this.embeddingsUsable(index));

    let next = 0;
    return slots.map(slot => slot ?? fresh[next++]);
  }

  /**
   * Write files, then commit the index in one transaction; restore the
   * previous files if the transaction fails
   */
  private async commit(leaves: Leaf[], extra?: (index: IndexStore) => void): Promise<void> {
    const index = this.index;
    const slots = await this.embedLeaves(leaves, index);
    const written: Array<{ location: LeafLocation; previous: string | null }> = [];

    try {
      const rows = leaves.map((leaf, i) => {
        const write = this.files.writeLeaf(leaf);
        written.push({ location: locationOf(leaf), previous: write.previous });
        return toIndexedLeaf(leaf, write.hash, slots[i]);
      });

      index.transaction(() => {
        this.applyRows(index, rows, leaves);
        extra?.(index);
      });
    } catch (error) {
      for (const { location, previous } of written.reverse()) {
        try {
          this.files.revertLeaf(location, previous);
        } catch (revertError) {
          log.error(`Could not restore ${location.path}:`, getErrorMessage(revertError));
        }
      }
      throw error;
    }
  }

  /**
   * Index rows for files already on disk (repair paths)
   */
  private async reconcile(stored: StoredLeaf[], extra?: (index: IndexStore) => void): Promise<void> {
    const index = this.index;
    const leaves = stored.map(entry => entry.leaf);
    const slots = await this.embedLeaves(leaves, index);
    const rows = stored.map((entry, i) => toIndexedLeaf(entry.leaf, entry.hash, slots[i]));

    index.transaction(() => {
      this.applyRows(index, rows, leaves);
      extra?.(index);
    });
  }

  private applyRows(index: IndexStore, rows: IndexedLeaf[], leaves: Leaf[]): void {
    for (const row of rows) {
      index.upsertLeaf(row);
    }
    for (const leaf of leaves) {
      const links = leaf.links
        .filter(link => index.hasLeaf(link.to))
        .map(link => ({ from: leaf.path, to: link.to, relation: link.relation, createdAt: link.createdAt }));
      index.replaceOutgoingLinks(leaf.path, links);
    }
    if (rows.some(row => row.embedding !== null) && index.getEmbeddingInfo().model === null) {
      index.setEmbeddingInfo(this.settings.model, this.settings.dimensions);
    }
  }

  private async embedPending(paths: string[]): Promise<number> {
    const index = this.index;
    if (paths.length === 0 || !this.embeddingsUsable(index)) return 0;

    const rows = paths.map(path => index.getLeaf(path)).filter((row): row is IndexedLeaf => row !== null);
    const slots = await this.embedContents(rows.map(row => row.content), true);

    let embedded = 0;
    index.transaction(() => {
      rows.forEach((row, i) => {
        const slot = slots[i];
        if (slot.embedding && slot.embeddingModel) {
          index.setEmbedding(row.path, slot.embedding, slot.embeddingModel);
          embedded++;
        }
      });
      if (embedded > 0 && index.getEmbeddingInfo().model === null) {
        index.setEmbeddingInfo(this.settings.model, this.settings.dimensions);
      }
    });
    return embedded;
  }

  private async repairWith(held: boolean, fn: () => Promise<void> | void): Promise<void> {
    if (held) {
      await fn();
    } else {
      await this.tryRepair(fn);
    }
  }

  /**
   * Run a repair unless another writer holds the store; readers never fail
   * or wait because of a lock
   */
  private async tryRepair(fn: () => Promise<void> | void): Promise<void> {
    try {
      const ran = await this.lock.tryRunExclusive(fn);
      if (!ran) log.debug('Skipping repair: a write is in progress');
    } catch (error) {
      if (!(error instanceof StoreLockedError)) throw error;
      log.debug(`Skipping repair: ${error.message}`);
    }
  }

  /**
   * Row-level repair before a read when auto-repair is on
   */
  private async refreshIndex(): Promise<void> {
    if (!this.config.autoRepair) return;
    const report = this.check();
    if (report.missing.length + report.orphaned.length + report.stale.length === 0) return;

    await this.tryRepair(async () => {
      await this.repairRows();
    });
  }

  private tryReadLeaf(location: LeafLocation, invalid: string[]): StoredLeaf | null {
    try {
      return this.files.readLeaf(location);
    } catch (error) {
      if (!(error instanceof KnowledgeBaseError) || error.code !== 'InvalidConfig') throw error;
      log.warn(error.message);
      invalid.push(location.path);
      return null;
    }
  }

  /**
   * Finish or roll back deletes and writes cut short by a crash: a tombstone
   * whose index row is gone was a completed delete, otherwise the file comes
   * back. Stray temp files are removed.
   */
  private async recoverInterruptedWrites(): Promise<void> {
    const { tombstones, tempFiles } = this.files.findLeftovers();
    if (tombstones.length === 0 && tempFiles.length === 0) return;

    await this.tryRepair(() => {
      for (const tombstone of tombstones) {
        const committed = this.indexStore !== null && !this.indexStore.hasLeaf(tombstone.location.path);
        if (committed || this.files.leafExists(tombstone.location)) {
          this.files.purgeTombstone(tombstone);
        } else {
          log.warn(`Restoring ${tombstone.location.path} after an interrupted delete`);
          this.files.restoreTombstone(tombstone);
        }
      }
      for (const file of tempFiles) {
        this.files.removeFile(file);
      }
    });
  }
}
