/**
 * Index Store
 *
 * SQLite mirror of the canonical files. Uses better-sqlite3 for synchronous
 * operations so that a leaf's row, tags and links change in one transaction.
 *
 * Everything here is derived data: the index can be deleted and rebuilt from
 * the leaf files at any time (see KnowledgeBase.reindex).
 */

import Database from 'better-sqlite3';
import { existsSync, renameSync, rmSync } from 'fs';
import { IndexCorruptError, getErrorMessage } from '../core/errors.js';
import { TIERS, emptyTierCounts, isTier } from '../core/tiers.js';
import type { Branch, IndexedLeaf, LeafFilter, Link, TagCount, Tier, Tree } from '../core/types.js';
import { bufferToVector, vectorToBuffer } from '../vector/similarity.js';

export const INDEX_SCHEMA_VERSION = 1;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS trees (
    name TEXT PRIMARY KEY,
    description TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS branches (
    tree TEXT NOT NULL,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    PRIMARY KEY (tree, name)
  );

  CREATE TABLE IF NOT EXISTS leaves (
    path TEXT PRIMARY KEY,
    id TEXT NOT NULL,
    tree TEXT NOT NULL,
    branch TEXT NOT NULL,
    name TEXT NOT NULL,
    title TEXT NOT NULL,
    content TEXT NOT NULL,
    tier TEXT NOT NULL CHECK (tier IN (${TIERS.map(t => `'${t}'`).join(', ')})),
    confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
    content_hash TEXT NOT NULL,
    embedding BLOB,
    embedding_model TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_leaves_location ON leaves(tree, branch);
  CREATE INDEX IF NOT EXISTS idx_leaves_tier ON leaves(tier);

  CREATE TABLE IF NOT EXISTS leaf_tags (
    path TEXT NOT NULL REFERENCES leaves(path) ON DELETE CASCADE,
    tag TEXT NOT NULL,
    position INTEGER NOT NULL,
    PRIMARY KEY (path, tag)
  );
  CREATE INDEX IF NOT EXISTS idx_leaf_tags_tag ON leaf_tags(tag);

  CREATE TABLE IF NOT EXISTS links (
    from_path TEXT NOT NULL,
    to_path TEXT NOT NULL,
    relation TEXT NOT NULL,
    created_at TEXT NOT NULL,
    PRIMARY KEY (from_path, to_path, relation)
  );
  CREATE INDEX IF NOT EXISTS idx_links_to ON links(to_path);
`;

interface LeafRow {
  path: string;
  id: string;
  tree: string;
  branch: string;
  name: string;
  title: string;
  content: string;
  tier: string;
  confidence: number;
  content_hash: string;
  embedding: Buffer | null;
  embedding_model: string | null;
  created_at: string;
  updated_at: string;
}

interface LinkRow {
  from_path: string;
  to_path: string;
  relation: string;
  created_at: string;
}

export interface IndexCounts {
  trees: number;
  branches: number;
  leaves: number;
  links: number;
  tags: number;
  pending: number;
  byTier: Record<Tier, number>;
}

function sqliteCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

function isCorruption(error: unknown): boolean {
  const code = sqliteCode(error);
  return code !== null && (code.startsWith('SQLITE_CORRUPT') || code === 'SQLITE_NOTADB');
}

export class IndexStore {
  readonly path: string;
  private db: Database.Database;

  private constructor(path: string, db: Database.Database) {
    this.path = path;
    this.db = db;
  }

  /**
   * Open (or create) an index.
   *
   * @throws {IndexCorruptError} If an existing file fails `PRAGMA quick_check`
   */
  static open(path: string): IndexStore {
    const existed = existsSync(path);
    let db: Database.Database | null = null;

    try {
      db = new Database(path);
      db.pragma('foreign_keys = ON');

      if (existed) {
        const result = db.pragma('quick_check', { simple: true });
        if (result !== 'ok') {
          throw new IndexCorruptError(`quick_check reported: ${String(result)}`);
        }
      }

      db.exec(SCHEMA);
      const store = new IndexStore(path, db);
      if (store.getMeta('schema_version') === null) {
        store.setMeta('schema_version', String(INDEX_SCHEMA_VERSION));
      }
      return store;
    } catch (error) {
      db?.close();
      if (error instanceof IndexCorruptError) throw error;
      if (isCorruption(error)) {
        throw new IndexCorruptError(getErrorMessage(error), { cause: error });
      }
      throw error;
    }
  }

  /**
   * Create an empty index at `path`, replacing whatever is there
   */
  static create(path: string): IndexStore {
    rmSync(path, { force: true });
    rmSync(`${path}-journal`, { force: true });
    return IndexStore.open(path);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  /**
   * Close this index and atomically move it over `target`
   */
  moveTo(target: string): void {
    this.close();
    renameSync(this.path, target);
  }

  /**
   * Run `fn` in a single transaction. Corruption surfaces as IndexCorruptError.
   */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (error) {
      if (isCorruption(error)) {
        throw new IndexCorruptError(getErrorMessage(error), { cause: error });
      }
      throw error;
    }
  }

  // ==========================================
  // META
  // ==========================================

  getMeta(key: string): string | null {
    const row = this.db.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?').get(key);
    return row ? row.value : null;
  }

  setMeta(key: string, value: string): void {
    this.db.prepare('INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value')
      .run(key, value);
  }

  /**
   * Model and dimensionality the stored embeddings were built with
   */
  getEmbeddingInfo(): { model: string | null; dimensions: number | null } {
    const model = this.getMeta('embedding_model');
    const dimensions = this.getMeta('embedding_dimensions');
    return { model, dimensions: dimensions === null ? null : parseInt(dimensions, 10) };
  }

  setEmbeddingInfo(model: string, dimensions: number): void {
    this.setMeta('embedding_model', model);
    this.setMeta('embedding_dimensions', String(dimensions));
  }

  // ==========================================
  // TREES AND BRANCHES
  // ==========================================

  upsertTree(tree: Tree): void {
    this.db.prepare(`
      INSERT INTO trees (name, description, created_at) VALUES (?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET description = excluded.description, created_at = excluded.created_at
    `).run(tree.name, tree.description, tree.createdAt);
  }

  upsertBranch(branch: Branch): void {
    this.db.prepare(`
      INSERT INTO branches (tree, name, description, created_at) VALUES (?, ?, ?, ?)
      ON CONFLICT(tree, name) DO UPDATE SET description = excluded.description, created_at = excluded.created_at
    `).run(branch.tree, branch.name, branch.description, branch.createdAt);
  }

  listTrees(): Tree[] {
    return this.db
      .prepare<[], { name: string; description: string; created_at: string }>(
        'SELECT name, description, created_at FROM trees ORDER BY name'
      )
      .all()
      .map(row => ({ name: row.name, description: row.description, createdAt: row.created_at }));
  }

  listBranches(tree?: string): Branch[] {
    const sql = tree === undefined
      ? 'SELECT tree, name, description, created_at FROM branches ORDER BY tree, name'
      : 'SELECT tree, name, description, created_at FROM branches WHERE tree = ? ORDER BY name';
    const params = tree === undefined ? [] : [tree];

    return this.db
      .prepare<unknown[], { tree: string; name: string; description: string; created_at: string }>(sql)
      .all(...params)
      .map(row => ({ tree: row.tree, name: row.name, description: row.description, createdAt: row.created_at }));
  }

  // ==========================================
  // LEAVES
  // ==========================================

  upsertLeaf(leaf: IndexedLeaf): void {
    this.db.prepare(`
      INSERT INTO leaves (
        path, id, tree, branch, name, title, content, tier, confidence,
        content_hash, embedding, embedding_model, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(path) DO UPDATE SET
        id = excluded.id,
        tree = excluded.tree,
        branch = excluded.branch,
        name = excluded.name,
        title = excluded.title,
        content = excluded.content,
        tier = excluded.tier,
        confidence = excluded.confidence,
        content_hash = excluded.content_hash,
        embedding = excluded.embedding,
        embedding_model = excluded.embedding_model,
        created_at = excluded.created_at,
        updated_at = excluded.updated_at
    `).run(
      leaf.path,
      leaf.id,
      leaf.tree,
      leaf.branch,
      leaf.name,
      leaf.title,
      leaf.content,
      leaf.tier,
      leaf.confidence,
      leaf.contentHash,
      leaf.embedding ? vectorToBuffer(leaf.embedding) : null,
      leaf.embedding ? leaf.embeddingModel : null,
      leaf.createdAt,
      leaf.updatedAt
    );

    this.db.prepare('DELETE FROM leaf_tags WHERE path = ?').run(leaf.path);
    const insertTag = this.db.prepare('INSERT INTO leaf_tags (path, tag, position) VALUES (?, ?, ?)');
    leaf.tags.forEach((tag, position) => insertTag.run(leaf.path, tag, position));
  }

  /**
   * Remove a leaf row, its tags and every link touching it
   */
  deleteLeaf(path: string): boolean {
    this.db.prepare('DELETE FROM links WHERE from_path = ? OR to_path = ?').run(path, path);
    const result = this.db.prepare('DELETE FROM leaves WHERE path = ?').run(path);
    return result.changes > 0;
  }

  getLeaf(path: string): IndexedLeaf | null {
    const row = this.db.prepare<[string], LeafRow>('SELECT * FROM leaves WHERE path = ?').get(path);
    if (!row) return null;
    return this.rowToLeaf(row, this.tagsFor([path]).get(path) ?? []);
  }

  hasLeaf(path: string): boolean {
    return this.db.prepare<[string], { found: number }>('SELECT 1 AS found FROM leaves WHERE path = ?').get(path) !== undefined;
  }

  /**
   * path -> content hash for every indexed leaf
   */
  leafHashes(): Map<string, string> {
    const rows = this.db
      .prepare<[], { path: string; content_hash: string }>('SELECT path, content_hash FROM leaves ORDER BY path')
      .all();
    return new Map(rows.map(row => [row.path, row.content_hash]));
  }

  /**
   * Leaves whose embedding is missing or was produced by another model
   */
  pendingPaths(model: string): string[] {
    return this.db
      .prepare<[string], { path: string }>(
        'SELECT path FROM leaves WHERE embedding IS NULL OR embedding_model IS NOT ? ORDER BY path'
      )
      .all(model)
      .map(row => row.path);
  }

  setEmbedding(path: string, vector: Float32Array, model: string): void {
    this.db.prepare('UPDATE leaves SET embedding = ?, embedding_model = ? WHERE path = ?')
      .run(vectorToBuffer(vector), model, path);
  }

  /**
   * Structural filter applied before any similarity scoring. Ordered by path.
   */
  queryLeaves(filter: LeafFilter = {}): IndexedLeaf[] {
    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filter.tiers && filter.tiers.length > 0) {
      clauses.push('l.tier IN (SELECT value FROM json_each(?))');
      params.push(JSON.stringify(filter.tiers));
    }
    if (filter.tags && filter.tags.length > 0) {
      clauses.push('EXISTS (SELECT 1 FROM leaf_tags t WHERE t.path = l.path AND t.tag IN (SELECT value FROM json_each(?)))');
      params.push(JSON.stringify(filter.tags));
    }
    if (filter.tree !== undefined) {
      clauses.push('l.tree = ?');
      params.push(filter.tree);
    }
    if (filter.branch !== undefined) {
      clauses.push('l.branch = ?');
      params.push(filter.branch);
    }
    if (filter.minConfidence !== undefined) {
      clauses.push('l.confidence >= ?');
      params.push(filter.minConfidence);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare<unknown[], LeafRow>(`SELECT l.* FROM leaves l ${where} ORDER BY l.path`)
      .all(...params);

    const tags = this.tagsFor(rows.map(row => row.path));
    return rows.map(row => this.rowToLeaf(row, tags.get(row.path) ?? []));
  }

  listTags(): TagCount[] {
    return this.db
      .prepare<[], TagCount>('SELECT tag, COUNT(*) AS count FROM leaf_tags GROUP BY tag ORDER BY count DESC, tag ASC')
      .all();
  }

  // ==========================================
  // LINKS
  // ==========================================

  /**
   * @returns false when the (from, to, relation) triple already existed
   */
  insertLink(link: Link): boolean {
    const result = this.db.prepare(`
      INSERT INTO links (from_path, to_path, relation, created_at) VALUES (?, ?, ?, ?)
      ON CONFLICT(from_path, to_path, relation) DO NOTHING
    `).run(link.from, link.to, link.relation, link.createdAt);
    return result.changes > 0;
  }

  deleteLink(from: string, to: string, relation: string): boolean {
    const result = this.db.prepare('DELETE FROM links WHERE from_path = ? AND to_path = ? AND relation = ?')
      .run(from, to, relation);
    return result.changes > 0;
  }

  /**
   * Replace all outgoing links of a leaf
   */
  replaceOutgoingLinks(from: string, links: Link[]): void {
    this.db.prepare('DELETE FROM links WHERE from_path = ?').run(from);
    for (const link of links) {
      this.insertLink(link);
    }
  }

  outgoingLinks(path: string): Link[] {
    return this.db
      .prepare<[string], LinkRow>('SELECT * FROM links WHERE from_path = ? ORDER BY relation, to_path')
      .all(path)
      .map(rowToLink);
  }

  incomingLinks(path: string): Link[] {
    return this.db
      .prepare<[string], LinkRow>('SELECT * FROM links WHERE to_path = ? ORDER BY relation, from_path')
      .all(path)
      .map(rowToLink);
  }

  linksByRelation(relation: string): Link[] {
    return this.db
      .prepare<[string], LinkRow>('SELECT * FROM links WHERE relation = ? ORDER BY from_path, to_path')
      .all(relation)
      .map(rowToLink);
  }

  // ==========================================
  // STATISTICS AND MAINTENANCE
  // ==========================================

  counts(activeModel: string): IndexCounts {
    const count = (sql: string, ...params: unknown[]): number =>
      this.db.prepare<unknown[], { n: number }>(sql).get(...params)?.n ?? 0;

    const byTier = emptyTierCounts();
    const tierRows = this.db
      .prepare<[], { tier: string; n: number }>('SELECT tier, COUNT(*) AS n FROM leaves GROUP BY tier')
      .all();
    for (const row of tierRows) {
      if (isTier(row.tier)) byTier[row.tier] = row.n;
    }

    return {
      trees: count('SELECT COUNT(*) AS n FROM trees'),
      branches: count('SELECT COUNT(*) AS n FROM branches'),
      leaves: count('SELECT COUNT(*) AS n FROM leaves'),
      links: count('SELECT COUNT(*) AS n FROM links'),
      tags: count('SELECT COUNT(DISTINCT tag) AS n FROM leaf_tags'),
      pending: count(
        'SELECT COUNT(*) AS n FROM leaves WHERE embedding IS NULL OR embedding_model IS NOT ?',
        activeModel
      ),
      byTier
    };
  }

  /**
   * Deterministic text dump of every row, used to compare two indexes
   */
  dump(): string[] {
    const lines: string[] = [];
    const tables: Array<[string, string]> = [
      ['meta', 'SELECT * FROM meta ORDER BY key'],
      ['trees', 'SELECT * FROM trees ORDER BY name'],
      ['branches', 'SELECT * FROM branches ORDER BY tree, name'],
      ['leaves', 'SELECT * FROM leaves ORDER BY path'],
      ['leaf_tags', 'SELECT * FROM leaf_tags ORDER BY path, position'],
      ['links', 'SELECT * FROM links ORDER BY from_path, to_path, relation']
    ];

    for (const [table, sql] of tables) {
      for (const row of this.db.prepare<[], Record<string, unknown>>(sql).all()) {
        const values = Object.entries(row).map(([key, value]) =>
          `${key}=${Buffer.isBuffer(value) ? value.toString('hex') : String(value)}`
        );
        lines.push(`${table}|${values.join('|')}`);
      }
    }
    return lines;
  }

  // ==========================================
  // INTERNALS
  // ==========================================

  private tagsFor(paths: string[]): Map<string, string[]> {
    const result = new Map<string, string[]>();
    if (paths.length === 0) return result;

    const rows = this.db
      .prepare<[string], { path: string; tag: string }>(
        'SELECT path, tag FROM leaf_tags WHERE path IN (SELECT value FROM json_each(?)) ORDER BY path, position'
      )
      .all(JSON.stringify(paths));

    for (const row of rows) {
      const list = result.get(row.path);
      if (list) {
        list.push(row.tag);
      } else {
        result.set(row.path, [row.tag]);
      }
    }
    return result;
  }

  private rowToLeaf(row: LeafRow, tags: string[]): IndexedLeaf {
    if (!isTier(row.tier)) {
      throw new IndexCorruptError(`leaf ${row.path} has unknown tier '${row.tier}'`);
    }

    return {
      path: row.path,
      id: row.id,
      tree: row.tree,
      branch: row.branch,
      name: row.name,
      title: row.title,
      content: row.content,
      tier: row.tier,
      confidence: row.confidence,
      tags,
      contentHash: row.content_hash,
      embedding: row.embedding ? bufferToVector(row.embedding) : null,
      embeddingModel: row.embedding_model,
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }
}

function rowToLink(row: LinkRow): Link {
  return { from: row.from_path, to: row.to_path, relation: row.relation, createdAt: row.created_at };
}
