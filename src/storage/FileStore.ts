/**
 * FileStore
 *
 * Canonical on-disk layout of a store:
 *
 * ```
 * <store>/<tree>/_meta.yaml
 * <store>/<tree>/<branch>/_meta.yaml
 * <store>/<tree>/<branch>/<leaf>.md
 * ```
 *
 * Leaf writes go to a hidden temp file first and are renamed into place, so a
 * reader only ever sees the old or the new file. Deletes rename the file to a
 * hidden tombstone that the caller purges or restores once the index agrees.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync
} from 'fs';
import { basename, dirname, join } from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { InvalidConfigError, getErrorMessage } from '../core/errors.js';
import type { Branch, Leaf, Tree } from '../core/types.js';
import { formatIssues } from '../config/ConfigLoader.js';
import {
  LEAF_EXTENSION,
  hashContent,
  leafPath,
  parseLeaf,
  serializeLeaf,
  type LeafLocation
} from './LeafDocument.js';

export const META_FILE = '_meta.yaml';
const TOMBSTONE_SUFFIX = '.deleted';
const NAME_PATTERN = /^[a-z0-9][a-z0-9_-]{0,63}$/;

const MetaSchema = z.object({
  name: z.string().optional(),
  description: z.string().default(''),
  created: z.string().optional()
});

export interface StoredLeaf {
  leaf: Leaf;
  raw: string;
  hash: string;
}

export interface LeafWrite {
  raw: string;
  hash: string;
  /** File content before the write, null if the file is new */
  previous: string | null;
}

export interface Tombstone {
  location: LeafLocation;
  tombstonePath: string;
}

export class FileStore {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  ensureRoot(): void {
    mkdirSync(this.root, { recursive: true });
  }

  // ==========================================
  // TREES AND BRANCHES
  // ==========================================

  treeExists(tree: string): boolean {
    return existsSync(join(this.root, tree));
  }

  branchExists(tree: string, branch: string): boolean {
    return existsSync(join(this.root, tree, branch));
  }

  writeTree(tree: Tree): void {
    const dir = join(this.root, tree.name);
    mkdirSync(dir, { recursive: true });
    this.writeMeta(join(dir, META_FILE), { name: tree.name, description: tree.description, created: tree.createdAt });
  }

  writeBranch(branch: Branch): void {
    const dir = join(this.root, branch.tree, branch.name);
    mkdirSync(dir, { recursive: true });
    this.writeMeta(join(dir, META_FILE), {
      name: branch.name,
      description: branch.description,
      created: branch.createdAt
    });
  }

  readTree(tree: string): Tree {
    const dir = join(this.root, tree);
    const meta = this.readMeta(dir);
    return { name: tree, description: meta.description, createdAt: meta.created };
  }

  readBranch(tree: string, branch: string): Branch {
    const dir = join(this.root, tree, branch);
    const meta = this.readMeta(dir);
    return { tree, name: branch, description: meta.description, createdAt: meta.created };
  }

  listTreeNames(): string[] {
    return this.listDirectories(this.root);
  }

  listBranchNames(tree: string): string[] {
    return this.listDirectories(join(this.root, tree));
  }

  listLeafNames(tree: string, branch: string): string[] {
    const dir = join(this.root, tree, branch);
    if (!existsSync(dir)) return [];

    return readdirSync(dir, { withFileTypes: true })
      .filter(entry => entry.isFile() && entry.name.endsWith(LEAF_EXTENSION))
      .map(entry => entry.name.slice(0, -LEAF_EXTENSION.length))
      .filter(name => NAME_PATTERN.test(name))
      .sort();
  }

  /**
   * Every canonical leaf location, sorted by path
   */
  scanLeaves(): LeafLocation[] {
    const locations: LeafLocation[] = [];
    for (const tree of this.listTreeNames()) {
      for (const branch of this.listBranchNames(tree)) {
        for (const name of this.listLeafNames(tree, branch)) {
          locations.push({ tree, branch, name, path: leafPath(tree, branch, name) });
        }
      }
    }
    return locations.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  // ==========================================
  // LEAVES
  // ==========================================

  leafExists(location: LeafLocation): boolean {
    return existsSync(this.fullPath(location));
  }

  /**
   * Read and parse a leaf file, or null if it does not exist
   */
  readLeaf(location: LeafLocation): StoredLeaf | null {
    const file = this.fullPath(location);
    if (!existsSync(file)) return null;

    const raw = readFileSync(file, 'utf-8');
    const mtime = statSync(file).mtime.toISOString();
    return { leaf: parseLeaf(location, raw, mtime), raw, hash: hashContent(raw) };
  }

  /**
   * Atomically replace (or create) a leaf file
   */
  writeLeaf(leaf: Leaf): LeafWrite {
    const location: LeafLocation = { tree: leaf.tree, branch: leaf.branch, name: leaf.name, path: leaf.path };
    const file = this.fullPath(location);
    const previous = existsSync(file) ? readFileSync(file, 'utf-8') : null;
    const raw = serializeLeaf(leaf);

    mkdirSync(join(this.root, leaf.tree, leaf.branch), { recursive: true });
    this.atomicWrite(file, raw);

    return { raw, hash: hashContent(raw), previous };
  }

  /**
   * Undo a write: put back the previous content, or remove a file that was new
   */
  revertLeaf(location: LeafLocation, previous: string | null): void {
    const file = this.fullPath(location);
    if (previous === null) {
      rmSync(file, { force: true });
    } else {
      this.atomicWrite(file, previous);
    }
  }

  tombstoneLeaf(location: LeafLocation): Tombstone {
    const tombstonePath = this.tombstonePath(location);
    renameSync(this.fullPath(location), tombstonePath);
    return { location, tombstonePath };
  }

  restoreTombstone(tombstone: Tombstone): void {
    renameSync(tombstone.tombstonePath, this.fullPath(tombstone.location));
  }

  purgeTombstone(tombstone: Tombstone): void {
    rmSync(tombstone.tombstonePath, { force: true });
  }

  /**
   * Tombstones and temp files left behind by an interrupted write
   */
  findLeftovers(): { tombstones: Tombstone[]; tempFiles: string[] } {
    const tombstones: Tombstone[] = [];
    const tempFiles: string[] = [];

    for (const tree of this.listTreeNames()) {
      for (const branch of this.listBranchNames(tree)) {
        const dir = join(this.root, tree, branch);
        for (const entry of readdirSync(dir)) {
          if (!entry.startsWith('.')) continue;
          if (entry.endsWith(`${LEAF_EXTENSION}${TOMBSTONE_SUFFIX}`)) {
            const name = entry.slice(1, -(LEAF_EXTENSION.length + TOMBSTONE_SUFFIX.length));
            if (!NAME_PATTERN.test(name)) continue;
            tombstones.push({
              location: { tree, branch, name, path: leafPath(tree, branch, name) },
              tombstonePath: join(dir, entry)
            });
          } else if (entry.includes('.tmp-')) {
            tempFiles.push(join(dir, entry));
          }
        }
      }
    }

    return { tombstones, tempFiles };
  }

  removeFile(path: string): void {
    rmSync(path, { force: true });
  }

  fullPath(location: LeafLocation): string {
    return join(this.root, location.tree, location.branch, `${location.name}${LEAF_EXTENSION}`);
  }

  // ==========================================
  // INTERNALS
  // ==========================================

  private tombstonePath(location: LeafLocation): string {
    return join(this.root, location.tree, location.branch, `.${location.name}${LEAF_EXTENSION}${TOMBSTONE_SUFFIX}`);
  }

  private atomicWrite(file: string, content: string): void {
    const tmp = join(dirname(file), `.${basename(file)}.tmp-${process.pid}`);
    writeFileSync(tmp, content, 'utf-8');
    try {
      renameSync(tmp, file);
    } catch (error) {
      rmSync(tmp, { force: true });
      throw error;
    }
  }

  private listDirectories(dir: string): string[] {
    if (!existsSync(dir)) return [];
    return readdirSync(dir, { withFileTypes: true })
      .filter(entry => entry.isDirectory() && NAME_PATTERN.test(entry.name))
      .map(entry => entry.name)
      .sort();
  }

  private writeMeta(file: string, meta: { name: string; description: string; created: string }): void {
    this.atomicWrite(file, YAML.stringify(meta));
  }

  private readMeta(dir: string): { description: string; created: string } {
    const file = join(dir, META_FILE);
    const fallback = existsSync(dir) ? statSync(dir).mtime.toISOString() : new Date(0).toISOString();
    if (!existsSync(file)) {
      return { description: '', created: fallback };
    }

    let data: unknown;
    try {
      data = YAML.parse(readFileSync(file, 'utf-8')) ?? {};
    } catch (error) {
      throw new InvalidConfigError(file, `malformed YAML: ${getErrorMessage(error)}`, { cause: error });
    }

    const parsed = MetaSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidConfigError(file, formatIssues(parsed.error));
    }
    return { description: parsed.data.description, created: parsed.data.created ?? fallback };
  }
}
