/**
 * Knowledge Graph
 *
 * Directed, typed edges between leaves. The graph is a general multigraph:
 * cycles, self-links and several relations between the same pair are allowed;
 * only the exact (from, to, relation) triple is unique.
 *
 * Outgoing links live in the source leaf's frontmatter, so every change here
 * rewrites that leaf through the repository and a reindex restores the edges.
 * The index `links` table is the queryable mirror used by related().
 */

import { InvalidRelationError, NotFoundError } from '../core/errors.js';
import type { Leaf, RelatedLeaf } from '../core/types.js';
import { makeExcerpt } from '../search/SearchEngine.js';
import type { IndexStore } from '../storage/IndexStore.js';
import { parseLeafPath } from '../storage/LeafDocument.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('KnowledgeGraph');

const RELATION_PATTERN = /^[a-z][a-z0-9_-]{0,31}$/;

export const DEFAULT_RELATION = 'related_to';

export const KNOWN_RELATIONS = [
  'supports',
  'contradicts',
  'refines',
  'related_to',
  'depends_on',
  'supersedes'
] as const;

export type KnownRelation = (typeof KNOWN_RELATIONS)[number];

export function isKnownRelation(relation: string): relation is KnownRelation {
  return KNOWN_RELATIONS.some(known => known === relation);
}

/**
 * Relations are an open set: anything matching the charset and length rules
 * is accepted, known or not.
 *
 * @throws {InvalidRelationError}
 */
export function validateRelation(relation: string): string {
  if (!RELATION_PATTERN.test(relation)) {
    throw new InvalidRelationError(relation);
  }
  return relation;
}

/**
 * Persistence the graph needs from its owner. The owner serializes writers:
 * link, unlink and detachIncoming run while it holds the store's write lock.
 */
export interface LeafRepository {
  index(): IndexStore;
  /**
   * `held` is true when the caller holds the write lock
   *
   * @throws {NotFoundError}
   */
  loadLeaf(path: string, held: boolean): Promise<Leaf>;
  /** Only called with the write lock held */
  saveLeaves(leaves: Leaf[]): Promise<void>;
}

export interface LinkResult {
  from: string;
  to: string;
  relation: string;
  /** False when the edge already existed */
  created: boolean;
}

export class KnowledgeGraph {
  private readonly repository: LeafRepository;
  private readonly excerptLength: number;
  private readonly now: () => Date;

  constructor(repository: LeafRepository, options: { excerptLength: number; now?: () => Date }) {
    this.repository = repository;
    this.excerptLength = options.excerptLength;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Add an edge. Adding an existing triple again changes nothing.
   *
   * @throws {NotFoundError} If either endpoint is missing
   * @throws {InvalidRelationError}
   */
  async link(from: string, to: string, relation: string = DEFAULT_RELATION): Promise<LinkResult> {
    validateRelation(relation);
    const source = await this.repository.loadLeaf(from, true);
    const target = await this.repository.loadLeaf(to, true);

    const exists = source.links.some(link => link.to === target.path && link.relation === relation);
    if (exists) {
      return { from: source.path, to: target.path, relation, created: false };
    }

    if (!isKnownRelation(relation)) {
      log.debug(`Custom relation '${relation}'`);
    }

    const updated: Leaf = {
      ...source,
      links: [...source.links, { to: target.path, relation, createdAt: this.now().toISOString() }]
    };
    await this.repository.saveLeaves([updated]);

    return { from: source.path, to: target.path, relation, created: true };
  }

  /**
   * @throws {NotFoundError} If the source leaf or the edge is missing
   */
  async unlink(from: string, to: string, relation: string): Promise<void> {
    const source = await this.repository.loadLeaf(from, true);
    const targetPath = parseLeafPath(to).path;

    const remaining = source.links.filter(link => !(link.to === targetPath && link.relation === relation));
    if (remaining.length === source.links.length) {
      throw new NotFoundError('link', `${source.path} -[${relation}]-> ${targetPath}`);
    }

    await this.repository.saveLeaves([{ ...source, links: remaining }]);
  }

  /**
   * Outgoing and incoming edges of a leaf with a summary of the other end.
   * Ordered by relation, then path, outgoing before incoming.
   *
   * @throws {NotFoundError}
   */
  async related(path: string): Promise<RelatedLeaf[]> {
    const leaf = await this.repository.loadLeaf(path, false);
    const index = this.repository.index();

    const edges: Array<{ direction: RelatedLeaf['direction']; relation: string; path: string }> = [
      ...index.outgoingLinks(leaf.path).map(link => ({ direction: 'outgoing' as const, relation: link.relation, path: link.to })),
      ...index.incomingLinks(leaf.path).map(link => ({ direction: 'incoming' as const, relation: link.relation, path: link.from }))
    ];

    const related: RelatedLeaf[] = [];
    for (const edge of edges) {
      const other = index.getLeaf(edge.path);
      if (!other) continue;
      related.push({
        direction: edge.direction,
        relation: edge.relation,
        path: other.path,
        title: other.title,
        excerpt: makeExcerpt(other.content, this.excerptLength),
        tier: other.tier
      });
    }

    return related.sort((a, b) => {
      if (a.relation !== b.relation) return a.relation < b.relation ? -1 : 1;
      if (a.path !== b.path) return a.path < b.path ? -1 : 1;
      return a.direction === b.direction ? 0 : a.direction === 'outgoing' ? -1 : 1;
    });
  }

  /**
   * Leaves that link to `path`, with those links removed. The caller saves
   * them in the same commit that deletes the target.
   */
  async detachIncoming(path: string): Promise<Leaf[]> {
    const sources = [...new Set(this.repository.index().incomingLinks(path).map(link => link.from))];
    const detached: Leaf[] = [];

    for (const sourcePath of sources) {
      if (sourcePath === path) continue;
      let source: Leaf;
      try {
        source = await this.repository.loadLeaf(sourcePath, true);
      } catch (error) {
        // Index row without a file; nothing on disk to rewrite
        if (error instanceof NotFoundError) continue;
        throw error;
      }
      const links = source.links.filter(link => link.to !== path);
      if (links.length !== source.links.length) {
        detached.push({ ...source, links });
      }
    }
    return detached;
  }
}
