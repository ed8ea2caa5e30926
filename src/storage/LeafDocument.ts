/**
 * Leaf Document
 *
 * Parses and serializes canonical leaf files: markdown with a YAML frontmatter
 * header. The file is the source of truth; everything in the index is derived
 * from what this module reads.
 *
 * ```
 * ---
 * id: 6f1c...
 * title: MACD crossovers work best in trending markets
 * tier: trunk
 * confidence: 0.8
 * tags:
 *   - indicators
 * links:
 *   - to: trading/gotchas/b.md
 *     relation: contradicts
 *     created: 2026-01-01T00:00:00.000Z
 * created: 2026-01-01T00:00:00.000Z
 * updated: 2026-01-01T00:00:00.000Z
 * ---
 *
 * MACD crossovers work best in trending markets
 * ```
 */

import { createHash } from 'crypto';
import YAML from 'yaml';
import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import { InvalidConfigError, InvalidNameError, getErrorMessage } from '../core/errors.js';
import { DEFAULT_CONFIDENCE, DEFAULT_TIER, TIERS } from '../core/tiers.js';
import type { Leaf, LeafLink } from '../core/types.js';
import { formatIssues } from '../config/ConfigLoader.js';

const FRONTMATTER_PATTERN = /^---\r?\n([\s\S]*?)\r?\n---\r?\n?([\s\S]*)$/;
const NAME_PATTERN = /^[a-z0-9][a-z0-9_-]{0,63}$/;

/** Namespace for ids derived from a path when a hand-written file carries none */
const LEAF_ID_NAMESPACE = '3b241101-e2bb-4255-8caf-4136c566a962';

export const LEAF_EXTENSION = '.md';
export const GENERATED_NAME_LENGTH = 40;
const TITLE_LENGTH = 80;

const LinkSchema = z.object({
  to: z.string().min(1),
  relation: z.string().min(1),
  created: z.string().min(1)
});

const FrontmatterSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().optional(),
  tier: z.enum(TIERS).default(DEFAULT_TIER),
  confidence: z.number().min(0).max(1).default(DEFAULT_CONFIDENCE),
  tags: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
  links: z.array(LinkSchema).default([]),
  created: z.string().optional(),
  updated: z.string().optional()
});

export interface LeafLocation {
  tree: string;
  branch: string;
  name: string;
  /** tree/branch/name.md */
  path: string;
}

// ==========================================
// NAMES AND PATHS
// ==========================================

/**
 * @throws {InvalidNameError} If the name is not a store slug
 */
export function validateName(name: string, kind: 'tree' | 'branch' | 'leaf' = 'leaf'): string {
  if (!NAME_PATTERN.test(name)) {
    throw new InvalidNameError(
      name,
      `${kind} names use 1-64 lowercase letters, digits, '-' or '_' and start with a letter or digit`
    );
  }
  return name;
}

export function slugify(text: string, maxLength: number = GENERATED_NAME_LENGTH): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '') // Drop combining accents
    .toLowerCase()
    .replace(/[^a-z0-9\s_-]/g, '')
    .trim()
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .slice(0, maxLength)
    .replace(/^[-_]+|[-_]+$/g, '');
}

/**
 * Name derived from the opening words of the content, or `untitled`
 */
export function generateLeafName(content: string): string {
  return slugify(content.slice(0, 200)) || 'untitled';
}

/**
 * First non-empty line with markdown heading markers removed
 */
export function generateTitle(content: string): string {
  const firstLine = content
    .split('\n')
    .map(line => line.trim())
    .find(line => line.length > 0);

  if (!firstLine) return 'untitled';

  const cleaned = firstLine.replace(/^#+\s*/, '').trim();
  return cleaned.length > TITLE_LENGTH ? `${cleaned.slice(0, TITLE_LENGTH - 3)}...` : cleaned;
}

/**
 * Parse `tree/branch/name[.md]` into its canonical location.
 *
 * @throws {InvalidNameError} If the path does not have three valid segments
 */
export function parseLeafPath(path: string): LeafLocation {
  const trimmed = path.trim().replace(/\\/g, '/').replace(/^\.?\/+/, '');
  const withoutExt = trimmed.endsWith(LEAF_EXTENSION) ? trimmed.slice(0, -LEAF_EXTENSION.length) : trimmed;
  const parts = withoutExt.split('/');

  if (parts.length !== 3) {
    throw new InvalidNameError(path, 'leaf paths have the form <tree>/<branch>/<name>');
  }

  const [tree, branch, name] = parts;
  validateName(tree, 'tree');
  validateName(branch, 'branch');
  validateName(name, 'leaf');

  return { tree, branch, name, path: leafPath(tree, branch, name) };
}

export function leafPath(tree: string, branch: string, name: string): string {
  return `${tree}/${branch}/${name}${LEAF_EXTENSION}`;
}

export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (tag.length === 0 || seen.has(tag)) continue;
    seen.add(tag);
    result.push(tag);
  }
  return result;
}

export function hashContent(raw: string): string {
  return createHash('sha256').update(raw, 'utf-8').digest('hex');
}

// ==========================================
// SERIALIZATION
// ==========================================

export function serializeLeaf(leaf: Leaf): string {
  const frontmatter = {
    id: leaf.id,
    title: leaf.title,
    tier: leaf.tier,
    confidence: leaf.confidence,
    tags: leaf.tags,
    links: leaf.links.map(link => ({ to: link.to, relation: link.relation, created: link.createdAt })),
    created: leaf.createdAt,
    updated: leaf.updatedAt
  };

  return `---\n${YAML.stringify(frontmatter)}---\n\n${leaf.content}\n`;
}

/**
 * Parse a canonical leaf file.
 *
 * Hand-written files may omit any header field; omitted timestamps come from
 * `fallbackTime` (the file's mtime) and a missing id is derived from the path,
 * so repeated reads of the same file always agree.
 *
 * @throws {InvalidConfigError} If the header is not valid YAML or holds invalid values
 */
export function parseLeaf(location: LeafLocation, raw: string, fallbackTime: string): Leaf {
  const match = raw.match(FRONTMATTER_PATTERN);
  let header: unknown = {};
  let body = raw;

  if (match) {
    try {
      header = YAML.parse(match[1]) ?? {};
    } catch (error) {
      throw new InvalidConfigError(location.path, `malformed frontmatter: ${getErrorMessage(error)}`, { cause: error });
    }
    body = match[2];
  }

  const parsed = FrontmatterSchema.safeParse(header);
  if (!parsed.success) {
    throw new InvalidConfigError(location.path, formatIssues(parsed.error));
  }
  const meta = parsed.data;

  // serializeLeaf writes one blank line before and one newline after the body
  const content = body.replace(/^\r?\n/, '').replace(/\r?\n$/, '');

  const links: LeafLink[] = meta.links.map(link => ({
    to: link.to,
    relation: link.relation,
    createdAt: link.created
  }));

  const createdAt = meta.created ?? fallbackTime;

  return {
    id: meta.id ?? uuidv5(location.path, LEAF_ID_NAMESPACE),
    path: location.path,
    tree: location.tree,
    branch: location.branch,
    name: location.name,
    title: meta.title && meta.title.length > 0 ? meta.title : generateTitle(content),
    content,
    tier: meta.tier,
    confidence: meta.confidence,
    tags: normalizeTags(meta.tags),
    links,
    createdAt,
    updatedAt: meta.updated ?? createdAt
  };
}
