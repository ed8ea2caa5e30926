/**
 * Custom Error Classes for the Knowledge Base
 *
 * Every failure surfaced by the core is a named subclass of KnowledgeBaseError
 * with a stable `code`, so callers (and the server protocol) can match on it.
 */

export const ERROR_CODES = [
  'NotFound',
  'AlreadyExists',
  'AmbiguousBranch',
  'InvalidName',
  'InvalidConfidence',
  'InvalidTier',
  'InvalidRelation',
  'InvalidModel',
  'DimensionMismatch',
  'ServerUnavailable',
  'ServerStartFailure',
  'Timeout',
  'RequestTooLarge',
  'IndexCorrupt',
  'StoreLocked',
  'InvalidConfig',
  'InvalidRequest'
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export class KnowledgeBaseError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Thrown when a tree, branch, leaf or link endpoint does not exist
 */
export class NotFoundError extends KnowledgeBaseError {
  public readonly kind: 'tree' | 'branch' | 'leaf' | 'link';
  public readonly target: string;

  constructor(kind: 'tree' | 'branch' | 'leaf' | 'link', target: string) {
    super('NotFound', `${kind[0].toUpperCase()}${kind.slice(1)} not found: ${target}`);
    this.kind = kind;
    this.target = target;
  }
}

export class AlreadyExistsError extends KnowledgeBaseError {
  public readonly target: string;

  constructor(kind: 'tree' | 'branch' | 'leaf', target: string) {
    super('AlreadyExists', `${kind[0].toUpperCase()}${kind.slice(1)} already exists: ${target}`);
    this.target = target;
  }
}

/**
 * Thrown when an unqualified branch name exists in more than one tree
 */
export class AmbiguousBranchError extends KnowledgeBaseError {
  public readonly branch: string;
  public readonly trees: string[];

  constructor(branch: string, trees: string[]) {
    super(
      'AmbiguousBranch',
      `Branch '${branch}' exists in ${trees.length} trees (${trees.join(', ')}). ` +
      `Qualify it as <tree>/${branch}.`
    );
    this.branch = branch;
    this.trees = trees;
  }
}

export class InvalidNameError extends KnowledgeBaseError {
  constructor(name: string, reason: string) {
    super('InvalidName', `Invalid name '${name}': ${reason}`);
  }
}

export class InvalidConfidenceError extends KnowledgeBaseError {
  public readonly value: unknown;

  constructor(value: unknown) {
    super('InvalidConfidence', `Confidence must be a number in [0.0, 1.0], got ${String(value)}`);
    this.value = value;
  }
}

export class InvalidTierError extends KnowledgeBaseError {
  public readonly value: unknown;

  constructor(value: unknown) {
    super('InvalidTier', `Unknown tier '${String(value)}'. Expected one of: leaves, branches, trunk, roots`);
    this.value = value;
  }
}

export class InvalidRelationError extends KnowledgeBaseError {
  constructor(relation: string) {
    super(
      'InvalidRelation',
      `Invalid relation '${relation}': use 1-32 lowercase letters, digits, '_' or '-', starting with a letter`
    );
  }
}

export class InvalidModelError extends KnowledgeBaseError {
  public readonly alias: string;

  constructor(alias: string, known: string[]) {
    super('InvalidModel', `Unsupported model alias '${alias}'. Known aliases: ${known.join(', ')}`);
    this.alias = alias;
  }
}

/**
 * Thrown when a vector's dimensionality does not match what the store recorded
 */
export class DimensionMismatchError extends KnowledgeBaseError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, hint?: string) {
    super(
      'DimensionMismatch',
      `Vector dimension mismatch: expected ${expected}, got ${actual}` + (hint ? `. ${hint}` : '')
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class ServerUnavailableError extends KnowledgeBaseError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('ServerUnavailable', `Embedding server unavailable: ${detail}`, options);
  }
}

export class ServerStartFailureError extends KnowledgeBaseError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('ServerStartFailure', `Embedding server failed to start: ${detail}`, options);
  }
}

export class TimeoutError extends KnowledgeBaseError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('Timeout', `${operation} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class RequestTooLargeError extends KnowledgeBaseError {
  constructor(detail: string) {
    super('RequestTooLarge', `Request too large: ${detail}`);
  }
}

export class IndexCorruptError extends KnowledgeBaseError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super('IndexCorrupt', `Index failed consistency check (${detail}). Run 'arbor reindex' to rebuild it.`, options);
  }
}

export class StoreLockedError extends KnowledgeBaseError {
  public readonly pid: number;

  constructor(pid: number) {
    super('StoreLocked', `Store is locked by another writer (pid ${pid})`);
    this.pid = pid;
  }
}

/**
 * Thrown when a persisted YAML document (store config, metadata, frontmatter) cannot be read
 */
export class InvalidConfigError extends KnowledgeBaseError {
  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super('InvalidConfig', `Invalid document ${path}: ${detail}`, options);
  }
}

/**
 * Thrown by the embedding server for a malformed request body or an unknown route
 */
export class InvalidRequestError extends KnowledgeBaseError {
  constructor(detail: string) {
    super('InvalidRequest', `Invalid request: ${detail}`);
  }
}

export function isKnowledgeBaseError(error: unknown): error is KnowledgeBaseError {
  return error instanceof KnowledgeBaseError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
