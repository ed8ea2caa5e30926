/**
 * Embedding server wire protocol
 *
 * JSON over HTTP on a local Unix socket. Every payload in both directions is
 * validated with zod; failures travel as `{ error: { code, message } }`.
 */

import { z } from 'zod';
import { ERROR_CODES, KnowledgeBaseError, getErrorMessage, type ErrorCode } from '../core/errors.js';

export const SOCKET_FILE = 'embedder.sock';
export const PID_FILE = 'embedder.pid';
export const LOG_FILE = 'embedder.log';

export const MAX_TEXTS_PER_REQUEST = 64;
export const MAX_TEXT_LENGTH = 8192;
export const MAX_BODY_BYTES = 4 * 1024 * 1024;

export const ROUTES = {
  status: '/status',
  embed: '/embed',
  model: '/model',
  shutdown: '/shutdown'
} as const;

// ==========================================
// REQUESTS
// ==========================================

export const EmbedRequestSchema = z.object({
  texts: z.array(z.string()),
  expectedDimensions: z.number().int().positive().optional()
});
export type EmbedRequest = z.infer<typeof EmbedRequestSchema>;

export const ModelRequestSchema = z.object({
  alias: z.string().min(1)
});
export type ModelRequest = z.infer<typeof ModelRequestSchema>;

// ==========================================
// RESPONSES
// ==========================================

export const StatusResponseSchema = z.object({
  running: z.boolean(),
  model: z.string(),
  dimensions: z.number().int().positive(),
  pid: z.number().int(),
  startedAt: z.string(),
  queueDepth: z.number().int().nonnegative(),
  registryVersion: z.number().int()
});
export type StatusResponse = z.infer<typeof StatusResponseSchema>;

export const EmbedResponseSchema = z.object({
  vectors: z.array(z.array(z.number())),
  model: z.string(),
  dimensions: z.number().int().positive()
});
export type EmbedResponse = z.infer<typeof EmbedResponseSchema>;

export const ModelResponseSchema = z.object({
  current: z.string(),
  requested: z.string(),
  restartRequired: z.boolean()
});
export type ModelResponse = z.infer<typeof ModelResponseSchema>;

export const ShutdownResponseSchema = z.object({
  stopping: z.literal(true)
});

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.enum(ERROR_CODES),
    message: z.string()
  })
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// ==========================================
// ERRORS
// ==========================================

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  InvalidModel: 400,
  InvalidConfig: 400,
  InvalidRequest: 400,
  NotFound: 404,
  DimensionMismatch: 409,
  RequestTooLarge: 413,
  Timeout: 503,
  ServerUnavailable: 503
};

export function serializeError(error: unknown): { status: number; body: ErrorResponse } {
  if (error instanceof KnowledgeBaseError) {
    return {
      status: STATUS_BY_CODE[error.code] ?? 500,
      body: { error: { code: error.code, message: error.message } }
    };
  }
  return {
    status: 500,
    body: { error: { code: 'ServerUnavailable', message: getErrorMessage(error) } }
  };
}

/**
 * Rebuild an error received from the server. Returns null if the body is not an error payload.
 */
export function deserializeError(body: unknown): KnowledgeBaseError | null {
  const parsed = ErrorResponseSchema.safeParse(body);
  if (!parsed.success) return null;
  return new KnowledgeBaseError(parsed.data.error.code, parsed.data.error.message);
}
