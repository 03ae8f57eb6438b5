// Standardized error handling utilities
// HTTP-facing AppError plus the error taxonomy of the agent loop and orchestrator

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  PROVIDER_UNAVAILABLE = 'provider_unavailable',
  PROVIDER_ERROR = 'provider_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static providerUnavailable(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.PROVIDER_UNAVAILABLE, message, 400, details);
  }

  static providerError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.PROVIDER_ERROR, message, 502, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

// Tool argument decoding

export class ArgumentParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentParseError';
  }
}

export class ArgumentShapeError extends Error {
  constructor(message: string = 'Tool arguments JSON must decode to an object') {
    super(message);
    this.name = 'ArgumentShapeError';
  }
}

// Tool dispatch

export class UnknownToolError extends Error {
  constructor(public toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class ToolExecutionError extends Error {
  constructor(
    public toolName: string,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ToolExecutionError';
  }
}

// Provider calls

export type ProviderErrorKind =
  | 'auth'
  | 'rate_limit'
  | 'timeout'
  | 'connection'
  | 'server'
  | 'bad_request'
  | 'unknown';

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set(['rate_limit', 'timeout', 'connection', 'server']);

export class ProviderCallError extends Error {
  public readonly retryable: boolean;

  constructor(
    public readonly provider: string,
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ProviderCallError';
    this.retryable = RETRYABLE_KINDS.has(kind);
  }
}

// Run lifecycle

export class AgentCancelledError extends Error {
  constructor(message: string = 'Agent run cancelled') {
    super(message);
    this.name = 'AgentCancelledError';
  }
}

export class AgentTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Orchestration deadline of ${formatSeconds(timeoutMs)} reached`);
    this.name = 'AgentTimeoutError';
  }
}

export class DecompositionParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecompositionParseError';
  }
}

export class SynthesisError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SynthesisError';
  }
}

export function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const RETRYABLE_MESSAGE = /timed out|timeout|connection (?:reset|refused|error|closed)|network|socket hang up|fetch failed|temporarily unavailable/i;

/**
 * Transient failures worth another attempt: connection, timeout and
 * rate-limit shaped errors. Cancellation is never retried.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AgentCancelledError || error instanceof AgentTimeoutError) {
    return false;
  }
  if (error instanceof ProviderCallError) {
    return error.retryable;
  }
  if (isRecord(error)) {
    const code = error.code;
    if (typeof code === 'string' && RETRYABLE_ERROR_CODES.has(code)) {
      return true;
    }
    if (error.cause !== undefined && error.cause !== error && isRetryableError(error.cause)) {
      return true;
    }
  }
  return error instanceof Error && RETRYABLE_MESSAGE.test(error.message);
}

const AUTH_MESSAGE = /\b401\b|\b403\b|unauthori[sz]ed|invalid[ _-]?api[ _-]?key|incorrect api key|authentication/i;
const RATE_LIMIT_MESSAGE = /\b429\b|rate[ _-]?limit|too many requests/i;
const TIMEOUT_MESSAGE = /timed out|timeout|ETIMEDOUT/i;

/** Best-effort kind for a provider failure that did not come with a status code. */
export function classifyProviderFailure(error: unknown): ProviderErrorKind {
  const message = errorMessage(error);
  if (AUTH_MESSAGE.test(message)) return 'auth';
  if (RATE_LIMIT_MESSAGE.test(message)) return 'rate_limit';
  if (TIMEOUT_MESSAGE.test(message)) return 'timeout';
  if (isRetryableError(error)) return 'connection';
  return 'unknown';
}

export function isAuthFailureMessage(message: string): boolean {
  return AUTH_MESSAGE.test(message);
}
