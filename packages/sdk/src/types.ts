/**
 * @judgekit/sdk — SDK types.
 *
 * Client configuration and the error hierarchy shared by every layer.
 * Domain records live in models.ts.
 */

import type { Logger } from "pino";

// =============================================================================
// Client Configuration
// =============================================================================

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

/**
 * Request signing state owned by a client for its lifetime.
 */
export interface SigningContext {
  /** Sign every request when true; requests go out unsigned otherwise */
  readonly enabled: boolean;
  /** Public API key (required when enabled) */
  readonly key?: string | undefined;
  /** API secret (required when enabled) */
  readonly secret?: string | undefined;
  /** Pins the signature timestamp, in Unix seconds */
  readonly fixedTime?: number | undefined;
}

/**
 * Sources of the two nondeterministic signing inputs.
 */
export interface SigningEntropy {
  /** Current Unix time in seconds */
  readonly now: () => number;
  /** Six-digit nonce in [111111, 999999] */
  readonly nonce: () => number;
}

/**
 * Configuration for a judgekit client.
 */
export interface JudgeClientConfig {
  /** API root without trailing slash (default: "https://codeforces.com/api") */
  readonly apiRoot?: string | undefined;
  /** Request signing (default: disabled) */
  readonly auth?: SigningContext | undefined;
  /** Abort a request after this many milliseconds (default: no limit) */
  readonly timeoutMs?: number | undefined;
  /** Level for the client's own logger (default: "silent") */
  readonly logLevel?: LogLevel | undefined;
  /** Logger to use instead of creating one */
  readonly logger?: Logger | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
  /** Clock and nonce overrides (for deterministic signatures) */
  readonly entropy?: Partial<SigningEntropy> | undefined;
}

/**
 * Per-call options accepted by every client operation.
 */
export interface CallOptions {
  /** Abandons the request when aborted */
  readonly signal?: AbortSignal | undefined;
}

// =============================================================================
// Error Types
// =============================================================================

export type JudgeKitErrorCode =
  | "API_ERROR"
  | "DECODE_ERROR"
  | "NETWORK_ERROR"
  | "HTTP_ERROR"
  | "TIMEOUT"
  | "ABORTED"
  | "CLIENT_CLOSED"
  | "INVALID_PARAMETER"
  | "INVALID_CONFIG";

/**
 * Base class of every error the SDK raises.
 */
export class JudgeKitError extends Error {
  /** Machine-readable error code */
  readonly code: JudgeKitErrorCode;

  constructor(code: JudgeKitErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "JudgeKitError";
    this.code = code;
  }
}

/** Fallback message when a FAILED envelope carries no comment. */
export const UNKNOWN_API_ERROR = "Unknown API error";

/**
 * The remote service answered and rejected the request.
 */
export class ApiError extends JudgeKitError {
  /** API method that failed */
  readonly method: string;
  /** The envelope's comment, as sent */
  readonly comment: string | undefined;

  constructor(method: string, comment: string | undefined) {
    super("API_ERROR", comment ?? UNKNOWN_API_ERROR);
    this.name = "ApiError";
    this.method = method;
    this.comment = comment;
  }
}

export type TransportErrorCode = "NETWORK_ERROR" | "HTTP_ERROR" | "TIMEOUT" | "ABORTED";

/**
 * The request never produced a usable response.
 */
export class TransportError extends JudgeKitError {
  /** HTTP status, or 0 when no response arrived */
  readonly statusCode: number;

  constructor(
    code: TransportErrorCode,
    message: string,
    statusCode: number,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = "TransportError";
    this.statusCode = statusCode;
  }
}

export interface DecodeIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * The response body was not JSON, or did not match the expected shape.
 */
export class DecodeError extends JudgeKitError {
  readonly issues: readonly DecodeIssue[];

  constructor(message: string, issues: readonly DecodeIssue[] = [], options?: { cause?: unknown }) {
    super("DECODE_ERROR", message, options);
    this.name = "DecodeError";
    this.issues = issues;
  }
}

export type UsageErrorCode = "CLIENT_CLOSED" | "INVALID_PARAMETER" | "INVALID_CONFIG";

/**
 * The library was called in a way it does not support.
 */
export class UsageError extends JudgeKitError {
  constructor(code: UsageErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "UsageError";
  }
}
