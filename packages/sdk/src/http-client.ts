/**
 * @judgekit/sdk — HTTP transport.
 *
 * Wraps fetch() with:
 * - Per-call cancellation (AbortSignal)
 * - Optional timeout
 * - Abort of every in-flight request on close()
 * - Error normalization to TransportError
 *
 * A non-2xx status is not an error here: the API reports rejected
 * requests with 4xx statuses and an envelope body, which the decoder
 * turns into an ApiError.
 */

import { TransportError } from "./types.js";

/**
 * Status and raw body of one response.
 */
export interface TransportResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly body: Uint8Array;
}

/**
 * Executes one HTTP GET per call.
 */
export interface Transport {
  get(url: string, signal?: AbortSignal): Promise<TransportResponse>;
  close(): void;
}

export interface HttpTransportOptions {
  readonly fetchFn?: typeof fetch | undefined;
  readonly timeoutMs?: number | undefined;
}

type AbortCause = "cancelled" | "timeout" | "closed";

/**
 * fetch()-based transport.
 *
 * fetch draws connections from the runtime's shared pool, so a
 * transport that is never closed holds no sockets of its own.
 */
export class HttpTransport implements Transport {
  private readonly fetchFn: typeof fetch;
  private readonly timeoutMs: number | undefined;
  private readonly inFlight = new Set<() => void>();

  constructor(options: HttpTransportOptions = {}) {
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.timeoutMs = options.timeoutMs;
  }

  async get(url: string, signal?: AbortSignal): Promise<TransportResponse> {
    if (signal?.aborted === true) {
      throw new TransportError("ABORTED", "Request was cancelled before it started", 0);
    }

    const controller = new AbortController();
    const state: { cause?: AbortCause } = {};
    const abort = (why: AbortCause): void => {
      state.cause ??= why;
      controller.abort();
    };
    const onClose = (): void => abort("closed");
    const onCancel = (): void => abort("cancelled");
    signal?.addEventListener("abort", onCancel, { once: true });
    const timer =
      this.timeoutMs !== undefined ? setTimeout(() => abort("timeout"), this.timeoutMs) : undefined;
    this.inFlight.add(onClose);

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      const body = new Uint8Array(await response.arrayBuffer());
      return { status: response.status, ok: response.ok, body };
    } catch (error) {
      throw this.normalizeError(error, state.cause);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCancel);
      this.inFlight.delete(onClose);
    }
  }

  /**
   * Abort every request still in flight.
   */
  close(): void {
    for (const abortRequest of [...this.inFlight]) {
      abortRequest();
    }
  }

  private normalizeError(error: unknown, cause: AbortCause | undefined): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    switch (cause) {
      case "timeout":
        return new TransportError("TIMEOUT", `Request timed out after ${this.timeoutMs}ms`, 0, {
          cause: error,
        });
      case "cancelled":
        return new TransportError("ABORTED", "Request was cancelled", 0, { cause: error });
      case "closed":
        return new TransportError("ABORTED", "Request was aborted by client close", 0, {
          cause: error,
        });
      default:
        return new TransportError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : "Network error",
          0,
          { cause: error },
        );
    }
  }
}
