/**
 * @judgekit/sdk — Request pipeline.
 *
 * build -> sign -> GET -> decode, shared by both client variants.
 *
 * - RequestPipeline runs calls as they come, each suspending only on I/O
 * - SerialExecutor funnels calls through a mutex, one request at a time
 */

import type { Logger } from "pino";
import type { ZodType, ZodTypeDef } from "zod";
import { resolveClientConfig } from "./config.js";
import { decodeResponse } from "./decoder.js";
import type { ApiMethod, EndpointDescriptor } from "./endpoints.js";
import { endpointUrl } from "./endpoints.js";
import type { Transport, TransportResponse } from "./http-client.js";
import { HttpTransport } from "./http-client.js";
import { createLogger } from "./logger.js";
import type { RequestLogEntry } from "./logger.js";
import { AsyncMutex } from "./mutex.js";
import { RequestSigner } from "./signing.js";
import type { CallOptions, JudgeClientConfig } from "./types.js";
import { DecodeError, JudgeKitError, TransportError, UsageError } from "./types.js";

/**
 * Schema of one result item.
 */
export type ItemSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Runs one API call end to end.
 */
export interface RequestExecutor {
  execute<T>(descriptor: EndpointDescriptor, item: ItemSchema<T>, options?: CallOptions): Promise<T[]>;
  close(): void;
  readonly closed: boolean;
}

/**
 * The shared pipeline. Holds no per-call mutable state.
 */
export class RequestPipeline implements RequestExecutor {
  private readonly apiRoot: string;
  private readonly signer: RequestSigner;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private isClosed = false;

  constructor(config: JudgeClientConfig = {}) {
    const resolved = resolveClientConfig(config);
    this.apiRoot = resolved.apiRoot;
    this.signer = new RequestSigner(resolved.apiRoot, resolved.auth, config.entropy);
    this.transport = new HttpTransport({ fetchFn: config.fetchFn, timeoutMs: resolved.timeoutMs });
    this.logger = config.logger ?? createLogger(resolved.logLevel);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async execute<T>(
    descriptor: EndpointDescriptor,
    item: ItemSchema<T>,
    options: CallOptions = {},
  ): Promise<T[]> {
    const { method } = descriptor;
    if (this.isClosed) {
      throw new UsageError("CLIENT_CLOSED", `Client is closed; cannot call ${method}`);
    }

    const start = Date.now();
    const url = this.signer.sign(endpointUrl(this.apiRoot, descriptor), method);
    try {
      const response = await this.transport.get(url, options.signal);
      const entry: RequestLogEntry = {
        method,
        status: response.status,
        durationMs: Date.now() - start,
        signed: this.signer.enabled,
      };
      this.logger.debug(entry, `${method} ${response.status}`);
      return this.decode(method, response, item);
    } catch (error) {
      this.logger.debug(
        {
          method,
          code: error instanceof JudgeKitError ? error.code : "UNKNOWN",
          durationMs: Date.now() - start,
        },
        `${method} failed`,
      );
      throw error;
    }
  }

  /**
   * Abort in-flight requests and refuse new ones. Idempotent.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.transport.close();
  }

  private decode<T>(method: ApiMethod, response: TransportResponse, item: ItemSchema<T>): T[] {
    try {
      return decodeResponse(method, response.body, item);
    } catch (error) {
      // An undecodable body on an error status is the server's failure, not ours
      if (error instanceof DecodeError && !response.ok) {
        throw new TransportError("HTTP_ERROR", `HTTP ${response.status}`, response.status, {
          cause: error,
        });
      }
      throw error;
    }
  }
}

/**
 * Executor that lets only one request run at a time.
 */
export class SerialExecutor implements RequestExecutor {
  private readonly mutex = new AsyncMutex();

  constructor(private readonly inner: RequestExecutor) {}

  get closed(): boolean {
    return this.inner.closed;
  }

  execute<T>(descriptor: EndpointDescriptor, item: ItemSchema<T>, options?: CallOptions): Promise<T[]> {
    return this.mutex.runExclusive(() => this.inner.execute(descriptor, item, options));
  }

  close(): void {
    this.inner.close();
  }
}
