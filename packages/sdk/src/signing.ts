/**
 * @judgekit/sdk — Request signing.
 *
 * Signature scheme of the remote API:
 *
 *   apiSig = rand6 + sha512hex("{rand6}/{method}?apiKey={key}&{query}&time={time}#{secret}")
 *
 * where `query` is the request's own parameters, sorted by key and
 * canonically encoded. The signed URL carries the sorted parameters
 * followed by apiKey, time and apiSig.
 */

import { createHash, randomInt } from "node:crypto";
import type { ApiMethod } from "./endpoints.js";
import { canonicalQuery, parseQuery } from "./query.js";
import type { SigningContext, SigningEntropy } from "./types.js";
import { UsageError } from "./types.js";

export const NONCE_MIN = 111111;
export const NONCE_MAX = 999999;

/**
 * Inputs of one signature, with the nondeterministic parts resolved.
 */
export interface SignatureInput {
  readonly method: ApiMethod;
  readonly key: string;
  readonly secret: string;
  readonly time: number;
  readonly nonce: number;
  readonly canonicalQuery: string;
}

export const defaultEntropy: SigningEntropy = {
  now: () => Math.floor(Date.now() / 1000),
  nonce: () => randomInt(NONCE_MIN, NONCE_MAX + 1),
};

function joinParams(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join("&");
}

/**
 * Compute the apiSig value: the nonce followed by the SHA-512 hex digest.
 */
export function computeApiSig(input: SignatureInput): string {
  const query = joinParams(`apiKey=${input.key}`, input.canonicalQuery, `time=${input.time}`);
  const digest = createHash("sha512")
    .update(`${input.nonce}/${input.method}?${query}#${input.secret}`, "utf8")
    .digest("hex");
  return `${input.nonce}${digest}`;
}

/**
 * Recover the raw query string of a URL built for `method` under `apiRoot`.
 */
export function extractQuery(url: string, apiRoot: string, method: ApiMethod): string {
  const base = `${apiRoot}/${method}`;
  if (url === base) return "";
  if (url.startsWith(`${base}?`)) return url.slice(base.length + 1);
  throw new UsageError("INVALID_PARAMETER", `URL does not target ${method} under ${apiRoot}`);
}

/**
 * Sign a URL with fully resolved inputs. Deterministic.
 */
export function signUrl(
  url: string,
  apiRoot: string,
  method: ApiMethod,
  credentials: { readonly key: string; readonly secret: string },
  time: number,
  nonce: number,
): string {
  const query = canonicalQuery(parseQuery(extractQuery(url, apiRoot, method)));
  const apiSig = computeApiSig({
    method,
    key: credentials.key,
    secret: credentials.secret,
    time,
    nonce,
    canonicalQuery: query,
  });
  return `${apiRoot}/${method}?${joinParams(query, `apiKey=${credentials.key}`, `time=${time}`, `apiSig=${apiSig}`)}`;
}

/**
 * Signs request URLs with a client's signing context.
 *
 * Time is read per call unless the context pins it.
 */
export class RequestSigner {
  private readonly credentials: { readonly key: string; readonly secret: string } | undefined;
  private readonly fixedTime: number | undefined;
  private readonly entropy: SigningEntropy;

  constructor(
    private readonly apiRoot: string,
    context: SigningContext,
    entropy: Partial<SigningEntropy> = {},
  ) {
    if (context.enabled) {
      if (context.key === undefined || context.secret === undefined) {
        throw new UsageError("INVALID_CONFIG", "Signing is enabled but key or secret is missing");
      }
      this.credentials = { key: context.key, secret: context.secret };
    }
    this.fixedTime = context.fixedTime;
    this.entropy = { ...defaultEntropy, ...entropy };
  }

  get enabled(): boolean {
    return this.credentials !== undefined;
  }

  /**
   * Return the signed URL, or `url` unchanged when signing is disabled.
   */
  sign(url: string, method: ApiMethod): string {
    if (this.credentials === undefined) {
      return url;
    }
    const time = this.fixedTime ?? this.entropy.now();
    return signUrl(url, this.apiRoot, method, this.credentials, time, this.entropy.nonce());
  }
}
