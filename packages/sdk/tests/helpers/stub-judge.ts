/**
 * In-process judge API stand-in.
 *
 * A Hono app serving `/api/:method` from per-method handlers. Its
 * request() is handed to the client as fetchFn, so no server or socket
 * is involved.
 */

import { Hono } from "hono";

export interface StubReply {
  readonly status?: number;
  readonly json?: unknown;
  readonly text?: string;
  readonly delayMs?: number;
}

export interface RecordedRequest {
  readonly method: string;
  readonly url: string;
  readonly query: Readonly<Record<string, string>>;
}

export type StubHandler = (query: Readonly<Record<string, string>>) => StubReply;

export interface StubJudge {
  readonly app: Hono;
  readonly requests: RecordedRequest[];
  readonly fetchFn: typeof fetch;
  /** Highest number of requests the stub was serving at once */
  readonly maxConcurrent: () => number;
}

export function createStubJudge(handlers: Readonly<Record<string, StubHandler>>): StubJudge {
  const requests: RecordedRequest[] = [];
  const routes = new Map(Object.entries(handlers));
  let active = 0;
  let peak = 0;

  const app = new Hono();
  app.get("/api/:method", async (c) => {
    const method = c.req.param("method");
    const query = c.req.query();
    requests.push({ method, url: c.req.url, query });

    const handler = routes.get(method);
    const reply: StubReply =
      handler !== undefined
        ? handler(query)
        : { status: 400, json: { status: "FAILED", comment: `Unknown method ${method}` } };

    active++;
    peak = Math.max(peak, active);
    try {
      if (reply.delayMs !== undefined) {
        await new Promise((resolve) => setTimeout(resolve, reply.delayMs));
      }
    } finally {
      active--;
    }

    const body = reply.text ?? JSON.stringify(reply.json ?? null);
    return new Response(body, {
      status: reply.status ?? 200,
      headers: { "content-type": reply.text !== undefined ? "text/plain" : "application/json" },
    });
  });

  const fetchFn: typeof fetch = async (input, init) => app.request(new Request(input, init));

  return { app, requests, fetchFn, maxConcurrent: () => peak };
}

/** Reply with an OK envelope. */
export function ok(result: unknown, delayMs?: number): StubReply {
  return delayMs === undefined
    ? { json: { status: "OK", result } }
    : { json: { status: "OK", result }, delayMs };
}

/** Reply with a FAILED envelope, on status 400 as the remote service does. */
export function failed(comment?: string): StubReply {
  return {
    status: 400,
    json: comment === undefined ? { status: "FAILED" } : { status: "FAILED", comment },
  };
}
