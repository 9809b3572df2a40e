/**
 * @judgekit/sdk — Response decoder.
 *
 * Raw bytes -> envelope -> typed list, or an error:
 * - Not UTF-8 JSON, or not an envelope -> DecodeError
 * - status other than "OK"             -> ApiError (comment or fallback text)
 * - result absent / single / list      -> [] / [item] / items
 * - an item not matching its schema    -> DecodeError with issue paths
 */

import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { EnvelopeSchema } from "./models.js";
import type { DecodeIssue } from "./types.js";
import { ApiError, DecodeError } from "./types.js";

/**
 * A result as the API may send it.
 */
export type ResultShape<T> = T | readonly T[] | undefined;

/**
 * Normalize an absent, single or list result to a list.
 */
export function ensureList<T>(result: ResultShape<T>): T[] {
  if (result === undefined) return [];
  if (isList(result)) return [...result];
  return [result];
}

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function formatZodIssues(error: ZodError, prefix: string): DecodeIssue[] {
  return error.issues.map((issue) => ({
    path: [prefix, ...issue.path].join("."),
    message: issue.message,
  }));
}

/**
 * Parse response bytes as JSON.
 */
export function parseJson(body: Uint8Array): unknown {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(body);
  } catch (error) {
    throw new DecodeError("Response body is not valid UTF-8", [], { cause: error });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError("Response body is not valid JSON", [], { cause: error });
  }
}

/**
 * Decode a response body for `method`, validating each result item.
 */
export function decodeResponse<T>(
  method: string,
  body: Uint8Array,
  item: ZodType<T, ZodTypeDef, unknown>,
): T[] {
  const envelope = EnvelopeSchema.safeParse(parseJson(body));
  if (!envelope.success) {
    throw new DecodeError(
      "Response is not an API envelope",
      formatZodIssues(envelope.error, "envelope"),
    );
  }

  const { status, comment, result } = envelope.data;
  if (status !== "OK") {
    throw new ApiError(method, comment ?? undefined);
  }

  if (result === undefined || result === null) {
    return [];
  }
  const items = ensureList<unknown>(result);
  return items.map((raw, index) => {
    const parsed = item.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError(
        `Result item ${index} of ${method} does not match the expected shape`,
        formatZodIssues(parsed.error, `result.${index}`),
      );
    }
    return parsed.data;
  });
}
