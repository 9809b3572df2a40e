/**
 * Response decoder tests.
 *
 * Verifies:
 * - ensureList over absent / single / list results
 * - FAILED envelopes become ApiError (comment or fallback)
 * - Malformed bodies and shapes become DecodeError
 * - Permissive decoding of records (unknown fields, omitted fields)
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { decodeResponse, ensureList, parseJson } from "../src/decoder.js";
import {
  ContestSchema,
  HackSchema,
  ProblemSetProblemsSchema,
  StandingsSchema,
  UserSchema,
} from "../src/models.js";
import { ApiError, DecodeError, UNKNOWN_API_ERROR } from "../src/types.js";

function bytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(typeof value === "string" ? value : JSON.stringify(value));
}

function decodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DecodeError) return error;
    throw error;
  }
  throw new Error("expected a DecodeError");
}

// =============================================================================
// ensureList
// =============================================================================

describe("ensureList", () => {
  it("maps absent to an empty list", () => {
    expect(ensureList<number>(undefined)).toEqual([]);
  });

  it("wraps a single value", () => {
    expect(ensureList({ id: 1 })).toEqual([{ id: 1 }]);
  });

  it("returns a copy of a list", () => {
    const list = [{ id: 1 }, { id: 2 }];
    const result = ensureList(list);
    expect(result).toEqual(list);
    expect(result).not.toBe(list);
  });
});

// =============================================================================
// Envelope status
// =============================================================================

describe("decodeResponse status handling", () => {
  it("returns items of an OK envelope", () => {
    const users = decodeResponse(
      "user.info",
      bytes({ status: "OK", result: [{ handle: "tourist" }, { handle: "Petr" }] }),
      UserSchema,
    );
    expect(users).toEqual([{ handle: "tourist" }, { handle: "Petr" }]);
  });

  it("treats a bare result like a one-element list", () => {
    const bare = decodeResponse(
      "contest.list",
      bytes({ status: "OK", result: { id: 566, name: "Codeforces Round 1" } }),
      ContestSchema,
    );
    const wrapped = decodeResponse(
      "contest.list",
      bytes({ status: "OK", result: [{ id: 566, name: "Codeforces Round 1" }] }),
      ContestSchema,
    );
    expect(bare).toEqual([{ id: 566, name: "Codeforces Round 1" }]);
    expect(bare).toEqual(wrapped);
  });

  it("returns an empty list when result is absent or null", () => {
    expect(decodeResponse("user.friends", bytes({ status: "OK" }), z.string())).toEqual([]);
    expect(decodeResponse("user.friends", bytes({ status: "OK", result: null }), z.string())).toEqual(
      [],
    );
  });

  it("raises ApiError with the comment on FAILED", () => {
    const call = () =>
      decodeResponse(
        "user.info",
        bytes({ status: "FAILED", comment: "handles: User with handle nobody not found" }),
        UserSchema,
      );
    expect(call).toThrow(ApiError);
    expect(call).toThrow("handles: User with handle nobody not found");
  });

  it("falls back to a fixed message without a comment", () => {
    try {
      decodeResponse("user.info", bytes({ status: "FAILED" }), UserSchema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        message: UNKNOWN_API_ERROR,
        code: "API_ERROR",
        method: "user.info",
        comment: undefined,
      });
    }
  });

  it("ignores the result of a FAILED envelope", () => {
    expect(() =>
      decodeResponse(
        "user.info",
        bytes({ status: "FAILED", comment: "Call limit exceeded", result: [{ handle: 42 }] }),
        UserSchema,
      ),
    ).toThrow("Call limit exceeded");
  });

  it("treats any status other than OK as failure", () => {
    expect(() =>
      decodeResponse("user.info", bytes({ status: "PENDING", comment: "later" }), UserSchema),
    ).toThrow(ApiError);
  });

  it("treats a null comment as absent", () => {
    expect(() =>
      decodeResponse("user.info", bytes({ status: "FAILED", comment: null }), UserSchema),
    ).toThrow(UNKNOWN_API_ERROR);
  });
});

// =============================================================================
// Decode errors
// =============================================================================

describe("decodeResponse decode errors", () => {
  it("rejects a body that is not JSON", () => {
    const error = decodeError(() => parseJson(bytes("<html>Service unavailable</html>")));
    expect(error.message).toBe("Response body is not valid JSON");
    expect(error.code).toBe("DECODE_ERROR");
  });

  it("rejects a body that is not valid UTF-8", () => {
    const encoder = new TextEncoder();
    const body = new Uint8Array([
      ...encoder.encode('{"status":"OK","result":[{"handle":"a'),
      0xff,
      0xfe,
      ...encoder.encode('"}]}'),
    ]);

    const error = decodeError(() => decodeResponse("user.info", body, UserSchema));
    expect(error.message).toBe("Response body is not valid UTF-8");
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it("rejects an envelope without status", () => {
    const error = decodeError(() => decodeResponse("user.info", bytes({ result: [] }), UserSchema));
    expect(error.message).toBe("Response is not an API envelope");
    expect(error.issues.map((issue) => issue.path)).toEqual(["envelope.status"]);
  });

  it("rejects a JSON array as envelope", () => {
    expect(() => decodeResponse("user.info", bytes([1, 2]), UserSchema)).toThrow(DecodeError);
  });

  it("rejects an item missing a required field", () => {
    const error = decodeError(() =>
      decodeResponse(
        "contest.hacks",
        bytes({ status: "OK", result: [{ id: 1, creationTimeSeconds: 10 }, { id: 2 }] }),
        HackSchema,
      ),
    );
    expect(error.message).toBe("Result item 1 of contest.hacks does not match the expected shape");
    expect(error.issues.map((issue) => issue.path)).toEqual(["result.1.creationTimeSeconds"]);
  });

  it("rejects a field of the wrong type", () => {
    const error = decodeError(() =>
      decodeResponse("user.info", bytes({ status: "OK", result: [{ rating: "high" }] }), UserSchema),
    );
    expect(error.issues.map((issue) => issue.path)).toEqual(["result.0.rating"]);
  });
});

// =============================================================================
// Records
// =============================================================================

describe("record decoding", () => {
  it("drops unknown fields and leaves omitted ones absent", () => {
    const [user] = decodeResponse(
      "user.info",
      bytes({ status: "OK", result: [{ handle: "tourist", rating: 3800, newField: { nested: true } }] }),
      UserSchema,
    );
    expect(user).toEqual({ handle: "tourist", rating: 3800 });
    expect(user?.country).toBeUndefined();
  });

  it("normalizes the lists inside standings", () => {
    const [standings] = decodeResponse(
      "contest.standings",
      bytes({
        status: "OK",
        result: {
          contest: { id: 566, name: "Round" },
          problems: { index: "A", name: "Watermelon" },
          rows: [{ rank: 1, points: 3.5 }],
        },
      }),
      StandingsSchema,
    );
    expect(standings).toEqual({
      contest: { id: 566, name: "Round" },
      problems: [{ index: "A", name: "Watermelon" }],
      rows: [{ rank: 1, points: 3.5 }],
    });
  });

  it("decodes problemset problems with statistics", () => {
    const [problemset] = decodeResponse(
      "problemset.problems",
      bytes({
        status: "OK",
        result: {
          problems: [{ contestId: 4, index: "A", tags: ["brute force", "math"] }],
          problemStatistics: [{ contestId: 4, index: "A", solvedCount: 1000 }],
        },
      }),
      ProblemSetProblemsSchema,
    );
    expect(problemset?.problems).toEqual([{ contestId: 4, index: "A", tags: ["brute force", "math"] }]);
    expect(problemset?.problemStatistics).toEqual([{ contestId: 4, index: "A", solvedCount: 1000 }]);
  });

  it("keeps absent composite lists absent", () => {
    const [standings] = decodeResponse(
      "contest.standings",
      bytes({ status: "OK", result: { contest: { id: 1 } } }),
      StandingsSchema,
    );
    expect(standings).toEqual({ contest: { id: 1 } });
  });
});
