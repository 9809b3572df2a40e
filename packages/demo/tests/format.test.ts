/**
 * Demo formatting tests. Colors are disabled so output is plain text.
 */

import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import {
  formatContest,
  formatDelta,
  formatDuration,
  formatRatingChange,
  formatUser,
  ratingColor,
} from "../src/format.js";

const plain = new Chalk({ level: 0 });
const colored = new Chalk({ level: 1 });

describe("ratingColor", () => {
  it("picks the band of the rating", () => {
    expect(ratingColor(colored, 3800)("x")).toBe(colored.red("x"));
    expect(ratingColor(colored, 2100)("x")).toBe(colored.yellow("x"));
    expect(ratingColor(colored, 1500)("x")).toBe(colored.cyan("x"));
    expect(ratingColor(colored, 1199)("x")).toBe(colored.gray("x"));
  });

  it("uses gray when unrated", () => {
    expect(ratingColor(colored, undefined)("x")).toBe(colored.gray("x"));
  });
});

describe("formatDelta", () => {
  it("signs the change", () => {
    expect(formatDelta(50)).toBe("+50");
    expect(formatDelta(-12)).toBe("-12");
    expect(formatDelta(0)).toBe("0");
  });
});

describe("formatDuration", () => {
  it("formats minutes, hours and days", () => {
    expect(formatDuration(45 * 60)).toBe("45m");
    expect(formatDuration(2 * 3600 + 30 * 60 + 59)).toBe("2h 30m");
    expect(formatDuration(3 * 86400 + 4 * 3600 + 5 * 60)).toBe("3d 4h");
  });

  it("clamps negative durations", () => {
    expect(formatDuration(-100)).toBe("0m");
  });
});

describe("formatUser", () => {
  it("lays out handle, rating, rank and place", () => {
    expect(
      formatUser(plain, {
        handle: "tourist",
        rating: 3800,
        rank: "legendary grandmaster",
        city: "Gomel",
        country: "Belarus",
      }),
    ).toBe(`${"tourist".padEnd(20)}${"3800".padEnd(8)}legendary grandmaster · Gomel, Belarus`);
  });

  it("marks unrated users", () => {
    expect(formatUser(plain, { handle: "newcomer" })).toBe(
      `${"newcomer".padEnd(20)}${"unrated".padEnd(8)}unrated`,
    );
  });
});

describe("formatRatingChange", () => {
  it("shows the new rating and the delta", () => {
    expect(
      formatRatingChange(plain, { contestName: "Round 900", oldRating: 1500, newRating: 1550 }),
    ).toBe("1550 (+50) Round 900");
  });

  it("drops a missing contest name", () => {
    expect(formatRatingChange(plain, { oldRating: 1500, newRating: 1488 })).toBe("1488 (-12)");
  });
});

describe("formatContest", () => {
  it("shows the time until start", () => {
    expect(
      formatContest(plain, { id: 2000, name: "Round 1000", startTimeSeconds: 10_000 }, 10_000 - 5400),
    ).toBe(`${"#2000".padEnd(8)}Round 1000 (starts in 1h 30m)`);
  });

  it("omits timing when the start is unknown", () => {
    expect(formatContest(plain, { id: 7 }, 0)).toBe(`${"#7".padEnd(8)}(unnamed)`);
  });
});
