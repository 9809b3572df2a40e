/**
 * @judgekit/demo — Terminal formatting.
 *
 * Pure string builders. Each takes the chalk instance to color with, so
 * tests can pass one with colors disabled.
 */

import type { ChalkInstance } from "chalk";
import type { Contest, RatingChange, User } from "@judgekit/sdk";

/**
 * Lower rating bound of each color band, highest first.
 */
const RATING_BANDS: ReadonlyArray<readonly [number, (chalk: ChalkInstance) => ChalkInstance]> = [
  [2400, (c) => c.red],
  [2100, (c) => c.yellow],
  [1900, (c) => c.magenta],
  [1600, (c) => c.blue],
  [1400, (c) => c.cyan],
  [1200, (c) => c.green],
];

export function ratingColor(chalk: ChalkInstance, rating: number | undefined): ChalkInstance {
  if (rating === undefined) return chalk.gray;
  for (const [min, color] of RATING_BANDS) {
    if (rating >= min) return color(chalk);
  }
  return chalk.gray;
}

/** "+50", "-12" or "0". */
export function formatDelta(delta: number): string {
  return delta > 0 ? `+${delta}` : String(delta);
}

/** "3d 4h", "2h 30m", "45m"; minutes are dropped once days appear. */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds / 60));
  const days = Math.floor(total / 1440);
  const hours = Math.floor((total % 1440) / 60);
  const minutes = total % 60;
  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

export function formatUser(chalk: ChalkInstance, user: User): string {
  const color = ratingColor(chalk, user.rating);
  const handle = color.bold((user.handle ?? "?").padEnd(20));
  const rating = color(String(user.rating ?? "unrated").padEnd(8));
  const place = [user.city, user.country].filter((part) => part !== undefined).join(", ");
  return `${handle}${rating}${chalk.gray(user.rank ?? "unrated")}${place ? chalk.gray(` · ${place}`) : ""}`;
}

export function formatRatingChange(chalk: ChalkInstance, change: RatingChange): string {
  const before = change.oldRating ?? 0;
  const after = change.newRating ?? before;
  const delta = after - before;
  const deltaText = formatDelta(delta);
  const coloredDelta = delta > 0 ? chalk.green(deltaText) : delta < 0 ? chalk.red(deltaText) : chalk.gray(deltaText);
  return `${ratingColor(chalk, after)(String(after))} (${coloredDelta}) ${chalk.gray(change.contestName ?? "")}`.trimEnd();
}

/**
 * One line per upcoming contest; `now` is Unix seconds.
 */
export function formatContest(chalk: ChalkInstance, contest: Contest, now: number): string {
  const id = chalk.cyan(`#${contest.id ?? "?"}`.padEnd(8));
  const name = chalk.white(contest.name ?? "(unnamed)");
  if (contest.startTimeSeconds === undefined) return `${id}${name}`;
  const startsIn = contest.startTimeSeconds - now;
  const when = startsIn > 0 ? `starts in ${formatDuration(startsIn)}` : "started";
  return `${id}${name} ${chalk.gray(`(${when})`)}`;
}
