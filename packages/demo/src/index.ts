/**
 * @judgekit/demo — Terminal walkthrough of the judge API client.
 *
 * Looks up the handles given on the command line:
 * profiles -> rating history (concurrent) -> upcoming contests ->
 * online friends (only when signing is configured)
 *
 * Usage: npm start -w @judgekit/demo -- [handle...]   (default: tourist Petr)
 * Configured from JUDGEKIT_* environment variables.
 */

import chalk from "chalk";
import {
  ApiError,
  JudgeClient,
  JudgeKitError,
  SerialJudgeClient,
  loadClientConfig,
  resolveClientConfig,
} from "@judgekit/sdk";
import { formatContest, formatRatingChange, formatUser } from "./format.js";

// =============================================================================
// Helpers
// =============================================================================

const DEFAULT_HANDLES = ["tourist", "Petr"];
const UPCOMING_LIMIT = 5;

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     JUDGEKIT DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("          Typed client for the contest judge API          ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function line(text: string): void {
  console.log(`      ${text}`);
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function describeError(error: unknown): string {
  if (error instanceof ApiError) return `API said: ${error.message}`;
  if (error instanceof JudgeKitError) return `${error.code}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

const TOTAL_STEPS = 5;

// =============================================================================
// Demo
// =============================================================================

async function run(handles: readonly string[]): Promise<void> {
  banner();

  // ─── Step 1: Configuration ──────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Configuration");

  const config = loadClientConfig(process.env);
  const resolved = resolveClientConfig(config);
  info("api root", resolved.apiRoot);
  info("signing", resolved.auth.enabled ? "enabled" : "disabled");
  info("timeout", resolved.timeoutMs !== undefined ? `${resolved.timeoutMs}ms` : "none");
  info("handles", handles.join(", "));

  const serial = new SerialJudgeClient(config);
  const concurrent = new JudgeClient(config);

  try {
    // ─── Step 2: Profiles ─────────────────────────────────────────────

    stepHeader(2, TOTAL_STEPS, "Profiles (user.info)");

    const users = await serial.user.info({ handles });
    for (const user of users) {
      line(formatUser(chalk, user));
    }
    ok(`${users.length} profile(s) loaded`);

    // ─── Step 3: Rating history ───────────────────────────────────────

    stepHeader(3, TOTAL_STEPS, "Rating history (concurrent user.rating)");

    const started = Date.now();
    const histories = await Promise.allSettled(
      handles.map((handle) => concurrent.user.rating({ handle })),
    );
    histories.forEach((history, index) => {
      const handle = handles[index] ?? "?";
      if (history.status === "rejected") {
        warn(`${handle}: ${describeError(history.reason)}`);
        return;
      }
      const last = history.value.at(-1);
      line(
        `${chalk.white(handle.padEnd(20))}${chalk.gray(`${history.value.length} contests`.padEnd(14))}` +
          (last !== undefined ? formatRatingChange(chalk, last) : chalk.gray("unrated")),
      );
    });
    ok(`${handles.length} lookups in ${Date.now() - started}ms`);

    // ─── Step 4: Upcoming contests ────────────────────────────────────

    stepHeader(4, TOTAL_STEPS, "Upcoming contests (contest.list)");

    const now = Math.floor(Date.now() / 1000);
    const upcoming = (await serial.contest.list({ gym: false }))
      .filter((contest) => contest.phase === "BEFORE")
      .sort((a, b) => (a.startTimeSeconds ?? 0) - (b.startTimeSeconds ?? 0))
      .slice(0, UPCOMING_LIMIT);
    for (const contest of upcoming) {
      line(formatContest(chalk, contest, now));
    }
    if (upcoming.length === 0) {
      warn("No contests scheduled");
    } else {
      ok(`${upcoming.length} upcoming`);
    }

    // ─── Step 5: Friends ──────────────────────────────────────────────

    stepHeader(5, TOTAL_STEPS, "Online friends (signed user.friends)");

    if (!resolved.auth.enabled) {
      warn("Skipped: set JUDGEKIT_AUTH_ENABLED, JUDGEKIT_API_KEY and JUDGEKIT_API_SECRET");
    } else {
      const friends = await serial.user.friends({ onlyOnline: true });
      line(friends.length > 0 ? friends.join(", ") : chalk.gray("nobody online"));
      ok("Signed request accepted");
    }
  } finally {
    serial.close();
    concurrent.close();
  }

  console.log();
}

const argvHandles = process.argv.slice(2);

run(argvHandles.length > 0 ? argvHandles : DEFAULT_HANDLES).catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), describeError(err));
  process.exit(1);
});
