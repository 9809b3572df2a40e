/**
 * @judgekit/sdk — Judge client.
 *
 * Main entry point of the SDK.
 *
 * Design:
 * - Delegates every call to a RequestExecutor (build, sign, GET, decode)
 * - Namespace grouping: client.blogEntry, client.contest,
 *   client.problemset, client.user, plus client.recentActions()
 * - Every operation resolves to a list, even for single results
 * - JudgeClient runs calls concurrently; SerialJudgeClient one at a time
 */

import { z } from "zod";
import type {
  BlogEntryParams,
  ContestHacksParams,
  ContestListParams,
  ContestRatingChangesParams,
  ContestStandingsParams,
  ContestStatusParams,
  ProblemsetProblemsParams,
  ProblemsetRecentStatusParams,
  RecentActionsParams,
  UserFriendsParams,
  UserHandleParams,
  UserInfoParams,
  UserRatedListParams,
  UserStatusParams,
} from "./endpoints.js";
import { endpoints } from "./endpoints.js";
import type {
  BlogEntry,
  Comment,
  Contest,
  Hack,
  ProblemSetProblems,
  RatingChange,
  RecentAction,
  Standings,
  Submission,
  User,
} from "./models.js";
import {
  BlogEntrySchema,
  CommentSchema,
  ContestSchema,
  HackSchema,
  ProblemSetProblemsSchema,
  RatingChangeSchema,
  RecentActionSchema,
  StandingsSchema,
  SubmissionSchema,
  UserSchema,
} from "./models.js";
import type { RequestExecutor } from "./pipeline.js";
import { RequestPipeline, SerialExecutor } from "./pipeline.js";
import type { CallOptions, JudgeClientConfig } from "./types.js";

const HandleSchema = z.string();

// =============================================================================
// Namespace Classes
// =============================================================================

/**
 * Blog entry operations.
 */
export class BlogEntryNamespace {
  constructor(private readonly executor: RequestExecutor) {}

  /** Comments of a blog entry. */
  async comments(params: BlogEntryParams, options?: CallOptions): Promise<Comment[]> {
    return this.executor.execute(endpoints.blogEntryComments(params), CommentSchema, options);
  }

  /** The blog entry itself. */
  async view(params: BlogEntryParams, options?: CallOptions): Promise<BlogEntry[]> {
    return this.executor.execute(endpoints.blogEntryView(params), BlogEntrySchema, options);
  }
}

/**
 * Contest operations.
 */
export class ContestNamespace {
  constructor(private readonly executor: RequestExecutor) {}

  async hacks(params: ContestHacksParams, options?: CallOptions): Promise<Hack[]> {
    return this.executor.execute(endpoints.contestHacks(params), HackSchema, options);
  }

  async list(params?: ContestListParams, options?: CallOptions): Promise<Contest[]> {
    return this.executor.execute(endpoints.contestList(params), ContestSchema, options);
  }

  async ratingChanges(params: ContestRatingChangesParams, options?: CallOptions): Promise<RatingChange[]> {
    return this.executor.execute(endpoints.contestRatingChanges(params), RatingChangeSchema, options);
  }

  /**
   * Standings of a contest. The API answers with one composite object,
   * so the list normally has a single element.
   */
  async standings(params: ContestStandingsParams, options?: CallOptions): Promise<Standings[]> {
    return this.executor.execute(endpoints.contestStandings(params), StandingsSchema, options);
  }

  async status(params: ContestStatusParams, options?: CallOptions): Promise<Submission[]> {
    return this.executor.execute(endpoints.contestStatus(params), SubmissionSchema, options);
  }
}

/**
 * Problemset operations.
 */
export class ProblemsetNamespace {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * Problems with their statistics, filtered by tags or by problemset
   * name (tags take precedence).
   */
  async problems(params?: ProblemsetProblemsParams, options?: CallOptions): Promise<ProblemSetProblems[]> {
    return this.executor.execute(endpoints.problemsetProblems(params), ProblemSetProblemsSchema, options);
  }

  async recentStatus(params: ProblemsetRecentStatusParams, options?: CallOptions): Promise<Submission[]> {
    return this.executor.execute(endpoints.problemsetRecentStatus(params), SubmissionSchema, options);
  }
}

/**
 * User operations.
 */
export class UserNamespace {
  constructor(private readonly executor: RequestExecutor) {}

  async blogEntries(params: UserHandleParams, options?: CallOptions): Promise<BlogEntry[]> {
    return this.executor.execute(endpoints.userBlogEntries(params), BlogEntrySchema, options);
  }

  /** Handles of the authorized user's friends. Requires signing. */
  async friends(params?: UserFriendsParams, options?: CallOptions): Promise<string[]> {
    return this.executor.execute(endpoints.userFriends(params), HandleSchema, options);
  }

  async info(params: UserInfoParams, options?: CallOptions): Promise<User[]> {
    return this.executor.execute(endpoints.userInfo(params), UserSchema, options);
  }

  async ratedList(params?: UserRatedListParams, options?: CallOptions): Promise<User[]> {
    return this.executor.execute(endpoints.userRatedList(params), UserSchema, options);
  }

  async rating(params: UserHandleParams, options?: CallOptions): Promise<RatingChange[]> {
    return this.executor.execute(endpoints.userRating(params), RatingChangeSchema, options);
  }

  async status(params: UserStatusParams, options?: CallOptions): Promise<Submission[]> {
    return this.executor.execute(endpoints.userStatus(params), SubmissionSchema, options);
  }
}

// =============================================================================
// Clients
// =============================================================================

/**
 * Namespaces over one executor. Subclasses choose the executor.
 */
abstract class JudgeClientBase {
  /** Blog entry operations. */
  readonly blogEntry: BlogEntryNamespace;
  /** Contest operations. */
  readonly contest: ContestNamespace;
  /** Problemset operations. */
  readonly problemset: ProblemsetNamespace;
  /** User operations. */
  readonly user: UserNamespace;

  protected constructor(private readonly executor: RequestExecutor) {
    this.blogEntry = new BlogEntryNamespace(executor);
    this.contest = new ContestNamespace(executor);
    this.problemset = new ProblemsetNamespace(executor);
    this.user = new UserNamespace(executor);
  }

  /** Recent actions across the site. */
  async recentActions(params: RecentActionsParams, options?: CallOptions): Promise<RecentAction[]> {
    return this.executor.execute(endpoints.recentActions(params), RecentActionSchema, options);
  }

  get closed(): boolean {
    return this.executor.closed;
  }

  /**
   * Abort in-flight requests; later calls fail with CLIENT_CLOSED.
   */
  close(): void {
    this.executor.close();
  }
}

/**
 * Judge API client. Calls may run concurrently.
 *
 * Usage:
 * ```typescript
 * const client = new JudgeClient();
 * const [user] = await client.user.info({ handles: "tourist" });
 *
 * const signed = new JudgeClient({
 *   auth: { enabled: true, key: "<key>", secret: "<secret>" },
 * });
 * const friends = await signed.user.friends({ onlyOnline: true });
 * ```
 */
export class JudgeClient extends JudgeClientBase {
  constructor(config: JudgeClientConfig = {}) {
    super(new RequestPipeline(config));
  }
}

/**
 * Judge API client that runs one request at a time, in call order.
 */
export class SerialJudgeClient extends JudgeClientBase {
  constructor(config: JudgeClientConfig = {}) {
    super(new SerialExecutor(new RequestPipeline(config)));
  }
}
