/**
 * @judgekit/sdk — Endpoint builder.
 *
 * Maps each remote operation and its typed parameters to an endpoint
 * descriptor: the method name plus query parameters in a fixed order.
 * Pure string construction, no I/O.
 *
 * Wire rules:
 * - Booleans render as "True" / "False"
 * - Unset optional parameters are left out entirely
 * - List values (handles, tags) are joined with ";"
 */

import type { QueryParam } from "./query.js";
import { formatQuery } from "./query.js";
import { UsageError } from "./types.js";

// =============================================================================
// Methods
// =============================================================================

export const API_METHODS = [
  "blogEntry.comments",
  "blogEntry.view",
  "contest.hacks",
  "contest.list",
  "contest.ratingChanges",
  "contest.standings",
  "contest.status",
  "problemset.problems",
  "problemset.recentStatus",
  "recentActions",
  "user.blogEntries",
  "user.friends",
  "user.info",
  "user.ratedList",
  "user.rating",
  "user.status",
] as const;

export type ApiMethod = (typeof API_METHODS)[number];

export interface EndpointDescriptor {
  readonly method: ApiMethod;
  readonly params: readonly QueryParam[];
}

export const DEFAULT_API_ROOT = "https://codeforces.com/api";

// =============================================================================
// Parameters
// =============================================================================

export interface BlogEntryParams {
  readonly blogEntryId: number;
}

export interface ContestHacksParams {
  readonly contestId: number;
  readonly asManager?: boolean | undefined;
}

export interface ContestListParams {
  /** List gym contests instead of regular ones */
  readonly gym?: boolean | undefined;
}

export interface ContestRatingChangesParams {
  readonly contestId: number;
}

export interface ContestStandingsParams {
  readonly contestId: number;
  readonly asManager?: boolean | undefined;
  /** 1-based index of the first ranklist row */
  readonly from?: number | undefined;
  readonly count?: number | undefined;
  readonly showUnofficial?: boolean | undefined;
}

export interface ContestStatusParams {
  readonly contestId: number;
  readonly asManager?: boolean | undefined;
  readonly handle?: string | undefined;
  /** 1-based index of the first submission */
  readonly from?: number | undefined;
  readonly count?: number | undefined;
}

/**
 * `tags` and `problemsetName` are exclusive; `tags` wins when both are set.
 */
export interface ProblemsetProblemsParams {
  readonly tags?: string | readonly string[] | undefined;
  readonly problemsetName?: string | undefined;
}

export interface ProblemsetRecentStatusParams {
  readonly count: number;
  readonly problemsetName?: string | undefined;
}

export interface RecentActionsParams {
  readonly maxCount: number;
}

export interface UserHandleParams {
  readonly handle: string;
}

export interface UserFriendsParams {
  readonly onlyOnline?: boolean | undefined;
}

export interface UserInfoParams {
  /** One handle, a ";"-joined string, or a list of handles */
  readonly handles: string | readonly string[];
  readonly checkHistoricHandles?: boolean | undefined;
}

export interface UserRatedListParams {
  readonly activeOnly?: boolean | undefined;
  readonly includeRetired?: boolean | undefined;
  readonly contestId?: number | undefined;
}

export interface UserStatusParams {
  readonly handle: string;
  /** 1-based index of the first submission */
  readonly from?: number | undefined;
  readonly count?: number | undefined;
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Render a boolean the way the remote service parses it.
 */
export function formatBoolean(value: boolean): "True" | "False" {
  return value ? "True" : "False";
}

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function invalid(key: string, message: string): UsageError {
  return new UsageError("INVALID_PARAMETER", `Invalid parameter "${key}": ${message}`);
}

/**
 * Ordered parameter collector with per-kind validation.
 */
class ParamList {
  private readonly params: QueryParam[] = [];

  integer(key: string, value: number | undefined, min = 1): this {
    if (value === undefined) return this;
    if (!Number.isSafeInteger(value)) {
      throw invalid(key, `expected an integer, got ${value}`);
    }
    if (value < min) {
      throw invalid(key, `must be at least ${min}, got ${value}`);
    }
    this.params.push([key, String(value)]);
    return this;
  }

  boolean(key: string, value: boolean | undefined): this {
    if (value !== undefined) {
      this.params.push([key, formatBoolean(value)]);
    }
    return this;
  }

  text(key: string, value: string | undefined): this {
    if (value === undefined) return this;
    if (value.trim() === "") {
      throw invalid(key, "must not be empty");
    }
    if (UNPAIRED_SURROGATE.test(value)) {
      throw invalid(key, "contains an unpaired surrogate");
    }
    this.params.push([key, value]);
    return this;
  }

  list(key: string, value: string | readonly string[] | undefined): this {
    if (value === undefined) return this;
    return this.text(key, typeof value === "string" ? value : value.join(";"));
  }

  build(method: ApiMethod): EndpointDescriptor {
    return { method, params: this.params };
  }
}

function required<T>(key: string, value: T | undefined): T {
  if (value === undefined) {
    throw invalid(key, "is required");
  }
  return value;
}

/** Blank strings and lists of blank strings count as unset. */
function isSet(value: string | readonly string[] | undefined): boolean {
  if (value === undefined) return false;
  if (typeof value === "string") return value.trim() !== "";
  return value.some((entry) => entry.trim() !== "");
}

// =============================================================================
// Builders
// =============================================================================

/**
 * One descriptor builder per remote operation.
 */
export const endpoints = {
  blogEntryComments(params: BlogEntryParams): EndpointDescriptor {
    return new ParamList()
      .integer("blogEntryId", required("blogEntryId", params.blogEntryId))
      .build("blogEntry.comments");
  },

  blogEntryView(params: BlogEntryParams): EndpointDescriptor {
    return new ParamList()
      .integer("blogEntryId", required("blogEntryId", params.blogEntryId))
      .build("blogEntry.view");
  },

  contestHacks(params: ContestHacksParams): EndpointDescriptor {
    return new ParamList()
      .integer("contestId", required("contestId", params.contestId))
      .boolean("asManager", params.asManager)
      .build("contest.hacks");
  },

  contestList(params: ContestListParams = {}): EndpointDescriptor {
    return new ParamList().boolean("gym", params.gym).build("contest.list");
  },

  contestRatingChanges(params: ContestRatingChangesParams): EndpointDescriptor {
    return new ParamList()
      .integer("contestId", required("contestId", params.contestId))
      .build("contest.ratingChanges");
  },

  contestStandings(params: ContestStandingsParams): EndpointDescriptor {
    return new ParamList()
      .integer("contestId", required("contestId", params.contestId))
      .boolean("asManager", params.asManager)
      .integer("from", params.from)
      .integer("count", params.count)
      .boolean("showUnofficial", params.showUnofficial)
      .build("contest.standings");
  },

  contestStatus(params: ContestStatusParams): EndpointDescriptor {
    return new ParamList()
      .integer("contestId", required("contestId", params.contestId))
      .boolean("asManager", params.asManager)
      .text("handle", params.handle)
      .integer("from", params.from)
      .integer("count", params.count)
      .build("contest.status");
  },

  problemsetProblems(params: ProblemsetProblemsParams = {}): EndpointDescriptor {
    const list = new ParamList();
    if (isSet(params.tags)) {
      list.list("tags", params.tags);
    } else if (isSet(params.problemsetName)) {
      list.text("problemsetName", params.problemsetName);
    }
    return list.build("problemset.problems");
  },

  problemsetRecentStatus(params: ProblemsetRecentStatusParams): EndpointDescriptor {
    return new ParamList()
      .integer("count", required("count", params.count))
      .text("problemsetName", params.problemsetName)
      .build("problemset.recentStatus");
  },

  recentActions(params: RecentActionsParams): EndpointDescriptor {
    return new ParamList()
      .integer("maxCount", required("maxCount", params.maxCount))
      .build("recentActions");
  },

  userBlogEntries(params: UserHandleParams): EndpointDescriptor {
    return new ParamList()
      .text("handle", required("handle", params.handle))
      .build("user.blogEntries");
  },

  userFriends(params: UserFriendsParams = {}): EndpointDescriptor {
    return new ParamList().boolean("onlyOnline", params.onlyOnline).build("user.friends");
  },

  userInfo(params: UserInfoParams): EndpointDescriptor {
    return new ParamList()
      .list("handles", required("handles", params.handles))
      .boolean("checkHistoricHandles", params.checkHistoricHandles)
      .build("user.info");
  },

  userRatedList(params: UserRatedListParams = {}): EndpointDescriptor {
    return new ParamList()
      .boolean("activeOnly", params.activeOnly)
      .boolean("includeRetired", params.includeRetired)
      .integer("contestId", params.contestId)
      .build("user.ratedList");
  },

  userRating(params: UserHandleParams): EndpointDescriptor {
    return new ParamList()
      .text("handle", required("handle", params.handle))
      .build("user.rating");
  },

  userStatus(params: UserStatusParams): EndpointDescriptor {
    return new ParamList()
      .text("handle", required("handle", params.handle))
      .integer("from", params.from)
      .integer("count", params.count)
      .build("user.status");
  },
};

/**
 * Render a descriptor as a full URL under the given API root.
 */
export function endpointUrl(apiRoot: string, descriptor: EndpointDescriptor): string {
  const base = `${apiRoot}/${descriptor.method}`;
  return descriptor.params.length > 0 ? `${base}?${formatQuery(descriptor.params)}` : base;
}
