/**
 * @judgekit/sdk — Typed client for the contest judge web API.
 *
 * Builds endpoint URLs, signs requests when credentials are configured,
 * and decodes every reply into a typed list. Uses native fetch.
 *
 * @packageDocumentation
 */

// Types
export type {
  CallOptions,
  JudgeClientConfig,
  JudgeKitErrorCode,
  LogLevel,
  SigningContext,
  SigningEntropy,
  DecodeIssue,
  TransportErrorCode,
  UsageErrorCode,
} from "./types.js";

export {
  JudgeKitError,
  ApiError,
  TransportError,
  DecodeError,
  UsageError,
  UNKNOWN_API_ERROR,
} from "./types.js";

// Configuration
export {
  ClientConfigSchema,
  EnvSchema,
  LOG_LEVELS,
  loadClientConfig,
  resolveClientConfig,
} from "./config.js";
export type { ResolvedClientConfig, EnvConfig } from "./config.js";

// Endpoints
export { API_METHODS, DEFAULT_API_ROOT, endpoints, endpointUrl, formatBoolean } from "./endpoints.js";
export type {
  ApiMethod,
  EndpointDescriptor,
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

// Query encoding and signing
export { canonicalQuery, encodeQueryComponent, formatQuery, parseQuery } from "./query.js";
export type { QueryParam } from "./query.js";
export { RequestSigner, computeApiSig, signUrl, NONCE_MIN, NONCE_MAX } from "./signing.js";
export type { SignatureInput } from "./signing.js";

// Transport and decoding
export { HttpTransport } from "./http-client.js";
export type { Transport, TransportResponse, HttpTransportOptions } from "./http-client.js";
export { decodeResponse, ensureList } from "./decoder.js";
export type { ResultShape } from "./decoder.js";
export { RequestPipeline, SerialExecutor } from "./pipeline.js";
export type { RequestExecutor, ItemSchema } from "./pipeline.js";
export { createLogger } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";

// Client
export {
  JudgeClient,
  SerialJudgeClient,
  BlogEntryNamespace,
  ContestNamespace,
  ProblemsetNamespace,
  UserNamespace,
} from "./client.js";

// Domain records
export {
  UserSchema,
  BlogEntrySchema,
  CommentSchema,
  RecentActionSchema,
  RatingChangeSchema,
  ContestSchema,
  MemberSchema,
  PartySchema,
  ProblemSchema,
  ProblemStatisticsSchema,
  SubmissionSchema,
  HackSchema,
  ProblemResultSchema,
  RankListRowSchema,
  StandingsSchema,
  ProblemSetProblemsSchema,
  EnvelopeSchema,
} from "./models.js";
export type {
  User,
  BlogEntry,
  Comment,
  RecentAction,
  RatingChange,
  Contest,
  Member,
  Party,
  Problem,
  ProblemStatistics,
  Submission,
  Hack,
  ProblemResult,
  RankListRow,
  Standings,
  ProblemSetProblems,
  Envelope,
} from "./models.js";
