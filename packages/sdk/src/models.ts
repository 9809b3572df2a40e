/**
 * @judgekit/sdk — Domain records.
 *
 * Zod schemas for every record the remote API returns, with the
 * TypeScript types derived from them. The API omits fields rather than
 * sending null, so nearly every field is optional; unknown fields are
 * stripped. Only fields the API always sends are required.
 */

import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * A value the API sends either bare or wrapped in a list, read as a list.
 */
export function listOf<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess(
    (value) => (value === undefined || Array.isArray(value) ? value : [value]),
    z.array(item).optional(),
  );
}

const int = z.number().int();

// =============================================================================
// Users and blogs
// =============================================================================

export const UserSchema = z.object({
  handle: z.string().optional(),
  email: z.string().optional(),
  vkId: z.string().optional(),
  openId: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  country: z.string().optional(),
  city: z.string().optional(),
  organization: z.string().optional(),
  contribution: int.optional(),
  rank: z.string().optional(),
  rating: int.optional(),
  maxRank: z.string().optional(),
  maxRating: int.optional(),
  lastOnlineTimeSeconds: int.optional(),
  registrationTimeSeconds: int.optional(),
  friendOfCount: int.optional(),
  avatar: z.string().optional(),
  titlePhoto: z.string().optional(),
});

export type User = z.infer<typeof UserSchema>;

export const BlogEntrySchema = z.object({
  id: int.optional(),
  originalLocale: z.string().optional(),
  creationTimeSeconds: int.optional(),
  authorHandle: z.string().optional(),
  title: z.string().optional(),
  content: z.string().optional(),
  locale: z.string().optional(),
  modificationTimeSeconds: int.optional(),
  allowViewHistory: z.boolean().optional(),
  tags: z.array(z.string()).optional(),
  rating: int.optional(),
});

export type BlogEntry = z.infer<typeof BlogEntrySchema>;

export const CommentSchema = z.object({
  id: int.optional(),
  creationTimeSeconds: int.optional(),
  commentatorHandle: z.string().optional(),
  locale: z.string().optional(),
  text: z.string().optional(),
  parentCommentId: int.optional(),
  rating: int.optional(),
});

export type Comment = z.infer<typeof CommentSchema>;

export const RecentActionSchema = z.object({
  timeSeconds: int.optional(),
  blogEntry: BlogEntrySchema.optional(),
  comment: CommentSchema.optional(),
});

export type RecentAction = z.infer<typeof RecentActionSchema>;

// =============================================================================
// Contests
// =============================================================================

export const RatingChangeSchema = z.object({
  contestId: int.optional(),
  contestName: z.string().optional(),
  handle: z.string().optional(),
  rank: int.optional(),
  ratingUpdateTimeSeconds: int.optional(),
  oldRating: int.optional(),
  newRating: int.optional(),
});

export type RatingChange = z.infer<typeof RatingChangeSchema>;

export const ContestSchema = z.object({
  id: int.optional(),
  name: z.string().optional(),
  type: z.string().optional(),
  phase: z.string().optional(),
  frozen: z.boolean().optional(),
  durationSeconds: int.optional(),
  startTimeSeconds: int.optional(),
  relativeTimeSeconds: int.optional(),
  preparedBy: z.string().optional(),
  websiteUrl: z.string().optional(),
  description: z.string().optional(),
  difficulty: int.optional(),
  kind: z.string().optional(),
  icpcRegion: z.string().optional(),
  country: z.string().optional(),
  city: z.string().optional(),
  season: z.string().optional(),
});

export type Contest = z.infer<typeof ContestSchema>;

export const MemberSchema = z.object({
  handle: z.string(),
  name: z.string().optional(),
});

export type Member = z.infer<typeof MemberSchema>;

export const PartySchema = z.object({
  contestId: int.optional(),
  members: z.array(MemberSchema).optional(),
  participantType: z.string().optional(),
  teamId: int.optional(),
  teamName: z.string().optional(),
  ghost: z.boolean().optional(),
  room: int.optional(),
  startTimeSeconds: int.optional(),
});

export type Party = z.infer<typeof PartySchema>;

export const ProblemSchema = z.object({
  contestId: int.optional(),
  problemsetName: z.string().optional(),
  index: z.string().optional(),
  name: z.string().optional(),
  type: z.string().optional(),
  points: z.number().optional(),
  rating: int.optional(),
  tags: z.array(z.string()).optional(),
});

export type Problem = z.infer<typeof ProblemSchema>;

export const ProblemStatisticsSchema = z.object({
  contestId: int.optional(),
  index: z.string().optional(),
  solvedCount: int.optional(),
});

export type ProblemStatistics = z.infer<typeof ProblemStatisticsSchema>;

export const SubmissionSchema = z.object({
  id: int,
  contestId: int.optional(),
  creationTimeSeconds: int.optional(),
  relativeTimeSeconds: int.optional(),
  problem: ProblemSchema.optional(),
  author: PartySchema.optional(),
  programmingLanguage: z.string().optional(),
  verdict: z.string().optional(),
  testset: z.string().optional(),
  passedTestCount: int.optional(),
  timeConsumedMillis: int.optional(),
  memoryConsumedBytes: int.optional(),
  points: z.number().optional(),
});

export type Submission = z.infer<typeof SubmissionSchema>;

export const HackSchema = z.object({
  id: int,
  creationTimeSeconds: int,
  hacker: PartySchema.optional(),
  defender: PartySchema.optional(),
  verdict: z.string().optional(),
  problem: ProblemSchema.optional(),
  test: z.string().optional(),
  judgeProtocol: z.record(z.string()).optional(),
});

export type Hack = z.infer<typeof HackSchema>;

export const ProblemResultSchema = z.object({
  points: z.number().optional(),
  penalty: int.optional(),
  rejectedAttemptCount: int.optional(),
  type: z.string().optional(),
  bestSubmissionTimeSeconds: int.optional(),
});

export type ProblemResult = z.infer<typeof ProblemResultSchema>;

export const RankListRowSchema = z.object({
  party: PartySchema.optional(),
  rank: int.optional(),
  points: z.number().optional(),
  penalty: int.optional(),
  successfulHackCount: int.optional(),
  unsuccessfulHackCount: int.optional(),
  problemResults: z.array(ProblemResultSchema).optional(),
  lastSubmissionTimeSeconds: int.optional(),
});

export type RankListRow = z.infer<typeof RankListRowSchema>;

// =============================================================================
// Composites
// =============================================================================

export const StandingsSchema = z.object({
  contest: ContestSchema.optional(),
  problems: listOf(ProblemSchema),
  rows: listOf(RankListRowSchema),
});

export type Standings = z.infer<typeof StandingsSchema>;

export const ProblemSetProblemsSchema = z.object({
  problems: listOf(ProblemSchema),
  problemStatistics: listOf(ProblemStatisticsSchema),
});

export type ProblemSetProblems = z.infer<typeof ProblemSetProblemsSchema>;

// =============================================================================
// Envelope
// =============================================================================

/**
 * Wrapper of every reply. `result` is validated per operation.
 */
export const EnvelopeSchema = z.object({
  status: z.string(),
  comment: z.string().nullish(),
  result: z.unknown().optional(),
});

export type Envelope = z.infer<typeof EnvelopeSchema>;
