import {
  ERROR_DETAIL_MAX_LENGTH,
  NewScheduledPost,
  PostStatus,
  PublishOutcome,
  ScheduledPost,
} from "./scheduledPost.model";

/**
 * Durable record store for scheduled posts. Every status change is a
 * conditional transition: it only applies when the record is still in the
 * expected source status, which is what makes overlapping publishing runs
 * safe.
 */
export interface ScheduleStore {
  /** Validates and persists a new `pending` post, returning its id. */
  insert(post: NewScheduledPost): Promise<string>;
  findById(id: string): Promise<ScheduledPost | null>;
  /** Pending posts with `scheduledTime <= now`, oldest first. */
  queryDue(now: Date): Promise<ScheduledPost[]>;
  /** Atomic `pending -> processing`. False when the post is not pending. */
  claim(id: string, now?: Date): Promise<boolean>;
  markPosted(
    id: string,
    postedAt: Date,
    outcome?: PublishOutcome
  ): Promise<ScheduledPost>;
  markFailed(id: string, errorDetail: string): Promise<ScheduledPost>;
  reschedule(id: string, newTime: Date): Promise<ScheduledPost>;
  /** Deletes a pending post and returns the removed record. */
  cancel(id: string): Promise<ScheduledPost>;
  /** Operator reset `failed -> pending` with a fresh time and media. */
  requeue(
    id: string,
    scheduledTime: Date,
    mediaRef: string | null
  ): Promise<ScheduledPost>;
  listByStatus(status: PostStatus): Promise<ScheduledPost[]>;
  /** Tail of the account's chain: latest time among pending/processing posts. */
  latestScheduledTime(accountRef: string): Promise<Date | null>;
}

/** Statuses that occupy a slot in their account's chain. */
export const CHAIN_STATUSES: readonly PostStatus[] = ["pending", "processing"];

export const truncateErrorDetail = (detail: string): string =>
  detail.length > ERROR_DETAIL_MAX_LENGTH
    ? `${detail.slice(0, ERROR_DETAIL_MAX_LENGTH - 3)}...`
    : detail;

export function buildNewRecord(
  input: NewScheduledPost,
  now: Date
): Omit<ScheduledPost, "id"> {
  return {
    platform: input.platform,
    accountRef: input.accountRef,
    mediaRef: input.mediaRef ?? null,
    caption: input.caption,
    replyToPostId: input.replyToPostId ?? null,
    scheduledTime: input.scheduledTime,
    status: "pending",
    claimedAt: null,
    postedAt: null,
    remotePostId: null,
    permalink: null,
    errorDetail: null,
    createdAt: now,
    updatedAt: now,
  };
}
