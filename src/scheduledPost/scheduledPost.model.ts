export const PLATFORMS = ["instagram", "text_only", "video_attached"] as const;
export type Platform = (typeof PLATFORMS)[number];

export const POST_STATUSES = ["pending", "processing", "posted", "failed"] as const;
export type PostStatus = (typeof POST_STATUSES)[number];

/** Platforms whose pipeline starts from a staged media blob. */
export const MEDIA_PLATFORMS: ReadonlySet<Platform> = new Set<Platform>([
  "instagram",
  "video_attached",
]);

/** Platforms published through the X text-post call, which can reply to a post. */
export const REPLYABLE_PLATFORMS: ReadonlySet<Platform> = new Set<Platform>([
  "text_only",
  "video_attached",
]);

export interface ScheduledPost {
  id: string;
  platform: Platform;
  accountRef: string;
  mediaRef: string | null;
  caption: string;
  replyToPostId: string | null;
  scheduledTime: Date; // UTC instant
  status: PostStatus;
  claimedAt: Date | null;
  postedAt: Date | null;
  remotePostId: string | null;
  permalink: string | null;
  errorDetail: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewScheduledPost {
  platform: Platform;
  accountRef: string;
  mediaRef?: string | null;
  caption: string;
  replyToPostId?: string | null;
  scheduledTime: Date;
}

export interface PublishOutcome {
  remotePostId: string;
  permalink: string | null;
}

export const ERROR_DETAIL_MAX_LENGTH = 500;
