import { PostStatus, ScheduledPost } from "./scheduledPost.model";
import { ScheduleStore } from "./scheduledPost.store";
import {
  RequeueRequest,
  ScheduleRequest,
  scheduleRequestSchema,
  validate,
} from "../validation/scheduledPost.validation";
import { PublisherConfig } from "../config/publisher.config";
import { BlobStaging } from "../utils/blobStaging";
import {
  InvalidStateError,
  NotFoundError,
  SlotTakenError,
  ValidationError,
} from "../utils/httpError";
import { nextSlot } from "../utils/slotCalculator";
import { formatDateForTimezone } from "../utils/dateUtils";

export interface ScheduleServiceDeps {
  store: ScheduleStore;
  blobs: BlobStaging;
  schedule: PublisherConfig["schedule"];
  /** Age after which a `processing` claim may be released by an operator. */
  staleClaimMs?: number;
  clock?: () => Date;
}

// another producer can take the computed slot between reading the tail and inserting
const MAX_SLOT_ATTEMPTS = 3;

const DEFAULT_STALE_CLAIM_MS = 60 * 60 * 1000;

/**
 * Producer and operator entry point: puts posts into their account's next
 * slot and handles the manual reschedule, cancel and requeue operations.
 */
export class ScheduleService {
  private readonly clock: () => Date;

  constructor(private readonly deps: ScheduleServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async schedulePost(request: ScheduleRequest): Promise<ScheduledPost> {
    const input = validate(scheduleRequestSchema, request, "Invalid scheduled post");

    for (let attempt = 1; ; attempt++) {
      const scheduledTime = await this.nextSlotFor(input.accountRef);
      try {
        const id = await this.deps.store.insert({ ...input, scheduledTime });
        console.log(
          `[Schedule] ${id} (${input.platform}) queued for ${input.accountRef} at ${formatDateForTimezone(
            scheduledTime,
            this.deps.schedule.timezone
          )}`
        );
        return this.getPost(id);
      } catch (error) {
        if (!(error instanceof SlotTakenError) || attempt >= MAX_SLOT_ATTEMPTS) throw error;
        console.warn(`[Schedule] slot ${scheduledTime.toISOString()} taken, recomputing`);
      }
    }
  }

  /** Stages the media first; the blob is removed again if the post cannot be stored. */
  async stageAndSchedule(
    request: Omit<ScheduleRequest, "mediaRef">,
    media: Buffer
  ): Promise<ScheduledPost> {
    const mediaRef = await this.deps.blobs.put(media);
    try {
      return await this.schedulePost({ ...request, mediaRef });
    } catch (error) {
      await this.discardMedia(mediaRef);
      throw error;
    }
  }

  async reschedule(id: string, newTime: Date): Promise<ScheduledPost> {
    this.assertFuture(newTime);
    return this.deps.store.reschedule(id, newTime);
  }

  async cancel(id: string): Promise<ScheduledPost> {
    const removed = await this.deps.store.cancel(id);
    if (removed.mediaRef) await this.discardMedia(removed.mediaRef);
    return removed;
  }

  /**
   * Operator reset of a failed post. Media posts need a freshly staged
   * `mediaRef`: the old blob went away when the post failed.
   */
  async requeueFailed(id: string, { scheduledTime, mediaRef }: RequeueRequest = {}): Promise<ScheduledPost> {
    const post = await this.getPost(id);
    if (post.status !== "failed") {
      throw new InvalidStateError(`Cannot requeue a ${post.status} post`, post.status);
    }

    if (scheduledTime) this.assertFuture(scheduledTime);
    const time = scheduledTime ?? (await this.nextSlotFor(post.accountRef));

    return this.deps.store.requeue(id, time, mediaRef ?? null);
  }

  /**
   * Moves a post whose run died before recording its result from
   * `processing` to `failed`, so it can be requeued. Whether it went out
   * remotely is for the operator to check first.
   */
  async releaseStuck(id: string): Promise<ScheduledPost> {
    const post = await this.getPost(id);
    if (post.status !== "processing") {
      throw new InvalidStateError(`Cannot release a ${post.status} post`, post.status);
    }

    const claimedAt = post.claimedAt ?? post.updatedAt;
    const ageMs = this.clock().getTime() - claimedAt.getTime();
    if (ageMs < (this.deps.staleClaimMs ?? DEFAULT_STALE_CLAIM_MS)) {
      throw new InvalidStateError(
        `Post ${id} was claimed at ${claimedAt.toISOString()} and may still be publishing`,
        post.status
      );
    }

    const released = await this.deps.store.markFailed(
      id,
      `Released by operator: claim from ${claimedAt.toISOString()} never completed`
    );
    console.warn(`[Schedule] ${id} released from a stale claim`);
    if (released.mediaRef) await this.discardMedia(released.mediaRef);
    return released;
  }

  listByStatus(status: PostStatus): Promise<ScheduledPost[]> {
    return this.deps.store.listByStatus(status);
  }

  async getPost(id: string): Promise<ScheduledPost> {
    const post = await this.deps.store.findById(id);
    if (!post) throw new NotFoundError(`Scheduled post ${id} not found`);
    return post;
  }

  private async nextSlotFor(accountRef: string): Promise<Date> {
    const tail = await this.deps.store.latestScheduledTime(accountRef);
    const { slots, timezone } = this.deps.schedule;
    return nextSlot(tail, this.clock(), slots, timezone);
  }

  private assertFuture(time: Date): void {
    if (time.getTime() <= this.clock().getTime()) {
      throw new ValidationError("Invalid schedule time", {
        scheduledTime: "scheduledTime must be in the future",
      });
    }
  }

  private async discardMedia(ref: string): Promise<void> {
    try {
      await this.deps.blobs.delete(ref);
    } catch (error) {
      console.error(`[Schedule] could not delete staged media ${ref}:`, error);
    }
  }
}
