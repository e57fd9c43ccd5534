import {
  NewScheduledPost,
  PostStatus,
  PublishOutcome,
  ScheduledPost,
} from "./scheduledPost.model";
import {
  buildNewRecord,
  CHAIN_STATUSES,
  ScheduleStore,
  truncateErrorDetail,
} from "./scheduledPost.store";
import { validateNewPost } from "../validation/scheduledPost.validation";
import { InvalidStateError, NotFoundError, SlotTakenError } from "../utils/httpError";

/**
 * In-process ScheduleStore. Each transition checks and writes without
 * yielding, so it has the same test-and-set semantics as the MongoDB store.
 */
export class InMemoryScheduleStore implements ScheduleStore {
  private readonly posts = new Map<string, ScheduledPost>();
  private sequence = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async insert(input: NewScheduledPost): Promise<string> {
    const post = validateNewPost(input);
    this.assertSlotFree(post.accountRef, post.scheduledTime);

    const id = `post_${++this.sequence}`;
    this.posts.set(id, { id, ...buildNewRecord(post, this.clock()) });
    return id;
  }

  async findById(id: string): Promise<ScheduledPost | null> {
    const post = this.posts.get(id);
    return post ? { ...post } : null;
  }

  async queryDue(now: Date): Promise<ScheduledPost[]> {
    return this.sorted(
      (post) =>
        post.status === "pending" &&
        post.scheduledTime.getTime() <= now.getTime()
    );
  }

  async claim(id: string, now: Date = this.clock()): Promise<boolean> {
    const post = this.posts.get(id);
    if (post?.status !== "pending") return false;

    this.posts.set(id, { ...post, status: "processing", claimedAt: now, updatedAt: now });
    return true;
  }

  async markPosted(
    id: string,
    postedAt: Date,
    outcome?: PublishOutcome
  ): Promise<ScheduledPost> {
    return this.transition(id, "processing", "mark as posted", {
      status: "posted",
      postedAt,
      remotePostId: outcome?.remotePostId ?? null,
      permalink: outcome?.permalink ?? null,
      errorDetail: null,
    });
  }

  async markFailed(id: string, errorDetail: string): Promise<ScheduledPost> {
    return this.transition(id, "processing", "mark as failed", {
      status: "failed",
      errorDetail: truncateErrorDetail(errorDetail),
    });
  }

  async reschedule(id: string, newTime: Date): Promise<ScheduledPost> {
    const current = this.require(id);
    if (current.status === "pending") {
      this.assertSlotFree(current.accountRef, newTime, id);
    }
    return this.transition(id, "pending", "reschedule", { scheduledTime: newTime });
  }

  async cancel(id: string): Promise<ScheduledPost> {
    const post = this.require(id);
    if (post.status !== "pending") {
      throw new InvalidStateError(`Cannot cancel a ${post.status} post`, post.status);
    }
    this.posts.delete(id);
    return { ...post };
  }

  async requeue(
    id: string,
    scheduledTime: Date,
    mediaRef: string | null
  ): Promise<ScheduledPost> {
    const current = this.require(id);
    if (current.status === "failed") {
      validateNewPost({ ...current, scheduledTime, mediaRef });
      this.assertSlotFree(current.accountRef, scheduledTime, id);
    }
    return this.transition(id, "failed", "requeue", {
      status: "pending",
      scheduledTime,
      mediaRef,
      errorDetail: null,
      postedAt: null,
      claimedAt: null,
    });
  }

  async listByStatus(status: PostStatus): Promise<ScheduledPost[]> {
    return this.sorted((post) => post.status === status);
  }

  async latestScheduledTime(accountRef: string): Promise<Date | null> {
    let latest: Date | null = null;
    for (const post of this.posts.values()) {
      if (post.accountRef !== accountRef || !CHAIN_STATUSES.includes(post.status)) {
        continue;
      }
      if (!latest || post.scheduledTime.getTime() > latest.getTime()) {
        latest = post.scheduledTime;
      }
    }
    return latest;
  }

  private require(id: string): ScheduledPost {
    const post = this.posts.get(id);
    if (!post) throw new NotFoundError(`Scheduled post ${id} not found`);
    return post;
  }

  private transition(
    id: string,
    from: PostStatus,
    action: string,
    changes: Partial<Omit<ScheduledPost, "id">>
  ): ScheduledPost {
    const post = this.require(id);
    if (post.status !== from) {
      throw new InvalidStateError(`Cannot ${action} a ${post.status} post`, post.status);
    }
    const updated = { ...post, ...changes, updatedAt: this.clock() };
    this.posts.set(id, updated);
    return { ...updated };
  }

  private assertSlotFree(accountRef: string, time: Date, exceptId?: string): void {
    for (const post of this.posts.values()) {
      if (
        post.id !== exceptId &&
        post.accountRef === accountRef &&
        CHAIN_STATUSES.includes(post.status) &&
        post.scheduledTime.getTime() === time.getTime()
      ) {
        throw new SlotTakenError(accountRef, time);
      }
    }
  }

  private sorted(predicate: (post: ScheduledPost) => boolean): ScheduledPost[] {
    return [...this.posts.values()]
      .filter(predicate)
      .sort(
        (a, b) =>
          a.scheduledTime.getTime() - b.scheduledTime.getTime() ||
          a.createdAt.getTime() - b.createdAt.getTime()
      )
      .map((post) => ({ ...post }));
  }
}
