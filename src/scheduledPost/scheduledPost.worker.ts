import { v4 as uuidv4 } from "uuid";
import { Platform, PublishOutcome, ScheduledPost } from "./scheduledPost.model";
import { ScheduleStore } from "./scheduledPost.store";
import { PlatformPublishers, postToPlatform } from "../worker/postToPlatform";
import { PublishError } from "../services/platforms/platformError";
import { PublisherConfig } from "../config/publisher.config";
import { StoreUnavailableError } from "../utils/httpError";
import { Notifier } from "../utils/slack";
import { runLanes } from "../utils/concurrency";

export type PostRunOutcome = "posted" | "failed" | "skipped";

export interface PostRunResult {
  id: string;
  platform: Platform;
  accountRef: string;
  outcome: PostRunOutcome;
  detail?: string;
}

export interface RunSummary {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  due: number;
  claimed: number;
  skipped: number;
  posted: number;
  failed: number;
  results: PostRunResult[];
}

export interface ScheduledPostWorkerDeps {
  store: ScheduleStore;
  publishers: PlatformPublishers;
  notifier: Notifier;
  concurrency: PublisherConfig["concurrency"];
  clock?: () => Date;
}

type Attempt =
  | { ok: true; outcome: PublishOutcome }
  | { ok: false; detail: string };

export function describeFailure(error: unknown): string {
  if (error instanceof PublishError) {
    return `[${error.step}] ${error.name}: ${error.message}`;
  }
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

export class ScheduledPostWorker {
  private readonly clock: () => Date;

  constructor(private readonly deps: ScheduledPostWorkerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * One publishing run: claims every due post and drives it to `posted` or
   * `failed`. Posts of one account go one at a time; up to
   * `concurrency.maxAccounts` accounts are worked in parallel.
   */
  async processScheduledPosts({ signal }: { signal?: AbortSignal } = {}): Promise<RunSummary> {
    const startedAt = this.clock();
    const runId = uuidv4();
    const results: PostRunResult[] = [];

    try {
      const due = await this.deps.store.queryDue(startedAt);
      console.log(`[Publisher] run ${runId}: found ${due.length} posts to process`);

      await runLanes(
        due,
        (post) => post.accountRef,
        this.deps.concurrency.maxAccounts,
        async (post) => {
          results.push(await this.processPost(post, signal));
        }
      );

      const summary = this.summarize(runId, startedAt, due.length, results);
      console.log(
        `[Publisher] run ${runId} finished: ${summary.posted} posted, ${summary.failed} failed, ${summary.skipped} skipped`
      );
      if (summary.failed > 0) {
        await this.deps.notifier.notify(
          `Publishing run ${runId} finished with ${summary.failed} failed post(s):\n${results
            .filter((result) => result.outcome === "failed")
            .map((result) => `- ${result.id} (${result.platform}): ${result.detail ?? "unknown error"}`)
            .join("\n")}`
        );
      }
      return summary;
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        console.error(`[Publisher] run ${runId} aborted, schedule store unreachable:`, error.message);
        await this.deps.notifier.notify(
          `Publishing run ${runId} aborted: ${error.message}. ${results.length} post(s) handled before the outage.`
        );
      }
      throw error;
    }
  }

  private async processPost(post: ScheduledPost, signal?: AbortSignal): Promise<PostRunResult> {
    const base = { id: post.id, platform: post.platform, accountRef: post.accountRef };

    let claimed: boolean;
    try {
      claimed = await this.deps.store.claim(post.id, this.clock());
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      // the post is still pending, so the next run picks it up again
      const detail = describeFailure(error);
      console.error(`[Publisher] could not claim ${post.id}, skipping: ${detail}`);
      return { ...base, outcome: "skipped", detail };
    }
    if (!claimed) {
      console.log(`[Publisher] ${post.id} already claimed elsewhere, skipping`);
      return { ...base, outcome: "skipped" };
    }

    const attempt = await this.attempt(post, signal);

    try {
      if (attempt.ok) {
        await this.deps.store.markPosted(post.id, this.clock(), attempt.outcome);
      } else {
        await this.deps.store.markFailed(post.id, attempt.detail);
      }
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      console.error(`[Publisher] could not record the result of ${post.id}:`, error);
      return {
        ...base,
        outcome: "failed",
        detail: `${post.id} left in processing (${
          attempt.ok ? `published as ${attempt.outcome.remotePostId}` : "publish failed"
        }), release it once checked: ${describeFailure(error)}`,
      };
    }

    await this.releaseMedia(post);

    if (attempt.ok) {
      console.log(`[Publisher] ${post.id} posted as ${attempt.outcome.remotePostId}`);
      return { ...base, outcome: "posted" };
    }
    return { ...base, outcome: "failed", detail: attempt.detail };
  }

  private async attempt(post: ScheduledPost, signal?: AbortSignal): Promise<Attempt> {
    try {
      const outcome = await postToPlatform(post, this.deps.publishers, signal);
      return { ok: true, outcome };
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error;
      const detail = describeFailure(error);
      console.error(`[Publisher] ${post.id} (${post.platform}) failed: ${detail}`);
      return { ok: false, detail };
    }
  }

  // called once per resolved post; delete errors are only logged
  private async releaseMedia(post: ScheduledPost): Promise<void> {
    if (!post.mediaRef) return;
    try {
      await this.deps.publishers.blobs.delete(post.mediaRef);
    } catch (error) {
      console.error(`[Publisher] could not delete staged media ${post.mediaRef}:`, error);
    }
  }

  private summarize(
    runId: string,
    startedAt: Date,
    due: number,
    results: PostRunResult[]
  ): RunSummary {
    const count = (outcome: PostRunOutcome) =>
      results.filter((result) => result.outcome === outcome).length;
    const skipped = count("skipped");

    return {
      runId,
      startedAt,
      finishedAt: this.clock(),
      due,
      claimed: results.length - skipped,
      skipped,
      posted: count("posted"),
      failed: count("failed"),
      results,
    };
  }
}
