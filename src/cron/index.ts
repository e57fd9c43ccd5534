import cron, { ScheduledTask } from "node-cron";
import { ScheduledPostWorker } from "../scheduledPost/scheduledPost.worker";

export type CronWorker = Pick<ScheduledPostWorker, "processScheduledPosts">;

/**
 * Returns the tick handler used by the cron job. A tick that fires while the
 * previous run is still going is skipped.
 */
export function createPublishTick(worker: CronWorker): () => Promise<void> {
  let running = false;

  return async () => {
    if (running) {
      console.warn("[Cron] previous publishing run still in progress, skipping tick");
      return;
    }

    running = true;
    try {
      await worker.processScheduledPosts();
    } catch (error) {
      console.error("[Cron] publishing run failed:", error);
    } finally {
      running = false;
    }
  };
}

export const setupCronJobs = (worker: CronWorker, expression: string): ScheduledTask => {
  const task = cron.schedule(expression, createPublishTick(worker));

  console.log(`[Cron] publishing job scheduled (${expression})`);
  return task;
};
