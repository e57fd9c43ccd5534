import { Router } from "express";
import { ScheduledPostWorker } from "../scheduledPost/scheduledPost.worker";

export function manualCronRoutes(worker: Pick<ScheduledPostWorker, "processScheduledPosts">): Router {
  const router = Router();

  router.get("/publish", async (req, res, next) => {
    const timestamp = new Date().toISOString();
    console.log(`[Manual Cron] Triggered at ${timestamp} by ${req.method} request`);

    try {
      const result = await worker.processScheduledPosts();
      res.status(200).json({ message: "Cron ran", timestamp, result });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
