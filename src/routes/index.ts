import { Router } from "express";
import { scheduledPostRoutes } from "../scheduledPost/scheduledPost.routes";
import { ScheduledPostController } from "../scheduledPost/scheduledPost.controller";
import { ScheduleService } from "../scheduledPost/scheduledPost.service";
import { ScheduledPostWorker } from "../scheduledPost/scheduledPost.worker";
import { manualCronRoutes } from "../shared/manualCron.router";
import { requireBearerSecret } from "../middlewares/auth";

export interface RouteDeps {
  scheduleService: ScheduleService;
  worker: Pick<ScheduledPostWorker, "processScheduledPosts">;
  cronSecret: string;
}

export function createRoutes({ scheduleService, worker, cronSecret }: RouteDeps): Router {
  const router = Router();
  const requireSecret = requireBearerSecret(cronSecret);

  // Scheduled posts routes
  router.use(
    "/scheduled-posts",
    requireSecret,
    scheduledPostRoutes(new ScheduledPostController(scheduleService))
  );

  // On-demand publishing run
  router.use("/cron", requireSecret, manualCronRoutes(worker));

  return router;
}
