import express, { Router } from "express";
import { ScheduledPostController } from "./scheduledPost.controller";

export function scheduledPostRoutes(controller: ScheduledPostController): Router {
  const router = express.Router();

  // List posts by status (pending when omitted)
  router.get("/", controller.getScheduledPosts);

  // Schedule a post into the next free slot
  router.post("/", controller.createScheduledPost);

  router.get("/:postId", controller.getScheduledPostById);

  // Move a pending post to another time
  router.patch("/:postId/schedule", controller.reschedulePost);

  // Put a failed post back in the queue
  router.post("/:postId/requeue", controller.requeuePost);

  // Fail a post whose run never recorded a result
  router.post("/:postId/release", controller.releasePost);

  // Cancel a pending post
  router.delete("/:postId", controller.deleteScheduledPost);

  return router;
}
