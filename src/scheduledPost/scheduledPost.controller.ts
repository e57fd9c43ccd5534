import { NextFunction, Request, Response } from "express";
import { ScheduleService } from "./scheduledPost.service";
import {
  listQuerySchema,
  requeueRequestSchema,
  rescheduleRequestSchema,
  scheduleRequestSchema,
  validate,
} from "../validation/scheduledPost.validation";

export class ScheduledPostController {
  constructor(private readonly service: ScheduleService) {}

  // Queue a post into its account's next slot
  createScheduledPost = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = validate(scheduleRequestSchema, req.body, "Invalid scheduled post");
      const post = await this.service.schedulePost(input);

      res.status(201).json({ status: "success", data: post });
    } catch (error) {
      next(error);
    }
  };

  getScheduledPosts = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status } = validate(listQuerySchema, req.query, "Invalid query");
      const posts = await this.service.listByStatus(status);

      res.status(200).json({ status: "success", data: posts });
    } catch (error) {
      next(error);
    }
  };

  getScheduledPostById = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const post = await this.service.getPost(req.params.postId);

      res.status(200).json({ status: "success", data: post });
    } catch (error) {
      next(error);
    }
  };

  reschedulePost = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { scheduledTime } = validate(rescheduleRequestSchema, req.body, "Invalid schedule time");
      const post = await this.service.reschedule(req.params.postId, scheduledTime);

      res.status(200).json({ status: "success", data: post });
    } catch (error) {
      next(error);
    }
  };

  // Operator reset of a failed post back to pending
  requeuePost = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = validate(requeueRequestSchema, req.body ?? {}, "Invalid requeue request");
      const post = await this.service.requeueFailed(req.params.postId, input);

      res.status(200).json({ status: "success", data: post });
    } catch (error) {
      next(error);
    }
  };

  // Operator exit for a post stuck in processing
  releasePost = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const post = await this.service.releaseStuck(req.params.postId);

      res.status(200).json({ status: "success", data: post });
    } catch (error) {
      next(error);
    }
  };

  deleteScheduledPost = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await this.service.cancel(req.params.postId);

      res.status(200).json({
        status: "success",
        message: "Scheduled post deleted successfully",
      });
    } catch (error) {
      next(error);
    }
  };
}
