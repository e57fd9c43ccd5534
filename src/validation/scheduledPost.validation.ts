import Joi from "joi";
import {
  MEDIA_PLATFORMS,
  NewScheduledPost,
  PLATFORMS,
  REPLYABLE_PLATFORMS,
  POST_STATUSES,
  PostStatus,
  Platform,
} from "../scheduledPost/scheduledPost.model";
import { ValidationError } from "../utils/httpError";

const mediaRef = Joi.when("platform", {
  is: Joi.valid(...MEDIA_PLATFORMS),
  then: Joi.string().uri().required().messages({
    "any.required": "mediaRef is required for media platforms",
    "string.base": "mediaRef is required for media platforms",
  }),
  otherwise: Joi.valid(null).optional().messages({
    "any.only": "mediaRef must be empty for text_only posts",
  }),
});

const replyToPostId = Joi.when("platform", {
  is: Joi.valid(...REPLYABLE_PLATFORMS),
  then: Joi.string().pattern(/^\d+$/).allow(null).optional(),
  otherwise: Joi.valid(null).optional().messages({
    "any.only": "replyToPostId is not supported for instagram posts",
  }),
});

const caption = Joi.when("platform", {
  is: "text_only",
  then: Joi.string().trim().min(1).max(25000).required(),
  otherwise: Joi.string().allow("").max(2200).required(),
});

export const newScheduledPostSchema = Joi.object<NewScheduledPost>({
  platform: Joi.string()
    .valid(...PLATFORMS)
    .required(),
  accountRef: Joi.string().trim().min(1).required(),
  mediaRef,
  caption,
  replyToPostId,
  scheduledTime: Joi.date().required(),
});

export interface ScheduleRequest {
  platform: Platform;
  accountRef: string;
  caption: string;
  mediaRef?: string | null;
  replyToPostId?: string | null;
}

export const scheduleRequestSchema = Joi.object<ScheduleRequest>({
  platform: Joi.string()
    .valid(...PLATFORMS)
    .required(),
  accountRef: Joi.string().trim().min(1).required(),
  mediaRef,
  caption,
  replyToPostId,
});

export const rescheduleRequestSchema = Joi.object<{ scheduledTime: Date }>({
  scheduledTime: Joi.date().iso().required(),
});

export interface RequeueRequest {
  scheduledTime?: Date;
  mediaRef?: string;
}

export const requeueRequestSchema = Joi.object<RequeueRequest>({
  scheduledTime: Joi.date().iso(),
  mediaRef: Joi.string().uri(),
});

export const listQuerySchema = Joi.object<{ status: PostStatus }>({
  status: Joi.string()
    .valid(...POST_STATUSES)
    .default("pending"),
});

/**
 * Runs a Joi schema and converts a failure into a ValidationError whose
 * details map each offending path to its message.
 */
export function validate<T>(
  schema: Joi.ObjectSchema<T>,
  input: unknown,
  message = "Validation failed"
): T {
  const { error, value } = schema.validate(input, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    const details = error.details.reduce<Record<string, string>>((acc, detail) => {
      acc[detail.path.join(".") || "value"] = detail.message;
      return acc;
    }, {});
    throw new ValidationError(message, details);
  }

  return value;
}

export const validateNewPost = (input: NewScheduledPost): NewScheduledPost =>
  validate(newScheduledPostSchema, input, "Invalid scheduled post");
