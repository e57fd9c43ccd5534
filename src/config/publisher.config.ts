import Joi from "joi";
import cron from "node-cron";
import { ConfigService } from "./config.service";
import { ValidationError } from "../utils/httpError";
import { isValidTimezone } from "../utils/dateUtils";
import { normalizeSlots, parseSlotTime, SlotTime } from "../utils/slotCalculator";

export interface PollBudget {
  intervalMs: number;
  maxAttempts: number;
  maxWaitMs: number;
  minIntervalMs: number;
}

export interface PublisherConfig {
  nodeEnv: string;
  port: number;
  corsOrigins: string[];
  mongo: {
    uri: string;
    dbName: string;
    scheduledPostsCollection: string;
    socialAccountsCollection: string;
    maxPoolSize: number;
    serverSelectionTimeoutMs: number;
  };
  schedule: {
    timezone: string;
    slots: SlotTime[];
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    backoffFactor: number;
    maxDelayMs: number;
  };
  /** Budget for media_publish "not ready" answers. */
  publishRetry: {
    maxAttempts: number;
    delayMs: number;
  };
  resumablePoll: PollBudget;
  chunkedPoll: PollBudget;
  chunkSizeBytes: number;
  /** Per-request axios timeouts; uploads carry whole media chunks. */
  http: {
    timeoutMs: number;
    uploadTimeoutMs: number;
  };
  concurrency: {
    maxAccounts: number;
    maxUploadStreams: number;
  };
  /** Claims older than this may be released by an operator. */
  staleClaimMs: number;
  instagram: {
    graphBaseUrl: string;
    uploadBaseUrl: string;
  };
  twitter: {
    mediaUploadUrl: string;
    statusBaseUrl: string;
  };
  cloudinary: {
    cloudName: string;
    apiKey: string;
    apiSecret: string;
    folder: string;
  };
  cron: {
    expression: string;
    secret: string;
  };
  slackWebhookUrl: string;
}

const positiveInt = Joi.number().integer().min(1).required();

const pollBudget = Joi.object({
  intervalMs: positiveInt,
  maxAttempts: positiveInt,
  maxWaitMs: positiveInt,
  minIntervalMs: Joi.number().integer().min(0).required(),
});

const publisherConfigSchema = Joi.object<PublisherConfig>({
  nodeEnv: Joi.string().required(),
  port: Joi.number().port().required(),
  corsOrigins: Joi.array().items(Joi.string().uri()).required(),
  mongo: Joi.object({
    uri: Joi.string()
      .uri({ scheme: ["mongodb", "mongodb+srv"] })
      .required(),
    dbName: Joi.string().required(),
    scheduledPostsCollection: Joi.string().required(),
    socialAccountsCollection: Joi.string().required(),
    maxPoolSize: positiveInt,
    serverSelectionTimeoutMs: positiveInt,
  }).required(),
  schedule: Joi.object({
    timezone: Joi.string()
      .custom((value: string, helpers) =>
        isValidTimezone(value) ? value : helpers.error("any.invalid")
      )
      .required(),
    slots: Joi.array().min(1).required(),
  }).required(),
  retry: Joi.object({
    maxAttempts: positiveInt,
    baseDelayMs: positiveInt,
    backoffFactor: Joi.number().min(1).required(),
    maxDelayMs: positiveInt,
  }).required(),
  publishRetry: Joi.object({
    maxAttempts: positiveInt,
    delayMs: Joi.number().integer().min(0).required(),
  }).required(),
  resumablePoll: pollBudget.required(),
  chunkedPoll: pollBudget.required(),
  // the chunked endpoint accepts at most 5 MB per APPEND
  chunkSizeBytes: Joi.number()
    .integer()
    .min(64 * 1024)
    .max(5 * 1024 * 1024)
    .required(),
  http: Joi.object({
    timeoutMs: positiveInt,
    uploadTimeoutMs: positiveInt,
  }).required(),
  concurrency: Joi.object({
    maxAccounts: positiveInt,
    maxUploadStreams: positiveInt,
  }).required(),
  staleClaimMs: positiveInt,
  instagram: Joi.object({
    graphBaseUrl: Joi.string().uri().required(),
    uploadBaseUrl: Joi.string().uri().required(),
  }).required(),
  twitter: Joi.object({
    mediaUploadUrl: Joi.string().uri().required(),
    statusBaseUrl: Joi.string().uri().required(),
  }).required(),
  cloudinary: Joi.object({
    cloudName: Joi.string().allow(""),
    apiKey: Joi.string().allow(""),
    apiSecret: Joi.string().allow(""),
    folder: Joi.string().required(),
  }).required(),
  cron: Joi.object({
    expression: Joi.string()
      .custom((value: string, helpers) =>
        cron.validate(value) ? value : helpers.error("any.invalid")
      )
      .required(),
    secret: Joi.string().allow(""),
  }).required(),
  slackWebhookUrl: Joi.string().uri().allow(""),
});

/**
 * Reads every publisher setting once and validates the lot, so a bad value
 * fails at startup with all offending keys listed.
 */
export function loadPublisherConfig(
  env: ConfigService = ConfigService.getInstance()
): PublisherConfig {
  let slots: SlotTime[] = [];
  const slotErrors: Record<string, string> = {};
  try {
    slots = normalizeSlots(
      env.getList("SCHEDULE_SLOTS", ["09:00", "14:00", "19:00"]).map(parseSlotTime)
    );
  } catch (error) {
    slotErrors["schedule.slots"] =
      error instanceof Error ? error.message : String(error);
  }

  const raw: PublisherConfig = {
    nodeEnv: env.get("NODE_ENV", "development"),
    port: env.getNumber("PORT", 3001),
    corsOrigins: env.getList("CORS_ORIGINS"),
    mongo: {
      uri: env.get("MONGODB_URI", "mongodb://localhost:27017"),
      dbName: env.get("MONGODB_DB_NAME", "scheduler"),
      scheduledPostsCollection: env.get("SCHEDULED_POSTS_COLLECTION", "scheduledPosts"),
      socialAccountsCollection: env.get("SOCIAL_ACCOUNTS_COLLECTION", "socialaccounts"),
      maxPoolSize: env.getNumber("MONGODB_MAX_POOL_SIZE", 10),
      serverSelectionTimeoutMs: env.getNumber("MONGODB_SERVER_SELECTION_TIMEOUT_MS", 10_000),
    },
    schedule: {
      timezone: env.get("SCHEDULE_TIMEZONE", "Asia/Kolkata"),
      slots,
    },
    retry: {
      maxAttempts: env.getNumber("RETRY_MAX_ATTEMPTS", 3),
      baseDelayMs: env.getNumber("RETRY_BASE_DELAY_MS", 2000),
      backoffFactor: env.getNumber("RETRY_BACKOFF_FACTOR", 2),
      maxDelayMs: env.getNumber("RETRY_MAX_DELAY_MS", 30_000),
    },
    publishRetry: {
      maxAttempts: env.getNumber("PUBLISH_RETRY_ATTEMPTS", 3),
      delayMs: env.getNumber("PUBLISH_RETRY_DELAY_MS", 10_000),
    },
    resumablePoll: {
      intervalMs: env.getNumber("IG_POLL_INTERVAL_MS", 5000),
      maxAttempts: env.getNumber("IG_POLL_MAX_ATTEMPTS", 120),
      maxWaitMs: env.getNumber("IG_POLL_MAX_WAIT_MS", 600_000),
      minIntervalMs: 0,
    },
    chunkedPoll: {
      intervalMs: env.getNumber("X_POLL_INTERVAL_MS", 5000),
      maxAttempts: env.getNumber("X_POLL_MAX_ATTEMPTS", 120),
      maxWaitMs: env.getNumber("X_POLL_MAX_WAIT_MS", 600_000),
      minIntervalMs: env.getNumber("X_POLL_MIN_INTERVAL_MS", 1000),
    },
    chunkSizeBytes: env.getNumber("X_CHUNK_SIZE_BYTES", 4 * 1024 * 1024),
    http: {
      timeoutMs: env.getNumber("HTTP_TIMEOUT_MS", 30_000),
      uploadTimeoutMs: env.getNumber("HTTP_UPLOAD_TIMEOUT_MS", 300_000),
    },
    concurrency: {
      maxAccounts: env.getNumber("PUBLISH_MAX_ACCOUNTS", 3),
      maxUploadStreams: env.getNumber("PUBLISH_MAX_UPLOAD_STREAMS", 2),
    },
    staleClaimMs: env.getNumber("STALE_CLAIM_MS", 60 * 60 * 1000),
    instagram: {
      graphBaseUrl: env.get("IG_GRAPH_BASE_URL", "https://graph.facebook.com/v22.0"),
      uploadBaseUrl: env.get("IG_UPLOAD_BASE_URL", "https://rupload.facebook.com/ig-api-upload"),
    },
    twitter: {
      mediaUploadUrl: env.get("X_MEDIA_UPLOAD_URL", "https://api.x.com/2/media/upload"),
      statusBaseUrl: env.get("X_STATUS_BASE_URL", "https://x.com"),
    },
    cloudinary: {
      cloudName: env.get("CLOUDINARY_CLOUD_NAME"),
      apiKey: env.get("CLOUDINARY_API_KEY"),
      apiSecret: env.get("CLOUDINARY_API_SECRET"),
      folder: env.get("CLOUDINARY_FOLDER", "ready_to_publish"),
    },
    cron: {
      expression: env.get("CRON_SCHEDULE", "0 * * * *"),
      secret: env.get("CRON_SECRET"),
    },
    slackWebhookUrl: env.get("SLACK_WEBHOOK_URL"),
  };

  const { error, value } = publisherConfigSchema.validate(raw, {
    abortEarly: false,
    convert: false,
  });

  const details: Record<string, string> = {};
  for (const detail of error?.details ?? []) {
    details[detail.path.join(".")] = detail.message;
  }
  Object.assign(details, slotErrors);
  if (Object.keys(details).length > 0) {
    throw new ValidationError("Invalid publisher configuration", details);
  }

  return Object.freeze(value);
}
