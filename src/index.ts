export * from "./scheduledPost/scheduledPost.model";
export type { ScheduleStore } from "./scheduledPost/scheduledPost.store";
export { InMemoryScheduleStore } from "./scheduledPost/scheduledPost.memoryStore";
export { ScheduledPostRepository } from "./scheduledPost/scheduledPost.repository";
export { ScheduleService } from "./scheduledPost/scheduledPost.service";
export type { ScheduleServiceDeps } from "./scheduledPost/scheduledPost.service";
export { ScheduledPostWorker } from "./scheduledPost/scheduledPost.worker";
export type {
  PostRunResult,
  RunSummary,
  ScheduledPostWorkerDeps,
} from "./scheduledPost/scheduledPost.worker";
export { postToPlatform } from "./worker/postToPlatform";
export type { PlatformPublishers, TextPoster } from "./worker/postToPlatform";

export { ResumableSingleShotUpload } from "./uploads/resumableSingleShot.upload";
export type { ResumableUploadApi, ResumableUploadOptions } from "./uploads/resumableSingleShot.upload";
export { ChunkedMultipartUpload } from "./uploads/chunkedMultipart.upload";
export type { ChunkedUploadApi, ChunkedUploadOptions } from "./uploads/chunkedMultipart.upload";
export { InstagramGraphClient } from "./services/platforms/instagram.service";
export { TwitterMediaClient, TwitterTextClient } from "./services/platforms/twitter.service";
export { MongoCredentialProvider } from "./services/credentials.service";
export type { CredentialProvider } from "./services/credentials.service";

export { nextSlot, parseSlotTime } from "./utils/slotCalculator";
export type { SlotTime } from "./utils/slotCalculator";
export type { BlobStaging } from "./utils/blobStaging";
export { InMemoryBlobStaging } from "./utils/blobStaging";
export { CloudinaryBlobStaging } from "./utils/cloudinary";
export {
  HttpError,
  InvalidStateError,
  NotFoundError,
  SlotTakenError,
  StoreUnavailableError,
  ValidationError,
} from "./utils/httpError";
export {
  ProtocolError,
  PublishError,
  TimeoutError,
  TransientNetworkError,
} from "./services/platforms/platformError";

export { loadPublisherConfig } from "./config/publisher.config";
export type { PublisherConfig } from "./config/publisher.config";
export { ConfigService } from "./config/config.service";
export { createPublishingServices } from "./container";
export { createApp } from "./app";
