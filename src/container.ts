import { Db } from "mongodb";
import { PublisherConfig } from "./config/publisher.config";
import { ScheduledPostRepository } from "./scheduledPost/scheduledPost.repository";
import { ScheduleService } from "./scheduledPost/scheduledPost.service";
import { ScheduledPostWorker } from "./scheduledPost/scheduledPost.worker";
import { MongoCredentialProvider } from "./services/credentials.service";
import { InstagramGraphClient } from "./services/platforms/instagram.service";
import { TwitterMediaClient, TwitterTextClient } from "./services/platforms/twitter.service";
import { ResumableSingleShotUpload } from "./uploads/resumableSingleShot.upload";
import { ChunkedMultipartUpload } from "./uploads/chunkedMultipart.upload";
import { PlatformPublishers } from "./worker/postToPlatform";
import { CloudinaryBlobStaging } from "./utils/cloudinary";
import { Semaphore } from "./utils/concurrency";
import { SlackNotifier } from "./utils/slack";

export interface PublishingServices {
  store: ScheduledPostRepository;
  scheduleService: ScheduleService;
  worker: ScheduledPostWorker;
}

/** Builds the production object graph on top of a connected database. */
export function createPublishingServices(config: PublisherConfig, db: Db): PublishingServices {
  const store = ScheduledPostRepository.fromDb(db, config.mongo.scheduledPostsCollection);
  const blobs = new CloudinaryBlobStaging(config.cloudinary);
  // shared by both protocols so the cap holds across platforms
  const uploadSlots = new Semaphore(config.concurrency.maxUploadStreams);

  const publishers: PlatformPublishers = {
    credentials: MongoCredentialProvider.fromDb(db, config.mongo.socialAccountsCollection),
    blobs,
    resumable: new ResumableSingleShotUpload(new InstagramGraphClient(config.instagram, config.http), {
      retry: config.retry,
      publishRetry: config.publishRetry,
      poll: config.resumablePoll,
      uploadSlots,
    }),
    chunked: new ChunkedMultipartUpload(new TwitterMediaClient(config.twitter.mediaUploadUrl, config.http), {
      retry: config.retry,
      poll: config.chunkedPoll,
      chunkSizeBytes: config.chunkSizeBytes,
      uploadSlots,
    }),
    text: new TwitterTextClient(config.twitter.statusBaseUrl),
  };

  return {
    store,
    scheduleService: new ScheduleService({
      store,
      blobs,
      schedule: config.schedule,
      staleClaimMs: config.staleClaimMs,
    }),
    worker: new ScheduledPostWorker({
      store,
      publishers,
      notifier: new SlackNotifier(config.slackWebhookUrl),
      concurrency: config.concurrency,
    }),
  };
}
