import { InstagramCredentials } from "../services/credentials.service";
import {
  isRetryable,
  ProtocolError,
  PublishError,
  PublishStep,
  TimeoutError,
} from "../services/platforms/platformError";
import { PollBudget, PublisherConfig } from "../config/publisher.config";
import { PublishOutcome } from "../scheduledPost/scheduledPost.model";
import { Semaphore } from "../utils/concurrency";
import { pollUntil, Sleep, withRetry } from "../utils/retry";

export type ContainerStatus =
  | "IN_PROGRESS"
  | "FINISHED"
  | "ERROR"
  | "EXPIRED"
  | "PUBLISHED";

export interface ContainerStatusResult {
  status: ContainerStatus;
  detail?: string;
}

/** One remote implementation of the create / upload / poll / publish protocol. */
export interface ResumableUploadApi {
  createContainer(
    credentials: InstagramCredentials,
    request: { caption: string; totalSize: number },
    signal?: AbortSignal
  ): Promise<string>;
  uploadBinary(
    credentials: InstagramCredentials,
    containerId: string,
    bytes: Buffer,
    signal?: AbortSignal
  ): Promise<void>;
  pollStatus(
    credentials: InstagramCredentials,
    containerId: string,
    signal?: AbortSignal
  ): Promise<ContainerStatusResult>;
  publish(
    credentials: InstagramCredentials,
    containerId: string,
    signal?: AbortSignal
  ): Promise<string>;
  fetchPermalink(
    credentials: InstagramCredentials,
    postId: string,
    signal?: AbortSignal
  ): Promise<string | null>;
}

export type ResumableUploadState =
  | "CREATED"
  | "UPLOADING"
  | "FINISHED"
  | "ERROR"
  | "PUBLISHED";

export interface ResumableUploadOptions {
  retry: PublisherConfig["retry"];
  publishRetry: PublisherConfig["publishRetry"];
  poll: PollBudget;
  uploadSlots?: Semaphore;
  sleep?: Sleep;
}

// media_publish answers these while the container is still settling
const NOT_READY_CODES = new Set<string | number>([2207026, 2207027]);

const isNotReady = (error: unknown): boolean =>
  error instanceof ProtocolError &&
  error.remoteCode !== undefined &&
  NOT_READY_CODES.has(error.remoteCode);

/**
 * Drives a single-blob resumable upload from container creation to a
 * published post. Every step ends in a value or a PublishError.
 */
export class ResumableSingleShotUpload {
  constructor(
    private readonly api: ResumableUploadApi,
    private readonly options: ResumableUploadOptions
  ) {}

  async run(
    credentials: InstagramCredentials,
    bytes: Buffer,
    caption: string,
    signal?: AbortSignal
  ): Promise<PublishOutcome> {
    const containerId = await this.retrying("createContainer", signal, () =>
      this.api.createContainer(credentials, { caption, totalSize: bytes.length }, signal)
    );
    this.log(containerId, "CREATED");

    this.log(containerId, "UPLOADING", `${bytes.length} bytes`);
    const upload = () =>
      this.retrying("uploadBinary", signal, () =>
        this.api.uploadBinary(credentials, containerId, bytes, signal)
      );
    await (this.options.uploadSlots ? this.options.uploadSlots.use(upload) : upload());

    await this.waitUntilFinished(credentials, containerId, signal);
    this.log(containerId, "FINISHED");

    const { publishRetry } = this.options;
    const remotePostId = await withRetry(
      () => this.api.publish(credentials, containerId, signal),
      {
        maxAttempts: publishRetry.maxAttempts,
        baseDelayMs: publishRetry.delayMs,
        backoffFactor: 1,
        isRetryable: (error) => isRetryable(error) || isNotReady(error),
        onRetry: (attempt, error) =>
          console.warn(
            `[ResumableUpload] publish attempt ${attempt} for ${containerId} not accepted yet:`,
            error instanceof Error ? error.message : error
          ),
        sleep: this.options.sleep,
        signal,
      }
    );
    this.log(containerId, "PUBLISHED", `media ${remotePostId}`);

    return {
      remotePostId,
      permalink: await this.permalinkFor(credentials, remotePostId, signal),
    };
  }

  private async waitUntilFinished(
    credentials: InstagramCredentials,
    containerId: string,
    signal?: AbortSignal
  ): Promise<void> {
    const { poll } = this.options;

    await pollUntil<true>(
      // retries inside a poll draw on the same wait budget and deadline
      async (_attempt, scope) => {
        const result = await this.retrying(
          "pollStatus",
          scope.signal,
          () => this.api.pollStatus(credentials, containerId, scope.signal),
          scope.sleep
        );

        switch (result.status) {
          case "FINISHED":
          case "PUBLISHED":
            return { done: true, value: true };
          case "ERROR":
          case "EXPIRED":
            this.log(containerId, "ERROR", result.detail ?? result.status);
            throw new ProtocolError(
              `Container ${containerId} ended in ${result.status}${
                result.detail ? `: ${result.detail}` : ""
              }`,
              "pollStatus",
              result.status
            );
          default:
            return { done: false };
        }
      },
      {
        ...poll,
        sleep: this.options.sleep,
        signal,
        onTimeout: (attempts, waitedMs) =>
          new TimeoutError(
            `Container ${containerId} still processing after ${attempts} polls (${Math.round(
              waitedMs / 1000
            )}s)`,
            "pollStatus",
            waitedMs
          ),
      }
    );
  }

  /** The post is live at this point; a missing permalink is not a failure. */
  private async permalinkFor(
    credentials: InstagramCredentials,
    postId: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    try {
      return await this.retrying("fetchPermalink", signal, () =>
        this.api.fetchPermalink(credentials, postId, signal)
      );
    } catch (error) {
      if (!(error instanceof PublishError)) throw error;
      console.warn(`[ResumableUpload] permalink lookup for ${postId} failed: ${error.message}`);
      return null;
    }
  }

  private retrying<T>(
    step: PublishStep,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>,
    sleep: Sleep | undefined = this.options.sleep
  ): Promise<T> {
    const { retry } = this.options;
    return withRetry(fn, {
      ...retry,
      isRetryable,
      onRetry: (attempt, error, delayMs) =>
        console.warn(
          `[ResumableUpload] ${step} attempt ${attempt} failed, retrying in ${delayMs}ms:`,
          error instanceof Error ? error.message : error
        ),
      sleep,
      signal,
    });
  }

  private log(containerId: string, state: ResumableUploadState, detail?: string) {
    console.log(
      `[ResumableUpload] container ${containerId} -> ${state}${detail ? ` (${detail})` : ""}`
    );
  }
}
