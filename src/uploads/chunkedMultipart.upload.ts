import { TwitterCredentials } from "../services/credentials.service";
import {
  isRetryable,
  ProtocolError,
  PublishStep,
  TimeoutError,
} from "../services/platforms/platformError";
import { PollBudget, PublisherConfig } from "../config/publisher.config";
import { Semaphore } from "../utils/concurrency";
import { PollResult, pollUntil, Sleep, withRetry } from "../utils/retry";

export type ProcessingState = "pending" | "in_progress" | "succeeded" | "failed";

export interface ProcessingInfo {
  state: ProcessingState;
  checkAfterSecs?: number;
  error?: string;
}

/**
 * Command-style chunked media endpoint. `finalize` and `pollStatus` return
 * null when the response carries no processing info, i.e. the media is ready.
 */
export interface ChunkedUploadApi {
  init(
    credentials: TwitterCredentials,
    request: { totalBytes: number; mediaType: string; mediaCategory: string },
    signal?: AbortSignal
  ): Promise<string>;
  appendChunk(
    credentials: TwitterCredentials,
    mediaId: string,
    segmentIndex: number,
    chunk: Buffer,
    signal?: AbortSignal
  ): Promise<void>;
  finalize(
    credentials: TwitterCredentials,
    mediaId: string,
    signal?: AbortSignal
  ): Promise<ProcessingInfo | null>;
  pollStatus(
    credentials: TwitterCredentials,
    mediaId: string,
    signal?: AbortSignal
  ): Promise<ProcessingInfo | null>;
}

export type ChunkedUploadState =
  | "INIT"
  | "APPENDING"
  | "FINALIZING"
  | "PROCESSING"
  | "SUCCEEDED"
  | "FAILED";

export interface ChunkedUploadOptions {
  retry: PublisherConfig["retry"];
  poll: PollBudget;
  chunkSizeBytes: number;
  mediaType?: string;
  mediaCategory?: string;
  uploadSlots?: Semaphore;
  sleep?: Sleep;
}

export function splitIntoChunks(bytes: Buffer, chunkSize: number): Buffer[] {
  if (chunkSize < 1) throw new RangeError(`Invalid chunk size ${chunkSize}`);
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < bytes.length; offset += chunkSize) {
    chunks.push(bytes.subarray(offset, offset + chunkSize));
  }
  return chunks;
}

/**
 * INIT, ordered APPENDs, FINALIZE, then STATUS polling until the media is
 * usable. Resolves with the media id to attach to a post.
 */
export class ChunkedMultipartUpload {
  constructor(
    private readonly api: ChunkedUploadApi,
    private readonly options: ChunkedUploadOptions
  ) {}

  async run(
    credentials: TwitterCredentials,
    bytes: Buffer,
    signal?: AbortSignal
  ): Promise<string> {
    const chunks = splitIntoChunks(bytes, this.options.chunkSizeBytes);
    if (chunks.length === 0) {
      throw new ProtocolError("Refusing to upload an empty media payload", "init");
    }

    const mediaId = await this.retrying("init", signal, () =>
      this.api.init(
        credentials,
        {
          totalBytes: bytes.length,
          mediaType: this.options.mediaType ?? "video/mp4",
          mediaCategory: this.options.mediaCategory ?? "tweet_video",
        },
        signal
      )
    );
    this.log(mediaId, "INIT", `${bytes.length} bytes in ${chunks.length} chunks`);

    this.log(mediaId, "APPENDING");
    const appendAll = async () => {
      // strictly in order: the remote side assembles segments as they arrive
      for (const [index, chunk] of chunks.entries()) {
        await this.retrying("appendChunk", signal, () =>
          this.api.appendChunk(credentials, mediaId, index, chunk, signal)
        );
      }
    };
    await (this.options.uploadSlots ? this.options.uploadSlots.use(appendAll) : appendAll());

    this.log(mediaId, "FINALIZING");
    const finalized = await this.retrying("finalize", signal, () =>
      this.api.finalize(credentials, mediaId, signal)
    );

    const initial = this.interpret(mediaId, finalized);
    if (!initial.done) {
      this.log(mediaId, "PROCESSING");
      await this.waitForProcessing(credentials, mediaId, initial.retryAfterMs, signal);
    }

    this.log(mediaId, "SUCCEEDED");
    return mediaId;
  }

  private waitForProcessing(
    credentials: TwitterCredentials,
    mediaId: string,
    initialDelayMs: number | undefined,
    signal?: AbortSignal
  ): Promise<true> {
    const { poll } = this.options;

    return pollUntil<true>(
      // retries inside a poll draw on the same wait budget and deadline
      async (_attempt, scope) => {
        const info = await this.retrying(
          "pollStatus",
          scope.signal,
          () => this.api.pollStatus(credentials, mediaId, scope.signal),
          scope.sleep
        );
        return this.interpret(mediaId, info);
      },
      {
        ...poll,
        initialDelayMs: initialDelayMs ?? poll.intervalMs,
        sleep: this.options.sleep,
        signal,
        onTimeout: (attempts, waitedMs) => {
          this.log(mediaId, "FAILED", "processing timeout");
          return new TimeoutError(
            `Media ${mediaId} still processing after ${attempts} polls (${Math.round(
              waitedMs / 1000
            )}s)`,
            "pollStatus",
            waitedMs
          );
        },
      }
    );
  }

  private interpret(mediaId: string, info: ProcessingInfo | null): PollResult<true> {
    if (!info || info.state === "succeeded") return { done: true, value: true };

    if (info.state === "failed") {
      this.log(mediaId, "FAILED", info.error);
      throw new ProtocolError(
        `Media ${mediaId} processing failed${info.error ? `: ${info.error}` : ""}`,
        "pollStatus"
      );
    }

    return {
      done: false,
      retryAfterMs:
        info.checkAfterSecs === undefined ? undefined : info.checkAfterSecs * 1000,
    };
  }

  private retrying<T>(
    step: PublishStep,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>,
    sleep: Sleep | undefined = this.options.sleep
  ): Promise<T> {
    return withRetry(fn, {
      ...this.options.retry,
      isRetryable,
      onRetry: (attempt, error, delayMs) =>
        console.warn(
          `[ChunkedUpload] ${step} attempt ${attempt} failed, retrying in ${delayMs}ms:`,
          error instanceof Error ? error.message : error
        ),
      sleep,
      signal,
    });
  }

  private log(mediaId: string, state: ChunkedUploadState, detail?: string) {
    console.log(`[ChunkedUpload] media ${mediaId} -> ${state}${detail ? ` (${detail})` : ""}`);
  }
}
