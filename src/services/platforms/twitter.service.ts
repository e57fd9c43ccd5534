import axios, { AxiosRequestConfig } from "axios";
import { Client, auth } from "twitter-api-sdk";
import { z } from "zod";
import { TwitterCredentials } from "../credentials.service";
import { PublisherConfig } from "../../config/publisher.config";
import {
  ChunkedUploadApi,
  ProcessingInfo,
} from "../../uploads/chunkedMultipart.upload";
import {
  classifyHttpError,
  extractRemoteError,
  HttpClient,
  parseResponse,
  ProtocolError,
  PublishError,
  requestData,
  TransientNetworkError,
} from "./platformError";

const processingInfo = z.object({
  state: z.enum(["pending", "in_progress", "succeeded", "failed"]),
  check_after_secs: z.number().nonnegative().optional(),
  error: z.object({ message: z.string().optional(), name: z.string().optional() }).optional(),
});

// the v1.1 endpoint answers flat, the v2 one wraps the same fields in `data`
const mediaFields = z.object({
  id: z.string().optional(),
  media_id_string: z.string().optional(),
  processing_info: processingInfo.optional(),
});

const mediaResponse = z
  .union([z.object({ data: mediaFields }), mediaFields])
  .transform((body) => ("data" in body ? body.data : body));

const toProcessingInfo = (
  info: z.infer<typeof processingInfo> | undefined
): ProcessingInfo | null =>
  info
    ? {
        state: info.state,
        checkAfterSecs: info.check_after_secs,
        error: info.error?.message ?? info.error?.name,
      }
    : null;

/** Command-based chunked media upload (INIT / APPEND / FINALIZE / STATUS). */
export class TwitterMediaClient implements ChunkedUploadApi {
  constructor(
    private readonly uploadUrl: string,
    private readonly timeouts: PublisherConfig["http"],
    private readonly http: HttpClient = axios
  ) {}

  async init(
    { accessToken }: TwitterCredentials,
    request: { totalBytes: number; mediaType: string; mediaCategory: string },
    signal?: AbortSignal
  ): Promise<string> {
    const form = new URLSearchParams({
      command: "INIT",
      total_bytes: String(request.totalBytes),
      media_type: request.mediaType,
      media_category: request.mediaCategory,
    });
    const body = await requestData("init", () =>
      this.http.post(this.uploadUrl, form, this.requestConfig(accessToken, signal))
    );

    const media = parseResponse(mediaResponse, body, "init");
    const mediaId = media.media_id_string ?? media.id;
    if (!mediaId) {
      throw new ProtocolError("init: response carried no media id", "init");
    }
    return mediaId;
  }

  async appendChunk(
    { accessToken }: TwitterCredentials,
    mediaId: string,
    segmentIndex: number,
    chunk: Buffer,
    signal?: AbortSignal
  ): Promise<void> {
    const form = new FormData();
    form.append("command", "APPEND");
    form.append("media_id", mediaId);
    form.append("segment_index", String(segmentIndex));
    form.append("media", new Blob([chunk]), `segment-${segmentIndex}`);

    await requestData("appendChunk", () =>
      this.http.post(this.uploadUrl, form, {
        ...this.requestConfig(accessToken, signal),
        maxBodyLength: Infinity,
        timeout: this.timeouts.uploadTimeoutMs,
      })
    );
  }

  async finalize(
    { accessToken }: TwitterCredentials,
    mediaId: string,
    signal?: AbortSignal
  ): Promise<ProcessingInfo | null> {
    const form = new URLSearchParams({ command: "FINALIZE", media_id: mediaId });
    const body = await requestData("finalize", () =>
      this.http.post(this.uploadUrl, form, this.requestConfig(accessToken, signal))
    );
    return toProcessingInfo(parseResponse(mediaResponse, body, "finalize").processing_info);
  }

  async pollStatus(
    { accessToken }: TwitterCredentials,
    mediaId: string,
    signal?: AbortSignal
  ): Promise<ProcessingInfo | null> {
    const body = await requestData("pollStatus", () =>
      this.http.get(this.uploadUrl, {
        ...this.requestConfig(accessToken, signal),
        params: { command: "STATUS", media_id: mediaId },
      })
    );
    return toProcessingInfo(parseResponse(mediaResponse, body, "pollStatus").processing_info);
  }

  private requestConfig(accessToken: string, signal?: AbortSignal): AxiosRequestConfig {
    return {
      headers: { Authorization: `Bearer ${accessToken}` },
      timeout: this.timeouts.timeoutMs,
      signal,
    };
  }
}

export interface TweetRequest {
  text: string;
  media?: { media_ids: string[] };
  reply?: { in_reply_to_tweet_id: string };
}

/** The part of the SDK's tweets API the publisher calls. */
export interface TweetCreator {
  createTweet(request: TweetRequest): Promise<unknown>;
}

export type TweetCreatorFactory = (accessToken: string) => TweetCreator;

export const sdkTweetCreator: TweetCreatorFactory = (accessToken) =>
  new Client(new auth.OAuth2Bearer(accessToken)).tweets;

const createTweetResponse = z.object({
  data: z.object({ id: z.string(), text: z.string().optional() }),
});

// shape of the SDK's TwitterResponseError
const sdkErrorShape = z.object({
  status: z.number(),
  statusText: z.string().optional(),
  error: z.unknown().optional(),
});

export interface CreatePostInput {
  text: string;
  mediaIds?: string[];
  replyToPostId?: string | null;
}

export interface CreatedPost {
  id: string;
  url: string;
}

/** Text post creation through twitter-api-sdk. */
export class TwitterTextClient {
  constructor(
    private readonly statusBaseUrl: string,
    private readonly createClient: TweetCreatorFactory = sdkTweetCreator
  ) {}

  async createPost(
    { accessToken }: TwitterCredentials,
    { text, mediaIds, replyToPostId }: CreatePostInput
  ): Promise<CreatedPost> {
    const request: TweetRequest = { text };
    if (mediaIds?.length) request.media = { media_ids: mediaIds };
    if (replyToPostId) request.reply = { in_reply_to_tweet_id: replyToPostId };

    let body: unknown;
    try {
      body = await this.createClient(accessToken).createTweet(request);
    } catch (error) {
      throw classifySdkError(error);
    }

    const { id } = parseResponse(createTweetResponse, body, "createPost").data;
    return { id, url: `${this.statusBaseUrl}/i/web/status/${id}` };
  }
}

export function classifySdkError(error: unknown): PublishError {
  const parsed = sdkErrorShape.safeParse(error);
  if (!parsed.success) return classifyHttpError(error, "createPost");

  const { status, error: remoteBody } = parsed.data;
  const remote = extractRemoteError(remoteBody);
  const message = `createPost: HTTP ${status} ${remote?.message ?? parsed.data.statusText ?? ""}`.trim();

  if (status >= 500 || status === 429) {
    return new TransientNetworkError(message, "createPost", status);
  }
  return new ProtocolError(message, "createPost", remote?.code ?? status);
}
