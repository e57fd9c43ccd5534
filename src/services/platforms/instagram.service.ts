import axios from "axios";
import { z } from "zod";
import { InstagramCredentials } from "../credentials.service";
import {
  ContainerStatus,
  ContainerStatusResult,
  ResumableUploadApi,
} from "../../uploads/resumableSingleShot.upload";
import { PublisherConfig } from "../../config/publisher.config";
import { HttpClient, parseResponse, ProtocolError, requestData } from "./platformError";

const idResponse = z.object({ id: z.string() });

const statusResponse = z.object({
  status_code: z.string().optional(),
  status: z.string().optional(),
});

const permalinkResponse = z.object({ permalink: z.string().url().optional() });

const uploadResponse = z.object({
  success: z.boolean().optional(),
  debug_info: z.object({ message: z.string().optional() }).passthrough().optional(),
});

const KNOWN_STATUSES: readonly ContainerStatus[] = [
  "IN_PROGRESS",
  "FINISHED",
  "ERROR",
  "EXPIRED",
  "PUBLISHED",
];

const toContainerStatus = (code: string | undefined): ContainerStatus =>
  KNOWN_STATUSES.find((status) => status === code) ?? "IN_PROGRESS";

/**
 * Instagram Graph API reel publishing over the resumable upload endpoint.
 */
export class InstagramGraphClient implements ResumableUploadApi {
  constructor(
    private readonly urls: PublisherConfig["instagram"],
    private readonly timeouts: PublisherConfig["http"],
    private readonly http: HttpClient = axios
  ) {}

  async createContainer(
    { igUserId, accessToken }: InstagramCredentials,
    { caption }: { caption: string; totalSize: number },
    signal?: AbortSignal
  ): Promise<string> {
    const body = await requestData("createContainer", () =>
      this.http.post(`${this.urls.graphBaseUrl}/${igUserId}/media`, null, {
        params: {
          media_type: "REELS",
          upload_type: "resumable",
          caption,
          access_token: accessToken,
        },
        timeout: this.timeouts.timeoutMs,
        signal,
      })
    );
    return parseResponse(idResponse, body, "createContainer").id;
  }

  async uploadBinary(
    { accessToken }: InstagramCredentials,
    containerId: string,
    bytes: Buffer,
    signal?: AbortSignal
  ): Promise<void> {
    const body = await requestData("uploadBinary", () =>
      this.http.post(`${this.urls.uploadBaseUrl}/${containerId}`, bytes, {
        headers: {
          Authorization: `OAuth ${accessToken}`,
          offset: "0",
          file_size: String(bytes.length),
          "Content-Type": "application/octet-stream",
        },
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        timeout: this.timeouts.uploadTimeoutMs,
        signal,
      })
    );

    const result = parseResponse(uploadResponse, body, "uploadBinary");
    if (result.success === false) {
      throw new ProtocolError(
        `uploadBinary: rejected${result.debug_info?.message ? ` (${result.debug_info.message})` : ""}`,
        "uploadBinary"
      );
    }
  }

  async pollStatus(
    { accessToken }: InstagramCredentials,
    containerId: string,
    signal?: AbortSignal
  ): Promise<ContainerStatusResult> {
    const body = await requestData("pollStatus", () =>
      this.http.get(`${this.urls.graphBaseUrl}/${containerId}`, {
        params: { fields: "status_code,status", access_token: accessToken },
        timeout: this.timeouts.timeoutMs,
        signal,
      })
    );
    const result = parseResponse(statusResponse, body, "pollStatus");
    return { status: toContainerStatus(result.status_code), detail: result.status };
  }

  async publish(
    { igUserId, accessToken }: InstagramCredentials,
    containerId: string,
    signal?: AbortSignal
  ): Promise<string> {
    const body = await requestData("publish", () =>
      this.http.post(`${this.urls.graphBaseUrl}/${igUserId}/media_publish`, null, {
        params: { creation_id: containerId, access_token: accessToken },
        timeout: this.timeouts.timeoutMs,
        signal,
      })
    );
    return parseResponse(idResponse, body, "publish").id;
  }

  async fetchPermalink(
    { accessToken }: InstagramCredentials,
    postId: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    const body = await requestData("fetchPermalink", () =>
      this.http.get(`${this.urls.graphBaseUrl}/${postId}`, {
        params: { fields: "permalink", access_token: accessToken },
        timeout: this.timeouts.timeoutMs,
        signal,
      })
    );
    return parseResponse(permalinkResponse, body, "fetchPermalink").permalink ?? null;
  }
}
