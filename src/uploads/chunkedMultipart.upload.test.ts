import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import {
  ChunkedMultipartUpload,
  ChunkedUploadApi,
  ChunkedUploadOptions,
  splitIntoChunks,
} from "./chunkedMultipart.upload";
import {
  ProtocolError,
  TimeoutError,
  TransientNetworkError,
} from "../services/platforms/platformError";

const creds = { accessToken: "test-token" };

function fakeApi(): { [K in keyof ChunkedUploadApi]: Mock<ChunkedUploadApi[K]> } {
  return {
    init: vi.fn<ChunkedUploadApi["init"]>(async () => "media-1"),
    appendChunk: vi.fn<ChunkedUploadApi["appendChunk"]>(async () => undefined),
    finalize: vi.fn<ChunkedUploadApi["finalize"]>(async () => null),
    pollStatus: vi.fn<ChunkedUploadApi["pollStatus"]>(async () => null),
  };
}

function setup(overrides: Partial<ChunkedUploadOptions> = {}) {
  const api = fakeApi();
  const delays: number[] = [];
  const options: ChunkedUploadOptions = {
    retry: { maxAttempts: 3, baseDelayMs: 100, backoffFactor: 2, maxDelayMs: 1000 },
    poll: { intervalMs: 5000, maxAttempts: 120, maxWaitMs: 600_000, minIntervalMs: 1000 },
    chunkSizeBytes: 4,
    sleep: async (ms) => {
      delays.push(ms);
    },
    ...overrides,
  };
  return { api, delays, upload: new ChunkedMultipartUpload(api, options) };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("splitIntoChunks", () => {
  it("keeps the tail chunk short", () => {
    const chunks = splitIntoChunks(Buffer.from("abcdefghij"), 4);
    expect(chunks.map((c) => c.toString())).toEqual(["abcd", "efgh", "ij"]);
  });
});

describe("ChunkedMultipartUpload", () => {
  it("appends every segment in order and skips polling when finalize reports ready", async () => {
    const { api, upload } = setup();

    const mediaId = await upload.run(creds, Buffer.from("abcdefghij"));

    expect(mediaId).toBe("media-1");
    expect(api.init).toHaveBeenCalledWith(
      creds,
      { totalBytes: 10, mediaType: "video/mp4", mediaCategory: "tweet_video" },
      undefined
    );
    expect(api.appendChunk.mock.calls.map(([, , index, chunk]) => [index, chunk.toString()])).toEqual([
      [0, "abcd"],
      [1, "efgh"],
      [2, "ij"],
    ]);
    expect(api.pollStatus).not.toHaveBeenCalled();
  });

  it("retries a transient chunk failure without reordering", async () => {
    const { api, delays, upload } = setup();
    api.appendChunk
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new TransientNetworkError("reset", "appendChunk"));

    await upload.run(creds, Buffer.from("abcdefgh"));

    expect(api.appendChunk.mock.calls.map(([, , index]) => index)).toEqual([0, 1, 1]);
    expect(delays).toEqual([100]);
  });

  it("aborts on a permanent chunk rejection", async () => {
    const { api, upload } = setup();
    api.appendChunk.mockRejectedValue(new ProtocolError("HTTP 400 bad segment", "appendChunk"));

    await expect(upload.run(creds, Buffer.from("abcdefgh"))).rejects.toThrow("bad segment");
    expect(api.appendChunk).toHaveBeenCalledTimes(1);
    expect(api.finalize).not.toHaveBeenCalled();
  });

  it("follows the server's check_after hint until processing succeeds", async () => {
    const { api, delays, upload } = setup();
    api.finalize.mockResolvedValue({ state: "pending", checkAfterSecs: 1 });
    api.pollStatus
      .mockResolvedValueOnce({ state: "in_progress", checkAfterSecs: 3 })
      .mockResolvedValueOnce({ state: "succeeded" });

    await expect(upload.run(creds, Buffer.from("abc"))).resolves.toBe("media-1");
    expect(delays).toEqual([1000, 3000]);
  });

  it("fails when remote processing fails", async () => {
    const { api, upload } = setup();
    api.finalize.mockResolvedValue({ state: "in_progress" });
    api.pollStatus.mockResolvedValue({ state: "failed", error: "InvalidMedia" });

    await expect(upload.run(creds, Buffer.from("abc"))).rejects.toThrow(
      "Media media-1 processing failed: InvalidMedia"
    );
  });

  it("times out after 120 polls when processing never finishes", async () => {
    const { api, delays, upload } = setup();
    api.finalize.mockResolvedValue({ state: "in_progress", checkAfterSecs: 5 });
    api.pollStatus.mockResolvedValue({ state: "in_progress", checkAfterSecs: 5 });

    const error = await upload.run(creds, Buffer.from("abc")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({
      message: "Media media-1 still processing after 120 polls (600s)",
      waitedMs: 600_000,
    });
    expect(api.pollStatus).toHaveBeenCalledTimes(120);
    expect(delays.reduce((a, b) => a + b, 0)).toBe(600_000);
  });

  it("counts retry backoff inside a poll against the processing budget", async () => {
    const { api, delays, upload } = setup({
      retry: { maxAttempts: 3, baseDelayMs: 2000, backoffFactor: 2, maxDelayMs: 30_000 },
    });
    api.finalize.mockResolvedValue({ state: "in_progress" });
    let calls = 0;
    api.pollStatus.mockImplementation(async () => {
      calls++;
      if (calls % 3 !== 0) throw new TransientNetworkError("HTTP 503", "pollStatus", 503);
      return { state: "in_progress" };
    });

    const error = await upload.run(creds, Buffer.from("abc")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({
      message: "Media media-1 still processing after 55 polls (599s)",
      waitedMs: 599_000,
    });
    expect(api.pollStatus).toHaveBeenCalledTimes(163);
    expect(delays.reduce((a, b) => a + b, 0)).toBe(599_000);
  });

  it("gives up on a status request that never answers once the deadline passes", async () => {
    const { api, upload } = setup({
      poll: { intervalMs: 10, maxAttempts: 120, maxWaitMs: 50, minIntervalMs: 0 },
    });
    api.finalize.mockResolvedValue({ state: "in_progress" });
    api.pollStatus.mockImplementation(() => new Promise(() => {}));

    const error = await upload.run(creds, Buffer.from("abc")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ step: "pollStatus" });
    expect(api.pollStatus).toHaveBeenCalledTimes(1);
    expect(api.pollStatus.mock.calls[0][2]?.aborted).toBe(true);
  });

  it("rejects an empty payload before calling the remote", async () => {
    const { api, upload } = setup();

    await expect(upload.run(creds, Buffer.alloc(0))).rejects.toBeInstanceOf(ProtocolError);
    expect(api.init).not.toHaveBeenCalled();
  });
});
