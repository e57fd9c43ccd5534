import { describe, expect, it, vi } from "vitest";
import { TweetCreator, TwitterMediaClient, TwitterTextClient } from "./twitter.service";
import { HttpClient, ProtocolError, TransientNetworkError } from "./platformError";

const creds = { accessToken: "test-token" };
const UPLOAD_URL = "https://upload.test/media/upload";
const timeouts = { timeoutMs: 30_000, uploadTimeoutMs: 300_000 };

function fakeHttp() {
  return {
    get: vi.fn<HttpClient["get"]>(async () => ({ data: {} })),
    post: vi.fn<HttpClient["post"]>(async () => ({ data: {} })),
  };
}

describe("TwitterMediaClient", () => {
  it("sends INIT as a form and reads a v1.1 media id", async () => {
    const http = fakeHttp();
    http.post.mockResolvedValue({ data: { media_id_string: "710511363345354753" } });
    const client = new TwitterMediaClient(UPLOAD_URL, timeouts, http);

    const mediaId = await client.init(creds, {
      totalBytes: 1024,
      mediaType: "video/mp4",
      mediaCategory: "tweet_video",
    });

    expect(mediaId).toBe("710511363345354753");
    const [url, body, config] = http.post.mock.calls[0];
    expect(url).toBe(UPLOAD_URL);
    expect(String(body)).toBe(
      "command=INIT&total_bytes=1024&media_type=video%2Fmp4&media_category=tweet_video"
    );
    expect(config).toEqual({ headers: { Authorization: "Bearer test-token" }, timeout: 30_000 });
  });

  it("reads a wrapped media id", async () => {
    const http = fakeHttp();
    http.post.mockResolvedValue({ data: { data: { id: "99" } } });
    const client = new TwitterMediaClient(UPLOAD_URL, timeouts, http);

    await expect(
      client.init(creds, { totalBytes: 1, mediaType: "video/mp4", mediaCategory: "tweet_video" })
    ).resolves.toBe("99");
  });

  it("tags each APPEND with its segment index", async () => {
    const http = fakeHttp();
    const client = new TwitterMediaClient(UPLOAD_URL, timeouts, http);

    await client.appendChunk(creds, "99", 3, Buffer.from("abc"));

    const [, body, config] = http.post.mock.calls[0];
    expect(config).toMatchObject({ timeout: 300_000 });
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    expect(body.get("command")).toBe("APPEND");
    expect(body.get("media_id")).toBe("99");
    expect(body.get("segment_index")).toBe("3");
  });

  it("reports no processing info as ready", async () => {
    const http = fakeHttp();
    http.post.mockResolvedValue({ data: { media_id_string: "99" } });
    const client = new TwitterMediaClient(UPLOAD_URL, timeouts, http);

    await expect(client.finalize(creds, "99")).resolves.toBeNull();
  });

  it("maps STATUS processing info", async () => {
    const http = fakeHttp();
    http.get.mockResolvedValue({
      data: {
        media_id_string: "99",
        processing_info: { state: "failed", error: { message: "Unsupported codec" } },
      },
    });
    const client = new TwitterMediaClient(UPLOAD_URL, timeouts, http);

    await expect(client.pollStatus(creds, "99")).resolves.toEqual({
      state: "failed",
      checkAfterSecs: undefined,
      error: "Unsupported codec",
    });
    expect(http.get).toHaveBeenCalledWith(UPLOAD_URL, {
      params: { command: "STATUS", media_id: "99" },
      headers: { Authorization: "Bearer test-token" },
      timeout: 30_000,
    });
  });
});

describe("TwitterTextClient", () => {
  const setup = () => {
    const createTweet = vi.fn<TweetCreator["createTweet"]>(async () => ({
      data: { id: "1790000000000000001", text: "hello" },
    }));
    const factory = vi.fn((_token: string): TweetCreator => ({ createTweet }));
    return { createTweet, factory, client: new TwitterTextClient("https://x.test", factory) };
  };

  it("posts plain text with the account token", async () => {
    const { createTweet, factory, client } = setup();

    const post = await client.createPost(creds, { text: "hello" });

    expect(factory).toHaveBeenCalledWith("test-token");
    expect(createTweet).toHaveBeenCalledWith({ text: "hello" });
    expect(post).toEqual({
      id: "1790000000000000001",
      url: "https://x.test/i/web/status/1790000000000000001",
    });
  });

  it("attaches media and a reply target when given", async () => {
    const { createTweet, client } = setup();

    await client.createPost(creds, {
      text: "clip",
      mediaIds: ["99"],
      replyToPostId: "1780000000000000000",
    });

    expect(createTweet).toHaveBeenCalledWith({
      text: "clip",
      media: { media_ids: ["99"] },
      reply: { in_reply_to_tweet_id: "1780000000000000000" },
    });
  });

  it("classifies SDK errors by status", async () => {
    const { createTweet, client } = setup();
    createTweet
      .mockRejectedValueOnce(
        Object.assign(new Error("Too Many Requests"), { status: 429, statusText: "Too Many Requests" })
      )
      .mockRejectedValueOnce(
        Object.assign(new Error("Forbidden"), {
          status: 403,
          error: { detail: "You are not allowed to create a Tweet with duplicate content." },
        })
      );

    await expect(client.createPost(creds, { text: "a" })).rejects.toBeInstanceOf(
      TransientNetworkError
    );
    const error = await client.createPost(creds, { text: "a" }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({
      message: "createPost: HTTP 403 You are not allowed to create a Tweet with duplicate content.",
      remoteCode: 403,
    });
  });
});
