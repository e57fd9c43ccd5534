import { describe, expect, it, vi } from "vitest";
import { MongoNetworkError, MongoServerError, ObjectId, WithId } from "mongodb";
import {
  ScheduledPostCollection,
  ScheduledPostDocument,
  ScheduledPostRepository,
} from "./scheduledPost.repository";
import {
  InvalidStateError,
  NotFoundError,
  SlotTakenError,
  StoreUnavailableError,
  ValidationError,
} from "../utils/httpError";

const NOW = new Date("2026-05-04T08:00:00.000Z");
const ID = new ObjectId("665f1c2e8b3e4a0012345678");

const makeDoc = (
  overrides: Partial<ScheduledPostDocument> = {}
): WithId<ScheduledPostDocument> => ({
  _id: ID,
  platform: "text_only",
  accountRef: "acct-a",
  mediaRef: null,
  caption: "hello",
  replyToPostId: null,
  scheduledTime: new Date("2026-05-04T08:30:00.000Z"),
  status: "pending",
  claimedAt: null,
  postedAt: null,
  remotePostId: null,
  permalink: null,
  errorDetail: null,
  createdAt: NOW,
  updatedAt: NOW,
  ...overrides,
});

function fakeCollection() {
  const toArray = vi.fn<() => Promise<WithId<ScheduledPostDocument>[]>>();
  const collection = {
    insertOne: vi.fn<ScheduledPostCollection["insertOne"]>(),
    findOne: vi.fn<ScheduledPostCollection["findOne"]>(),
    find: vi.fn<ScheduledPostCollection["find"]>(() => ({ toArray })),
    findOneAndUpdate: vi.fn<ScheduledPostCollection["findOneAndUpdate"]>(),
    findOneAndDelete: vi.fn<ScheduledPostCollection["findOneAndDelete"]>(),
    createIndex: vi.fn<ScheduledPostCollection["createIndex"]>(),
  } satisfies ScheduledPostCollection;
  return { collection, toArray };
}

describe("ScheduledPostRepository", () => {
  it("inserts a validated pending record and returns its hex id", async () => {
    const { collection } = fakeCollection();
    collection.insertOne.mockImplementation(async (doc) => ({
      acknowledged: true,
      insertedId: doc._id,
    }));
    const repo = new ScheduledPostRepository(collection, () => NOW);

    const id = await repo.insert({
      platform: "text_only",
      accountRef: "acct-a",
      caption: "hello",
      scheduledTime: new Date("2026-05-04T08:30:00.000Z"),
    });

    const [doc] = collection.insertOne.mock.calls[0];
    expect(id).toBe(doc._id.toHexString());
    expect(doc.status).toBe("pending");
    expect(doc.mediaRef).toBeNull();
    expect(doc.createdAt).toEqual(NOW);
  });

  it("rejects a video_attached post without media before touching the collection", async () => {
    const { collection } = fakeCollection();
    const repo = new ScheduledPostRepository(collection, () => NOW);

    await expect(
      repo.insert({
        platform: "video_attached",
        accountRef: "acct-a",
        mediaRef: null,
        caption: "clip",
        scheduledTime: NOW,
      })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(collection.insertOne).not.toHaveBeenCalled();
  });

  it("maps a duplicate-key insert onto SlotTakenError", async () => {
    const { collection } = fakeCollection();
    collection.insertOne.mockRejectedValue(
      new MongoServerError({ message: "E11000 duplicate key", code: 11000 })
    );
    const repo = new ScheduledPostRepository(collection, () => NOW);

    await expect(
      repo.insert({
        platform: "text_only",
        accountRef: "acct-a",
        caption: "hello",
        scheduledTime: NOW,
      })
    ).rejects.toBeInstanceOf(SlotTakenError);
  });

  it("queries due posts oldest first", async () => {
    const { collection, toArray } = fakeCollection();
    toArray.mockResolvedValue([makeDoc()]);
    const repo = new ScheduledPostRepository(collection, () => NOW);

    const due = await repo.queryDue(NOW);

    expect(collection.find).toHaveBeenCalledWith(
      { status: "pending", scheduledTime: { $lte: NOW } },
      { sort: { scheduledTime: 1, createdAt: 1 } }
    );
    expect(due).toHaveLength(1);
    expect(due[0].id).toBe("665f1c2e8b3e4a0012345678");
  });

  it("claims with a filter on the pending status", async () => {
    const { collection } = fakeCollection();
    collection.findOneAndUpdate.mockResolvedValueOnce(makeDoc({ status: "processing" }));
    collection.findOneAndUpdate.mockResolvedValueOnce(null);
    const repo = new ScheduledPostRepository(collection, () => NOW);

    expect(await repo.claim(ID.toHexString(), NOW)).toBe(true);
    expect(await repo.claim(ID.toHexString(), NOW)).toBe(false);
    expect(collection.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: ID, status: "pending" },
      { $set: { status: "processing", claimedAt: NOW, updatedAt: NOW } },
      { returnDocument: "after" }
    );
  });

  it("never claims an id that is not an ObjectId", async () => {
    const { collection } = fakeCollection();
    const repo = new ScheduledPostRepository(collection, () => NOW);

    expect(await repo.claim("post_17")).toBe(false);
    expect(collection.findOneAndUpdate).not.toHaveBeenCalled();
  });

  it("reports InvalidStateError when markPosted finds a posted record", async () => {
    const { collection } = fakeCollection();
    collection.findOneAndUpdate.mockResolvedValue(null);
    collection.findOne.mockResolvedValue(makeDoc({ status: "posted" }));
    const repo = new ScheduledPostRepository(collection, () => NOW);

    const error = await repo.markPosted(ID.toHexString(), NOW).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidStateError);
    expect(error).toMatchObject({ currentStatus: "posted", statusCode: 409 });
  });

  it("reports NotFoundError when the post is gone", async () => {
    const { collection } = fakeCollection();
    collection.findOneAndDelete.mockResolvedValue(null);
    collection.findOne.mockResolvedValue(null);
    const repo = new ScheduledPostRepository(collection, () => NOW);

    await expect(repo.cancel(ID.toHexString())).rejects.toBeInstanceOf(NotFoundError);
    expect(collection.findOneAndDelete).toHaveBeenCalledWith({ _id: ID, status: "pending" });
  });

  it("truncates the failure detail to 500 characters", async () => {
    const { collection } = fakeCollection();
    collection.findOneAndUpdate.mockResolvedValue(makeDoc({ status: "failed" }));
    const repo = new ScheduledPostRepository(collection, () => NOW);

    await repo.markFailed(ID.toHexString(), "x".repeat(900));

    const [, update] = collection.findOneAndUpdate.mock.calls[0];
    expect(update.$set?.errorDetail).toBe(`${"x".repeat(497)}...`);
  });

  it("reads the chain tail from pending and processing posts", async () => {
    const { collection } = fakeCollection();
    const tail = new Date("2026-05-04T13:30:00.000Z");
    collection.findOne.mockResolvedValue(makeDoc({ scheduledTime: tail }));
    const repo = new ScheduledPostRepository(collection, () => NOW);

    expect(await repo.latestScheduledTime("acct-a")).toEqual(tail);
    expect(collection.findOne).toHaveBeenCalledWith(
      { accountRef: "acct-a", status: { $in: ["pending", "processing"] } },
      { sort: { scheduledTime: -1 }, projection: { scheduledTime: 1 } }
    );
  });

  it("turns a network failure into StoreUnavailableError", async () => {
    const { collection, toArray } = fakeCollection();
    toArray.mockRejectedValue(new MongoNetworkError("connection reset"));
    const repo = new ScheduledPostRepository(collection, () => NOW);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(repo.queryDue(NOW)).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});
