import { describe, expect, it } from "vitest";
import { InMemoryScheduleStore } from "./scheduledPost.memoryStore";
import { InvalidStateError, NotFoundError, SlotTakenError } from "../utils/httpError";

const NOW = new Date("2026-05-04T08:00:00.000Z");
const at = (iso: string) => new Date(iso);

const textPost = (scheduledTime: Date, accountRef = "acct-a") => ({
  platform: "text_only" as const,
  accountRef,
  caption: "hello",
  scheduledTime,
});

describe("InMemoryScheduleStore", () => {
  it("lets exactly one of many concurrent claims win", async () => {
    const store = new InMemoryScheduleStore(() => NOW);
    const id = await store.insert(textPost(at("2026-05-04T07:00:00.000Z")));

    const results = await Promise.all(
      Array.from({ length: 10 }, () => store.claim(id, NOW))
    );

    expect(results.filter(Boolean)).toHaveLength(1);
    expect((await store.findById(id))?.status).toBe("processing");
  });

  it("returns due posts oldest first and leaves future ones out", async () => {
    const store = new InMemoryScheduleStore(() => NOW);
    const later = await store.insert(textPost(at("2026-05-04T07:30:00.000Z")));
    const earlier = await store.insert(textPost(at("2026-05-04T03:30:00.000Z"), "acct-b"));
    await store.insert(textPost(at("2026-05-04T13:30:00.000Z")));

    const due = await store.queryDue(NOW);

    expect(due.map((p) => p.id)).toEqual([earlier, later]);
  });

  it("moves through processing to posted and then refuses further transitions", async () => {
    const store = new InMemoryScheduleStore(() => NOW);
    const id = await store.insert(textPost(at("2026-05-04T07:00:00.000Z")));

    await store.claim(id);
    const posted = await store.markPosted(id, NOW, {
      remotePostId: "1790000000000000000",
      permalink: null,
    });

    expect(posted.status).toBe("posted");
    expect(posted.postedAt).toEqual(NOW);
    expect(posted.remotePostId).toBe("1790000000000000000");
    await expect(store.markFailed(id, "late")).rejects.toBeInstanceOf(InvalidStateError);
    await expect(store.reschedule(id, NOW)).rejects.toBeInstanceOf(InvalidStateError);
    expect(await store.claim(id)).toBe(false);
  });

  it("requires processing before markPosted", async () => {
    const store = new InMemoryScheduleStore(() => NOW);
    const id = await store.insert(textPost(at("2026-05-04T07:00:00.000Z")));

    await expect(store.markPosted(id, NOW)).rejects.toMatchObject({
      currentStatus: "pending",
    });
  });

  it("cancels only pending posts and returns the removed record", async () => {
    const store = new InMemoryScheduleStore(() => NOW);
    const id = await store.insert(textPost(at("2026-05-04T13:30:00.000Z")));

    const removed = await store.cancel(id);

    expect(removed.id).toBe(id);
    expect(await store.findById(id)).toBeNull();
    await expect(store.cancel(id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("refuses two live posts of one account on the same instant", async () => {
    const store = new InMemoryScheduleStore(() => NOW);
    const slot = at("2026-05-04T13:30:00.000Z");
    await store.insert(textPost(slot));

    await expect(store.insert(textPost(slot))).rejects.toBeInstanceOf(SlotTakenError);
    await expect(store.insert(textPost(slot, "acct-b"))).resolves.toBe("post_2");
  });

  it("tracks the chain tail over pending and processing posts only", async () => {
    const store = new InMemoryScheduleStore(() => NOW);
    const first = await store.insert(textPost(at("2026-05-04T03:30:00.000Z")));
    await store.insert(textPost(at("2026-05-04T08:30:00.000Z")));
    const last = await store.insert(textPost(at("2026-05-04T13:30:00.000Z")));

    await store.claim(first);
    await store.markFailed(first, "boom");
    await store.cancel(last);

    expect(await store.latestScheduledTime("acct-a")).toEqual(at("2026-05-04T08:30:00.000Z"));
    expect(await store.latestScheduledTime("acct-z")).toBeNull();
  });

  it("requeues a failed post back to pending with the error cleared", async () => {
    const store = new InMemoryScheduleStore(() => NOW);
    const id = await store.insert(textPost(at("2026-05-04T07:00:00.000Z")));
    await store.claim(id);
    await store.markFailed(id, "HTTP 503");

    const requeued = await store.requeue(id, at("2026-05-05T03:30:00.000Z"), null);

    expect(requeued).toMatchObject({
      status: "pending",
      errorDetail: null,
      claimedAt: null,
      scheduledTime: at("2026-05-05T03:30:00.000Z"),
    });
    expect(await store.listByStatus("failed")).toEqual([]);
  });
});
