import {
  CreateIndexesOptions,
  Db,
  Filter,
  FindOneAndUpdateOptions,
  FindOptions,
  IndexSpecification,
  InsertOneResult,
  MongoNetworkError,
  MongoNotConnectedError,
  MongoServerError,
  MongoServerSelectionError,
  MongoTopologyClosedError,
  ObjectId,
  UpdateFilter,
  WithId,
} from "mongodb";
import { toObjectId } from "../shared/objectId";
import {
  NewScheduledPost,
  PostStatus,
  PublishOutcome,
  ScheduledPost,
} from "./scheduledPost.model";
import {
  buildNewRecord,
  CHAIN_STATUSES,
  ScheduleStore,
  truncateErrorDetail,
} from "./scheduledPost.store";
import { validateNewPost } from "../validation/scheduledPost.validation";
import {
  InvalidStateError,
  NotFoundError,
  SlotTakenError,
  StoreUnavailableError,
} from "../utils/httpError";

export type ScheduledPostDocument = Omit<ScheduledPost, "id"> & { _id: ObjectId };

/** The slice of a MongoDB collection the repository relies on. */
export interface ScheduledPostCollection {
  insertOne(doc: ScheduledPostDocument): Promise<InsertOneResult<ScheduledPostDocument>>;
  findOne(
    filter: Filter<ScheduledPostDocument>,
    options?: FindOptions
  ): Promise<WithId<ScheduledPostDocument> | null>;
  find(
    filter: Filter<ScheduledPostDocument>,
    options?: FindOptions
  ): { toArray(): Promise<WithId<ScheduledPostDocument>[]> };
  findOneAndUpdate(
    filter: Filter<ScheduledPostDocument>,
    update: UpdateFilter<ScheduledPostDocument>,
    options: FindOneAndUpdateOptions
  ): Promise<WithId<ScheduledPostDocument> | null>;
  findOneAndDelete(
    filter: Filter<ScheduledPostDocument>
  ): Promise<WithId<ScheduledPostDocument> | null>;
  createIndex(
    spec: IndexSpecification,
    options?: CreateIndexesOptions
  ): Promise<string>;
}

const DUPLICATE_KEY = 11000;
const DUE_ORDER = { scheduledTime: 1, createdAt: 1 } as const;

const isConnectivityError = (error: unknown): boolean =>
  error instanceof MongoNetworkError ||
  error instanceof MongoServerSelectionError ||
  error instanceof MongoTopologyClosedError ||
  error instanceof MongoNotConnectedError;

export function toScheduledPost(doc: WithId<ScheduledPostDocument>): ScheduledPost {
  return {
    id: doc._id.toHexString(),
    platform: doc.platform,
    accountRef: doc.accountRef,
    mediaRef: doc.mediaRef,
    caption: doc.caption,
    replyToPostId: doc.replyToPostId,
    scheduledTime: doc.scheduledTime,
    status: doc.status,
    claimedAt: doc.claimedAt,
    postedAt: doc.postedAt,
    remotePostId: doc.remotePostId,
    permalink: doc.permalink,
    errorDetail: doc.errorDetail,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

/**
 * MongoDB-backed ScheduleStore. Every status change is a single
 * `findOneAndUpdate` filtered on the expected source status, so two
 * publishing runs racing for the same post cannot both win.
 */
export class ScheduledPostRepository implements ScheduleStore {
  constructor(
    private readonly collection: ScheduledPostCollection,
    private readonly clock: () => Date = () => new Date()
  ) {}

  static fromDb(db: Db, collectionName = "scheduledPosts"): ScheduledPostRepository {
    return new ScheduledPostRepository(
      db.collection<ScheduledPostDocument>(collectionName)
    );
  }

  /**
   * Due-query index plus a partial unique index that keeps two live posts of
   * one account off the same instant.
   */
  async ensureIndexes(): Promise<void> {
    await this.run("create indexes", async () => {
      await this.collection.createIndex({ status: 1, scheduledTime: 1 });
      await this.collection.createIndex(
        { accountRef: 1, scheduledTime: 1 },
        {
          unique: true,
          name: "account_slot_unique",
          partialFilterExpression: { status: { $in: [...CHAIN_STATUSES] } },
        }
      );
    });
  }

  async insert(input: NewScheduledPost): Promise<string> {
    const post = validateNewPost(input);
    const doc: ScheduledPostDocument = {
      _id: new ObjectId(),
      ...buildNewRecord(post, this.clock()),
    };

    try {
      await this.run("insert", () => this.collection.insertOne(doc));
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        throw new SlotTakenError(post.accountRef, post.scheduledTime);
      }
      throw error;
    }
    return doc._id.toHexString();
  }

  async findById(id: string): Promise<ScheduledPost | null> {
    const _id = toObjectId(id);
    if (!_id) return null;

    const doc = await this.run("findById", () => this.collection.findOne({ _id }));
    return doc ? toScheduledPost(doc) : null;
  }

  async queryDue(now: Date): Promise<ScheduledPost[]> {
    const docs = await this.run("queryDue", () =>
      this.collection
        .find({ status: "pending", scheduledTime: { $lte: now } }, { sort: DUE_ORDER })
        .toArray()
    );
    return docs.map(toScheduledPost);
  }

  async claim(id: string, now: Date = this.clock()): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;

    const doc = await this.run("claim", () =>
      this.collection.findOneAndUpdate(
        { _id, status: "pending" },
        { $set: { status: "processing", claimedAt: now, updatedAt: now } },
        { returnDocument: "after" }
      )
    );
    return doc !== null;
  }

  async markPosted(
    id: string,
    postedAt: Date,
    outcome?: PublishOutcome
  ): Promise<ScheduledPost> {
    return this.transition(id, "processing", "mark as posted", {
      status: "posted",
      postedAt,
      remotePostId: outcome?.remotePostId ?? null,
      permalink: outcome?.permalink ?? null,
      errorDetail: null,
    });
  }

  async markFailed(id: string, errorDetail: string): Promise<ScheduledPost> {
    return this.transition(id, "processing", "mark as failed", {
      status: "failed",
      errorDetail: truncateErrorDetail(errorDetail),
    });
  }

  async reschedule(id: string, newTime: Date): Promise<ScheduledPost> {
    return this.transition(id, "pending", "reschedule", { scheduledTime: newTime });
  }

  async cancel(id: string): Promise<ScheduledPost> {
    const _id = this.requireObjectId(id);
    const doc = await this.run("cancel", () =>
      this.collection.findOneAndDelete({ _id, status: "pending" })
    );
    if (doc) return toScheduledPost(doc);

    throw await this.explainMiss(id, _id, "cancel");
  }

  async requeue(
    id: string,
    scheduledTime: Date,
    mediaRef: string | null
  ): Promise<ScheduledPost> {
    const current = await this.findById(id);
    if (current?.status === "failed") {
      validateNewPost({ ...current, scheduledTime, mediaRef });
    }

    return this.transition(id, "failed", "requeue", {
      status: "pending",
      scheduledTime,
      mediaRef,
      errorDetail: null,
      postedAt: null,
      claimedAt: null,
    });
  }

  async listByStatus(status: PostStatus): Promise<ScheduledPost[]> {
    const docs = await this.run("listByStatus", () =>
      this.collection.find({ status }, { sort: DUE_ORDER }).toArray()
    );
    return docs.map(toScheduledPost);
  }

  async latestScheduledTime(accountRef: string): Promise<Date | null> {
    const doc = await this.run("latestScheduledTime", () =>
      this.collection.findOne(
        { accountRef, status: { $in: [...CHAIN_STATUSES] } },
        { sort: { scheduledTime: -1 }, projection: { scheduledTime: 1 } }
      )
    );
    return doc?.scheduledTime ?? null;
  }

  private async transition(
    id: string,
    from: PostStatus,
    action: string,
    changes: Partial<Omit<ScheduledPost, "id">>
  ): Promise<ScheduledPost> {
    const _id = this.requireObjectId(id);

    let doc: WithId<ScheduledPostDocument> | null;
    try {
      doc = await this.run(action, () =>
        this.collection.findOneAndUpdate(
          { _id, status: from },
          { $set: { ...changes, updatedAt: this.clock() } },
          { returnDocument: "after" }
        )
      );
    } catch (error) {
      if (
        error instanceof MongoServerError &&
        error.code === DUPLICATE_KEY &&
        changes.scheduledTime
      ) {
        const current = await this.findById(id);
        throw new SlotTakenError(current?.accountRef ?? "unknown", changes.scheduledTime);
      }
      throw error;
    }

    if (doc) return toScheduledPost(doc);
    throw await this.explainMiss(id, _id, action);
  }

  /** A conditional write matched nothing: the post is gone or in another status. */
  private async explainMiss(
    id: string,
    _id: ObjectId,
    action: string
  ): Promise<Error> {
    const current = await this.run(action, () =>
      this.collection.findOne({ _id }, { projection: { status: 1 } })
    );
    if (!current) return new NotFoundError(`Scheduled post ${id} not found`);
    return new InvalidStateError(
      `Cannot ${action} a ${current.status} post`,
      current.status
    );
  }

  private requireObjectId(id: string): ObjectId {
    const _id = toObjectId(id);
    if (!_id) throw new NotFoundError(`Scheduled post ${id} not found`);
    return _id;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isConnectivityError(error)) {
        console.error(`[ScheduleStore] ${operation} failed, store unreachable:`, error);
        throw new StoreUnavailableError(`Schedule store unavailable during ${operation}`, error);
      }
      throw error;
    }
  }
}
