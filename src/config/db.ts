import { Db, MongoClient, MongoClientOptions } from "mongodb";
import { PublisherConfig } from "./publisher.config";

export type MongoSettings = PublisherConfig["mongo"];

/**
 * A short server selection timeout lets an unreachable database surface as
 * StoreUnavailableError within one run instead of stalling it.
 */
export const mongoClientOptions = (settings: MongoSettings): MongoClientOptions => ({
  maxPoolSize: settings.maxPoolSize,
  serverSelectionTimeoutMS: settings.serverSelectionTimeoutMs,
  retryWrites: true,
});

export class MongoConnection {
  private readonly client: MongoClient;
  private connecting: Promise<Db> | null = null;

  constructor(private readonly settings: MongoSettings) {
    this.client = new MongoClient(settings.uri, mongoClientOptions(settings));
  }

  connect(): Promise<Db> {
    if (this.connecting) return this.connecting;

    this.connecting = this.client
      .connect()
      .then((client) => {
        console.log(`✅ Connected to MongoDB database ${this.settings.dbName}`);
        return client.db(this.settings.dbName);
      })
      .catch((error: unknown) => {
        this.connecting = null;
        throw error;
      });
    return this.connecting;
  }

  async close(): Promise<void> {
    await this.client.close();
    this.connecting = null;
    console.log("MongoDB connection closed");
  }
}
