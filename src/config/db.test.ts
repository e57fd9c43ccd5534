import { describe, expect, it } from "vitest";
import { mongoClientOptions } from "./db";
import { loadPublisherConfig } from "./publisher.config";
import { ConfigService } from "./config.service";

describe("mongoClientOptions", () => {
  it("sizes the pool and server selection from the configuration", () => {
    const { mongo } = loadPublisherConfig(
      new ConfigService({ MONGODB_MAX_POOL_SIZE: "4", MONGODB_SERVER_SELECTION_TIMEOUT_MS: "2000" })
    );

    expect(mongoClientOptions(mongo)).toEqual({
      maxPoolSize: 4,
      serverSelectionTimeoutMS: 2000,
      retryWrites: true,
    });
  });

  it("defaults to a small pool and a ten second selection timeout", () => {
    const { mongo } = loadPublisherConfig(new ConfigService({}));

    expect(mongoClientOptions(mongo)).toMatchObject({
      maxPoolSize: 10,
      serverSelectionTimeoutMS: 10_000,
    });
  });
});
