import dotenv from "dotenv";

dotenv.config();

import fs from "fs";
import path from "path";
import { z } from "zod";
import { createApp } from "./app";
import { MongoConnection } from "./config/db";
import { ConfigService } from "./config/config.service";
import { loadPublisherConfig } from "./config/publisher.config";
import { createPublishingServices } from "./container";
import { setupCronJobs } from "./cron";

const packageJson = z.object({ version: z.string() });

function readVersion(): string {
  const file = path.join(__dirname, "..", "package.json");
  return packageJson.parse(JSON.parse(fs.readFileSync(file, "utf8"))).version;
}

async function bootstrap() {
  const config = loadPublisherConfig(ConfigService.getInstance());
  const connection = new MongoConnection(config.mongo);
  const db = await connection.connect();

  const { store, scheduleService, worker } = createPublishingServices(config, db);
  await store.ensureIndexes();

  const app = createApp({
    scheduleService,
    worker,
    cronSecret: config.cron.secret,
    version: readVersion(),
    nodeEnv: config.nodeEnv,
    corsOrigins: config.corsOrigins,
  });
  const task = setupCronJobs(worker, config.cron.expression);

  const server = app.listen(config.port, () => {
    console.log(`🚀 Server running on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    task.stop();
    server.close(() => {
      connection
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("Error during shutdown:", err);
          process.exit(1);
        });
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

bootstrap().catch((err: unknown) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
