// backend/services/docs/src/app.ts

/**
 * The served application module: `serve backend/services/docs/src/app:app`.
 * Config is read at import, so a missing env var fails the launch before
 * anything binds. onStartup/onShutdown are picked up by the app locator.
 */

import { loadConfig } from "./config";
import { buildContext } from "./context";
import { createApp } from "./createApp";
import { connectDB, disconnectDB, mongoReadiness } from "./db";
import { MongoDocumentationRepo } from "./repo/documentationRepo";
import { MongoRepoStore } from "./repo/repoStore";

const config = loadConfig();

const ctx = buildContext(config, {
  docs: new MongoDocumentationRepo(),
  repos: new MongoRepoStore(),
  readiness: mongoReadiness,
});

export const app = createApp(ctx);

export async function onStartup(): Promise<void> {
  await connectDB(config.mongoUri);
}

export async function onShutdown(): Promise<void> {
  await ctx.jobs.drain();
  await disconnectDB();
}
