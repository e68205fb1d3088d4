// backend/services/docs/src/db.ts
import mongoose from "mongoose";
import { logger } from "../../shared/utils/logger";

export function redactMongoUri(uri: string): string {
  return uri.replace(/:\/\/.*@/, "://***:***@");
}

export async function connectDB(uri: string): Promise<void> {
  try {
    await mongoose.connect(uri);
    logger.info(
      { component: "mongodb", uri: redactMongoUri(uri) },
      "[MongoDB-docs] Connected"
    );
  } catch (err) {
    logger.error(
      {
        component: "mongodb",
        error: err instanceof Error ? err.message : String(err),
      },
      "[MongoDB-docs] Connection error"
    );
    throw err;
  }
}

export async function disconnectDB(): Promise<void> {
  await mongoose.disconnect();
  logger.info({ component: "mongodb" }, "[MongoDB-docs] Disconnected");
}

// Readiness: throws (-> 503) unless the connection is up
export function mongoReadiness() {
  const state = mongoose.connection.readyState; // 1 = connected
  if (state !== 1) throw new Error(`mongo state=${state}`);
  return { mongo: "ok" };
}
