#!/usr/bin/env node
// backend/services/docs/src/index.ts

/**
 * repodocs CLI entry:
 *   repodocs serve [backend/services/docs/src/app:app] [--host ...] [--port ...] ...
 *   repodocs run <module> [args...]
 */

import path from "path";
import type { Logger } from "pino";
import { EXIT, runCli } from "../../shared/bootstrap/cli";
import { bootstrap, SERVICE_NAME } from "./bootstrap";

/** Resolved beside this file so it works from src (tsx) and dist (node). */
export const DEFAULT_APP = `${path.join(__dirname, "app")}:app`;
export const DEFAULT_RELOAD_DIRS = [path.resolve(__dirname, "..", "..")];

function startLogger(): Logger | null {
  try {
    return bootstrap();
  } catch (err) {
    console.error(
      `[${SERVICE_NAME}] bootstrap failed: ${err instanceof Error ? err.message : String(err)}`
    );
    return null;
  }
}

async function main(): Promise<void> {
  const log = startLogger();
  if (!log) {
    process.exitCode = EXIT.StartupFailed;
    return;
  }

  const result = await runCli(process.argv.slice(2), {
    bin: "repodocs",
    serviceName: SERVICE_NAME,
    logger: log,
    defaults: { app: DEFAULT_APP, reloadDirs: DEFAULT_RELOAD_DIRS },
  });
  if (result.exitCode !== null) process.exitCode = result.exitCode;
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = EXIT.StartupFailed;
});
