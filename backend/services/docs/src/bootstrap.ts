// backend/services/docs/src/bootstrap.ts

/**
 * Process bootstrap: load env (ENV_FILE or ./.env), then bind the shared
 * logger to this service. Runs before the app module is imported.
 */

import type { Logger } from "pino";
import { loadServiceEnv, optionalEnv } from "../../shared/config/env";
import { initLogger } from "../../shared/utils/logger";

export const SERVICE_NAME = "docs" as const;

export function bootstrap(cwd: string = process.cwd()): Logger {
  const envFile = loadServiceEnv(cwd);
  const log = initLogger(optionalEnv("DOCS_SERVICE_NAME") ?? SERVICE_NAME);
  if (envFile) log.debug({ envFile }, "env loaded");
  return log;
}
