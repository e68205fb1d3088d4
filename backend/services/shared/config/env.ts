// backend/services/shared/config/env.ts

import path from "path";
import fs from "fs";
import * as dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Load a specific env file. Throws if the file is missing or invalid. */
export function loadEnvFromFileOrThrow(envFilePath: string): string {
  if (!envFilePath || envFilePath.trim() === "") {
    throw new Error("ENV_FILE is required but was not provided.");
  }
  const resolved = path.resolve(process.cwd(), envFilePath.trim());
  if (!fs.existsSync(resolved)) {
    throw new Error(`ENV_FILE not found at: ${resolved}`);
  }

  const parsed = dotenv.config({ path: resolved });
  if (parsed.error) {
    throw new Error(
      `Failed to load ENV_FILE: ${resolved}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return resolved;
}

/**
 * ENV_FILE when set (must exist), otherwise `.env` in the working
 * directory if there is one. Already-set process vars are never overridden.
 * Returns the file loaded, or null.
 */
export function loadServiceEnv(cwd: string = process.cwd()): string | null {
  const explicit = process.env.ENV_FILE?.trim();
  if (explicit) return loadEnvFromFileOrThrow(path.resolve(cwd, explicit));

  const local = path.resolve(cwd, ".env");
  if (!fs.existsSync(local)) return null;
  return loadEnvFromFileOrThrow(local);
}

/** Assert required environment variables are present (non-empty). */
export function assertRequiredEnv(
  keys: string[],
  env: NodeJS.ProcessEnv = process.env
): void {
  const missing: string[] = [];
  for (const k of keys) {
    const v = env[k];
    if (!v || v.trim() === "") missing.push(k);
  }
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}

/** Require a non-empty env var; returns trimmed string. */
export function requireEnv(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const v = env[name];
  if (!v || !v.trim()) throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

/** Require an env var that parses to a finite number. */
export function requireNumber(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): number {
  const raw = requireEnv(name, env);
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

/** Optional env var, trimmed; blank counts as unset. */
export function optionalEnv(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}
