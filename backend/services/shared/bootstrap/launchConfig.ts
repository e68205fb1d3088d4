// backend/services/shared/bootstrap/launchConfig.ts

/**
 * Launch configuration: how the server process binds and serves traffic.
 *
 * Sources, later wins:
 *   defaults (from the service entrypoint) → env (HOST, PORT, SSL_KEYFILE,
 *   SSL_CERTFILE) → CLI flags.
 *
 * The result is frozen; nothing mutates it after process start.
 */

import net from "node:net";
import path from "node:path";
import { z } from "zod";
import { InvalidLaunchConfigError } from "./errors";
import { modulePathToFile } from "./moduleResolver";

export interface LaunchConfig {
  /** "<module path>:<export name>" of the request listener to bind. */
  readonly app: string;
  readonly host: string;
  readonly port: number;
  readonly reload: boolean;
  readonly reloadDirs: readonly string[];
  readonly sslKeyfile?: string;
  readonly sslCertfile?: string;
}

export type LaunchDefaults = Partial<Omit<LaunchConfig, "reloadDirs">> & {
  reloadDirs?: string[];
};

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8000;

// Flags that never take a value.
const BOOLEAN_FLAGS = new Set(["reload"]);
// Flags that may repeat.
const LIST_FLAGS = new Set(["reload-dir"]);

export interface ParsedArgs {
  positionals: string[];
  flags: Record<string, string | true | string[]>;
}

/** `--flag value`, `--flag=value`, bare boolean flags, and positionals. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: ParsedArgs["flags"] = {};

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      positionals.push(a);
      continue;
    }

    const eq = a.indexOf("=");
    const key = eq >= 0 ? a.slice(2, eq) : a.slice(2);
    let value: string | true;
    if (eq >= 0) {
      value = a.slice(eq + 1);
    } else if (BOOLEAN_FLAGS.has(key)) {
      value = true;
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
      value = argv[++i];
    } else {
      value = true;
    }

    if (LIST_FLAGS.has(key)) {
      const prev = flags[key];
      const list = Array.isArray(prev) ? prev : [];
      if (typeof value === "string") list.push(value);
      flags[key] = list;
    } else {
      flags[key] = value;
    }
  }

  return { positionals, flags };
}

const HOSTNAME_RE =
  /^(?=.{1,253}$)([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

export function isValidBindHost(host: string): boolean {
  if (net.isIP(host) !== 0) return true;
  // IPv4-looking strings that failed isIP (e.g. 300.1.1.1) are not hostnames.
  if (/^[\d.]+$/.test(host)) return false;
  return HOSTNAME_RE.test(host);
}

const zPort = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be an integer")
    .transform((s) => Number(s)),
]).pipe(z.number().int().min(0).max(65535));

const zOptionalPath = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .optional();

export const zLaunchConfig = z
  .object({
    app: z
      .string()
      .trim()
      .regex(/^.+:[A-Za-z_$][\w$]*$/, 'expected "<module>:<export>"'),
    host: z
      .string()
      .trim()
      .min(1, "must not be empty")
      .refine(isValidBindHost, "not a valid bind address"),
    port: zPort,
    reload: z.boolean(),
    reloadDirs: z.array(z.string().trim().min(1)),
    sslKeyfile: zOptionalPath,
    sslCertfile: zOptionalPath,
  })
  .superRefine((c, ctx) => {
    if (Boolean(c.sslKeyfile) !== Boolean(c.sslCertfile)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [c.sslKeyfile ? "sslCertfile" : "sslKeyfile"],
        message: "--ssl-keyfile and --ssl-certfile must be supplied together",
      });
    }
  });

function flagString(
  flags: ParsedArgs["flags"],
  key: string
): string | undefined {
  const v = flags[key];
  if (v === undefined) return undefined;
  if (v === true) return "";
  if (Array.isArray(v)) return v[v.length - 1];
  return v;
}

function envString(
  env: NodeJS.ProcessEnv,
  key: string
): string | undefined {
  const v = env[key];
  return v && v.trim() !== "" ? v.trim() : undefined;
}

/** Directory of the module half of an app spec, used as the default watch root. */
export function appModuleDir(app: string): string {
  const idx = app.lastIndexOf(":");
  const modulePart = idx > 0 ? app.slice(0, idx) : app;
  return path.dirname(modulePathToFile(modulePart));
}

export function parseLaunchConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  defaults: LaunchDefaults = {}
): LaunchConfig {
  const { positionals, flags } = parseArgs(argv);

  const known = new Set([
    "app",
    "host",
    "port",
    "reload",
    "reload-dir",
    "ssl-keyfile",
    "ssl-certfile",
  ]);
  const unknown = Object.keys(flags).filter((k) => !known.has(k));
  if (unknown.length > 0) {
    throw new InvalidLaunchConfigError(
      unknown.map((k) => `--${k}: unknown option`)
    );
  }
  if (positionals.length > 1) {
    throw new InvalidLaunchConfigError([
      `unexpected arguments: ${positionals.slice(1).join(" ")}`,
    ]);
  }

  const app = positionals[0] ?? flagString(flags, "app") ?? defaults.app ?? "";
  const reloadDirFlag = flags["reload-dir"];
  const reloadDirs = Array.isArray(reloadDirFlag)
    ? reloadDirFlag
    : defaults.reloadDirs ?? [appModuleDir(app)];

  const raw = {
    app,
    host:
      flagString(flags, "host") ??
      envString(env, "HOST") ??
      defaults.host ??
      DEFAULT_HOST,
    port:
      flagString(flags, "port") ??
      envString(env, "PORT") ??
      defaults.port ??
      DEFAULT_PORT,
    reload: flags["reload"] === true || defaults.reload === true,
    reloadDirs,
    sslKeyfile:
      flagString(flags, "ssl-keyfile") ??
      envString(env, "SSL_KEYFILE") ??
      defaults.sslKeyfile,
    sslCertfile:
      flagString(flags, "ssl-certfile") ??
      envString(env, "SSL_CERTFILE") ??
      defaults.sslCertfile,
  };

  const parsed = zLaunchConfig.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidLaunchConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return Object.freeze({
    ...parsed.data,
    reloadDirs: Object.freeze([...parsed.data.reloadDirs]),
  });
}

export function usesTls(config: LaunchConfig): boolean {
  return Boolean(config.sslKeyfile && config.sslCertfile);
}
