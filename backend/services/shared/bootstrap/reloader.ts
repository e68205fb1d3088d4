// backend/services/shared/bootstrap/reloader.ts

/**
 * Dev-only auto-reload supervisor.
 *
 * The supervisor never binds a socket. It forks one worker running the same
 * entrypoint (same runtime flags, reload flags stripped), watches source
 * directories, and restarts the worker after a debounced change. A new
 * worker is only forked once the previous one has exited, so the port is
 * free again.
 */

import { fork } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";

export interface WorkerProcess {
  readonly exitCode: number | null;
  /** Set instead of exitCode when a signal ended the process. */
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(
    event: "exit",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): this;
}

export type SpawnWorker = (args: string[]) => WorkerProcess;
export type WatchDir = (
  dir: string,
  onChange: (filename: string | null) => void
) => { close(): void };

export interface ReloaderOptions {
  dirs: readonly string[];
  workerArgs: string[];
  logger: Pick<Logger, "info" | "warn" | "debug">;
  debounceMs?: number;
  spawnWorker?: SpawnWorker;
  watchDir?: WatchDir;
  /** Forward SIGINT/SIGTERM to the worker (off in tests). */
  handleSignals?: boolean;
}

export const RELOAD_WORKER_ENV = "REPODOCS_RELOAD_WORKER";

const WATCHED_EXT = new Set([".ts", ".js", ".cjs", ".mts", ".json"]);
const IGNORED_SEGMENTS = new Set(["node_modules", "dist", ".git", "coverage"]);

export function shouldReload(filename: string | null): boolean {
  if (!filename) return false;
  const segments = filename.split(/[\\/]/);
  if (segments.some((s) => IGNORED_SEGMENTS.has(s))) return false;
  return WATCHED_EXT.has(path.extname(filename));
}

/** Drop --reload and --reload-dir (both forms) from a CLI argument list. */
export function stripReloadArgs(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--reload") continue;
    if (a.startsWith("--reload-dir=")) continue;
    if (a === "--reload-dir") {
      i++;
      continue;
    }
    out.push(a);
  }
  return out;
}

const defaultSpawn: SpawnWorker = (args) =>
  fork(process.argv[1], args, {
    execArgv: process.execArgv,
    stdio: "inherit",
    env: { ...process.env, [RELOAD_WORKER_ENV]: "1" },
  });

function hasExited(worker: WorkerProcess): boolean {
  return worker.exitCode !== null || worker.signalCode !== null;
}

const defaultWatch: WatchDir = (dir, onChange) =>
  fs.watch(dir, { recursive: true }, (_event, filename) => onChange(filename));

export class Reloader {
  private worker: WorkerProcess | null = null;
  private watchers: Array<{ close(): void }> = [];
  private timer: NodeJS.Timeout | null = null;
  private restarting = false;
  private stopping = false;
  private done: ((code: number) => void) | null = null;
  private spawnCount = 0;

  private readonly spawnWorker: SpawnWorker;
  private readonly watchDir: WatchDir;
  private readonly debounceMs: number;

  constructor(private readonly opts: ReloaderOptions) {
    this.spawnWorker = opts.spawnWorker ?? defaultSpawn;
    this.watchDir = opts.watchDir ?? defaultWatch;
    this.debounceMs = opts.debounceMs ?? 250;
  }

  get spawned(): number {
    return this.spawnCount;
  }

  /** Resolves with the last worker's exit code once the supervisor stops. */
  start(): Promise<number> {
    const finished = new Promise<number>((resolve) => {
      this.done = resolve;
    });

    for (const dir of this.opts.dirs) {
      const abs = path.resolve(dir);
      this.watchers.push(
        this.watchDir(abs, (filename) => this.onChange(filename))
      );
      this.opts.logger.info({ dir: abs }, "reload: watching");
    }

    if (this.opts.handleSignals ?? true) {
      process.once("SIGINT", () => this.stop("SIGINT"));
      process.once("SIGTERM", () => this.stop("SIGTERM"));
    }

    this.spawn();
    return finished;
  }

  stop(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.stopping) return;
    this.stopping = true;
    if (this.timer) clearTimeout(this.timer);
    for (const w of this.watchers) w.close();
    this.watchers = [];

    const worker = this.worker;
    if (!worker || hasExited(worker)) {
      this.finish(worker?.exitCode ?? 0);
      return;
    }
    worker.kill(signal);
  }

  private onChange(filename: string | null): void {
    if (this.stopping || !shouldReload(filename)) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.opts.logger.info({ file: filename }, "reload: change detected");
      this.restart();
    }, this.debounceMs);
  }

  private restart(): void {
    const worker = this.worker;
    if (!worker || hasExited(worker)) {
      this.spawn();
      return;
    }
    this.restarting = true;
    worker.kill("SIGTERM");
  }

  private spawn(): void {
    const worker = this.spawnWorker(this.opts.workerArgs);
    this.worker = worker;
    this.spawnCount++;

    worker.once("exit", (code, signal) => {
      if (this.worker !== worker) return;
      if (this.stopping) {
        this.finish(code ?? 0);
        return;
      }
      if (this.restarting) {
        this.restarting = false;
        this.spawn();
        return;
      }
      this.opts.logger.warn(
        { code, signal },
        "reload: worker exited; waiting for changes"
      );
    });
  }

  private finish(code: number): void {
    const done = this.done;
    this.done = null;
    done?.(code);
  }
}
