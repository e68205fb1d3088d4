// backend/services/shared/bootstrap/cli.ts

/**
 * Service CLI:
 *
 *   <bin> serve [<module>:<export>] [--host H] [--port P] [--reload]
 *               [--reload-dir D]... [--ssl-keyfile K --ssl-certfile C]
 *   <bin> run <module> [args...]
 *   <bin> help
 *
 * Exit codes: 0 ok, 1 startup failure, 2 usage error.
 */

import type { Logger } from "pino";
import { locateApp } from "./appLocator";
import { BootstrapError } from "./errors";
import { type LaunchDefaults, parseLaunchConfig } from "./launchConfig";
import { runModule } from "./moduleRunner";
import { RELOAD_WORKER_ENV, Reloader, stripReloadArgs } from "./reloader";
import {
  installShutdownHandlers,
  type StartedService,
  startHttpService,
} from "./startHttpService";

export const EXIT = { Ok: 0, StartupFailed: 1, Usage: 2 } as const;

export interface CliOptions {
  bin: string;
  serviceName: string;
  logger: Logger;
  defaults?: LaunchDefaults;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Install SIGINT/SIGTERM handlers for serve (off in tests). */
  handleSignals?: boolean;
  print?: (line: string) => void;
}

export interface CliResult {
  /** null while a server keeps the process alive. */
  exitCode: number | null;
  started?: StartedService;
}

export function usage(bin: string): string {
  return [
    `Usage:`,
    `  ${bin} serve [<module>:<export>] [--host HOST] [--port PORT] [--reload]`,
    `        [--reload-dir DIR]... [--ssl-keyfile KEY --ssl-certfile CERT]`,
    `  ${bin} run <module> [args...]`,
    `  ${bin} help`,
  ].join("\n");
}

async function serve(argv: string[], opts: CliOptions): Promise<CliResult> {
  const env = opts.env ?? process.env;
  const config = parseLaunchConfig(argv, env, opts.defaults);

  if (config.reload && env[RELOAD_WORKER_ENV] !== "1") {
    const reloader = new Reloader({
      dirs: config.reloadDirs,
      workerArgs: ["serve", ...stripReloadArgs(argv)],
      logger: opts.logger,
      handleSignals: opts.handleSignals,
    });
    return { exitCode: await reloader.start() };
  }

  const located = await locateApp(config.app, opts.cwd);
  opts.logger.debug({ app: config.app, file: located.file }, "app located");

  const started = await startHttpService({
    listener: located.listener,
    config,
    serviceName: opts.serviceName,
    logger: opts.logger,
    onStartup: located.onStartup,
    onShutdown: located.onShutdown,
    cwd: opts.cwd,
  });

  if (opts.handleSignals ?? true) {
    installShutdownHandlers(started, opts.serviceName, opts.logger);
  }
  return { exitCode: null, started };
}

async function run(argv: string[], opts: CliOptions): Promise<CliResult> {
  const [modulePath, ...args] = argv;
  if (!modulePath) {
    (opts.print ?? console.error)(usage(opts.bin));
    return { exitCode: EXIT.Usage };
  }
  await runModule(modulePath, args, opts.cwd);
  return { exitCode: EXIT.Ok };
}

export async function runCli(
  argv: readonly string[],
  opts: CliOptions
): Promise<CliResult> {
  const [cmd, ...rest] = argv;
  const print = opts.print ?? console.log;

  try {
    switch (cmd) {
      case "serve":
        return await serve(rest, opts);
      case "run":
        return await run(rest, opts);
      case "help":
      case "--help":
      case "-h":
        print(usage(opts.bin));
        return { exitCode: EXIT.Ok };
      default:
        print(cmd ? `Unknown command "${cmd}"\n${usage(opts.bin)}` : usage(opts.bin));
        return { exitCode: EXIT.Usage };
    }
  } catch (err) {
    if (err instanceof BootstrapError) {
      opts.logger.fatal(
        { code: err.code, err: err.message, service: opts.serviceName },
        "startup failed"
      );
      return { exitCode: err.exitCode };
    }
    opts.logger.fatal(
      {
        err: err instanceof Error ? err.message : String(err),
        service: opts.serviceName,
      },
      "startup failed"
    );
    return { exitCode: EXIT.StartupFailed };
  }
}
