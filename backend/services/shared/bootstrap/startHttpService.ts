// backend/services/shared/bootstrap/startHttpService.ts
import http, { type RequestListener } from "node:http";
import https from "node:https";
import type { Logger } from "pino";
import type { LifecycleHook } from "./appLocator";
import { fromListenError, TlsFileError } from "./errors";
import { type LaunchConfig, usesTls } from "./launchConfig";
import { loadTlsCredentials } from "./tlsCredentials";

export interface StartHttpServiceOptions {
  listener: RequestListener;
  config: LaunchConfig;
  serviceName: string;
  logger: Pick<Logger, "info" | "warn" | "error" | "debug">;
  onStartup?: LifecycleHook;
  onShutdown?: LifecycleHook;
  /** Directory TLS paths are resolved against. */
  cwd?: string;
}

export interface StartedService {
  server: http.Server;
  protocol: "http" | "https";
  host: string;
  boundPort: number;
  url: string;
  stop: () => Promise<void>;
}

function formatUrl(protocol: string, host: string, port: number): string {
  const h = host.includes(":") ? `[${host}]` : host;
  return `${protocol}://${h}:${port}`;
}

function createServer(
  opts: StartHttpServiceOptions
): { server: http.Server; protocol: "http" | "https" } {
  const { config, listener } = opts;
  if (!usesTls(config) || !config.sslKeyfile || !config.sslCertfile) {
    return { server: http.createServer(listener), protocol: "http" };
  }

  const creds = loadTlsCredentials(
    config.sslKeyfile,
    config.sslCertfile,
    opts.cwd
  );
  let server: https.Server;
  try {
    server = https.createServer({ key: creds.key, cert: creds.cert }, listener);
  } catch (err) {
    // createSecureContext rejects mismatched or malformed material.
    const reason = err instanceof Error ? err.message : String(err);
    throw new TlsFileError(
      "pair",
      `${config.sslKeyfile} + ${config.sslCertfile}`,
      `rejected by TLS: ${reason}`,
      err
    );
  }
  server.on("tlsClientError", (err) => {
    opts.logger.debug(
      { err: err.message, service: opts.serviceName },
      "tls client error"
    );
  });
  return { server, protocol: "https" };
}

/**
 * Start a plain HTTP or HTTPS listener for `listener` per the launch config.
 * Resolves once the socket is bound; rejects with a BootstrapError when the
 * TLS material, the address, or the startup hook fails.
 */
export async function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { config, serviceName, logger } = opts;

  const { server, protocol } = createServer(opts);

  if (opts.onStartup) {
    try {
      await opts.onStartup();
    } catch (err) {
      await opts.onShutdown?.();
      throw err;
    }
  }

  await new Promise<void>((resolve, reject) => {
    const onError = (err: NodeJS.ErrnoException) => {
      server.off("listening", onListening);
      reject(fromListenError(err, config.host, config.port));
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(config.port, config.host);
  }).catch(async (err: unknown) => {
    await opts.onShutdown?.();
    throw err;
  });

  const addr = server.address();
  const boundPort = addr && typeof addr === "object" ? addr.port : config.port;
  const url = formatUrl(protocol, config.host, boundPort);

  // Errors after bind (e.g. EMFILE) are logged; the process keeps serving.
  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
  });

  logger.info(
    { service: serviceName, host: config.host, port: boundPort, protocol },
    "service listening"
  );

  let stopping: Promise<void> | undefined;
  const stop = () => {
    stopping ??= new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    }).finally(async () => {
      await opts.onShutdown?.();
      logger.info({ service: serviceName }, "service stopped");
    });
    return stopping;
  };

  return { server, protocol, host: config.host, boundPort, url, stop };
}

/**
 * SIGINT/SIGTERM: stop the server, then exit 0. Lingering connections get
 * three seconds before a forced exit.
 */
export function installShutdownHandlers(
  started: StartedService,
  serviceName: string,
  logger: Pick<Logger, "info" | "warn">
): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    setTimeout(() => process.exit(0), 3000).unref();
    void started.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.warn(
          { err: String(err), service: serviceName },
          "shutdown_hook_error"
        );
        process.exit(0);
      }
    );
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}
