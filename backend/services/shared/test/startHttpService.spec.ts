// backend/services/shared/test/startHttpService.spec.ts
import fs from "node:fs";
import path from "node:path";
import type { RequestListener } from "node:http";
import pino from "pino";
import request from "supertest";
import { afterEach, describe, it, expect, vi } from "vitest";
import {
  type StartedService,
  startHttpService,
} from "../bootstrap/startHttpService";
import { parseLaunchConfig } from "../bootstrap/launchConfig";
import { AddressInUseError, TlsFileError } from "../bootstrap/errors";

const TLS_DIR = path.join(__dirname, "fixtures", "tls");
const log = pino({ level: "silent" });

const listener: RequestListener = (req, res) => {
  res.setHeader("content-type", "text/plain");
  res.end(`ok ${req.method} ${req.url}`);
};

const running: StartedService[] = [];

afterEach(async () => {
  await Promise.all(running.splice(0).map((s) => s.stop()));
});

async function start(argv: string[], hooks: {
  onStartup?: () => Promise<void>;
  onShutdown?: () => Promise<void>;
} = {}) {
  const started = await startHttpService({
    listener,
    config: parseLaunchConfig(["fixture/app:app", ...argv], {}),
    serviceName: "test",
    logger: log,
    cwd: TLS_DIR,
    ...hooks,
  });
  running.push(started);
  return started;
}

describe("startHttpService (http)", () => {
  it("binds loopback on an ephemeral port and serves the listener", async () => {
    const started = await start(["--port", "0"]);

    expect(started.protocol).toBe("http");
    expect(started.host).toBe("127.0.0.1");
    expect(started.boundPort).toBeGreaterThan(0);
    expect(started.url).toBe(`http://127.0.0.1:${started.boundPort}`);

    const res = await request(started.url).get("/ping?x=1");
    expect(res.status).toBe(200);
    expect(res.text).toBe("ok GET /ping?x=1");
  });

  it("runs the startup hook before listening and the shutdown hook once on stop", async () => {
    const order: string[] = [];
    const onStartup = vi.fn(async () => {
      order.push("startup");
    });
    const onShutdown = vi.fn(async () => {
      order.push("shutdown");
    });

    const started = await start(["--port", "0"], { onStartup, onShutdown });
    order.push(started.server.listening ? "listening" : "not-listening");

    await Promise.all([started.stop(), started.stop()]);
    expect(order).toEqual(["startup", "listening", "shutdown"]);
    expect(onShutdown).toHaveBeenCalledTimes(1);
    expect(started.server.listening).toBe(false);
  });

  it("fails with AddressInUseError when the port is taken", async () => {
    const first = await start(["--port", "0"]);
    const onShutdown = vi.fn(async () => undefined);

    await expect(
      start(["--port", String(first.boundPort)], { onShutdown })
    ).rejects.toBeInstanceOf(AddressInUseError);
    await expect(
      start(["--port", String(first.boundPort)])
    ).rejects.toThrow(`Address already in use: 127.0.0.1:${first.boundPort}`);
    expect(onShutdown).toHaveBeenCalledTimes(1);
  });

  it("does not listen when the startup hook fails, and still runs the shutdown hook", async () => {
    const onStartup = vi.fn(async () => {
      throw new Error("db unreachable");
    });
    const onShutdown = vi.fn(async () => undefined);
    await expect(start(["--port", "0"], { onStartup, onShutdown })).rejects.toThrow(
      "db unreachable"
    );
    expect(onShutdown).toHaveBeenCalledTimes(1);
  });
});

describe("startHttpService (https)", () => {
  it("serves over TLS with the configured key and certificate", async () => {
    const started = await start([
      "--port",
      "0",
      "--ssl-keyfile",
      "key.pem",
      "--ssl-certfile",
      "cert.pem",
    ]);
    expect(started.protocol).toBe("https");
    expect(started.url).toBe(`https://127.0.0.1:${started.boundPort}`);

    const res = await request(started.url)
      .get("/secure")
      .ca(fs.readFileSync(path.join(TLS_DIR, "cert.pem")));
    expect(res.status).toBe(200);
    expect(res.text).toBe("ok GET /secure");
  });

  it("refuses to start when the key file is missing", async () => {
    const onStartup = vi.fn(async () => undefined);
    await expect(
      start(
        ["--port", "0", "--ssl-keyfile", "nope.pem", "--ssl-certfile", "cert.pem"],
        { onStartup }
      )
    ).rejects.toBeInstanceOf(TlsFileError);
    expect(onStartup).not.toHaveBeenCalled();
  });

  it("names both files when TLS rejects the key/certificate pair", async () => {
    const onStartup = vi.fn(async () => undefined);
    const failure = await start(
      ["--port", "0", "--ssl-keyfile", "other-key.pem", "--ssl-certfile", "cert.pem"],
      { onStartup }
    ).then(
      () => null,
      (err: unknown) => err
    );

    expect(failure).toBeInstanceOf(TlsFileError);
    if (!(failure instanceof TlsFileError)) return;
    expect(failure.role).toBe("pair");
    expect(failure.filePath).toContain("other-key.pem");
    expect(failure.filePath).toContain("cert.pem");
    expect(failure.message).toContain("TLS key/certificate pair");
    expect(failure.message).toContain("rejected by TLS");
    expect(onStartup).not.toHaveBeenCalled();
  });
});
