// backend/services/shared/test/health.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import { createServiceApp } from "../app/createServiceApp";

function makeApp(readiness?: () => Record<string, unknown>) {
  return createServiceApp({
    serviceName: "health-spec",
    apiPrefix: "/api",
    version: "1.2.3",
    readiness,
    mountRoutes: (api) => {
      api.get("/echo", (req, res) => res.json({ id: req.id }));
    },
  });
}

describe("health routes", () => {
  it.each(["/health", "/health/live", "/healthz"])("%s reports liveness", async (p) => {
    const res = await request(makeApp()).get(p).set("x-request-id", "live-1");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      service: "health-spec",
      env: "test",
      version: "1.2.3",
      ok: true,
      requestId: "live-1",
    });
  });

  it.each(["/health/ready", "/readyz"])("%s merges readiness details", async (p) => {
    const res = await request(makeApp(() => ({ db: "up" }))).get(p);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ ok: true, db: "up" });
  });

  it("answers 503 when the readiness check throws", async () => {
    const app = makeApp(() => {
      throw new Error("mongo state=0");
    });
    const res = await request(app).get("/readyz");

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ ok: false, error: "mongo state=0" });
  });
});

describe("createServiceApp", () => {
  it("reuses a caller's request id and echoes it", async () => {
    const res = await request(makeApp()).get("/api/echo").set("x-correlation-id", "corr-7");

    expect(res.body).toEqual({ id: "corr-7" });
    expect(res.headers["x-request-id"]).toBe("corr-7");
  });

  it("mints a request id when none was sent", async () => {
    const res = await request(makeApp()).get("/api/echo");

    expect(res.headers["x-request-id"]).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
    expect(res.body.id).toBe(res.headers["x-request-id"]);
  });

  it("allows cross-origin callers and hides x-powered-by", async () => {
    const res = await request(makeApp())
      .get("/api/echo")
      .set("origin", "https://docs.example.test");

    expect(res.headers["access-control-allow-origin"]).toBe("https://docs.example.test");
    expect(res.headers["x-powered-by"]).toBeUndefined();
  });
});
