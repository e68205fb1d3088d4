// backend/services/docs/test/openapi.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import { redocHtml, swaggerUiHtml } from "../src/openapi";
import { buildTestContext } from "./helpers/testContext";
import { expectOK } from "./helpers/http";

const { app } = buildTestContext();

describe("API documentation routes", () => {
  it("serves the OpenAPI document", async () => {
    const res = await expectOK(request(app).get("/openapi.json"));

    expect(res.body.openapi).toBe("3.0.3");
    expect(res.body.info.title).toBe("repodocs");
    expect(Object.keys(res.body.paths)).toEqual([
      "/ping",
      "/hello_world",
      "/docs",
      "/file-docs",
      "/file-docs/{id}",
      "/repos",
      "/repos/{id}",
    ]);
    expect(res.body.paths["/file-docs/{id}"].put.parameters[1].schema.default).toBe(
      "mistralai/Mixtral-8x7B-Instruct-v0.1"
    );
  });

  it("GET /docs renders Swagger UI", async () => {
    const res = await expectOK(request(app).get("/docs"));

    expect(res.headers["content-type"]).toMatch(/^text\/html/);
    expect(res.text).toContain("<title>docs - Swagger UI</title>");
    expect(res.text).toContain('SwaggerUIBundle({ url: "/openapi.json", dom_id: "#swagger-ui" })');
  });

  it("GET /redoc renders ReDoc", async () => {
    const res = await expectOK(request(app).get("/redoc"));

    expect(res.text).toContain("<title>docs - ReDoc</title>");
    expect(res.text).toContain('<redoc spec-url="/openapi.json"></redoc>');
  });
});

describe("HTML shells", () => {
  it("escape the title", () => {
    expect(swaggerUiHtml("/spec", "a<b>")).toContain(
      "<title>a&lt;b&gt; - Swagger UI</title>"
    );
    expect(redocHtml("/spec?x=1&y=2", "t")).toContain(
      '<redoc spec-url="/spec?x=1&amp;y=2"></redoc>'
    );
  });
});
