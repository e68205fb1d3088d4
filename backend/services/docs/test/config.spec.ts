// backend/services/docs/test/config.spec.ts
import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";

const BASE = {
  DOCS_MONGO_URI: "mongodb://127.0.0.1:27017/repodocs",
  AUTH_JWT_SECRET: "test-secret",
  LLM_API_KEY: "test-key",
};

describe("loadConfig", () => {
  it("fills in defaults", () => {
    expect(loadConfig(BASE)).toEqual({
      serviceName: "docs",
      mongoUri: "mongodb://127.0.0.1:27017/repodocs",
      auth: { secret: "test-secret", issuer: undefined, audience: undefined },
      llm: {
        apiKey: "test-key",
        baseUrl: "https://api.endpoints.anyscale.com/v1",
        defaultModel: "mistralai/Mixtral-8x7B-Instruct-v0.1",
        timeoutMs: 60_000,
      },
      github: { apiUrl: "https://api.github.com", token: undefined },
    });
  });

  it("reads overrides and strips trailing slashes from URLs", () => {
    const config = loadConfig({
      ...BASE,
      DOCS_SERVICE_NAME: "docs-eu",
      AUTH_JWT_ISSUER: "repodocs",
      LLM_BASE_URL: "http://localhost:8080/v1/",
      LLM_DEFAULT_MODEL: "meta-llama/Llama-2-7b-chat-hf",
      LLM_TIMEOUT_MS: "1500",
      GITHUB_API_URL: "http://localhost:9999/api//",
      GITHUB_TOKEN: "test-token",
    });

    expect(config.serviceName).toBe("docs-eu");
    expect(config.auth.issuer).toBe("repodocs");
    expect(config.llm).toEqual({
      apiKey: "test-key",
      baseUrl: "http://localhost:8080/v1",
      defaultModel: "meta-llama/Llama-2-7b-chat-hf",
      timeoutMs: 1500,
    });
    expect(config.github).toEqual({
      apiUrl: "http://localhost:9999/api",
      token: "test-token",
    });
  });

  it.each([
    [{ DOCS_MONGO_URI: "" }, "Missing required env var: DOCS_MONGO_URI"],
    [{ AUTH_JWT_SECRET: " " }, "Missing required env var: AUTH_JWT_SECRET"],
    [{ LLM_API_KEY: "" }, "Missing required env var: LLM_API_KEY"],
    [{ LLM_TIMEOUT_MS: "soon" }, 'Invalid number for env var LLM_TIMEOUT_MS: "soon"'],
    [{ LLM_TIMEOUT_MS: "0" }, 'Invalid number for env var LLM_TIMEOUT_MS: "0"'],
    [{ LLM_BASE_URL: "nope" }, 'Invalid URL for env var LLM_BASE_URL: "nope"'],
  ])("rejects %o", (override, message) => {
    expect(() => loadConfig({ ...BASE, ...override })).toThrow(message);
  });

  it("names the allowed models when the default model is unknown", () => {
    expect(() => loadConfig({ ...BASE, LLM_DEFAULT_MODEL: "gpt-4" })).toThrow(
      'Invalid LLM_DEFAULT_MODEL: "gpt-4" (one of mistralai/Mixtral-8x7B-Instruct-v0.1, ' +
        "mistralai/Mistral-7B-Instruct-v0.1, Open-Orca/Mistral-7B-OpenOrca, " +
        "meta-llama/Llama-2-7b-chat-hf)"
    );
  });
});
