// backend/services/docs/src/config.ts

/**
 * Docs service config.
 * - No dotenv loading here (bootstrap.ts loads env).
 * - Fail fast: loadConfig() throws on the first missing/invalid var.
 */

import { z } from "zod";
import {
  optionalEnv,
  requireEnv,
  requireNumber,
} from "../../shared/config/env";

export const LLM_MODELS = [
  "mistralai/Mixtral-8x7B-Instruct-v0.1",
  "mistralai/Mistral-7B-Instruct-v0.1",
  "Open-Orca/Mistral-7B-OpenOrca",
  "meta-llama/Llama-2-7b-chat-hf",
] as const;

export const zLlmModel = z.enum(LLM_MODELS);
export type LlmModel = z.infer<typeof zLlmModel>;

export const DEFAULT_LLM_MODEL: LlmModel = "mistralai/Mixtral-8x7B-Instruct-v0.1";

export interface DocsConfig {
  serviceName: string;
  mongoUri: string;
  auth: { secret: string; issuer?: string; audience?: string };
  llm: {
    apiKey: string;
    baseUrl: string;
    defaultModel: LlmModel;
    timeoutMs: number;
  };
  github: { apiUrl: string; token?: string };
}

const zUrl = z.string().url();

function urlEnv(name: string, fallback: string, env: NodeJS.ProcessEnv) {
  const raw = optionalEnv(name, env) ?? fallback;
  if (!zUrl.safeParse(raw).success) {
    throw new Error(`Invalid URL for env var ${name}: "${raw}"`);
  }
  return raw.replace(/\/+$/, "");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DocsConfig {
  const rawModel = optionalEnv("LLM_DEFAULT_MODEL", env) ?? DEFAULT_LLM_MODEL;
  const model = zLlmModel.safeParse(rawModel);
  if (!model.success) {
    throw new Error(
      `Invalid LLM_DEFAULT_MODEL: "${rawModel}" (one of ${LLM_MODELS.join(", ")})`
    );
  }

  const timeoutMs =
    optionalEnv("LLM_TIMEOUT_MS", env) !== undefined
      ? requireNumber("LLM_TIMEOUT_MS", env)
      : 60_000;
  if (timeoutMs <= 0) {
    throw new Error(`Invalid number for env var LLM_TIMEOUT_MS: "${timeoutMs}"`);
  }

  return {
    serviceName: optionalEnv("DOCS_SERVICE_NAME", env) ?? "docs",
    mongoUri: requireEnv("DOCS_MONGO_URI", env),
    auth: {
      secret: requireEnv("AUTH_JWT_SECRET", env),
      issuer: optionalEnv("AUTH_JWT_ISSUER", env),
      audience: optionalEnv("AUTH_JWT_AUDIENCE", env),
    },
    llm: {
      apiKey: requireEnv("LLM_API_KEY", env),
      baseUrl: urlEnv(
        "LLM_BASE_URL",
        "https://api.endpoints.anyscale.com/v1",
        env
      ),
      defaultModel: model.data,
      timeoutMs,
    },
    github: {
      apiUrl: urlEnv("GITHUB_API_URL", "https://api.github.com", env),
      token: optionalEnv("GITHUB_TOKEN", env),
    },
  };
}
