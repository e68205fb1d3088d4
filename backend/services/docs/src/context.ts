// backend/services/docs/src/context.ts

/**
 * Everything a handler needs, wired once per app instance. Tests build one
 * around in-memory repos and fake upstream transports.
 */

import type { Logger } from "pino";
import type { ReadinessFn } from "../../shared/health";
import { logger } from "../../shared/utils/logger";
import type { DocsConfig } from "./config";
import type { DocumentationRepo } from "./repo/documentationRepo";
import type { RepoStore } from "./repo/repoStore";
import { DocumentationService } from "./services/documentationService";
import { GithubClient } from "./services/githubClient";
import { IdentifierService } from "./services/identifierService";
import { JobRunner } from "./services/jobRunner";
import { ChatCompletionsClient, type LlmClient } from "./services/llmClient";

export interface DocsContext {
  config: DocsConfig;
  log: Logger;
  github: GithubClient;
  llm: LlmClient;
  docs: DocumentationRepo;
  repos: RepoStore;
  jobs: JobRunner;
  documentation: DocumentationService;
  identifier: IdentifierService;
  readiness?: ReadinessFn;
}

export interface ContextDeps {
  docs: DocumentationRepo;
  repos: RepoStore;
  github?: GithubClient;
  llm?: LlmClient;
  log?: Logger;
  readiness?: ReadinessFn;
  newId?: () => string;
}

export function buildContext(config: DocsConfig, deps: ContextDeps): DocsContext {
  const log = deps.log ?? logger;
  const github =
    deps.github ??
    new GithubClient({ apiUrl: config.github.apiUrl, token: config.github.token });
  const llm =
    deps.llm ??
    new ChatCompletionsClient({
      baseUrl: config.llm.baseUrl,
      apiKey: config.llm.apiKey,
      timeoutMs: config.llm.timeoutMs,
    });
  const jobs = new JobRunner(log);

  return {
    config,
    log,
    github,
    llm,
    docs: deps.docs,
    repos: deps.repos,
    jobs,
    documentation: new DocumentationService({
      github,
      llm,
      docs: deps.docs,
      jobs,
      defaultModel: config.llm.defaultModel,
      log,
    }),
    identifier: new IdentifierService(github, deps.repos, deps.newId),
    readiness: deps.readiness,
  };
}
