// backend/services/docs/src/services/documentationService.ts
import type { Logger } from "pino";
import { badRequest, notFound } from "../../../shared/http/errors";
import type { LlmModel } from "../config";
import type { Documentation } from "../contracts/docs";
import type { DocumentationRepo } from "../repo/documentationRepo";
import type { GithubClient, GithubFile } from "./githubClient";
import type { JobRunner } from "./jobRunner";
import type { LlmClient } from "./llmClient";
import {
  fileDocPrompt,
  FILE_MARKDOWN_SYSTEM_PROMPT,
  FILE_SUMMARY_SYSTEM_PROMPT,
} from "./prompts";

export interface DocumentationServiceDeps {
  github: GithubClient;
  llm: LlmClient;
  docs: DocumentationRepo;
  jobs: JobRunner;
  defaultModel: LlmModel;
  log: Pick<Logger, "info" | "warn">;
}

export class DocumentationService {
  constructor(private readonly deps: DocumentationServiceDeps) {}

  /** Synchronous, short summary of a single file. */
  async generateDocForGithubFile(
    fileUrl: string,
    model: LlmModel = this.deps.defaultModel
  ): Promise<{ content: string }> {
    if (!fileUrl.trim()) throw badRequest("File url cannot be empty");

    const fileContent = await this.deps.github.readFile(fileUrl);
    const content = await this.deps.llm.generateText({
      model,
      system: FILE_SUMMARY_SYSTEM_PROMPT,
      prompt: fileContent,
      maxTokens: 500,
    });
    return { content };
  }

  /**
   * Validate the file upstream, record it as STARTED, and document it in the
   * background. Returns the new record id.
   */
  async enqueueGenerateFileDocJob(
    userId: string,
    githubUrl: string,
    model: LlmModel = this.deps.defaultModel
  ): Promise<string> {
    const file = await this.deps.github.getFile(githubUrl);
    const doc = await this.deps.docs.create({
      owner: userId,
      githubUrl,
      relativePath: file.path,
      model,
    });

    this.deps.jobs.schedule(`file-doc:${doc.id}`, () =>
      this.runFileDocJob(doc.id, model, file)
    );
    return doc.id;
  }

  async regenerateDoc(
    userId: string,
    docId: string,
    model: LlmModel = this.deps.defaultModel
  ): Promise<string> {
    const existing = await this.getUserDocumentation(userId, docId);
    if (existing.status === "STARTED") {
      throw badRequest(
        "Documentation is still being generated for this id, so it cannot be regenerated yet."
      );
    }

    await this.deps.docs.update(docId, { status: "STARTED", error: null, model });
    this.deps.jobs.schedule(`file-doc:${docId}`, () =>
      this.runFileDocJob(docId, model)
    );
    return docId;
  }

  async getUserDocumentation(
    userId: string,
    docId: string
  ): Promise<Documentation> {
    const doc = await this.deps.docs.findById(docId);
    // Another user's record is reported exactly like a missing one.
    if (!doc || doc.owner !== userId) {
      throw notFound(`Documentation with id='${docId}' not found`);
    }
    return doc;
  }

  async deleteUserDocumentation(userId: string, docId: string): Promise<void> {
    const doc = await this.getUserDocumentation(userId, docId);
    if (doc.status === "STARTED") {
      throw badRequest(
        "Data is still being generated for this id, so it cannot be deleted yet."
      );
    }
    await this.deps.docs.delete(docId);
  }

  private async runFileDocJob(
    docId: string,
    model: LlmModel,
    prefetched?: GithubFile
  ): Promise<void> {
    try {
      const file = prefetched ?? (await this.fetchFileFor(docId));
      const content = await this.deps.llm.generateText({
        model,
        system: FILE_MARKDOWN_SYSTEM_PROMPT,
        prompt: fileDocPrompt(file.name, file.content),
      });
      await this.deps.docs.update(docId, {
        status: "COMPLETED",
        content,
        error: null,
      });
      this.deps.log.info({ docId, model }, "file documentation completed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.deps.log.warn({ docId, model, err: message }, "file documentation failed");
      await this.deps.docs.update(docId, { status: "FAILED", error: message });
    }
  }

  private async fetchFileFor(docId: string): Promise<GithubFile> {
    const doc = await this.deps.docs.findById(docId);
    if (!doc) throw notFound(`Documentation with id='${docId}' not found`);
    return this.deps.github.getFile(doc.githubUrl);
  }
}
