// backend/services/docs/test/helpers/memoryRepos.ts

/** In-memory stand-ins for the Mongo repositories. */

import type {
  Documentation,
  DocumentationPatch,
  NewDocumentation,
  RepoRecord,
} from "../../src/contracts/docs";
import type { DocumentationRepo } from "../../src/repo/documentationRepo";
import type { RepoStore } from "../../src/repo/repoStore";

export class InMemoryDocumentationRepo implements DocumentationRepo {
  readonly rows = new Map<string, Documentation>();
  private seq = 0;

  async create(input: NewDocumentation): Promise<Documentation> {
    const now = new Date();
    const doc: Documentation = {
      id: `doc-${++this.seq}`,
      ...input,
      status: "STARTED",
      content: null,
      error: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(doc.id, doc);
    return { ...doc };
  }

  async findById(id: string): Promise<Documentation | null> {
    const doc = this.rows.get(id);
    return doc ? { ...doc } : null;
  }

  async update(
    id: string,
    patch: DocumentationPatch
  ): Promise<Documentation | null> {
    const doc = this.rows.get(id);
    if (!doc) return null;
    const next = { ...doc, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return { ...next };
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }
}

export class InMemoryRepoStore implements RepoStore {
  readonly rows = new Map<string, RepoRecord>();

  async create(repo: RepoRecord): Promise<RepoRecord> {
    this.rows.set(repo.id, repo);
    return repo;
  }

  async findById(id: string): Promise<RepoRecord | null> {
    return this.rows.get(id) ?? null;
  }

  async listIds(owner: string): Promise<string[]> {
    return [...this.rows.values()]
      .filter((r) => r.owner === owner)
      .map((r) => r.id);
  }
}
