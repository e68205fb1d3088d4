// backend/services/docs/src/services/identifierService.ts

/**
 * Walks a GitHub repository breadth-first and records every file/folder
 * worth documenting as a RepoNode, linked to its parent folder.
 */

import { randomUUID } from "crypto";
import type { RepoNode, RepoRecord } from "../contracts/docs";
import type { RepoStore } from "../repo/repoStore";
import {
  type GithubClient,
  type GithubContentEntry,
  parseGithubUrl,
} from "./githubClient";

const INCLUDE_PATTERN = /\.(py|js|ts|go|rb)$/;
// ~20k tokens for most models
export const MAX_FILE_BYTES = 99_000;

export function shouldSkip(
  entry: Pick<GithubContentEntry, "type" | "name" | "size">
): boolean {
  const { name } = entry;
  if (entry.type === "file") {
    const badName =
      name.startsWith("_") ||
      name.startsWith(".") ||
      name.endsWith(".d.ts") ||
      name.endsWith(".d.js") ||
      name.endsWith(".min.js") ||
      /test/i.test(name) ||
      !INCLUDE_PATTERN.test(name);
    return badName || (entry.size ?? 0) > MAX_FILE_BYTES;
  }
  if (entry.type === "dir") {
    return (
      name.startsWith("_") ||
      name.startsWith(".") ||
      name.startsWith("node_modules") ||
      /test/i.test(name)
    );
  }
  // symlinks, submodules
  return true;
}

export class IdentifierService {
  constructor(
    private readonly github: GithubClient,
    private readonly repos: RepoStore,
    private readonly newId: () => string = randomUUID
  ) {}

  async identify(githubUrl: string, userId: string): Promise<RepoRecord> {
    const { owner, repo, ref } = parseGithubUrl(githubUrl);
    const meta = await this.github.getRepository(owner, repo);

    const repoId = this.newId();
    const root: RepoNode = {
      id: this.newId(),
      githubUrl: meta.htmlUrl,
      relativePath: "",
      type: "dir",
      size: null,
      status: "NOT_STARTED",
      repo: repoId,
      owner: userId,
    };

    const docs: Record<string, RepoNode> = { [root.id]: root };
    const dependencies: Record<string, string | null> = { [root.id]: null };

    const queue: RepoNode[] = [root];
    while (queue.length > 0) {
      const parent = queue.shift();
      if (!parent) break;

      const entries = await this.github.listContents(
        owner,
        repo,
        parent.relativePath,
        ref
      );
      for (const entry of entries) {
        if (shouldSkip(entry)) continue;
        const node: RepoNode = {
          id: this.newId(),
          githubUrl: entry.html_url ?? `${meta.htmlUrl}/blob/${ref ?? meta.defaultBranch}/${entry.path}`,
          relativePath: entry.path,
          type: entry.type === "dir" ? "dir" : "file",
          size: entry.size || null,
          status: "NOT_STARTED",
          repo: repoId,
          owner: userId,
        };
        docs[node.id] = node;
        dependencies[node.id] = parent.id;
        if (node.type === "dir") queue.push(node);
      }
    }

    return this.repos.create({
      id: repoId,
      owner: userId,
      repoName: meta.fullName,
      rootDoc: root.id,
      status: "NOT_STARTED",
      dependencies,
      docs,
    });
  }
}
