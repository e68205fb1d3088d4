// backend/services/docs/src/contracts/docs.ts
import type { LlmModel } from "../config";

export const DOC_STATUSES = ["STARTED", "COMPLETED", "FAILED"] as const;
export type DocStatus = (typeof DOC_STATUSES)[number];

/** Per-node status inside a walked repository. */
export const NODE_STATUSES = [
  "NOT_STARTED",
  "STARTED",
  "COMPLETED",
  "FAILED",
] as const;
export type NodeStatus = (typeof NODE_STATUSES)[number];

export interface Documentation {
  id: string;
  owner: string;
  githubUrl: string;
  relativePath: string;
  model: LlmModel;
  status: DocStatus;
  content: string | null;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewDocumentation {
  owner: string;
  githubUrl: string;
  relativePath: string;
  model: LlmModel;
}

export type DocumentationPatch = Partial<
  Pick<Documentation, "status" | "content" | "error" | "model">
>;

export type NodeType = "file" | "dir";

export interface RepoNode {
  id: string;
  githubUrl: string;
  relativePath: string;
  type: NodeType;
  size: number | null;
  status: NodeStatus;
  repo: string;
  owner: string;
}

export interface RepoRecord {
  id: string;
  owner: string;
  repoName: string;
  rootDoc: string;
  status: NodeStatus;
  /** child id -> parent id (null for the root) */
  dependencies: Record<string, string | null>;
  docs: Record<string, RepoNode>;
}

// ── wire shapes ──────────────────────────────────────────────────────────────

export interface FileDocsView {
  id: string;
  github_url: string;
  status: DocStatus;
  content: string | null;
}

export function toFileDocsView(doc: Documentation): FileDocsView {
  return {
    id: doc.id,
    github_url: doc.githubUrl,
    status: doc.status,
    content: doc.content,
  };
}
