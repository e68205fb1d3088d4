// backend/services/docs/src/models/Repo.ts
import { Schema, model } from "mongoose";
import {
  NODE_STATUSES,
  type NodeStatus,
  type RepoNode,
} from "../contracts/docs";

export interface RepoDb {
  _id: string;
  owner: string;
  repoName: string;
  rootDoc: string;
  status: NodeStatus;
  dependencies: Record<string, string | null>;
  docs: Record<string, RepoNode>;
  createdAt: Date;
  updatedAt: Date;
}

// dependencies/docs are keyed by node id; kept as plain objects.
const repoSchema = new Schema<RepoDb>(
  {
    _id: { type: String, required: true },
    owner: { type: String, required: true, index: true },
    repoName: { type: String, required: true },
    rootDoc: { type: String, required: true },
    status: { type: String, enum: [...NODE_STATUSES], required: true },
    dependencies: { type: Schema.Types.Mixed, default: {} },
    docs: { type: Schema.Types.Mixed, default: {} },
  },
  {
    timestamps: true,
    versionKey: false,
    minimize: false,
    collection: "repos",
  }
);

export const RepoModel = model<RepoDb>("Repo", repoSchema);
