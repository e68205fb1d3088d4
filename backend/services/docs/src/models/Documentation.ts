// backend/services/docs/src/models/Documentation.ts
import { Schema, model } from "mongoose";
import { LLM_MODELS, type LlmModel } from "../config";
import { DOC_STATUSES, type DocStatus } from "../contracts/docs";

export interface DocumentationDb {
  _id: string;
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

const documentationSchema = new Schema<DocumentationDb>(
  {
    _id: { type: String, required: true },
    owner: { type: String, required: true, index: true },
    githubUrl: { type: String, required: true },
    relativePath: { type: String, default: "" },
    model: { type: String, enum: [...LLM_MODELS], required: true },
    status: { type: String, enum: [...DOC_STATUSES], required: true },
    content: { type: String, default: null },
    error: { type: String, default: null },
  },
  { timestamps: true, versionKey: false, collection: "documentation" }
);

export const DocumentationModel = model<DocumentationDb>(
  "Documentation",
  documentationSchema
);
