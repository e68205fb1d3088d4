// backend/services/docs/src/repo/documentationRepo.ts
import { randomUUID } from "crypto";
import {
  DocumentationModel,
  type DocumentationDb,
} from "../models/Documentation";
import type {
  Documentation,
  DocumentationPatch,
  NewDocumentation,
} from "../contracts/docs";

export interface DocumentationRepo {
  create(input: NewDocumentation): Promise<Documentation>;
  findById(id: string): Promise<Documentation | null>;
  update(id: string, patch: DocumentationPatch): Promise<Documentation | null>;
  delete(id: string): Promise<boolean>;
}

function dbToDomain(doc: DocumentationDb): Documentation {
  return {
    id: doc._id,
    owner: doc.owner,
    githubUrl: doc.githubUrl,
    relativePath: doc.relativePath,
    model: doc.model,
    status: doc.status,
    content: doc.content ?? null,
    error: doc.error ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoDocumentationRepo implements DocumentationRepo {
  async create(input: NewDocumentation): Promise<Documentation> {
    const created = await DocumentationModel.create({
      _id: randomUUID(),
      ...input,
      status: "STARTED",
      content: null,
      error: null,
    });
    return dbToDomain(created.toObject());
  }

  async findById(id: string): Promise<Documentation | null> {
    const doc = await DocumentationModel.findById(id).lean().exec();
    return doc ? dbToDomain(doc) : null;
  }

  async update(
    id: string,
    patch: DocumentationPatch
  ): Promise<Documentation | null> {
    const doc = await DocumentationModel.findByIdAndUpdate(
      id,
      { $set: patch },
      { new: true }
    )
      .lean()
      .exec();
    return doc ? dbToDomain(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const res = await DocumentationModel.deleteOne({ _id: id }).exec();
    return res.deletedCount > 0;
  }
}
