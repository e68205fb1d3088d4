// backend/services/docs/src/repo/repoStore.ts
import { RepoModel, type RepoDb } from "../models/Repo";
import type { RepoRecord } from "../contracts/docs";

export interface RepoStore {
  create(repo: RepoRecord): Promise<RepoRecord>;
  findById(id: string): Promise<RepoRecord | null>;
  listIds(owner: string): Promise<string[]>;
}

function dbToDomain(doc: RepoDb): RepoRecord {
  return {
    id: doc._id,
    owner: doc.owner,
    repoName: doc.repoName,
    rootDoc: doc.rootDoc,
    status: doc.status,
    dependencies: doc.dependencies,
    docs: doc.docs,
  };
}

export class MongoRepoStore implements RepoStore {
  async create(repo: RepoRecord): Promise<RepoRecord> {
    const { id, ...rest } = repo;
    const created = await RepoModel.create({ _id: id, ...rest });
    return dbToDomain(created.toObject());
  }

  async findById(id: string): Promise<RepoRecord | null> {
    const doc = await RepoModel.findById(id).lean().exec();
    return doc ? dbToDomain(doc) : null;
  }

  async listIds(owner: string): Promise<string[]> {
    const docs = await RepoModel.find({ owner })
      .sort({ createdAt: 1 })
      .select({ _id: 1 })
      .lean()
      .exec();
    return docs.map((d) => d._id);
  }
}
