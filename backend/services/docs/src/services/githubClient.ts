// backend/services/docs/src/services/githubClient.ts

/**
 * Thin GitHub REST client (contents + repository metadata).
 *
 * Notes:
 * - Upstream 404 surfaces as our 404; every other upstream failure is a 502.
 * - Response bodies are validated with zod before anything reads them.
 */

import axios, { type AxiosAdapter, type AxiosInstance, isAxiosError } from "axios";
import { z } from "zod";
import {
  badGateway,
  badRequest,
  HttpError,
  notFound,
} from "../../../shared/http/errors";

export interface GithubUrlParts {
  owner: string;
  repo: string;
  ref?: string;
  /** Path inside the repository; "" for the root. */
  path: string;
}

export class InvalidGithubUrlError extends HttpError {
  constructor(url: string) {
    super(400, `Invalid GitHub url: "${url}"`, { code: "INVALID_GITHUB_URL" });
    this.name = "InvalidGithubUrlError";
  }
}

/**
 * https://github.com/<owner>/<repo>[/blob|tree/<ref>/<path...>]
 */
export function parseGithubUrl(url: string): GithubUrlParts {
  let parts: string[];
  try {
    parts = new URL(url).pathname
      .split("/")
      .filter(Boolean)
      .map((s) => decodeURIComponent(s));
  } catch {
    throw new InvalidGithubUrlError(url);
  }
  if (parts.length < 2) throw new InvalidGithubUrlError(url);

  const [owner, repo, kind, ref] = parts;
  return {
    owner,
    repo,
    ref: (kind === "blob" || kind === "tree") && ref ? ref : undefined,
    path: parts.slice(4).join("/"),
  };
}

const zContentEntry = z.object({
  type: z.string(),
  name: z.string(),
  path: z.string(),
  size: z.number().nullish(),
  html_url: z.string().nullish(),
  content: z.string().optional(),
  encoding: z.string().nullish(),
});
export type GithubContentEntry = z.infer<typeof zContentEntry>;

const zContents = z.union([z.array(zContentEntry), zContentEntry]);

const zRepository = z.object({
  full_name: z.string(),
  html_url: z.string(),
  default_branch: z.string(),
});

export interface GithubRepository {
  fullName: string;
  htmlUrl: string;
  defaultBranch: string;
}

export interface GithubFile {
  name: string;
  path: string;
  htmlUrl: string;
  size: number;
  content: string;
}

export interface GithubClientOptions {
  apiUrl: string;
  token?: string;
  timeoutMs?: number;
  /** Swap the transport (tests). */
  adapter?: AxiosAdapter;
}

function encodePath(p: string): string {
  return p.split("/").filter(Boolean).map(encodeURIComponent).join("/");
}

function upstreamError(err: unknown, what: string): HttpError {
  if (err instanceof HttpError) return err;
  if (isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 404) return notFound(`GitHub ${what} not found`);
    return badGateway(
      `GitHub request for ${what} failed${status ? ` (${status})` : ""}: ${err.message}`,
      { cause: err }
    );
  }
  if (err instanceof z.ZodError) {
    return badGateway(`Unexpected GitHub response for ${what}`, { cause: err });
  }
  return badGateway(`GitHub request for ${what} failed`, { cause: err });
}

export class GithubClient {
  private readonly http: AxiosInstance;

  constructor(opts: GithubClientOptions) {
    this.http = axios.create({
      baseURL: opts.apiUrl,
      timeout: opts.timeoutMs ?? 10_000,
      adapter: opts.adapter,
      headers: {
        Accept: "application/vnd.github+json",
        ...(opts.token ? { Authorization: `token ${opts.token}` } : {}),
      },
    });
  }

  async getRepository(owner: string, repo: string): Promise<GithubRepository> {
    const what = `repository ${owner}/${repo}`;
    try {
      const { data } = await this.http.get(
        `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`
      );
      const r = zRepository.parse(data);
      return {
        fullName: r.full_name,
        htmlUrl: r.html_url,
        defaultBranch: r.default_branch,
      };
    } catch (err) {
      throw upstreamError(err, what);
    }
  }

  /** Directory listing; a file path yields a single entry. */
  async listContents(
    owner: string,
    repo: string,
    path: string,
    ref?: string
  ): Promise<GithubContentEntry[]> {
    const data = await this.contents(owner, repo, path, ref);
    return Array.isArray(data) ? data : [data];
  }

  async getFile(url: string): Promise<GithubFile> {
    const { owner, repo, ref, path } = parseGithubUrl(url);
    const data = await this.contents(owner, repo, path, ref);
    if (Array.isArray(data) || data.type === "dir") {
      throw badRequest(`${url} is a folder, not a file.`);
    }
    if (data.encoding !== "base64" || data.content === undefined) {
      throw badGateway("Could not decode file content");
    }
    return {
      name: data.name,
      path: data.path,
      htmlUrl: data.html_url ?? url,
      size: data.size ?? 0,
      content: Buffer.from(data.content, "base64").toString("utf8"),
    };
  }

  async readFile(url: string): Promise<string> {
    return (await this.getFile(url)).content;
  }

  private async contents(
    owner: string,
    repo: string,
    path: string,
    ref?: string
  ) {
    const what = `contents ${owner}/${repo}/${path}`;
    try {
      const { data } = await this.http.get(
        `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/contents/${encodePath(path)}`,
        { params: ref ? { ref } : undefined }
      );
      return zContents.parse(data);
    } catch (err) {
      throw upstreamError(err, what);
    }
  }
}

/** `repodocs run <this module> <github-file-url>` prints the file. */
export async function main(args: string[]): Promise<void> {
  const [url] = args;
  if (!url) throw new Error("usage: githubClient <github-file-url>");
  const client = new GithubClient({
    apiUrl: process.env.GITHUB_API_URL?.trim() || "https://api.github.com",
    token: process.env.GITHUB_TOKEN?.trim() || undefined,
  });
  process.stdout.write((await client.readFile(url)) + "\n");
}
