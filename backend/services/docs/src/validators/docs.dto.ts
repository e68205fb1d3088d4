// backend/services/docs/src/validators/docs.dto.ts
import { z } from "zod";
import { unprocessable } from "../../../shared/http/errors";
import { zLlmModel } from "../config";

/** POST /docs */
export const generateDocDto = z.object({
  url: z.string(),
});

/** POST /file-docs, POST /repos. Presence is checked by the handler (422). */
export const githubUrlDto = z.object({
  github_url: z.string().optional(),
});

/** ?model= on POST/PUT /file-docs */
export const modelQueryDto = z.object({
  model: zLlmModel.optional(),
});


export function requireGithubUrl(body: unknown): string {
  const { github_url } = githubUrlDto.parse(body ?? {});
  if (!github_url || !github_url.trim()) {
    throw unprocessable("Required field 'github_url' is missing.");
  }
  return github_url.trim();
}
