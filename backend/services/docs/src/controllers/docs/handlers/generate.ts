// backend/services/docs/src/controllers/docs/handlers/generate.ts
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import type { DocsContext } from "../../../context";
import { generateDocDto } from "../../../validators/docs.dto";

/** POST /docs: document one GitHub file synchronously. */
export function generate(ctx: DocsContext) {
  return asyncHandler(async (req, res) => {
    const { url } = generateDocDto.parse(req.body);
    const result = await ctx.documentation.generateDocForGithubFile(url);
    res.json(result);
  });
}
