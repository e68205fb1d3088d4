// backend/services/docs/src/controllers/fileDocs/handlers/create.ts
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { requireUser } from "../../../../../shared/middleware/authenticate";
import type { DocsContext } from "../../../context";
import {
  modelQueryDto,
  requireGithubUrl,
} from "../../../validators/docs.dto";

export function create(ctx: DocsContext) {
  return asyncHandler(async (req, res) => {
    const { uid } = requireUser(req);
    const { model } = modelQueryDto.parse(req.query);
    const githubUrl = requireGithubUrl(req.body);

    const id = await ctx.documentation.enqueueGenerateFileDocJob(
      uid,
      githubUrl,
      model
    );
    req.log.info({ docId: id, model }, "file documentation started");

    res.status(202).json({
      message: "Documentation generation has been started.",
      id,
    });
  });
}
