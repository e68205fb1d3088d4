// backend/services/docs/src/controllers/fileDocs/handlers/regenerate.ts
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { requireUser } from "../../../../../shared/middleware/authenticate";
import { zIdParam } from "../../../../../shared/contracts/common";
import type { DocsContext } from "../../../context";
import { modelQueryDto } from "../../../validators/docs.dto";

export function regenerate(ctx: DocsContext) {
  return asyncHandler(async (req, res) => {
    const { uid } = requireUser(req);
    const { id } = zIdParam.parse(req.params);
    const { model } = modelQueryDto.parse(req.query);

    const docId = await ctx.documentation.regenerateDoc(uid, id, model);
    res.status(202).json({
      message: "Documentation regeneration has been started.",
      id: docId,
    });
  });
}
