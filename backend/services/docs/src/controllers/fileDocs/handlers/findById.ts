// backend/services/docs/src/controllers/fileDocs/handlers/findById.ts
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { requireUser } from "../../../../../shared/middleware/authenticate";
import { zIdParam } from "../../../../../shared/contracts/common";
import type { DocsContext } from "../../../context";
import { toFileDocsView } from "../../../contracts/docs";

export function findById(ctx: DocsContext) {
  return asyncHandler(async (req, res) => {
    const { uid } = requireUser(req);
    const { id } = zIdParam.parse(req.params);
    const doc = await ctx.documentation.getUserDocumentation(uid, id);
    res.json(toFileDocsView(doc));
  });
}
