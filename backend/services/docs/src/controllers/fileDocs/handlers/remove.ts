// backend/services/docs/src/controllers/fileDocs/handlers/remove.ts
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { requireUser } from "../../../../../shared/middleware/authenticate";
import { zIdParam } from "../../../../../shared/contracts/common";
import type { DocsContext } from "../../../context";

export function remove(ctx: DocsContext) {
  return asyncHandler(async (req, res) => {
    const { uid } = requireUser(req);
    const { id } = zIdParam.parse(req.params);
    await ctx.documentation.deleteUserDocumentation(uid, id);
    res.json({
      message: `The data associated with id='${id}' was deleted.`,
      id,
    });
  });
}
