// backend/services/docs/src/controllers/repos/handlers/list.ts
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { requireUser } from "../../../../../shared/middleware/authenticate";
import type { DocsContext } from "../../../context";

export function list(ctx: DocsContext) {
  return asyncHandler(async (req, res) => {
    const { uid } = requireUser(req);
    res.json({ repos: await ctx.repos.listIds(uid) });
  });
}
