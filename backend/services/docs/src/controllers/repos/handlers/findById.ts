// backend/services/docs/src/controllers/repos/handlers/findById.ts
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { requireUser } from "../../../../../shared/middleware/authenticate";
import { zIdParam } from "../../../../../shared/contracts/common";
import { notFound } from "../../../../../shared/http/errors";
import type { DocsContext } from "../../../context";
import { formatRepo } from "../../../services/repoFormatter";

export function findById(ctx: DocsContext) {
  return asyncHandler(async (req, res) => {
    const { uid } = requireUser(req);
    const { id } = zIdParam.parse(req.params);
    const repo = await ctx.repos.findById(id);
    if (!repo || repo.owner !== uid) {
      throw notFound(`Repository with id='${id}' not found`);
    }
    res.json({ repo: formatRepo(repo) });
  });
}
