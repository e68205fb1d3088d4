// backend/services/docs/src/controllers/repos/handlers/create.ts
import { asyncHandler } from "../../../../../shared/middleware/asyncHandler";
import { requireUser } from "../../../../../shared/middleware/authenticate";
import type { DocsContext } from "../../../context";
import { formatRepo } from "../../../services/repoFormatter";
import { requireGithubUrl } from "../../../validators/docs.dto";

/** POST /repos: walk the repository now and store its tree. */
export function create(ctx: DocsContext) {
  return asyncHandler(async (req, res) => {
    const { uid } = requireUser(req);
    const githubUrl = requireGithubUrl(req.body);
    const repo = await ctx.identifier.identify(githubUrl, uid);
    req.log.info(
      { repoId: repo.id, nodes: Object.keys(repo.docs).length },
      "repository identified"
    );
    res.status(201).json({ repo: formatRepo(repo) });
  });
}
