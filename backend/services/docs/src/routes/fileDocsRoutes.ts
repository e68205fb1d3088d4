// backend/services/docs/src/routes/fileDocsRoutes.ts
import { Router } from "express";
import { authenticate } from "../../../shared/middleware/authenticate";
import type { DocsContext } from "../context";
import { create } from "../controllers/fileDocs/handlers/create";
import { findById } from "../controllers/fileDocs/handlers/findById";
import { remove } from "../controllers/fileDocs/handlers/remove";
import { regenerate } from "../controllers/fileDocs/handlers/regenerate";

// one-liners only; every route needs a bearer token
export function fileDocsRoutes(ctx: DocsContext): Router {
  const router = Router();
  router.use(authenticate(ctx.config.auth));

  router.post("/", create(ctx));
  router.get("/:id", findById(ctx));
  router.put("/:id", regenerate(ctx));
  router.delete("/:id", remove(ctx));
  return router;
}
