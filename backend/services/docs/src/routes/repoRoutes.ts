// backend/services/docs/src/routes/repoRoutes.ts
import { Router } from "express";
import { authenticate } from "../../../shared/middleware/authenticate";
import type { DocsContext } from "../context";
import { create } from "../controllers/repos/handlers/create";
import { list } from "../controllers/repos/handlers/list";
import { findById } from "../controllers/repos/handlers/findById";

export function repoRoutes(ctx: DocsContext): Router {
  const router = Router();
  router.use(authenticate(ctx.config.auth));

  router.post("/", create(ctx));
  router.get("/", list(ctx));
  router.get("/:id", findById(ctx));
  return router;
}
