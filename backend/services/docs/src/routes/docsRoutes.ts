// backend/services/docs/src/routes/docsRoutes.ts
import { Router } from "express";
import type { DocsContext } from "../context";
import { generate } from "../controllers/docs/handlers/generate";

export function docsRoutes(ctx: DocsContext): Router {
  const router = Router();
  router.post("/docs", generate(ctx));
  return router;
}
