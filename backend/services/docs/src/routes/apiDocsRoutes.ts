// backend/services/docs/src/routes/apiDocsRoutes.ts
import { Router } from "express";
import {
  buildOpenApiDocument,
  redocHtml,
  swaggerUiHtml,
} from "../openapi";

export function apiDocsRoutes(serviceName: string): Router {
  const router = Router();
  const document = buildOpenApiDocument(serviceName);

  router.get("/openapi.json", (_req, res) => {
    res.json(document);
  });
  router.get("/docs", (_req, res) => {
    res.type("html").send(swaggerUiHtml("/openapi.json", serviceName));
  });
  router.get("/redoc", (_req, res) => {
    res.type("html").send(redocHtml("/openapi.json", serviceName));
  });
  return router;
}
