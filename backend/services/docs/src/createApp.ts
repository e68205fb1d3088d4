// backend/services/docs/src/createApp.ts
import type { Express, Router } from "express";
import { createServiceApp } from "../../shared/app/createServiceApp";
import type { DocsContext } from "./context";
import { apiDocsRoutes } from "./routes/apiDocsRoutes";
import { docsRoutes } from "./routes/docsRoutes";
import { fileDocsRoutes } from "./routes/fileDocsRoutes";
import { helloRoutes } from "./routes/helloRoutes";
import { repoRoutes } from "./routes/repoRoutes";

export function createApp(ctx: DocsContext): Express {
  // Mount routes (one-liners only)
  function mountRoutes(api: Router) {
    api.use(helloRoutes());
    api.use(apiDocsRoutes(ctx.config.serviceName));
    api.use(docsRoutes(ctx));
    api.use("/file-docs", fileDocsRoutes(ctx));
    api.use("/repos", repoRoutes(ctx));
  }

  return createServiceApp({
    serviceName: ctx.config.serviceName,
    apiPrefix: "",
    readiness: ctx.readiness,
    mountRoutes,
  });
}
