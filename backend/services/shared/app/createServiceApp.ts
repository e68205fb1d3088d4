// backend/services/shared/app/createServiceApp.ts

/**
 * Shared Express builder.
 *
 * Stack order: requestId → http logger → cors → health → json parser →
 * routes → 404 → error handler. Health stays open; auth is per-route.
 */

import express, { type Express } from "express";
import cors, { type CorsOptions } from "cors";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug, used in logs and health payloads. */
  serviceName: string;
  /** API base path (e.g. "/api"); "" mounts routes at the root. */
  apiPrefix: string;
  mountRoutes: (router: express.Router) => void;
  readiness?: ReadinessFn;
  version?: string;
  /** Defaults to allowing any origin. */
  cors?: CorsOptions;
  jsonLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, readiness, version } = opts;

  const app = express();
  app.disable("x-powered-by");

  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));
  app.use(cors(opts.cors ?? { origin: true }));

  app.use(createHealthRouter({ service: serviceName, version, readiness }));

  app.use(express.json({ limit: opts.jsonLimit ?? "1mb" }));

  const api = express.Router();
  mountRoutes(api);
  if (apiPrefix) app.use(apiPrefix, api);
  else app.use(api);

  app.use(notFoundProblemJson([apiPrefix || "/"]));
  app.use(errorProblemJson());

  return app;
}
