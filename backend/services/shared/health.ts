// backend/services/shared/health.ts

/**
 * Liveness and readiness endpoints shared by every service.
 *
 * Notes:
 * - Liveness is local only; never call out to a dependency from it.
 * - Readiness takes an optional fast check; a throw means 503 "not ready".
 */

import express from "express";
import { asyncHandler } from "./middleware/asyncHandler";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = (
  req: express.Request
) => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  env?: string;
  version?: string;
  readiness?: ReadinessFn;
};

function getReqId(req: express.Request): string | undefined {
  return req.id !== undefined ? String(req.id) : undefined;
}

/**
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> liveness
 *   GET /health/ready   -> readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  const liveness = (req: express.Request, res: express.Response) => {
    res.json({ ...base, ok: true, requestId: getReqId(req) });
  };

  const readiness = asyncHandler(async (req, res) => {
    try {
      const details = opts.readiness ? await opts.readiness(req) : {};
      res.json({ ...base, ok: true, requestId: getReqId(req), ...details });
    } catch (err) {
      res.status(503).json({
        ...base,
        ok: false,
        requestId: getReqId(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  router.get("/health", liveness);
  router.get("/health/live", liveness);
  router.get("/health/ready", readiness);
  router.get("/healthz", liveness);
  router.get("/readyz", readiness);

  return router;
}
