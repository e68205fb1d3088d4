// backend/services/shared/middleware/requestId.ts

/**
 * Request correlation id.
 *
 * Notes:
 * - Must run before the http logger so every record carries the id.
 * - Never overwrites a caller-supplied id; mints a UUID only when the request
 *   has none of `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 * - Echoed back as `x-request-id`; downstream code reads `req.id`.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { RequestHandler } from "express";
import { randomUUID } from "crypto";

export function headerRequestId(
  headers: IncomingHttpHeaders
): string | undefined {
  const hdr =
    headers["x-request-id"] ||
    headers["x-correlation-id"] ||
    headers["x-amzn-trace-id"];
  const first = Array.isArray(hdr) ? hdr[0] : hdr;
  return first && first.trim() ? first.trim() : undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = headerRequestId(req.headers) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
