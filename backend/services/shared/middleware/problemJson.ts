// backend/services/shared/middleware/problemJson.ts

/**
 * RFC 7807 Problem+JSON formatting for every error a route produces.
 *
 * Notes:
 * - 404s are formatted only under known prefixes; anything else gets a bare 404.
 * - HttpError carries status/code/headers; ZodError becomes a 400 with issues;
 *   anything carrying a numeric `status`/`statusCode` (body-parser, etc.) keeps it.
 * - 5xx detail is never echoed back unless the error was an HttpError.
 */

import { STATUS_CODES } from "http";
import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { isHttpError, type ProblemIssue } from "../http/errors";
import { clean, zodIssues } from "../contracts/common";
import { extractLogContext, logger } from "../utils/logger";

const PROBLEM_TYPE = "application/problem+json";

function titleFor(status: number): string {
  return STATUS_CODES[status] ?? "Error";
}

export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      return res
        .status(404)
        .type(PROBLEM_TYPE)
        .json(
          clean({
            type: "about:blank",
            title: titleFor(404),
            status: 404,
            detail: "Route not found",
            instance: req.id !== undefined ? String(req.id) : undefined,
          })
        );
    }
    return res.status(404).end();
  };
}

interface NormalizedError {
  status: number;
  type: string;
  title: string;
  detail: string;
  code?: string;
  errors?: ProblemIssue[];
  headers: Record<string, string>;
}

function statusOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  const raw =
    ("statusCode" in err ? err.statusCode : undefined) ??
    ("status" in err ? err.status : undefined);
  const n = Number(raw);
  return Number.isInteger(n) && n >= 400 && n <= 599 ? n : 500;
}

export function normalizeError(err: unknown): NormalizedError {
  if (isHttpError(err)) {
    return {
      status: err.status,
      type: err.type,
      title: err.title ?? titleFor(err.status),
      detail: err.message,
      code: err.code,
      errors: err.errors,
      headers: err.headers,
    };
  }
  if (err instanceof ZodError) {
    return {
      status: 400,
      type: "about:blank",
      title: titleFor(400),
      detail: "Validation failed",
      code: "BAD_REQUEST",
      errors: zodIssues(err),
      headers: {},
    };
  }
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : "Unexpected error";
  return {
    status,
    type: "about:blank",
    title: titleFor(status),
    detail: status >= 500 ? "Internal server error" : message,
    headers: {},
  };
}

export function errorProblemJson() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const problem = normalizeError(err);

    const ctx = extractLogContext(req);
    if (problem.status >= 500) {
      logger.error({ ...ctx, status: problem.status, err }, "request error");
    } else {
      logger.debug(
        { ...ctx, status: problem.status, code: problem.code },
        problem.detail
      );
    }

    if (res.headersSent) return;

    for (const [name, value] of Object.entries(problem.headers)) {
      res.setHeader(name, value);
    }

    res
      .status(problem.status)
      .type(PROBLEM_TYPE)
      .json(
        clean({
          type: problem.type,
          title: problem.title,
          status: problem.status,
          detail: problem.detail,
          instance: req.id !== undefined ? String(req.id) : undefined,
          code: problem.code,
          errors: problem.errors,
        })
      );
  };
}
