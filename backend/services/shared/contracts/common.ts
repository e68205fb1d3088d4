// backend/services/shared/contracts/common.ts
import { z, type ZodError } from "zod";
import type { ProblemIssue } from "../http/errors";

/** Opaque string id (UUID minted by the services). */
export const zId = z.string().trim().min(1).max(128);

export const zIdParam = z.object({ id: zId });

export function zodIssues(error: ZodError): ProblemIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
}

/** Strip undefined (stable wire format) */
export function clean(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
