// backend/services/shared/http/errors.ts

/**
 * Throwable HTTP errors. Handlers throw (or next()) these; the shared
 * errorProblemJson() formatter turns them into RFC 7807 Problem+JSON.
 */

export interface ProblemIssue {
  path: string;
  code: string;
  message: string;
}

export interface HttpErrorOptions {
  title?: string;
  type?: string;
  code?: string;
  headers?: Record<string, string>;
  errors?: ProblemIssue[];
  cause?: unknown;
}

export class HttpError extends Error {
  public readonly title?: string;
  public readonly type: string;
  public readonly code?: string;
  public readonly headers: Record<string, string>;
  public readonly errors?: ProblemIssue[];

  constructor(
    public readonly status: number,
    detail: string,
    opts: HttpErrorOptions = {}
  ) {
    super(detail, { cause: opts.cause });
    this.name = "HttpError";
    this.title = opts.title;
    this.type = opts.type ?? "about:blank";
    this.code = opts.code;
    this.headers = opts.headers ?? {};
    this.errors = opts.errors;
  }
}

export const badRequest = (detail: string, opts?: HttpErrorOptions) =>
  new HttpError(400, detail, { code: "BAD_REQUEST", ...opts });

export const unauthorized = (detail: string, opts?: HttpErrorOptions) =>
  new HttpError(401, detail, { code: "UNAUTHORIZED", ...opts });

export const notFound = (detail = "Resource not found", opts?: HttpErrorOptions) =>
  new HttpError(404, detail, { code: "NOT_FOUND", ...opts });

export const unprocessable = (detail: string, opts?: HttpErrorOptions) =>
  new HttpError(422, detail, { code: "UNPROCESSABLE_ENTITY", ...opts });

export const badGateway = (detail: string, opts?: HttpErrorOptions) =>
  new HttpError(502, detail, { code: "BAD_GATEWAY", ...opts });

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof HttpError;
}
