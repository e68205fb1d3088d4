// backend/services/shared/middleware/authenticate.ts
import type { Request, RequestHandler } from "express";
import jwt, { type JwtPayload } from "jsonwebtoken";
import { unauthorized } from "../http/errors";

/** What we expect to live on req.user */
export interface AuthUser {
  uid: string;
  claims: JwtPayload;
}

/** Module augmentation: add `user` to Express.Request */
declare module "express-serve-static-core" {
  interface Request {
    user?: AuthUser;
  }
}

export interface AuthOptions {
  secret: string;
  issuer?: string;
  audience?: string;
}

export function getBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, token] = header.trim().split(/\s+/, 2);
  if (!scheme || scheme.toLowerCase() !== "bearer" || !token) return null;
  return token;
}

function userIdOf(payload: JwtPayload): string | undefined {
  const uid = payload["uid"];
  if (typeof uid === "string" && uid) return uid;
  return payload.sub || undefined;
}

/**
 * Bearer JWT gate. The caller's user id is the `uid` claim, falling back to `sub`.
 * Failures are thrown as 401 HttpErrors for errorProblemJson() to render.
 */
export function authenticate(opts: AuthOptions): RequestHandler {
  return (req, res, next) => {
    const token = getBearerToken(req.headers.authorization);
    if (!token) {
      return next(
        unauthorized("Bearer authentication is needed", {
          headers: { "WWW-Authenticate": 'Bearer realm="auth_required"' },
        })
      );
    }

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, opts.secret, {
        algorithms: ["HS256"],
        issuer: opts.issuer,
        audience: opts.audience,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return next(
        unauthorized(`Invalid authentication token. ${reason}`, {
          headers: { "WWW-Authenticate": 'Bearer error="invalid_token"' },
          cause: err,
        })
      );
    }

    const uid = typeof decoded === "object" ? userIdOf(decoded) : undefined;
    if (typeof decoded !== "object" || !uid) {
      return next(
        unauthorized("Invalid authentication token. missing subject", {
          headers: { "WWW-Authenticate": 'Bearer error="invalid_token"' },
        })
      );
    }

    req.user = { uid, claims: decoded };
    res.setHeader("WWW-Authenticate", 'Bearer realm="auth_required"');
    return next();
  };
}

/** The authenticated caller; only valid behind authenticate(). */
export function requireUser(req: Request): AuthUser {
  if (!req.user) throw unauthorized("Bearer authentication is needed");
  return req.user;
}
