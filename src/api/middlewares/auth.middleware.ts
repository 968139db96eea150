/**
 * Service Authentication
 *
 * Every portal route runs a workflow under the operator's client
 * certificate, so callers must present SERVICE_SECRET as a bearer token.
 * Status routes are mounted before this middleware and stay public.
 */
import { timingSafeEqual } from "crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import config from "../../config";
import { logger } from "../../monitoring/logger";

const BEARER_PREFIX = "Bearer ";

/** Token from an `Authorization: Bearer <token>` header, if present */
export function bearerToken(header: string | undefined): string | undefined {
  if (!header?.startsWith(BEARER_PREFIX)) return undefined;
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token || undefined;
}

/**
 * Constant-time comparison. Lengths differ only when the token is wrong,
 * and the length of the secret is not treated as confidential.
 */
export function secretMatches(token: string, secret: string): boolean {
  const given = Buffer.from(token, "utf8");
  const expected = Buffer.from(secret, "utf8");
  return given.length === expected.length && timingSafeEqual(given, expected);
}

export function createAuthMiddleware(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = bearerToken(req.headers.authorization);

    if (token === undefined) {
      logger.warn({ ip: req.ip, path: req.path }, "Portal request without bearer token");
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    if (!secretMatches(token, secret)) {
      logger.warn({ ip: req.ip, path: req.path }, "Portal request with wrong service secret");
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    next();
  };
}

export const authMiddleware = createAuthMiddleware(config.serviceSecret);
