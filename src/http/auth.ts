import crypto from "node:crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { PipelineError } from "../pipeline/errors";

export function extractBearerToken(header: string | undefined): string | undefined {
  const match = (header ?? "").match(/^Bearer\s+(.+)$/i);
  const token = match?.[1]?.trim();
  return token ? token : undefined;
}

function digest(value: string): Buffer {
  return crypto.createHash("sha256").update(value, "utf8").digest();
}

/**
 * Compares fixed-length digests so the check takes the same time whatever
 * the presented token's length or content. An empty secret rejects everything.
 */
export function isAuthorized(header: string | undefined, secret: string): boolean {
  if (!secret) return false;
  const token = extractBearerToken(header);
  if (!token) return false;
  return crypto.timingSafeEqual(digest(token), digest(secret));
}

export function bearerAuth(secret: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.header("authorization");
    if (!extractBearerToken(header)) {
      return next(new PipelineError("Unauthorized", "Missing Bearer token"));
    }
    if (!isAuthorized(header, secret)) {
      return next(new PipelineError("Unauthorized", "Invalid authentication token"));
    }
    next();
  };
}
