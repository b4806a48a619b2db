import crypto from "node:crypto";
import type { Request, Response, NextFunction } from "express";

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const existing = req.header("x-request-id")?.trim();
  const requestId = existing && REQUEST_ID_PATTERN.test(existing) ? existing : crypto.randomUUID();
  res.setHeader("x-request-id", requestId);
  res.locals.requestId = requestId;
  next();
}

export function getRequestId(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : "unknown";
}
