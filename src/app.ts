import { performance } from "node:perf_hooks";
import express from "express";
import { z } from "zod";
import type { ModelState } from "./engine/modelCache";
import { bearerAuth } from "./http/auth";
import { HttpError, bodyParserErrorDetail, isAbortError, toErrorBody } from "./http/errors";
import { getRequestId, requestIdMiddleware } from "./http/requestId";
import { errorMessage, logError, logLine } from "./log";
import { PipelineError } from "./pipeline/errors";
import type { ExtractRequest, ExtractionResult } from "./pipeline/orchestrator";

export interface ExtractionService {
  extract(req: ExtractRequest): Promise<ExtractionResult>;
}

export interface ModelStatus {
  state(): ModelState;
  isLoaded(): boolean;
}

export type AppDeps = {
  apiToken: string;
  service: ExtractionService;
  models: ModelStatus;
};

export const extractVocalsBody = z.object({
  mp3_url: z
    .string({ required_error: "mp3_url is required", invalid_type_error: "mp3_url must be a string" })
    .trim()
    .url("mp3_url must be a valid URL")
    .refine((value) => /^https?:\/\//i.test(value), "mp3_url must use http or https"),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(requestIdMiddleware);
  app.use((_req, res, next) => {
    res.locals.acceptedAt = performance.now();
    next();
  });

  app.get("/health", (_req, res) => {
    if (deps.models.state() === "failed") {
      return res.status(503).json({ status: "unhealthy", model_loaded: false });
    }
    return res.json({ status: "healthy", model_loaded: deps.models.isLoaded() });
  });

  app.post("/extract-vocals", bearerAuth(deps.apiToken), express.json({ limit: "64kb" }), async (req, res, next) => {
    const requestId = getRequestId(res);
    const acceptedAt: unknown = res.locals.acceptedAt;
    const parsed = extractVocalsBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      return next(new PipelineError("InvalidRequest", describeIssues(parsed.error)));
    }

    // Cleanup does not depend on this: it only stops work the client can no longer receive.
    const disconnect = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) disconnect.abort();
    });

    try {
      const result = await deps.service.extract({
        sourceUrl: parsed.data.mp3_url,
        correlationId: requestId,
        acceptedAt: typeof acceptedAt === "number" ? acceptedAt : undefined,
        signal: disconnect.signal,
      });
      return res.json({
        vocals_url: result.vocalsUrl,
        processing_time_seconds: result.processingTimeSeconds,
      });
    } catch (err) {
      next(err);
    }
  });

  app.use((_req, _res, next) => next(new HttpError(404, "Not found")));

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // If the peer disconnected, don't try to write a response.
    if (res.headersSent || res.writableEnded || res.destroyed) {
      if (!isAbortError(err)) logError(`[${getRequestId(res)}]`, "error_after_response", { message: errorMessage(err) });
      return;
    }

    const bodyDetail = bodyParserErrorDetail(err);
    if (bodyDetail) {
      return res.status(422).json(toErrorBody(new HttpError(422, bodyDetail)));
    }
    if (err instanceof PipelineError || err instanceof HttpError) {
      if (err.statusCode >= 500) {
        logLine(`[${getRequestId(res)}]`, "request_failed", {
          path: req.path,
          status: err.statusCode,
          message: err.message,
        });
      }
      return res.status(err.statusCode).json(toErrorBody(err));
    }

    logError(`[${getRequestId(res)}]`, "unhandled_error", {
      message: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    return res.status(500).json(toErrorBody(new HttpError(500, "Internal server error")));
  });

  return app;
}
