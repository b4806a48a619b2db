import { PipelineError } from "../pipeline/errors";

export type ErrorBody = {
  detail: string;
};

export class HttpError extends Error {
  public readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
  }
}

export function toErrorBody(error: HttpError | PipelineError): ErrorBody {
  return { detail: error.message };
}

/**
 * body-parser tags its errors with a `type` such as "entity.parse.failed".
 * Returns a client-facing message for those, undefined for anything else.
 */
export function bodyParserErrorDetail(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("type" in err) || typeof err.type !== "string") {
    return undefined;
  }
  switch (err.type) {
    case "entity.parse.failed":
      return "Request body must be valid JSON";
    case "entity.too.large":
      return "Request body is too large";
    case "encoding.unsupported":
    case "charset.unsupported":
    case "request.aborted":
    case "request.size.invalid":
    case "stream.encoding.set":
      return "Request body could not be read";
    default:
      return undefined;
  }
}

export function isAbortError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("code" in err && err.code === "ECONNABORTED") return true;
  const msg = "message" in err && typeof err.message === "string" ? err.message : "";
  // Express uses this exact message in response.js's onaborted handler.
  if (msg === "Request aborted") return true;
  return msg.includes("aborted") || msg.includes("socket hang up");
}
