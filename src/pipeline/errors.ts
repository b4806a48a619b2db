export type ErrorKind =
  | "Unauthorized"
  | "InvalidRequest"
  | "SourceUnavailable"
  | "UnsupportedAudio"
  | "ExtractionFailed"
  | "PublishFailed"
  | "Overloaded"
  | "Internal";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  Unauthorized: 401,
  InvalidRequest: 422,
  SourceUnavailable: 400,
  UnsupportedAudio: 400,
  ExtractionFailed: 500,
  PublishFailed: 500,
  Overloaded: 503,
  Internal: 500,
};

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/**
 * A failure classified for the caller. `message` is safe to return to
 * clients; anything sensitive belongs in `details`, which is only logged.
 */
export class PipelineError extends Error {
  public readonly kind: ErrorKind;
  public readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.details = details;
  }

  get statusCode(): number {
    return statusForKind(this.kind);
  }
}
