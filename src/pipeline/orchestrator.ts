import fs from "node:fs";
import path from "node:path";
import { performance } from "node:perf_hooks";
import { EncodeError } from "../audio/ffmpeg";
import type { VocalExtractor, VocalSeparator } from "../engine/extractor";
import { ModelUnavailableError, type ModelCache } from "../engine/modelCache";
import { EngineError } from "../engine/separatorWorker";
import { FetchError, fetchAudio } from "../http/download";
import { errorMessage, logError, logLine } from "../log";
import { OverloadedError, type SlotPool } from "../queue/slotPool";
import { PublishError, type ArtifactPublisher } from "../storage/publisher";
import { PipelineError } from "./errors";

export type JobStatus =
  | "received"
  | "authenticated"
  | "fetching"
  | "extracting"
  | "publishing"
  | "completed"
  | "failed";

/** Per-request state. Lives only as long as the request. */
export type Job = {
  correlationId: string;
  sourceUrl: string;
  startedAt: number;
  status: JobStatus;
  workDir?: string;
  inputPath?: string;
  outputPath?: string;
  failure?: PipelineError;
};

export type ExtractRequest = {
  sourceUrl: string;
  correlationId: string;
  /** Monotonic timestamp (ms) at which the HTTP request was accepted. */
  acceptedAt?: number;
  /** Aborts when the client goes away. */
  signal?: AbortSignal;
};

export type ExtractionResult = {
  vocalsUrl: string;
  processingTimeSeconds: number;
};

export type VocalExtractionServiceOptions = {
  slots: SlotPool;
  models: ModelCache<VocalSeparator>;
  extractor: VocalExtractor;
  publisher: ArtifactPublisher;
  jobsDir: string;
  download: { maxBytes: number; timeoutMs: number };
  clock?: () => number;
};

export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  if (err instanceof OverloadedError) {
    return new PipelineError("Overloaded", "Server is at capacity, retry later", err.message);
  }
  if (err instanceof FetchError) {
    if (err.code === "aborted") return new PipelineError("Internal", "Request cancelled", err.message);
    return new PipelineError("SourceUnavailable", err.message);
  }
  if (err instanceof ModelUnavailableError) {
    return new PipelineError("Internal", "Separation model is unavailable", errorMessage(err.cause));
  }
  if (err instanceof EngineError) {
    switch (err.code) {
      case "bad_audio":
        return new PipelineError("UnsupportedAudio", "Source audio could not be decoded", err.details);
      case "out_of_memory":
        return new PipelineError("ExtractionFailed", "Vocal extraction ran out of memory", err.details);
      default:
        return new PipelineError("ExtractionFailed", "Vocal extraction failed", err.details ?? err.message);
    }
  }
  if (err instanceof EncodeError) {
    return new PipelineError("ExtractionFailed", "Failed to encode extracted vocals", err.details ?? err.message);
  }
  if (err instanceof PublishError) {
    return new PipelineError("PublishFailed", "Failed to upload extracted vocals to storage", {
      message: err.message,
      cause: errorMessage(err.cause),
    });
  }
  return new PipelineError("Internal", "Internal server error", errorMessage(err));
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new PipelineError("Internal", "Request cancelled", "Client disconnected");
}

/**
 * Runs one extraction request: slot → download → separate → upload,
 * with the job's working directory removed on every exit path.
 */
export class VocalExtractionService {
  private readonly clock: () => number;

  constructor(private readonly options: VocalExtractionServiceOptions) {
    this.clock = options.clock ?? (() => performance.now());
  }

  async extract(req: ExtractRequest): Promise<ExtractionResult> {
    const acceptedAt = req.acceptedAt ?? this.clock();
    const job: Job = {
      correlationId: req.correlationId,
      sourceUrl: req.sourceUrl,
      startedAt: acceptedAt,
      status: "received",
    };
    this.transition(job, "authenticated");

    try {
      return await this.options.slots.run(() => this.runJob(job, req.signal));
    } catch (err) {
      const failure = toPipelineError(err);
      job.failure = failure;
      this.transition(job, "failed", { kind: failure.kind, message: failure.message, details: failure.details });
      throw failure;
    }
  }

  private async runJob(job: Job, signal?: AbortSignal): Promise<ExtractionResult> {
    await fs.promises.mkdir(this.options.jobsDir, { recursive: true });
    const safeId = job.correlationId.replaceAll(/[^\w.-]/g, "_").slice(0, 64);
    const workDir = await fs.promises.mkdtemp(path.join(this.options.jobsDir, `${safeId}-`));
    job.workDir = workDir;

    try {
      this.transition(job, "fetching");
      const fetched = await fetchAudio(job.sourceUrl, {
        destDir: workDir,
        maxBytes: this.options.download.maxBytes,
        timeoutMs: this.options.download.timeoutMs,
        signal,
      });
      job.inputPath = fetched.path;
      logLine(`[${job.correlationId}]`, "downloaded", { bytes: fetched.bytes, format: fetched.format });
      throwIfCancelled(signal);

      this.transition(job, "extracting");
      const model = await this.options.models.acquire();
      const tExtract = this.clock();
      const bytes = await this.options.extractor.extract(model, { inputPath: fetched.path, workDir });
      job.outputPath = path.join(workDir, "vocals.mp3");
      logLine(`[${job.correlationId}]`, "extracted", {
        bytes: bytes.byteLength,
        extractMs: Math.round(this.clock() - tExtract),
      });

      throwIfCancelled(signal);

      this.transition(job, "publishing");
      const { url } = await this.options.publisher.publish(bytes, { sourceUrl: job.sourceUrl });

      const processingTimeSeconds = (this.clock() - job.startedAt) / 1000;
      this.transition(job, "completed", { processingTimeSeconds });
      return { vocalsUrl: url, processingTimeSeconds };
    } finally {
      await this.removeWorkDir(job, workDir);
    }
  }

  private async removeWorkDir(job: Job, workDir: string): Promise<void> {
    try {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    } catch (err) {
      logError(`[${job.correlationId}]`, "cleanup_failed", { message: errorMessage(err) });
    }
  }

  private transition(job: Job, status: JobStatus, extra?: Record<string, unknown>): void {
    job.status = status;
    logLine(`[${job.correlationId}]`, `job_${status}`, {
      pending: this.options.slots.pending,
      running: this.options.slots.running,
      ...extra,
    });
  }
}

/**
 * Removes job directories left behind by a crashed process. Directories
 * younger than `ttlMs` may belong to a running request and are kept.
 */
export async function sweepStaleJobDirs(jobsDir: string, ttlMs: number, now = Date.now()): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(jobsDir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const removed: string[] = [];
  for (const ent of entries) {
    if (!ent.isDirectory()) continue;
    const full = path.join(jobsDir, ent.name);
    const st = await fs.promises.stat(full);
    if (now - st.mtimeMs < ttlMs) continue;
    await fs.promises.rm(full, { recursive: true, force: true });
    removed.push(ent.name);
  }
  return removed;
}
