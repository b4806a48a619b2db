import path from "node:path";
import { createApp } from "./app";
import { config, validateConfig } from "./config";
import { VocalExtractor } from "./engine/extractor";
import { resolvePythonBin } from "./engine/pythonBin";
import { createSeparatorModel } from "./engine/separatorModel";
import { errorMessage, logError, logLine, maskSecret } from "./log";
import { VocalExtractionService, sweepStaleJobDirs } from "./pipeline/orchestrator";
import { SlotPool } from "./queue/slotPool";
import { ArtifactPublisher, VercelBlobStore } from "./storage/publisher";

for (const warning of validateConfig(config)) logLine("[server]", "config_warning", { warning });

const jobsDir = path.join(config.tmpDir, "jobs");

const { worker, models } = createSeparatorModel({
  pythonBin: resolvePythonBin(config.pythonBin),
  runnerPath: config.separatorPy,
  model: config.demucsModel,
  device: config.demucsDevice,
  threads: config.extractSlots,
  onEvent: (ev) => {
    if (ev.type === "spawn") logLine("[worker]", "spawn", { pid: ev.pid });
    if (ev.type === "ready") logLine("[worker]", "ready", { pid: ev.pid, model: ev.model, device: ev.device });
    if (ev.type === "stderr") logLine("[worker]", `stderr ${ev.line}`, { pid: ev.pid });
    if (ev.type === "exit") logLine("[worker]", "exit", { code: ev.code, signal: ev.signal, expected: ev.expected });
  },
  onLoading: () => logLine("[server]", "model_loading", { model: config.demucsModel, device: config.demucsDevice }),
});

const service = new VocalExtractionService({
  slots: new SlotPool(config.extractSlots, config.slotWaitMs),
  models,
  extractor: new VocalExtractor({ ffmpegBin: config.ffmpegBin, bitrateKbps: config.mp3Bitrate }),
  publisher: new ArtifactPublisher({
    store: new VercelBlobStore(config.blobToken),
    prefix: config.blobPrefix,
    storeId: config.blobStoreId || undefined,
    timeoutMs: config.uploadTimeoutMs,
  }),
  jobsDir,
  download: { maxBytes: config.downloadMaxBytes, timeoutMs: config.downloadTimeoutMs },
});

async function main(): Promise<void> {
  const removed = await sweepStaleJobDirs(jobsDir, config.jobDirTtlSeconds * 1000);
  if (removed.length) logLine("[server]", "stale_job_dirs_removed", { count: removed.length });

  const app = createApp({ apiToken: config.apiToken, service, models });
  const server = app.listen(config.port, () => {
    logLine("[server]", `vocal-extractor listening on :${config.port}`, {
      apiToken: maskSecret(config.apiToken),
      blobStore: config.blobStoreId || "default",
      slots: config.extractSlots,
    });
  });

  if (config.preloadModel) {
    void models.acquire().then(
      () => logLine("[server]", "model_loaded", { model: config.demucsModel }),
      (err: unknown) =>
        logError("[server]", "model_load_failed", {
          message: errorMessage(err instanceof Error && err.cause !== undefined ? err.cause : err),
        })
    );
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logLine("[server]", "shutdown", { signal });
    server.close();
    void worker.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logError("[server]", "worker_shutdown_failed", { message: errorMessage(err) });
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logError("[server]", "startup_failed", { message: errorMessage(err) });
  process.exit(1);
});
