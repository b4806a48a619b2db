import "dotenv/config";
import os from "node:os";
import path from "node:path";

export type Config = {
  port: number;
  apiToken: string;
  blobToken: string;
  blobStoreId: string;
  blobPrefix: string;
  pythonBin: string;
  ffmpegBin: string;
  separatorPy: string;
  demucsModel: string;
  demucsDevice: string;
  mp3Bitrate: number;
  tmpDir: string;
  extractSlots: number;
  slotWaitMs: number;
  downloadMaxBytes: number;
  downloadTimeoutMs: number;
  uploadTimeoutMs: number;
  preloadModel: boolean;
  jobDirTtlSeconds: number;
};

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback = ""): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) return fallback;
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  return raw === "1" || raw.toLowerCase() === "true" || raw.toLowerCase() === "yes";
}

export function loadConfig(env: Env = process.env, cwd = process.cwd()): Readonly<Config> {
  return Object.freeze({
    port: readInt(env, "PORT", 8000),
    apiToken: readString(env, "API_TOKEN"),
    blobToken: readString(env, "BLOB_READ_WRITE_TOKEN", readString(env, "VERCEL_BLOB_READ_WRITE_TOKEN")),
    blobStoreId: readString(env, "VERCEL_BLOB_STORE_ID"),
    blobPrefix: readString(env, "BLOB_PREFIX", "vocals").replace(/^\/+|\/+$/g, ""),
    pythonBin: readString(env, "PYTHON_BIN"),
    ffmpegBin: readString(env, "FFMPEG_BIN", "ffmpeg"),
    separatorPy: readString(env, "SEPARATOR_PY", path.join(cwd, "python", "demucs_runner.py")),
    demucsModel: readString(env, "DEMUCS_MODEL", "htdemucs"),
    demucsDevice: readString(env, "DEMUCS_DEVICE", "cpu"),
    mp3Bitrate: readInt(env, "MP3_BITRATE", 192),
    tmpDir: readString(env, "TMP_DIR", path.join(os.tmpdir(), "vocal-extractor")),
    extractSlots: readInt(env, "EXTRACT_SLOTS", 2),
    slotWaitMs: readInt(env, "SLOT_WAIT_MS", 30_000),
    downloadMaxBytes: readInt(env, "DOWNLOAD_MAX_BYTES", 100 * 1024 * 1024),
    downloadTimeoutMs: readInt(env, "DOWNLOAD_TIMEOUT_MS", 30_000),
    uploadTimeoutMs: readInt(env, "UPLOAD_TIMEOUT_MS", 60_000),
    preloadModel: readBool(env, "PRELOAD_MODEL", true),
    jobDirTtlSeconds: readInt(env, "JOB_DIR_TTL_SECONDS", 3600),
  });
}

/**
 * Throws on settings the service cannot run with. Returns warnings for
 * settings it can run with in a degraded way (a missing API token makes
 * every extraction request fail with 401).
 */
export function validateConfig(config: Readonly<Config>): string[] {
  if (!config.blobToken) {
    throw new Error("Missing BLOB_READ_WRITE_TOKEN (or VERCEL_BLOB_READ_WRITE_TOKEN).");
  }
  const positive: Array<[keyof Config, string]> = [
    ["port", "PORT"],
    ["mp3Bitrate", "MP3_BITRATE"],
    ["extractSlots", "EXTRACT_SLOTS"],
    ["slotWaitMs", "SLOT_WAIT_MS"],
    ["downloadMaxBytes", "DOWNLOAD_MAX_BYTES"],
    ["downloadTimeoutMs", "DOWNLOAD_TIMEOUT_MS"],
    ["uploadTimeoutMs", "UPLOAD_TIMEOUT_MS"],
    ["jobDirTtlSeconds", "JOB_DIR_TTL_SECONDS"],
  ];
  for (const [key, name] of positive) {
    const value = config[key];
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
      throw new Error(`${name} must be a positive integer.`);
    }
  }

  const warnings: string[] = [];
  if (!config.apiToken) {
    warnings.push("API_TOKEN is not set: all extraction requests will be rejected.");
  }
  return warnings;
}

export const config = loadConfig();
