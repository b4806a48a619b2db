import fs from "node:fs";
import path from "node:path";

export type FetchFailure = "invalid_url" | "unreachable" | "too_large" | "timeout" | "not_audio" | "aborted";

export class FetchError extends Error {
  public readonly code: FetchFailure;

  constructor(code: FetchFailure, message: string) {
    super(message);
    this.name = "FetchError";
    this.code = code;
  }
}

export type FetchAudioOptions = {
  destDir: string;
  maxBytes: number;
  timeoutMs: number;
  signal?: AbortSignal;
};

export type FetchedAudio = {
  path: string;
  bytes: number;
  contentType: string;
  format: string;
};

const ACCEPTED_CONTENT_TYPES = new Set([
  "application/octet-stream",
  "binary/octet-stream",
  "application/ogg",
  "video/mp4",
  "video/webm",
  "video/ogg",
]);

const SNIFF_BYTES = 12;

export function parseSourceUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new FetchError("invalid_url", "Source URL is not a valid URL");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new FetchError("invalid_url", "Source URL must use http or https");
  }
  return url;
}

export function isAcceptedContentType(header: string | null): boolean {
  if (!header) return true;
  const mime = header.split(";")[0]?.trim().toLowerCase() ?? "";
  if (!mime) return true;
  return mime.startsWith("audio/") || ACCEPTED_CONTENT_TYPES.has(mime);
}

function ascii(head: Uint8Array, start: number, end: number): string {
  return Buffer.from(head.subarray(start, end)).toString("latin1");
}

/** Identifies the audio container from its leading bytes. */
export function sniffAudioContainer(head: Uint8Array): string | undefined {
  if (head.length < 4) return undefined;
  if (ascii(head, 0, 3) === "ID3") return "mp3";
  if (ascii(head, 0, 4) === "fLaC") return "flac";
  if (ascii(head, 0, 4) === "OggS") return "ogg";
  if (head[0] === 0x1a && head[1] === 0x45 && head[2] === 0xdf && head[3] === 0xa3) return "webm";
  if (head.length >= 12 && ascii(head, 0, 4) === "RIFF" && ascii(head, 8, 12) === "WAVE") return "wav";
  if (head.length >= 12 && ascii(head, 0, 4) === "FORM") {
    const kind = ascii(head, 8, 12);
    if (kind === "AIFF" || kind === "AIFC") return "aiff";
  }
  if (head.length >= 8 && ascii(head, 4, 8) === "ftyp") return "mp4";
  const b0 = head[0] ?? 0;
  const b1 = head[1] ?? 0;
  if (b0 === 0xff && (b1 & 0xf6) === 0xf0) return "aac";
  if (b0 === 0xff && (b1 & 0xe0) === 0xe0) return "mp3";
  return undefined;
}

function inputExtension(url: URL): string {
  const ext = path.extname(url.pathname).toLowerCase();
  return /^\.[a-z0-9]{1,5}$/.test(ext) ? ext : ".bin";
}

/**
 * Streams `rawUrl` into `<destDir>/input<ext>`. The caller owns the file
 * and must delete it, including when this function throws.
 */
export async function fetchAudio(rawUrl: string, options: FetchAudioOptions): Promise<FetchedAudio> {
  const url = parseSourceUrl(rawUrl);
  if (options.signal?.aborted) throw new FetchError("aborted", "Download cancelled");

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onCallerAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onCallerAbort, { once: true });

  const classify = (err: unknown, fallback: string): FetchError => {
    if (err instanceof FetchError) return err;
    if (timedOut) return new FetchError("timeout", `Timed out downloading source audio after ${options.timeoutMs} ms`);
    if (options.signal?.aborted) return new FetchError("aborted", "Download cancelled");
    return new FetchError("unreachable", fallback);
  };

  try {
    let response: Response;
    try {
      response = await fetch(url, { signal: controller.signal, redirect: "follow" });
    } catch (err) {
      throw classify(err, "Source audio could not be reached");
    }

    if (!response.ok) {
      throw new FetchError("unreachable", `Source responded with HTTP ${response.status}`);
    }
    const contentType = response.headers.get("content-type");
    if (!isAcceptedContentType(contentType)) {
      throw new FetchError("not_audio", "Source is not an audio resource");
    }
    const declared = Number.parseInt(response.headers.get("content-length") ?? "", 10);
    if (Number.isFinite(declared) && declared > options.maxBytes) {
      throw new FetchError("too_large", `Source audio exceeds the ${options.maxBytes}-byte limit`);
    }
    if (!response.body) throw new FetchError("not_audio", "Source audio is empty");

    await fs.promises.mkdir(options.destDir, { recursive: true });
    const destPath = path.join(options.destDir, `input${inputExtension(url)}`);
    const file = await fs.promises.open(destPath, "w");

    let bytes = 0;
    let head = Buffer.alloc(0);
    try {
      for await (const chunk of response.body as unknown as AsyncIterable<Uint8Array>) {
        bytes += chunk.byteLength;
        if (bytes > options.maxBytes) {
          throw new FetchError("too_large", `Source audio exceeds the ${options.maxBytes}-byte limit`);
        }
        if (head.length < SNIFF_BYTES) head = Buffer.concat([head, chunk]).subarray(0, SNIFF_BYTES);
        await file.write(chunk);
      }
    } catch (err) {
      throw classify(err, "Source audio download was interrupted");
    } finally {
      await file.close();
    }

    if (bytes === 0) throw new FetchError("not_audio", "Source audio is empty");
    const format = sniffAudioContainer(head);
    if (!format) throw new FetchError("not_audio", "Source payload is not a recognised audio format");

    return { path: destPath, bytes, contentType: contentType ?? "", format };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onCallerAbort);
    // Releases the connection when we stopped reading before the end of the body.
    controller.abort();
  }
}
