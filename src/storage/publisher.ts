import crypto from "node:crypto";
import { put } from "@vercel/blob";

export interface ObjectStore {
  put(key: string, bytes: Buffer, contentType: string, signal?: AbortSignal): Promise<string>;
}

export class PublishError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PublishError";
  }
}

export class VercelBlobStore implements ObjectStore {
  constructor(private readonly token: string) {}

  async put(key: string, bytes: Buffer, contentType: string, signal?: AbortSignal): Promise<string> {
    const blob = await put(key, bytes, {
      access: "public",
      token: this.token,
      contentType,
      addRandomSuffix: false,
      abortSignal: signal,
    });
    return blob.url;
  }
}

export type ArtifactPublisherOptions = {
  store: ObjectStore;
  prefix: string;
  timeoutMs: number;
  storeId?: string;
  now?: () => Date;
  randomHex?: () => string;
};

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatTimestamp(d: Date): string {
  const date = `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
  return `${date}_${time}`;
}

export function buildArtifactKey(args: { prefix: string; sourceUrl: string; at: Date; random: string }): string {
  const urlHash = crypto.createHash("sha1").update(args.sourceUrl).digest("hex").slice(0, 8);
  const name = `vocals_${urlHash}_${formatTimestamp(args.at)}_${args.random}.mp3`;
  return args.prefix ? `${args.prefix}/${name}` : name;
}

/** `store_AbC123` → `abc123`, the subdomain Vercel serves public blobs from. */
export function storeHostLabel(storeId: string): string {
  return storeId.replace(/^store_/i, "").toLowerCase();
}

/** Aborts the upload's signal when the time runs out, so the store stops sending. */
async function withTimeout<T>(work: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new PublishError(`Upload timed out after ${ms} ms`));
      controller.abort();
    }, ms);
  });
  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export class ArtifactPublisher {
  private readonly now: () => Date;
  private readonly randomHex: () => string;

  constructor(private readonly options: ArtifactPublisherOptions) {
    this.now = options.now ?? (() => new Date());
    this.randomHex = options.randomHex ?? (() => crypto.randomBytes(4).toString("hex"));
  }

  async publish(bytes: Buffer, meta: { sourceUrl: string }): Promise<{ url: string; key: string }> {
    const key = buildArtifactKey({
      prefix: this.options.prefix,
      sourceUrl: meta.sourceUrl,
      at: this.now(),
      random: this.randomHex(),
    });

    let url: string;
    try {
      url = await withTimeout(
        (signal) => this.options.store.put(key, bytes, "audio/mpeg", signal),
        this.options.timeoutMs
      );
    } catch (err) {
      if (err instanceof PublishError) throw err;
      throw new PublishError("Object store rejected the upload", { cause: err });
    }

    this.verifyUrl(url, key);
    return { url, key };
  }

  private verifyUrl(url: string, key: string): void {
    let parsed: URL;
    let pathname: string;
    try {
      parsed = new URL(url);
      pathname = decodeURIComponent(parsed.pathname);
    } catch (err) {
      throw new PublishError(`Object store returned an invalid URL: ${url}`, { cause: err });
    }
    if (parsed.protocol !== "https:") {
      throw new PublishError(`Object store returned a non-https URL: ${url}`);
    }
    const prefix = this.options.prefix;
    if (prefix && !pathname.includes(`/${prefix}/`)) {
      throw new PublishError(`Object store URL does not contain the ${prefix}/ path: ${url}`);
    }
    if (!pathname.endsWith(key.slice(key.lastIndexOf("/") + 1))) {
      throw new PublishError(`Object store URL does not match the uploaded key: ${url}`);
    }
    if (this.options.storeId) {
      const label = storeHostLabel(this.options.storeId);
      if (!parsed.hostname.startsWith(`${label}.`)) {
        throw new PublishError(`Object store URL is outside store ${this.options.storeId}: ${url}`);
      }
    }
  }
}
