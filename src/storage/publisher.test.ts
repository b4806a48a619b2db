import { describe, expect, it, vi, type Mock } from "vitest";
import { tick } from "../test/helpers";
import {
  ArtifactPublisher,
  PublishError,
  buildArtifactKey,
  formatTimestamp,
  storeHostLabel,
  type ObjectStore,
} from "./publisher";

const BLOB_HOST = "https://abc123.public.blob.vercel-storage.com";
const FIXED_DATE = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));

/** Echoes the key back under a blob-style host, the way the real store answers. */
function echoStore(host = BLOB_HOST): { put: Mock<ObjectStore["put"]> } {
  return { put: vi.fn<ObjectStore["put"]>(async (key) => `${host}/${key}`) };
}

describe("formatTimestamp", () => {
  it("renders UTC as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(FIXED_DATE)).toBe("20260102_030405");
  });
});

describe("buildArtifactKey", () => {
  it("places the object under the prefix with a short source hash", () => {
    const key = buildArtifactKey({
      prefix: "vocals",
      sourceUrl: "https://example.com/a.mp3",
      at: FIXED_DATE,
      random: "deadbeef",
    });
    expect(key).toMatch(/^vocals\/vocals_[0-9a-f]{8}_20260102_030405_deadbeef\.mp3$/);
  });

  it("omits the directory when the prefix is empty", () => {
    const key = buildArtifactKey({ prefix: "", sourceUrl: "https://example.com/a.mp3", at: FIXED_DATE, random: "00" });
    expect(key).toMatch(/^vocals_[0-9a-f]{8}_20260102_030405_00\.mp3$/);
  });

  it("hashes different sources differently", () => {
    const args = { prefix: "vocals", at: FIXED_DATE, random: "00" };
    expect(buildArtifactKey({ ...args, sourceUrl: "https://example.com/a.mp3" })).not.toBe(
      buildArtifactKey({ ...args, sourceUrl: "https://example.com/b.mp3" })
    );
  });
});

describe("storeHostLabel", () => {
  it("drops the store_ prefix and lowercases", () => {
    expect(storeHostLabel("store_AbC123")).toBe("abc123");
    expect(storeHostLabel("abc123")).toBe("abc123");
  });
});

describe("ArtifactPublisher", () => {
  const publisher = (store: ObjectStore, extra: Partial<ConstructorParameters<typeof ArtifactPublisher>[0]> = {}) =>
    new ArtifactPublisher({
      store,
      prefix: "vocals",
      timeoutMs: 1_000,
      now: () => FIXED_DATE,
      randomHex: () => "deadbeef",
      ...extra,
    });

  it("uploads as audio/mpeg and returns the public URL", async () => {
    const store = echoStore();
    const bytes = Buffer.from("mp3-bytes");

    const result = await publisher(store).publish(bytes, { sourceUrl: "https://example.com/a.mp3" });

    expect(result.key).toMatch(/^vocals\/vocals_[0-9a-f]{8}_20260102_030405_deadbeef\.mp3$/);
    expect(result.url).toBe(`${BLOB_HOST}/${result.key}`);
    expect(store.put).toHaveBeenCalledWith(result.key, bytes, "audio/mpeg");
  });

  it("gives each publish its own key", async () => {
    let n = 0;
    const p = publisher(echoStore(), { randomHex: () => `0000000${++n}` });
    const a = await p.publish(Buffer.from("a"), { sourceUrl: "https://example.com/a.mp3" });
    const b = await p.publish(Buffer.from("b"), { sourceUrl: "https://example.com/a.mp3" });
    expect(a.key).not.toBe(b.key);
  });

  it("wraps store failures", async () => {
    const cause = new Error("403 Forbidden");
    const store: ObjectStore = { put: async () => Promise.reject(cause) };

    const run = publisher(store).publish(Buffer.from("x"), { sourceUrl: "https://example.com/a.mp3" });

    await expect(run).rejects.toBeInstanceOf(PublishError);
    await expect(run).rejects.toThrow("Object store rejected the upload");
    await run.catch((err: unknown) => {
      expect(err instanceof Error ? err.cause : undefined).toBe(cause);
    });
  });

  it("times out a stalled upload and cancels it", async () => {
    let uploadSignal: AbortSignal | undefined;
    const store: ObjectStore = {
      put: (_key, _bytes, _contentType, signal) => {
        uploadSignal = signal;
        return new Promise<string>((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("upload aborted")));
        });
      },
    };

    await expect(
      publisher(store, { timeoutMs: 20 }).publish(Buffer.from("x"), { sourceUrl: "https://example.com/a.mp3" })
    ).rejects.toThrow("Upload timed out after 20 ms");
    expect(uploadSignal?.aborted).toBe(true);
  });

  it("leaves the signal alone when the upload finishes in time", async () => {
    let uploadSignal: AbortSignal | undefined;
    const store: ObjectStore = {
      put: async (key, _bytes, _contentType, signal) => {
        uploadSignal = signal;
        return `${BLOB_HOST}/${key}`;
      },
    };

    await publisher(store, { timeoutMs: 20 }).publish(Buffer.from("x"), { sourceUrl: "https://example.com/a.mp3" });
    await tick(40);
    expect(uploadSignal?.aborted).toBe(false);
  });

  it("rejects a URL whose path cannot be decoded", async () => {
    const store: ObjectStore = { put: async () => `${BLOB_HOST}/vocals/%E0%A4%A.mp3` };
    const run = publisher(store).publish(Buffer.from("x"), { sourceUrl: "https://example.com/a.mp3" });
    await expect(run).rejects.toBeInstanceOf(PublishError);
    await expect(run).rejects.toThrow(/^Object store returned an invalid URL: /);
  });

  it("rejects a non-https URL", async () => {
    const run = publisher(echoStore("http://abc123.public.blob.vercel-storage.com")).publish(Buffer.from("x"), {
      sourceUrl: "https://example.com/a.mp3",
    });
    await expect(run).rejects.toThrow(/^Object store returned a non-https URL: /);
  });

  it("rejects a URL that does not name the uploaded object", async () => {
    const store: ObjectStore = { put: async () => `${BLOB_HOST}/vocals/other.mp3` };
    const run = publisher(store).publish(Buffer.from("x"), { sourceUrl: "https://example.com/a.mp3" });
    await expect(run).rejects.toThrow(/^Object store URL does not match the uploaded key: /);
  });

  it("rejects a URL outside the configured prefix", async () => {
    const store: ObjectStore = { put: async (key) => `${BLOB_HOST}/${key.replace("vocals/", "stems/")}` };
    const run = publisher(store).publish(Buffer.from("x"), { sourceUrl: "https://example.com/a.mp3" });
    await expect(run).rejects.toThrow(/^Object store URL does not contain the vocals\/ path: /);
  });

  it("checks the host against the configured store", async () => {
    const ok = await publisher(echoStore(), { storeId: "store_ABC123" }).publish(Buffer.from("x"), {
      sourceUrl: "https://example.com/a.mp3",
    });
    expect(ok.url.startsWith(BLOB_HOST)).toBe(true);

    const run = publisher(echoStore("https://zzz999.public.blob.vercel-storage.com"), { storeId: "store_ABC123" }).publish(
      Buffer.from("x"),
      { sourceUrl: "https://example.com/a.mp3" }
    );
    await expect(run).rejects.toThrow(/^Object store URL is outside store store_ABC123: /);
  });
});
