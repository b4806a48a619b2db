import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir } from "../test/helpers";
import { EngineError, SeparatorWorker, parseWorkerMessage, type SeparatorWorkerEvent } from "./separatorWorker";

const FAKE_RUNNER = fileURLToPath(new URL("../test/fixtures/fake-separator.mjs", import.meta.url));

describe("parseWorkerMessage", () => {
  it("parses the ready announcement", () => {
    const msg = parseWorkerMessage(
      '{"type":"ready","pid":4242,"model":"htdemucs","device":"cpu","threads":2,"sources":["drums","bass","other","vocals"]}'
    );
    expect(msg).toEqual({
      type: "ready",
      pid: 4242,
      model: "htdemucs",
      device: "cpu",
      threads: 2,
      sources: ["drums", "bass", "other", "vocals"],
    });
  });

  it("parses successful and failed results", () => {
    expect(parseWorkerMessage('{"type":"result","id":3,"ok":true,"outputPath":"/work/vocals.wav"}')).toEqual({
      type: "result",
      id: 3,
      ok: true,
      outputPath: "/work/vocals.wav",
    });
    expect(parseWorkerMessage('{"type":"result","id":4,"ok":false,"code":"bad_audio","error":"no samples"}')).toEqual({
      type: "result",
      id: 4,
      ok: false,
      code: "bad_audio",
      error: "no samples",
    });
  });

  it("parses a fatal load error", () => {
    expect(parseWorkerMessage('{"type":"fatal","error":"failed to load model htdemucs"}')).toEqual({
      type: "fatal",
      error: "failed to load model htdemucs",
    });
  });

  it("ignores lines that are not protocol messages", () => {
    expect(parseWorkerMessage("Downloading: 100%")).toBeUndefined();
    expect(parseWorkerMessage('{"type":"progress","pct":50}')).toBeUndefined();
    expect(parseWorkerMessage('{"type":"result","id":"7","ok":true}')).toBeUndefined();
    expect(parseWorkerMessage('{"type":"result","id":7,"ok":false,"code":"mystery"}')).toBeUndefined();
  });
});

describe("SeparatorWorker", () => {
  let workDir: string;
  let worker: SeparatorWorker | undefined;
  let events: SeparatorWorkerEvent[];

  beforeEach(async () => {
    workDir = await makeTempDir();
    events = [];
  });

  afterEach(async () => {
    await worker?.shutdown(200);
    worker = undefined;
    await fs.promises.rm(workDir, { recursive: true, force: true });
  });

  function startWorker(mode: string): SeparatorWorker {
    worker = new SeparatorWorker({
      pythonBin: process.execPath,
      runnerPath: FAKE_RUNNER,
      model: mode,
      device: "cpu",
      threads: 1,
      onEvent: (ev) => events.push(ev),
    });
    return worker;
  }

  const paths = (name: string) => ({
    inputPath: path.join(workDir, `${name}.mp3`),
    outputPath: path.join(workDir, `${name}-vocals.wav`),
  });

  it("starts once the runner announces ready", async () => {
    const w = startWorker("ok");
    await Promise.all([w.start(), w.start()]);

    expect(events.map((e) => e.type)).toEqual(["spawn", "ready"]);
    expect(events[1]).toMatchObject({ type: "ready", model: "ok", device: "cpu", threads: 1 });
  });

  it("reports a failed load", async () => {
    const w = startWorker("fatal");

    await expect(w.start()).rejects.toThrow("weights gone");
    await expect(w.separateVocals(paths("a"))).rejects.toThrow("Separation worker is not running");
  });

  it("refuses work before it has been started", async () => {
    const w = startWorker("ok");
    await expect(w.separateVocals(paths("a"))).rejects.toBeInstanceOf(EngineError);
    expect(events).toEqual([]);
  });

  it("matches results to requests by id", async () => {
    const w = startWorker("ok");
    await w.start();
    const slow = paths("slow");
    const fast = paths("fast");

    const slowDone = w.separateVocals(slow);
    await w.separateVocals(fast);

    expect(await fs.promises.readFile(fast.outputPath, "utf8")).toBe("vocals:fast.mp3");
    expect(fs.existsSync(slow.outputPath)).toBe(false);

    await slowDone;
    expect(await fs.promises.readFile(slow.outputPath, "utf8")).toBe("vocals:slow.mp3");
  });

  it("surfaces runner failures with their code", async () => {
    const w = startWorker("ok");
    await w.start();

    const run = w.separateVocals(paths("bad"));
    await expect(run).rejects.toBeInstanceOf(EngineError);
    await run.catch((err: unknown) => {
      expect(err instanceof EngineError ? err.code : undefined).toBe("bad_audio");
    });
  });

  it("rejects in-flight work when the runner dies and does not respawn it", async () => {
    const w = startWorker("exit-on-use");
    await w.start();

    await expect(w.separateVocals(paths("a"))).rejects.toThrow("Separation worker exited code=137 signal=null");
    await expect(w.separateVocals(paths("b"))).rejects.toThrow("Separation worker is not running");

    expect(events.filter((e) => e.type === "spawn")).toHaveLength(1);
    expect(events.at(-1)).toEqual({ type: "exit", code: 137, signal: null, expected: false });
  });

  it("turns a broken stdin pipe into a failed request", async () => {
    const w = startWorker("deaf");
    await w.start();

    const run = w.separateVocals(paths("a"));
    await expect(run).rejects.toBeInstanceOf(EngineError);
    await run.catch((err: unknown) => {
      expect(err instanceof EngineError ? err.code : undefined).toBe("worker_exited");
    });
  });

  it("shuts down on request", async () => {
    const w = startWorker("ok");
    await w.start();

    await w.shutdown();

    expect(events.at(-1)).toEqual({ type: "exit", code: 0, signal: null, expected: true });
  });

  it("kills a runner that ignores shutdown", async () => {
    const w = startWorker("stubborn");
    await w.start();

    await w.shutdown(100);

    expect(events.at(-1)).toEqual({ type: "exit", code: null, signal: "SIGKILL", expected: true });
  });
});
