import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { z } from "zod";

export type EngineFailure = "bad_audio" | "out_of_memory" | "engine_error" | "worker_exited";

export class EngineError extends Error {
  public readonly code: EngineFailure;
  public readonly details?: unknown;

  constructor(code: EngineFailure, message: string, details?: unknown) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.details = details;
  }
}

const readyMessage = z.object({
  type: z.literal("ready"),
  pid: z.number(),
  model: z.string().optional(),
  device: z.string().optional(),
  threads: z.number().optional(),
  sources: z.array(z.string()).optional(),
});

const workerMessage = z.discriminatedUnion("type", [
  readyMessage,
  z.object({ type: z.literal("fatal"), error: z.string() }),
  z.object({
    type: z.literal("result"),
    id: z.number(),
    ok: z.boolean(),
    outputPath: z.string().optional(),
    code: z.enum(["bad_audio", "out_of_memory", "engine_error"]).optional(),
    error: z.string().optional(),
    traceback: z.string().optional(),
  }),
  z.object({ type: z.literal("shutdown"), ok: z.boolean().optional() }),
]);

export type WorkerMessage = z.infer<typeof workerMessage>;
export type WorkerReady = z.infer<typeof readyMessage>;

/** Parses one stdout line; anything that is not a protocol message is ignored. */
export function parseWorkerMessage(line: string): WorkerMessage | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = workerMessage.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

type Pending = {
  resolve: () => void;
  reject: (err: Error) => void;
};

export type SeparatorWorkerEvent =
  | { type: "spawn"; pid?: number }
  | ({ type: "ready" } & Omit<WorkerReady, "type">)
  | { type: "stderr"; pid?: number; line: string }
  | { type: "exit"; code: number | null; signal: NodeJS.Signals | null; expected: boolean };

export type SeparatorWorkerOptions = {
  pythonBin: string;
  runnerPath: string;
  model: string;
  device: string;
  threads: number;
  onEvent?: (ev: SeparatorWorkerEvent) => void;
};

/**
 * A long-lived Python process that loads the separation model once and
 * then serves newline-delimited JSON requests on stdin. It is never
 * respawned behind the caller's back: once it exits, requests fail until
 * `start()` is called again.
 */
export class SeparatorWorker {
  private child: ChildProcessWithoutNullStreams | undefined;
  private stdoutBuf = "";
  private stderrBuf = "";
  private nextId = 1;
  private readonly pending = new Map<number, Pending>();
  private starting: Promise<void> | undefined;
  private ready = false;
  private stopping = false;
  private startupWaiter: { resolve: () => void; reject: (err: Error) => void } | undefined;

  constructor(private readonly options: SeparatorWorkerOptions) {}

  async start(): Promise<void> {
    if (this.child && this.ready) return;
    if (this.starting) return this.starting;

    this.starting = this.spawnAndWait();
    try {
      await this.starting;
    } finally {
      this.starting = undefined;
    }
  }

  async separateVocals(args: { inputPath: string; outputPath: string }): Promise<void> {
    const child = this.child;
    if (!child || !this.ready) throw new EngineError("worker_exited", "Separation worker is not running");

    const id = this.nextId++;
    const payload = JSON.stringify({ type: "separate", id, inputPath: args.inputPath, outputPath: args.outputPath });

    const result = new Promise<void>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
    });
    child.stdin.write(`${payload}\n`, (err) => {
      if (err) this.rejectRequest(id, new EngineError("worker_exited", `Separation worker stdin failed: ${err.message}`));
    });
    return result;
  }

  async shutdown(timeoutMs = 5_000): Promise<void> {
    const child = this.child;
    if (!child) return;
    this.stopping = true;

    const exited = new Promise<void>((resolve) => child.once("close", () => resolve()));
    child.stdin.write(`${JSON.stringify({ type: "shutdown" })}\n`);
    child.stdin.end();

    const timer = setTimeout(() => child.kill("SIGKILL"), timeoutMs);
    try {
      await exited;
    } finally {
      clearTimeout(timer);
    }
  }

  private async spawnAndWait(): Promise<void> {
    const { pythonBin, runnerPath, model, device, threads } = this.options;
    const child = spawn(
      pythonBin,
      [runnerPath, "--model", model, "--device", device, "--threads", String(threads)],
      { stdio: ["pipe", "pipe", "pipe"] }
    );
    this.child = child;
    this.stdoutBuf = "";
    this.stderrBuf = "";
    this.ready = false;
    this.stopping = false;
    this.options.onEvent?.({ type: "spawn", pid: child.pid });

    const ready = new Promise<void>((resolve, reject) => {
      this.startupWaiter = { resolve, reject };
    });

    // EPIPE lands here when the worker dies before `close` is reported.
    child.stdin.on("error", (err) =>
      this.rejectAll(new EngineError("worker_exited", `Separation worker stdin failed: ${err.message}`))
    );
    child.stdout.on("data", (d) => this.onStdout(String(d)));
    child.stderr.on("data", (d) => this.onStderr(String(d)));
    child.on("error", (err) => this.failStartup(err));
    child.on("close", (code, signal) => this.onClose(code, signal));

    await ready;
  }

  private failStartup(err: Error): void {
    const waiter = this.startupWaiter;
    this.startupWaiter = undefined;
    waiter?.reject(err);
  }

  private rejectRequest(id: number, err: Error): void {
    const pending = this.pending.get(id);
    if (!pending) return;
    this.pending.delete(id);
    pending.reject(err);
  }

  private rejectAll(err: Error): void {
    for (const { reject } of this.pending.values()) reject(err);
    this.pending.clear();
  }

  private onClose(code: number | null, signal: NodeJS.Signals | null): void {
    this.child = undefined;
    this.ready = false;
    this.options.onEvent?.({ type: "exit", code, signal, expected: this.stopping });
    const reason = `Separation worker exited code=${code ?? "null"} signal=${signal ?? "null"}`;
    this.failStartup(new Error(reason));
    this.rejectAll(new EngineError("worker_exited", this.stopping ? "Separation worker shut down" : reason));
  }

  private handleMessage(msg: WorkerMessage): void {
    switch (msg.type) {
      case "ready": {
        this.ready = true;
        const { type: _type, ...rest } = msg;
        this.options.onEvent?.({ type: "ready", ...rest });
        const waiter = this.startupWaiter;
        this.startupWaiter = undefined;
        waiter?.resolve();
        return;
      }
      case "fatal":
        this.failStartup(new Error(msg.error));
        return;
      case "result": {
        const pending = this.pending.get(msg.id);
        if (!pending) return;
        this.pending.delete(msg.id);
        if (msg.ok) {
          pending.resolve();
        } else {
          pending.reject(
            new EngineError(msg.code ?? "engine_error", msg.error || "Separation failed", {
              error: msg.error,
              traceback: msg.traceback,
            })
          );
        }
        return;
      }
      case "shutdown":
        return;
    }
  }

  private onStdout(chunk: string): void {
    this.stdoutBuf += chunk;
    while (true) {
      const idx = this.stdoutBuf.indexOf("\n");
      if (idx < 0) break;
      const line = this.stdoutBuf.slice(0, idx).trim();
      this.stdoutBuf = this.stdoutBuf.slice(idx + 1);
      if (!line) continue;
      const msg = parseWorkerMessage(line);
      if (msg) this.handleMessage(msg);
    }
  }

  private onStderr(chunk: string): void {
    this.stderrBuf += chunk;
    while (true) {
      const idx = this.stderrBuf.indexOf("\n");
      if (idx < 0) break;
      const line = this.stderrBuf.slice(0, idx).trim();
      this.stderrBuf = this.stderrBuf.slice(idx + 1);
      if (!line) continue;
      const msg = line.length > 2000 ? `${line.slice(0, 2000)}…` : line;
      this.options.onEvent?.({ type: "stderr", pid: this.child?.pid, line: msg });
    }
  }
}
