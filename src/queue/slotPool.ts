import PQueue from "p-queue";

export class OverloadedError extends Error {
  constructor(waitedMs: number) {
    super(`No extraction slot became free within ${waitedMs} ms`);
    this.name = "OverloadedError";
  }
}

/**
 * A fixed number of execution slots. Tasks wait at most `maxWaitMs` for a
 * slot; a task that gives up is withdrawn and never runs.
 */
export class SlotPool {
  private readonly queue: PQueue;
  private readonly maxWaitMs: number;

  constructor(slots: number, maxWaitMs: number) {
    this.queue = new PQueue({ concurrency: slots });
    this.maxWaitMs = maxWaitMs;
  }

  get slots(): number {
    return this.queue.concurrency;
  }

  /** Tasks waiting for a slot. */
  get pending(): number {
    return this.queue.size;
  }

  /** Tasks holding a slot. */
  get running(): number {
    return this.queue.pending;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    let withdrawn = false;
    let started = false;
    let timer: NodeJS.Timeout | undefined;

    const waitExpired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        if (started) return;
        withdrawn = true;
        reject(new OverloadedError(this.maxWaitMs));
      }, this.maxWaitMs);
    });

    const result = this.queue.add(
      async () => {
        if (withdrawn) return undefined;
        started = true;
        clearTimeout(timer);
        return { value: await task() };
      },
      { throwOnTimeout: true }
    );

    try {
      const outcome = await Promise.race([result, waitExpired]);
      if (!outcome) throw new OverloadedError(this.maxWaitMs);
      return outcome.value;
    } finally {
      clearTimeout(timer);
    }
  }
}
