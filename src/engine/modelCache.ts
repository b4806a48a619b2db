export type ModelState = "idle" | "loading" | "ready" | "failed";

export class ModelUnavailableError extends Error {
  constructor(cause: unknown) {
    super("Separation model failed to load", { cause });
    this.name = "ModelUnavailableError";
  }
}

/**
 * Holds one lazily loaded model for the whole process. Concurrent first
 * callers share a single load; a failed load is final until restart.
 */
export class ModelCache<T> {
  private handle: T | undefined;
  private loading: Promise<T> | undefined;
  private failure: ModelUnavailableError | undefined;

  constructor(private readonly loader: () => Promise<T>) {}

  state(): ModelState {
    if (this.handle !== undefined) return "ready";
    if (this.failure) return "failed";
    if (this.loading) return "loading";
    return "idle";
  }

  isLoaded(): boolean {
    return this.handle !== undefined;
  }

  /** Marks the model as lost after it was loaded; later acquires fail like a failed load. */
  fail(cause: unknown): void {
    this.handle = undefined;
    this.failure ??= new ModelUnavailableError(cause);
  }

  async acquire(): Promise<T> {
    if (this.handle !== undefined) return this.handle;
    if (this.failure) throw this.failure;
    if (!this.loading) {
      this.loading = this.loader().then(
        (handle) => {
          this.handle = handle;
          this.loading = undefined;
          return handle;
        },
        (err: unknown) => {
          this.failure = new ModelUnavailableError(err);
          this.loading = undefined;
          throw this.failure;
        }
      );
    }
    return this.loading;
  }
}
