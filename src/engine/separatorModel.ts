import type { VocalSeparator } from "./extractor";
import { ModelCache } from "./modelCache";
import { SeparatorWorker, type SeparatorWorkerOptions } from "./separatorWorker";

export type SeparatorModel = {
  worker: SeparatorWorker;
  models: ModelCache<VocalSeparator>;
};

/**
 * The worker process is the loaded model. Starting it is the one and only
 * load; if it dies unexpectedly the cache is marked failed rather than
 * reloading behind the health check's back.
 */
export function createSeparatorModel(
  options: SeparatorWorkerOptions & { onLoading?: () => void }
): SeparatorModel {
  const { onLoading, ...workerOptions } = options;

  const worker = new SeparatorWorker({
    ...workerOptions,
    onEvent: (ev) => {
      options.onEvent?.(ev);
      if (ev.type === "exit" && !ev.expected) {
        models.fail(new Error(`Separation worker exited code=${ev.code ?? "null"} signal=${ev.signal ?? "null"}`));
      }
    },
  });

  const models = new ModelCache<VocalSeparator>(async () => {
    onLoading?.();
    await worker.start();
    return worker;
  });

  return { worker, models };
}
