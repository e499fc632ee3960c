import { setTimeout as delay } from "node:timers/promises";
import { ContentTimeoutError, type ContentOperation } from "./errors.js";

export async function withTimeout<T>(params: {
  operation: ContentOperation;
  timeoutMs: number | null;
  run: (signal: AbortSignal) => Promise<T>;
}): Promise<T> {
  const controller = new AbortController();
  const running = params.run(controller.signal);
  if (params.timeoutMs === null) return running;

  const timeoutMs = params.timeoutMs;
  const expired = delay(timeoutMs, undefined, { signal: controller.signal }).then(() => {
    throw new ContentTimeoutError(params.operation, timeoutMs);
  });

  try {
    return await Promise.race([running, expired]);
  } finally {
    controller.abort();
  }
}
