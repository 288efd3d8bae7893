import pLimit, { type LimitFunction } from "p-limit";
import { TaskTimeoutError, throwIfAborted } from "../domain/errors.js";

export interface TaskContext {
  signal: AbortSignal;
  index: number;
}

export interface PoolOptions<T, R> {
  concurrency: number;
  /** Hard wall-clock limit per task. Expiry frees the slot and aborts the task's signal. */
  timeoutMs: number;
  onTimeout: (item: T, index: number) => R | Promise<R>;
  onError: (item: T, error: unknown, index: number) => R | Promise<R>;
  onSettled?: (result: R, item: T, index: number) => void | Promise<void>;
}

export interface PoolReport<R> {
  results: R[];
  peakInFlight: number;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true }
    );
  });
}

export async function runWithTimeout<R>(task: (signal: AbortSignal) => Promise<R>, timeoutMs: number): Promise<R> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TaskTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Bounded fan-out over p-limit. Every item resolves to a result: timeouts and errors are converted by
 * the callbacks at the task boundary and never reach sibling tasks.
 */
export async function runPool<T, R>(
  items: readonly T[],
  options: PoolOptions<T, R>,
  task: (item: T, context: TaskContext) => Promise<R>
): Promise<PoolReport<R>> {
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency)));
  let inFlight = 0;
  let peakInFlight = 0;

  const results = await Promise.all(
    items.map((item, index) =>
      limit(async () => {
        inFlight += 1;
        peakInFlight = Math.max(peakInFlight, inFlight);
        let result: R;
        try {
          result = await runWithTimeout((signal) => task(item, { signal, index }), options.timeoutMs);
        } catch (error) {
          result =
            error instanceof TaskTimeoutError
              ? await options.onTimeout(item, index)
              : await options.onError(item, error, index);
        } finally {
          inFlight -= 1;
        }
        await options.onSettled?.(result, item, index);
        return result;
      })
    )
  );
  return { results, peakInFlight };
}

/**
 * Process-wide cap on simultaneous side-effecting operations, with optional spacing between starts.
 * A caller whose signal fires while queued or waiting out the spacing gets TaskAbortedError and `fn`
 * never runs.
 */
export class Semaphore {
  private readonly limiter: LimitFunction;
  private active = 0;
  private nextStartAt = 0;
  peak = 0;

  constructor(
    readonly limit: number,
    private readonly minStartIntervalMs = 0
  ) {
    this.limiter = pLimit(Math.max(1, Math.floor(limit)));
  }

  get inFlight(): number {
    return this.active;
  }

  use<R>(fn: () => Promise<R>, signal?: AbortSignal): Promise<R> {
    return this.limiter(async () => {
      throwIfAborted(signal);
      this.active += 1;
      this.peak = Math.max(this.peak, this.active);
      try {
        if (this.minStartIntervalMs > 0) {
          const startAt = Math.max(Date.now(), this.nextStartAt);
          this.nextStartAt = startAt + this.minStartIntervalMs;
          await sleep(startAt - Date.now(), signal);
          throwIfAborted(signal);
        }
        return await fn();
      } finally {
        this.active -= 1;
      }
    });
  }
}
