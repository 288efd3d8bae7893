/** Missing or invalid operator input. Aborts the whole stage run. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A persisted document that cannot be parsed. Aborts the stage before anything is written back. */
export class StoreCorruptionError extends Error {
  constructor(
    readonly document: string,
    message: string
  ) {
    super(`${document}: ${message}`);
    this.name = "StoreCorruptionError";
  }
}

export class TaskTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Task exceeded ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
  }
}

/** The task's signal fired before a side effect could start. */
export class TaskAbortedError extends Error {
  constructor() {
    super("Task aborted");
    this.name = "TaskAbortedError";
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new TaskAbortedError();
}

export function isStageAbort(error: unknown): error is ConfigurationError | StoreCorruptionError {
  return error instanceof ConfigurationError || error instanceof StoreCorruptionError;
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  return error instanceof Error ? error.message : fallback;
}
