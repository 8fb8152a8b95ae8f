import { AttemptTimeoutError, DeadlineExceededError } from "../errors";

export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error(typeof reason === "string" ? reason : "The operation was aborted");
  error.name = "AbortError";
  return error;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) {
        reject(abortReason(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      reject(abortReason(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise
      .then((value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      })
      .catch((error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      });
  });
}

export interface LinkedSignal {
  readonly signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

export function linkSignalWithTimeout(parent: AbortSignal | undefined, timeoutMs: number): LinkedSignal {
  const controller = new AbortController();
  let didTimeOut = false;
  const onParentAbort = (): void => {
    if (parent) {
      controller.abort(abortReason(parent));
    }
  };
  const timer = setTimeout(() => {
    didTimeOut = true;
    controller.abort(new AttemptTimeoutError(timeoutMs));
  }, timeoutMs);

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

export interface LinkedController {
  readonly controller: AbortController;
  dispose(): void;
}

export function linkAbortController(parent: AbortSignal): LinkedController {
  const controller = new AbortController();
  const onParentAbort = (): void => {
    controller.abort(abortReason(parent));
  };
  if (parent.aborted) {
    onParentAbort();
  } else {
    parent.addEventListener("abort", onParentAbort, { once: true });
  }
  return {
    controller,
    dispose: () => {
      parent.removeEventListener("abort", onParentAbort);
    },
  };
}

export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly startedAt: number;

  constructor(
    readonly timeoutMs: number,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
    this.timer = setTimeout(() => {
      this.controller.abort(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  remainingMs(): number {
    return Math.max(0, this.timeoutMs - this.elapsedMs());
  }

  cancel(reason: Error): void {
    clearTimeout(this.timer);
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  dispose(): void {
    clearTimeout(this.timer);
  }
}
