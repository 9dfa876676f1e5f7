/**
 * Deadlines and cancellation for external calls.
 */

import { DeadlineError, errorMessage } from "../errors";
import { logger } from "../logging";

export interface Deadline {
  /** Aborts when the parent aborts or the deadline passes. */
  signal: AbortSignal;
  /** True once the deadline (not the parent) fired. */
  expired(): boolean;
  /** Clear the timer; call when the guarded work is done. */
  dispose(): void;
}

/**
 * Child signal that follows `parent` and also aborts with a DeadlineError after `timeoutMs`.
 */
export function createDeadline(label: string, timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new DeadlineError(label, timeoutMs));
  }, timeoutMs);
  return {
    signal: controller.signal,
    expired: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/** Resolve after `ms`, or early (resolving false) when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Settle with `p`, or reject with the signal's reason as soon as it aborts.
 * For adapters that ignore the signal; the underlying work is left to finish on its own.
 */
export function abortable<T>(p: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    p.catch(() => undefined);
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      p.catch(() => undefined);
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      }
    );
  });
}

/**
 * Iterate `source`, stopping with the signal's reason as soon as it aborts, even while a
 * next() is pending. The source is told to return but not awaited.
 */
export async function* abortableIterable<T>(source: AsyncIterable<T>, signal: AbortSignal): AsyncIterable<T> {
  const it = source[Symbol.asyncIterator]();
  let finished = false;
  try {
    for (;;) {
      const r = await abortable(it.next(), signal);
      if (r.done) {
        finished = true;
        return;
      }
      yield r.value;
    }
  } finally {
    if (!finished) {
      it.return?.().catch((err: unknown) => {
        logger.debug({ event: "STREAM_CLOSE_FAILED", err: errorMessage(err) }, "Stream did not close cleanly");
      });
    }
  }
}
