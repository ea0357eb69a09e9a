import { CancelledError } from '../errors/CatalogError';

/**
 * Throw a CancelledError if the signal has fired.
 */
export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new CancelledError();
  }
};

/**
 * Promise-based sleep that rejects with CancelledError as soon as the signal fires.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export interface LinkedSignal {
  signal: AbortSignal;
  /** True once the timeout (rather than a parent signal) fired */
  timedOut: () => boolean;
  /** Detach listeners and clear the timer */
  dispose: () => void;
}

/**
 * Derive one signal that fires when any parent fires or when `timeoutMs` elapses.
 */
export const linkSignals = (parents: (AbortSignal | undefined)[], timeoutMs?: number): LinkedSignal => {
  const controller = new AbortController();
  const cleanups: (() => void)[] = [];
  let didTimeOut = false;

  for (const parent of parents) {
    if (!parent) {
      continue;
    }
    if (parent.aborted) {
      controller.abort();
      break;
    }
    const onAbort = () => controller.abort();
    parent.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', onAbort));
  }

  if (typeof timeoutMs === 'number' && timeoutMs > 0 && !controller.signal.aborted) {
    const timer = setTimeout(() => {
      didTimeOut = true;
      controller.abort();
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut,
    dispose: () => {
      cleanups.forEach(cleanup => cleanup());
      cleanups.length = 0;
    }
  };
};

/**
 * Settle with `promise`, or reject with CancelledError as soon as `signal` fires,
 * whichever happens first.
 */
export const raceWithSignal = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(new CancelledError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
};
