/**
 * Cancellable delay
 */

export class DelayAbortedError extends Error {
  constructor() {
    super('Delay aborted');
    this.name = 'DelayAbortedError';
    Object.setPrototypeOf(this, DelayAbortedError.prototype);
  }
}

/**
 * Wait for `ms` milliseconds. Rejects with DelayAbortedError if the signal
 * aborts first. A zero delay still yields to the event loop once.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DelayAbortedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new DelayAbortedError());
    };

    const timer: ReturnType<typeof setTimeout> = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
