/**
 * Abortable delay
 *
 * Resolves after `ms`, or as soon as `signal` aborts. Abort is a normal
 * early wake-up here, not an error.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const delay: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
