export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wait for `ms`, resolving early (to false) if the signal aborts.
 * Resolves true when the full delay elapsed.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
