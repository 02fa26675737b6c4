/**
 * Resolves after `delayMs` or as soon as `signal` aborts, whichever comes first.
 * Never rejects.
 */
export const abortableSleep = async (delayMs: number, signal?: AbortSignal): Promise<void> => {
  if (delayMs <= 0 || signal?.aborted === true) {
    return;
  }

  await new Promise<void>((resolve: () => void): void => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer: NodeJS.Timeout = setTimeout((): void => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, delayMs);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
