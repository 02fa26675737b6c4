export class OperationTimeoutError extends Error {
  public constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Races `operation` against a deadline. When the deadline wins, `controller` (if given)
 * is aborted with the {@link OperationTimeoutError} so the abandoned work can stop.
 */
export const withTimeout = async <TResult>(
  operation: Promise<TResult>,
  timeoutMs: number,
  label: string,
  controller?: AbortController,
): Promise<TResult> => {
  let timer: NodeJS.Timeout | undefined;

  const timeout: Promise<never> = new Promise<never>(
    (_resolve: (value: never) => void, reject: (reason: Error) => void): void => {
      timer = setTimeout((): void => {
        const timeoutError: OperationTimeoutError = new OperationTimeoutError(label, timeoutMs);
        controller?.abort(timeoutError);
        reject(timeoutError);
      }, timeoutMs);
    },
  );

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
};
