/**
 * Deadline enforcement for a single attempt.
 *
 * The work receives an AbortSignal that fires when the deadline passes or the
 * parent signal aborts. On expiry the returned promise rejects with the error
 * from onTimeout; whatever the abandoned work later produces is discarded.
 */

export type TimedWork<T> = (signal: AbortSignal) => Promise<T>;

export async function withTimeout<T>(
  work: TimedWork<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  parentSignal?.throwIfAborted();

  const onParentAbort = (): void => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const racers: Promise<T>[] = [];

  if (parentSignal) {
    racers.push(
      new Promise<T>((_, reject) => {
        controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
      })
    );
  }

  if (timeoutMs !== undefined) {
    racers.push(
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          const error = onTimeout();
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      })
    );
  }

  const running = Promise.resolve().then(() => work(controller.signal));
  if (racers.length === 0) {
    return running;
  }

  // The losing side of the race must not surface as an unhandled rejection.
  running.catch(() => undefined);
  for (const racer of racers) {
    racer.catch(() => undefined);
  }

  try {
    return await Promise.race([running, ...racers]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
