export type Supervised<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Race `task` against a wall-clock deadline. On timeout the task's signal is
 * aborted and the task itself is abandoned, not awaited: whatever it
 * accumulated stays with the caller. The child process is not touched here.
 */
export async function superviseDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<Supervised<T>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      task(controller.signal).then((value): Supervised<T> => ({ timedOut: false, value })),
      new Promise<Supervised<T>>((resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve({ timedOut: true });
        }, timeoutMs);
      })
    ]);
  } finally {
    clearTimeout(timer);
  }
}
