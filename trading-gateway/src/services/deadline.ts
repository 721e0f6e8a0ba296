export class DeadlineExceeded extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`, and rejects with
 * DeadlineExceeded at that point even if the task ignores the signal.
 */
export async function withDeadline<T>(timeoutMs: number, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new DeadlineExceeded(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([Promise.resolve().then(() => task(controller.signal)), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
