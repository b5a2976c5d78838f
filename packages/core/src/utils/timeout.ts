export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

interface WithTimeoutInput<T> {
  /** No deadline is applied when undefined. */
  timeoutMs: number | undefined;
  label: string;
  /** Receives a signal that aborts once the deadline passes. */
  run: (signal: AbortSignal) => Promise<T>;
}

export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  const controller = new AbortController();
  if (input.timeoutMs === undefined) {
    return input.run(controller.signal);
  }

  const timeoutMs = input.timeoutMs;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(input.label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([input.run(controller.signal), deadline]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
