export interface Clock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) =>
    new Promise<void>((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    })
};

export interface PollResult<T> {
  value: T;
  timedOut: boolean;
  attempts: number;
}

/**
 * Calls `read` until `isDone` accepts its value or `deadline` passes. The first
 * read always happens; sleeps never overshoot the deadline.
 */
export async function pollUntil<T>(params: {
  clock: Clock;
  deadline: number;
  intervalMs: number;
  read: () => Promise<T>;
  isDone: (value: T) => boolean;
}): Promise<PollResult<T>> {
  let attempts = 0;
  while (true) {
    const value = await params.read();
    attempts += 1;
    if (params.isDone(value)) {
      return { value, timedOut: false, attempts };
    }
    const remaining = params.deadline - params.clock.now();
    if (remaining <= 0) {
      return { value, timedOut: true, attempts };
    }
    await params.clock.sleep(Math.min(params.intervalMs, remaining));
  }
}
