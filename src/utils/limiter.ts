// src/utils/limiter.ts
// Concurrency limiter: at most `max` holders at once, waiters served FIFO.

export interface Limiter {
  acquire(): Promise<void>;
  release(): void;
  /** Run fn while holding a slot */
  run<T>(fn: () => Promise<T>): Promise<T>;
}

export function createLimiter(max: number): Limiter {
  const limit = Math.max(1, Math.floor(max));
  let active = 0;
  const waitQueue: Array<() => void> = [];

  async function acquire(): Promise<void> {
    if (active < limit) {
      active++;
      return;
    }
    return new Promise<void>((resolve) => {
      waitQueue.push(() => {
        active++;
        resolve();
      });
    });
  }

  function release(): void {
    active--;
    const next = waitQueue.shift();
    if (next) next();
  }

  async function run<T>(fn: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  return { acquire, release, run };
}
