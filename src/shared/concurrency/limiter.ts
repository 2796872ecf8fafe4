/**
 * A small FIFO concurrency limiter (no external deps).
 * Usage:
 *   const limiter = createLimiter(10);
 *   await Promise.all(items.map(i => limiter.run(() => doWork(i))));
 *
 * or, when the slot must be released before the task ends:
 *   const release = await limiter.acquire();
 *   try { ... } finally { release(); }
 */
export type Release = () => void;

export type Limiter = {
  acquire(): Promise<Release>;
  run<T>(task: () => Promise<T>): Promise<T>;
  active(): number;
  pending(): number;
};

export const createLimiter = (capacity: number): Limiter => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error("capacity must be an integer >= 1");
  }

  let active = 0;
  const waiters: Array<(release: Release) => void> = [];

  const makeRelease = (): Release => {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      active -= 1;
      next();
    };
  };

  const next = () => {
    if (active >= capacity) return;
    const grant = waiters.shift();
    if (!grant) return;
    active += 1;
    grant(makeRelease());
  };

  const acquire = (): Promise<Release> =>
    new Promise<Release>((resolve) => {
      waiters.push(resolve);
      next();
    });

  const run = async <T>(task: () => Promise<T>): Promise<T> => {
    const release = await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };

  return {
    acquire,
    run,
    active: () => active,
    pending: () => waiters.length
  };
};
