export interface SerialLock {
  run<T>(fn: () => Promise<T>): Promise<T>;
  readonly busy: boolean;
}

/** Promise chain that runs callbacks one at a time, in call order. */
export function createSerialLock(): SerialLock {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    get busy(): boolean {
      return pending > 0;
    },
    async run<T>(fn: () => Promise<T>): Promise<T> {
      const previous = tail;
      let release: (() => void) | undefined;
      tail = new Promise<void>((resolve) => {
        release = resolve;
      });
      pending++;

      await previous;
      try {
        return await fn();
      } finally {
        pending--;
        release?.();
      }
    },
  };
}
