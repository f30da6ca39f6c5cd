/**
 * Store Module - Mutual Exclusion
 *
 * Serializes async critical sections in call order. Used around every
 * read-modify-write of the identity document.
 */

export type Lock = Readonly<{
  runExclusive: <T>(task: () => Promise<T>) => Promise<T>;
}>;

export function createLock(): Lock {
  let tail: Promise<void> = Promise.resolve();

  return {
    runExclusive: <T>(task: () => Promise<T>): Promise<T> => {
      const run = tail.then(task);
      // The next task waits for this one whether it succeeded or not
      tail = run.then(
        () => undefined,
        () => undefined,
      );
      return run;
    },
  };
}
