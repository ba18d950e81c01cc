/**
 * packages/testkit/src/spy.ts — Call-recording wrapper for callbacks.
 *
 * Why: Cache tests count how often a builder ran and with which arguments;
 * a spy records each call and forwards to the wrapped implementation.
 */

export type Spy<A extends readonly unknown[], R> = ((...args: A) => R) &
  Readonly<{
    /** Arguments of every call, oldest first. */
    calls: () => readonly A[];
    callCount: () => number;
    /** Value returned by the most recent call; throws if never called. */
    lastResult: () => R;
    reset: () => void;
  }>;

export function createSpy<A extends readonly unknown[], R>(impl: (...args: A) => R): Spy<A, R> {
  const calls: A[] = [];
  let last: { value: R } | null = null;

  function spy(...args: A): R {
    calls.push(args);
    const result = impl(...args);
    last = { value: result };
    return result;
  }

  return Object.assign(spy, {
    calls(): readonly A[] {
      return calls;
    },
    callCount(): number {
      return calls.length;
    },
    lastResult(): R {
      if (last === null) throw new Error("spy: lastResult() before any call");
      return last.value;
    },
    reset(): void {
      calls.length = 0;
      last = null;
    },
  });
}
