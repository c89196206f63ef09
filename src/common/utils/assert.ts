/**
 * Invariant check that narrows for the compiler.
 * Use for programmer errors only; expected failures return a Result.
 */
export default function assert(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`);
  }
}
