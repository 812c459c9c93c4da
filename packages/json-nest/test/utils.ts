/**
 * Runs `fn` and returns what it throws. Fails when it does not throw.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error("expected the call to throw")
}
