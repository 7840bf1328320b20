/** Any error constructor, regardless of its constructor arguments. */
// biome-ignore lint/suspicious/noExplicitAny: constructor parameters differ per error class
export type ErrorClass<T extends Error> = new (...args: any[]) => T;

/**
 * Walks an error and its `cause` chain and returns the first link that is an
 * instance of `errorClass`, or `null` when none is.
 *
 * Errors crossing a realm or a bundle boundary fail `instanceof`, so a link whose
 * `name` equals the class' static `name` also matches.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass || current.name === errorClass.name) {
      return current as T;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
