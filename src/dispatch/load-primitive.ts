/**
 * The host operation that loads a resolved file.
 *
 * Implementations receive the resolved path and the forwarded arguments
 * exactly as given to the entry point. Whatever they throw reaches the
 * dispatcher's caller untouched.
 */
export interface LoadPrimitive {
  load(path: string, args: readonly string[]): unknown;
}
