/**
 * Where logging components report their own failures.
 *
 * Implementations must not throw and must not write through the sink
 * that failed.
 */
export interface SideChannel {
  report(message: string, err?: unknown): void
}
