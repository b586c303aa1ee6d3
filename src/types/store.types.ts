/**
 * Atomic key-value store contract
 */

export type TransactResult<T> =
  | { status: 'committed'; value: T }
  | { status: 'aborted' }
  | { status: 'conflict' };

/**
 * Returns the next value to write, or null to abort without writing.
 * Must not have side effects: the caller may run it again after a conflict.
 */
export type TransactFn<T> = (current: T | null) => T | null;

export interface AtomicStore<T> {
  get(key: string): Promise<T | null>;
  put(key: string, value: T): Promise<void>;
  /**
   * Applies `fn` to the current value and commits only if no other writer
   * touched the key since it was read. A single attempt: on `conflict`
   * the caller retries with backoff.
   */
  transact(key: string, fn: TransactFn<T>): Promise<TransactResult<T>>;
  list(): Promise<T[]>;
}
