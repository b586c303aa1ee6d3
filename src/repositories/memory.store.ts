import { AtomicStore, TransactFn, TransactResult } from '../types/store.types';

interface VersionedEntry<T> {
  version: number;
  value: T;
}

/**
 * In-process AtomicStore
 *
 * Every key carries a version; `transact` commits only when the version it read
 * is still current. Between the read and the commit the store yields to the event
 * loop, so concurrent units of work on the same key interleave the same way they
 * would against a remote store. Values are deep-copied in and out.
 */
export class InMemoryAtomicStore<T> implements AtomicStore<T> {
  private entries = new Map<string, VersionedEntry<T>>();

  async get(key: string): Promise<T | null> {
    const entry = this.entries.get(key);
    return entry ? structuredClone(entry.value) : null;
  }

  async put(key: string, value: T): Promise<void> {
    const version = (this.entries.get(key)?.version ?? 0) + 1;
    this.entries.set(key, { version, value: structuredClone(value) });
  }

  async transact(key: string, fn: TransactFn<T>): Promise<TransactResult<T>> {
    const entry = this.entries.get(key);
    const readVersion = entry?.version ?? 0;
    const current = entry ? structuredClone(entry.value) : null;

    await new Promise<void>((resolve) => setImmediate(resolve));

    const next = fn(current);
    if (next === null) {
      return { status: 'aborted' };
    }

    const latestVersion = this.entries.get(key)?.version ?? 0;
    if (latestVersion !== readVersion) {
      return { status: 'conflict' };
    }

    this.entries.set(key, { version: readVersion + 1, value: structuredClone(next) });
    return { status: 'committed', value: structuredClone(next) };
  }

  async list(): Promise<T[]> {
    return Array.from(this.entries.values(), (entry) => structuredClone(entry.value));
  }

  /**
   * Current version of a key (0 when absent)
   */
  versionOf(key: string): number {
    return this.entries.get(key)?.version ?? 0;
  }
}
