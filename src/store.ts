/**
 * Shared in-memory key-value map.
 *
 * Every operation is one synchronous Map call, so it runs to completion on
 * the event loop before any other handler can observe the map.
 */
export class KvStore {
  private entries = new Map<string, string>();

  set(key: string, value: string): void {
    this.entries.set(key, value);
  }

  /** Current value, or undefined if the key was never set or was deleted. */
  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  /** Removing an absent key is a no-op. */
  delete(key: string): void {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
