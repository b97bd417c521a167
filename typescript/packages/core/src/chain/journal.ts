import type { StateJournal } from "../types";

/**
 * Map whose writes are recorded in the active transaction's journal, so a revert restores
 * the previous entries.
 */
export class JournaledMap<K, V> {
  private readonly entries = new Map<K, V>();

  /**
   * Creates a journaled map.
   *
   * @param journal - Journal receiving the undo operations
   */
  constructor(private readonly journal: StateJournal) {}

  /**
   * Reads an entry.
   *
   * @param key - The entry key
   * @returns The stored value, or undefined
   */
  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  /**
   * Writes an entry. Must run inside a transaction.
   *
   * @param key - The entry key
   * @param value - The new value
   */
  set(key: K, value: V): void {
    const existed = this.entries.has(key);
    const previous = this.entries.get(key);
    this.journal.record(() => {
      if (existed && previous !== undefined) {
        this.entries.set(key, previous);
      } else {
        this.entries.delete(key);
      }
    });
    this.entries.set(key, value);
  }

  /**
   * Writes an entry without journaling it. Used by development helpers outside transactions.
   *
   * @param key - The entry key
   * @param value - The new value
   */
  setUnjournaled(key: K, value: V): void {
    this.entries.set(key, value);
  }
}

/**
 * Single journaled value.
 */
export class JournaledValue<V> {
  /**
   * Creates a journaled value.
   *
   * @param journal - Journal receiving the undo operations
   * @param value - Initial value
   */
  constructor(
    private readonly journal: StateJournal,
    private value: V,
  ) {}

  get(): V {
    return this.value;
  }

  set(value: V): void {
    const previous = this.value;
    this.journal.record(() => {
      this.value = previous;
    });
    this.value = value;
  }
}
