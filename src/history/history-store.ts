import { CommandEntry } from "../types/index.js";

export const DEFAULT_MAX_HISTORY = 10000;

/**
 * Chronologically ordered, capacity-bounded command history. Appending
 * past capacity evicts the oldest entry.
 */
export class HistoryStore {
  private buffer: (CommandEntry | undefined)[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number = DEFAULT_MAX_HISTORY) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`History capacity must be a non-negative integer, got ${capacity}`);
    }
    this.buffer = new Array<CommandEntry | undefined>(capacity);
  }

  static from(entries: Iterable<CommandEntry>, capacity: number = DEFAULT_MAX_HISTORY): HistoryStore {
    const store = new HistoryStore(capacity);
    for (const entry of entries) {
      store.append(entry);
    }
    return store;
  }

  get size(): number {
    return this.count;
  }

  append(entry: CommandEntry): void {
    if (this.capacity === 0) {
      return;
    }

    const frozen = Object.freeze({ command: entry.command, timestamp: entry.timestamp });

    if (this.count < this.capacity) {
      this.buffer[(this.head + this.count) % this.capacity] = frozen;
      this.count++;
      return;
    }

    // Full: overwrite the oldest slot and advance the head past it
    this.buffer[this.head] = frozen;
    this.head = (this.head + 1) % this.capacity;
  }

  /**
   * Entries oldest first.
   */
  entries(): readonly CommandEntry[] {
    const result: CommandEntry[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.buffer[(this.head + i) % this.capacity];
      if (entry) {
        result.push(entry);
      }
    }
    return result;
  }
}
