import { JournalEntry, RegistryStore } from "./schemas";

/**
 * MemoryStore - keeps the journal in process memory. Nothing survives a
 * restart; used as the default store and in tests.
 */
export class MemoryStore implements RegistryStore {
  private journal: JournalEntry[];

  constructor(initial: JournalEntry[] = []) {
    this.journal = [...initial];
  }

  async load(): Promise<JournalEntry[]> {
    return [...this.journal];
  }

  async append(entry: JournalEntry): Promise<void> {
    this.journal.push(entry);
  }

  async close(): Promise<void> {
    // nothing to release
  }

  /** Copy of every entry appended so far. */
  entries(): JournalEntry[] {
    return [...this.journal];
  }
}
