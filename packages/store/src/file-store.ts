import * as fs from "fs";
import * as path from "path";
import { JournalCodec, JournalEntry, RegistryStore } from "@dapp-registry/core";

export interface FileStoreOptions {
  /** Directory holding the journal (created if missing). Default: ./data */
  dataDir?: string;
  /** Journal file name. Default: registry.jsonl */
  fileName?: string;
  /** HMAC secret used to sign and verify every line */
  signatureSecret?: string;
}

/**
 * FileStore - append-only registry journal in a JSON Lines file.
 *
 * Each append is written and fsync'ed before it resolves. A failed append
 * is rolled back to the previous file length; if the rollback fails too,
 * the store refuses further appends. A final line without its newline is
 * what a crash mid-write leaves behind; load drops it and truncates the
 * file back to the last complete entry.
 */
export class FileStore implements RegistryStore {
  private logPath: string;
  private codec: JournalCodec;
  private handle?: fs.promises.FileHandle;
  private failed = false;

  constructor(options: FileStoreOptions = {}) {
    const dataDir = options.dataDir ?? "./data";
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    this.logPath = path.join(dataDir, options.fileName ?? "registry.jsonl");
    this.codec = new JournalCodec({ signatureSecret: options.signatureSecret });
  }

  async load(): Promise<JournalEntry[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.logPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    const lines = content.split("\n");
    const tail = lines.pop() ?? "";
    if (tail.length > 0) {
      console.warn(`Dropping incomplete journal entry at line ${lines.length + 1} of ${this.logPath}`);
      await fs.promises.truncate(this.logPath, Buffer.byteLength(content, "utf-8") - Buffer.byteLength(tail, "utf-8"));
    }

    const entries = lines.map((line, index) => this.codec.decode(line, index + 1));
    console.log(`Loaded ${entries.length} journal entries from ${this.logPath}`);
    return entries;
  }

  /**
   * Append an entry and flush it to disk.
   */
  async append(entry: JournalEntry): Promise<void> {
    if (this.failed) {
      throw new Error(`Journal ${this.logPath} may hold a partial entry; reopen the store to recover`);
    }
    if (!this.handle) {
      this.handle = await fs.promises.open(this.logPath, "a");
    }
    const handle = this.handle;
    const { size } = await handle.stat();

    try {
      await handle.appendFile(this.codec.encode(entry) + "\n", "utf-8");
      await handle.sync();
    } catch (err) {
      await this.rollback(handle, size);
      throw err;
    }
  }

  /**
   * Cut the file back to its length before a failed append.
   */
  private async rollback(handle: fs.promises.FileHandle, size: number): Promise<void> {
    try {
      await handle.truncate(size);
      await handle.sync();
    } catch (err) {
      this.failed = true;
      console.error(`Failed to roll back ${this.logPath} to ${size} bytes: ${(err as Error).message}`);
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }

  /**
   * Get the path to the journal file
   */
  getLogPath(): string {
    return this.logPath;
  }
}
