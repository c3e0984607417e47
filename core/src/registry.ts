import {
  DappRecord,
  EventEntry,
  GenesisEntry,
  Identity,
  RegistryEvent,
  RegistryListener,
  RegistryStore,
} from "./schemas";
import { isNullIdentity } from "./identity";
import { RegistryState, applyEvent, replayJournal } from "./journal";
import { MemoryStore } from "./memory-store";
import {
  createOwnershipTransferredEvent,
  createPublishedEvent,
  createVerifiedEvent,
} from "./events";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Default max event log size (entries). */
const DEFAULT_MAX_EVENT_LOG_SIZE = 10_000;

/**
 * Registry configuration options.
 */
export interface RegistryConfig {
  /** Identity allowed to verify records. Fixed for the registry's lifetime. */
  admin: Identity;
  /** Durable backing store. Default: MemoryStore (no persistence) */
  store?: RegistryStore;
  /** Time source for `created_at` and event timestamps */
  clock?: () => Date;

  // -- Callbacks --

  /** Called for every event after its mutation is applied */
  onEvent?: (event: RegistryEvent) => void;
  /** Called when a listener or `onEvent` throws */
  onError?: (error: Error, context: string) => void;

  /**
   * Maximum number of events kept by `getEventLog()`.
   * When exceeded, oldest events are evicted (FIFO).
   * Default: 10,000. Set to 0 for unlimited.
   */
  maxEventLogSize?: number;
}

// ---------------------------------------------------------------------------
// Concurrency lock
// ---------------------------------------------------------------------------

/**
 * Lightweight async mutex. Every mutation holds it from validation through
 * the durable append and notification, so mutations apply in a strict
 * total order.
 */
class AsyncMutex {
  private queue: Array<() => void> = [];
  private locked = false;

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}

// ---------------------------------------------------------------------------
// DappRegistry
// ---------------------------------------------------------------------------

/**
 * DApp registry.
 *
 * Anyone may publish a record; only the admin may verify one; only a
 * record's current owner may hand it to someone else. Records are never
 * deleted.
 *
 * Each mutation runs as one critical section:
 *
 *   1. validate   → RegistryError on failure, nothing written
 *   2. append     → journal entry made durable by the store
 *   3. apply      → in-memory state updated in one synchronous step
 *   4. notify     → event log, `onEvent`, subscribers
 *
 * Reads are synchronous and return frozen records.
 *
 * @example
 * ```typescript
 * const registry = new DappRegistry({ admin: "0xadmin" });
 * await registry.init();
 *
 * const id = await registry.publish("Swap", "Token swap", "https://git.example/swap", "0xalice");
 * await registry.verify(id, "0xadmin");
 * await registry.transferOwnership(id, "0xbob", "0xalice");
 * registry.get(id); // { id: 1, owner: "0xbob", verified: true, ... }
 * ```
 */
export class DappRegistry {
  private config: RegistryConfig;
  private store: RegistryStore;
  private clock: () => Date;
  private state: RegistryState;
  private listeners = new Set<RegistryListener>();
  private eventLog: RegistryEvent[] = [];
  private maxEventLogSize: number;
  private initialized = false;
  private mutex = new AsyncMutex();

  constructor(config: RegistryConfig) {
    if (isNullIdentity(config.admin)) {
      throw new RegistryError("INVALID_INPUT", "Registry admin must be a non-null identity", {
        field: "admin",
      });
    }
    this.config = config;
    this.store = config.store ?? new MemoryStore();
    this.clock = config.clock ?? (() => new Date());
    this.maxEventLogSize = config.maxEventLogSize ?? DEFAULT_MAX_EVENT_LOG_SIZE;
    this.state = { admin: config.admin, created_at: "", records: new Map(), seq: 0 };
  }

  /**
   * Load persisted state. A fresh store gets a genesis entry for the
   * configured admin; an existing journal is replayed and must name the
   * same admin.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    await this.mutex.acquire();
    try {
      const entries = await this.store.load();
      if (entries.length === 0) {
        const genesis: GenesisEntry = {
          seq: 0,
          kind: "genesis",
          admin: this.config.admin,
          created_at: this.clock().toISOString(),
        };
        await this.store.append(genesis);
        this.state = { admin: genesis.admin, created_at: genesis.created_at, records: new Map(), seq: 0 };
      } else {
        const state = replayJournal(entries);
        if (state.admin !== this.config.admin) {
          throw new Error(
            `Persisted registry admin "${state.admin}" does not match configured admin "${this.config.admin}"`
          );
        }
        this.state = state;
      }
      this.initialized = true;
    } finally {
      this.mutex.release();
    }
  }

  // -----------------------------------------------------------------------
  // Mutations
  // -----------------------------------------------------------------------

  /**
   * Publish a new record owned by `caller`.
   *
   * @returns the new record's id
   * @throws RegistryError INVALID_INPUT if name, description or repoLink is empty
   */
  async publish(name: string, description: string, repoLink: string, caller: Identity): Promise<number> {
    this.ensureInitialized();

    await this.mutex.acquire();
    try {
      // shutdown() may have run while this call waited for the lock
      this.ensureInitialized();
      requireText("name", name);
      requireText("description", description);
      requireText("repoLink", repoLink);

      const dappId = this.state.records.size + 1;
      const event = createPublishedEvent(
        { dappId, developer: caller, name, description, repoLink },
        this.clock()
      );
      await this.commit(event);
      return dappId;
    } finally {
      this.mutex.release();
    }
  }

  /**
   * Mark a record as verified. Admin only; verifying twice is an error.
   *
   * @throws RegistryError UNAUTHORIZED, NOT_FOUND or ALREADY_VERIFIED
   */
  async verify(id: number, caller: Identity): Promise<void> {
    this.ensureInitialized();

    await this.mutex.acquire();
    try {
      this.ensureInitialized();
      if (caller !== this.state.admin) {
        throw new RegistryError("UNAUTHORIZED", "Only the registry admin can verify DApps", {
          dapp_id: id,
          caller,
        });
      }
      const record = this.requireRecord(id);
      if (record.verified) {
        throw new RegistryError("ALREADY_VERIFIED", `DApp ${id} is already verified`, { dapp_id: id });
      }

      await this.commit(createVerifiedEvent(id, caller, this.clock()));
    } finally {
      this.mutex.release();
    }
  }

  /**
   * Hand a record to `newOwner`. Only the current owner may do this.
   *
   * @throws RegistryError NOT_FOUND, UNAUTHORIZED or INVALID_INPUT (null newOwner)
   */
  async transferOwnership(id: number, newOwner: Identity, caller: Identity): Promise<void> {
    this.ensureInitialized();

    await this.mutex.acquire();
    try {
      this.ensureInitialized();
      const record = this.requireRecord(id);
      if (caller !== record.owner) {
        throw new RegistryError("UNAUTHORIZED", `Only the owner of DApp ${id} can transfer it`, {
          dapp_id: id,
          caller,
        });
      }
      if (isNullIdentity(newOwner)) {
        throw new RegistryError("INVALID_INPUT", "New owner must be a non-null identity", {
          dapp_id: id,
          field: "newOwner",
        });
      }

      await this.commit(createOwnershipTransferredEvent(id, record.owner, newOwner, this.clock()));
    } finally {
      this.mutex.release();
    }
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  /**
   * Look up a record by id.
   *
   * @throws RegistryError NOT_FOUND if id is not in 1..recordCount
   */
  get(id: number): DappRecord {
    this.ensureInitialized();
    return this.requireRecord(id);
  }

  exists(id: number): boolean {
    this.ensureInitialized();
    return this.state.records.has(id);
  }

  /**
   * List all records in id order.
   */
  list(): DappRecord[] {
    this.ensureInitialized();
    return Array.from(this.state.records.values());
  }

  listByOwner(owner: Identity): DappRecord[] {
    return this.list().filter((r) => r.owner === owner);
  }

  listVerified(): DappRecord[] {
    return this.list().filter((r) => r.verified);
  }

  isAdmin(identity: Identity): boolean {
    return identity === this.admin;
  }

  get admin(): Identity {
    this.ensureInitialized();
    return this.state.admin;
  }

  get recordCount(): number {
    this.ensureInitialized();
    return this.state.records.size;
  }

  // -----------------------------------------------------------------------
  // Notifications
  // -----------------------------------------------------------------------

  /**
   * Register a listener for every future event.
   *
   * @returns a function that removes the listener
   */
  subscribe(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getEventLog(): RegistryEvent[] {
    return [...this.eventLog];
  }

  clearEventLog(): void {
    this.eventLog = [];
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Wait for in-flight mutations, then close the store.
   */
  async shutdown(): Promise<void> {
    await this.mutex.acquire();
    try {
      this.listeners.clear();
      await this.store.close();
      this.initialized = false;
    } finally {
      this.mutex.release();
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error("DappRegistry is not initialized. Call `await registry.init()` first.");
    }
  }

  /**
   * Ids are 1..recordCount; anything else (0, negatives, fractions, NaN)
   * misses the map.
   */
  private requireRecord(id: number): DappRecord {
    const record = this.state.records.get(id);
    if (!record) {
      throw new RegistryError("NOT_FOUND", `DApp ${id} does not exist`, { dapp_id: id });
    }
    return record;
  }

  /**
   * Persist, apply and announce a validated event. If the store rejects
   * the append, memory is left untouched and the store's error propagates.
   */
  private async commit(event: RegistryEvent): Promise<void> {
    const entry: EventEntry = { seq: this.state.seq + 1, kind: "event", event };
    await this.store.append(entry);

    applyEvent(this.state, event);
    this.state.seq = entry.seq;

    this.recordEvent(event);
  }

  /**
   * Record an event and fan it out. Enforces max log size (FIFO eviction).
   */
  private recordEvent(event: RegistryEvent): void {
    this.eventLog.push(event);

    if (this.maxEventLogSize > 0 && this.eventLog.length > this.maxEventLogSize) {
      const overage = this.eventLog.length - this.maxEventLogSize;
      this.eventLog.splice(0, overage);
    }

    const onEvent = this.config.onEvent;
    if (onEvent) {
      this.safeCallback(() => onEvent(event), "onEvent");
    }
    for (const listener of this.listeners) {
      this.safeCallback(() => listener(event), "listener");
    }
  }

  private safeCallback(fn: () => void, context: string): void {
    try {
      fn();
    } catch (err) {
      this.reportError(err instanceof Error ? err : new Error(String(err)), context);
    }
  }

  /**
   * Report an error via the onError callback without affecting control flow.
   */
  private reportError(error: Error, context: string): void {
    if (!this.config.onError) {
      console.warn(`DappRegistry ${context} failed: ${error.message}`);
      return;
    }
    try {
      this.config.onError(error, context);
    } catch (err) {
      console.warn(`DappRegistry onError callback failed: ${(err as Error).message}`);
    }
  }
}

function requireText(field: string, value: string): void {
  if (typeof value !== "string" || value.length === 0) {
    throw new RegistryError("INVALID_INPUT", `'${field}' must be a non-empty string`, { field });
  }
}

// ---------------------------------------------------------------------------
// RegistryError
// ---------------------------------------------------------------------------

export type RegistryErrorCode = "INVALID_INPUT" | "NOT_FOUND" | "UNAUTHORIZED" | "ALREADY_VERIFIED";

/**
 * Typed failure of a registry operation. Thrown before any state changes.
 */
export class RegistryError extends Error {
  constructor(
    public readonly code: RegistryErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "RegistryError";
  }
}

export function isRegistryError(err: unknown, code?: RegistryErrorCode): err is RegistryError {
  return err instanceof RegistryError && (code === undefined || err.code === code);
}
