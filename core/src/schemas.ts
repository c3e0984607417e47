/**
 * Canonical Schemas
 *
 * Data structures shared by the registry, its journal and its stores.
 * Everything that is serialized uses snake_case field names.
 */

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/**
 * Opaque, already-authenticated caller identity (an address, a key
 * fingerprint, an account name). Compared by exact string equality.
 */
export type Identity = string;

// ---------------------------------------------------------------------------
// DApp Record
// ---------------------------------------------------------------------------

export interface DappRecord {
  readonly id: number; // 1-based, assigned in creation order
  readonly owner: Identity;
  readonly name: string;
  readonly description: string;
  readonly repo_link: string; // uninterpreted
  readonly verified: boolean;
  readonly created_at: string; // ISO-8601
}

// ---------------------------------------------------------------------------
// Registry Events
// ---------------------------------------------------------------------------

export type RegistryEventType = "Published" | "Verified" | "OwnershipTransferred";

interface BaseRegistryEvent {
  event_id: string; // uuid
  timestamp: string; // ISO-8601
  dapp_id: number;
}

export interface PublishedEvent extends BaseRegistryEvent {
  type: "Published";
  developer: Identity;
  name: string;
  description: string;
  repo_link: string;
}

export interface VerifiedEvent extends BaseRegistryEvent {
  type: "Verified";
  verifier: Identity;
}

export interface OwnershipTransferredEvent extends BaseRegistryEvent {
  type: "OwnershipTransferred";
  old_developer: Identity;
  new_developer: Identity;
}

export type RegistryEvent = PublishedEvent | VerifiedEvent | OwnershipTransferredEvent;

export type RegistryListener = (event: RegistryEvent) => void;

// ---------------------------------------------------------------------------
// Journal
// ---------------------------------------------------------------------------

/** First journal entry. Fixes the admin for the registry's lifetime. */
export interface GenesisEntry {
  seq: 0;
  kind: "genesis";
  admin: Identity;
  created_at: string; // ISO-8601
}

export interface EventEntry {
  seq: number; // 1, 2, 3, ... strictly consecutive
  kind: "event";
  event: RegistryEvent;
}

export type JournalEntry = GenesisEntry | EventEntry;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Durable backing for a registry. `append` must not resolve until the entry
 * survives a restart; the registry changes memory only after it resolves.
 */
export interface RegistryStore {
  /** Return every persisted entry in order (empty for a fresh store). */
  load(): Promise<JournalEntry[]>;
  append(entry: JournalEntry): Promise<void>;
  close(): Promise<void>;
}
