import * as crypto from "crypto";
import { isNullIdentity } from "./identity";
import {
  DappRecord,
  EventEntry,
  GenesisEntry,
  Identity,
  JournalEntry,
  RegistryEvent,
} from "./schemas";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_MAX_LINE_BYTES = 64 * 1024; // 64 KiB
const HMAC_HEX_LENGTH = 64; // SHA-256 produces 32 bytes = 64 hex chars
const VALID_HEX_RE = /^[0-9a-f]+$/;

export interface JournalCodecOptions {
  /**
   * HMAC secret. When set, every encoded line is signed and every decoded
   * line must be; when unset, signed lines are rejected.
   */
  signatureSecret?: string;
  /** Maximum accepted line length in bytes (default: 64 KiB) */
  maxLineBytes?: number;
}

/**
 * JournalCodec - encodes journal entries as JSON Lines and decodes them back
 * with runtime shape checks and optional HMAC signatures.
 */
export class JournalCodec {
  private readonly signatureSecret?: string;
  private readonly maxLineBytes: number;

  constructor(options: JournalCodecOptions = {}) {
    this.signatureSecret = options.signatureSecret;
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
  }

  /**
   * Encode one entry as a single line (no trailing newline).
   */
  encode(entry: JournalEntry): string {
    if (!this.signatureSecret) {
      return JSON.stringify(entry);
    }
    return JSON.stringify({ ...entry, signature: JournalCodec.computeSignature(entry, this.signatureSecret) });
  }

  /**
   * Decode and validate one line.
   *
   * @param lineNumber 1-based position in the journal, used in error messages
   */
  decode(line: string, lineNumber?: number): JournalEntry {
    if (Buffer.byteLength(line, "utf-8") > this.maxLineBytes) {
      throw new JournalError(`Journal line exceeds maximum size of ${this.maxLineBytes} bytes`, lineNumber);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      throw new JournalError(`Journal JSON parse error: ${(err as Error).message}`, lineNumber);
    }

    const entry = validateEntry(raw, lineNumber);
    const signature = isRecord(raw) ? raw.signature : undefined;
    if (this.signatureSecret) {
      this.verifySignature(entry, signature, lineNumber);
    } else if (signature !== undefined) {
      // appending unsigned lines would make a signed journal unreadable with its secret
      throw new JournalError("Journal entry is signed but no signature secret is configured", lineNumber);
    }
    return entry;
  }

  // -----------------------------------------------------------------------
  // Signature utilities
  // -----------------------------------------------------------------------

  /**
   * Compute an HMAC-SHA256 signature over the canonical JSON of an entry.
   *
   * @returns hex-encoded HMAC signature (64 characters)
   */
  static computeSignature(entry: JournalEntry, secret: string): string {
    return crypto.createHmac("sha256", secret).update(canonicalJson(entry)).digest("hex");
  }

  private verifySignature(entry: JournalEntry, signature: unknown, lineNumber?: number): void {
    if (typeof signature !== "string") {
      throw new JournalError("Journal entry signature is required but missing", lineNumber);
    }
    if (signature.length !== HMAC_HEX_LENGTH || !VALID_HEX_RE.test(signature)) {
      throw new JournalError("Journal entry signature verification failed", lineNumber);
    }

    const expected = JournalCodec.computeSignature(entry, this.signatureSecret ?? "");
    if (!crypto.timingSafeEqual(Buffer.from(signature, "hex"), Buffer.from(expected, "hex"))) {
      throw new JournalError("Journal entry signature verification failed", lineNumber);
    }
  }
}

// ---------------------------------------------------------------------------
// Replay
// ---------------------------------------------------------------------------

/**
 * In-memory registry state rebuilt from a journal.
 */
export interface RegistryState {
  admin: Identity;
  created_at: string;
  records: Map<number, DappRecord>;
  /** seq of the last applied entry */
  seq: number;
}

/**
 * Rebuild registry state from a full journal, re-checking every invariant
 * the live registry enforces. Throws JournalError on the first violation.
 */
export function replayJournal(entries: readonly JournalEntry[]): RegistryState {
  const [genesis, ...rest] = entries;
  if (!genesis || genesis.kind !== "genesis") {
    throw new JournalError("Journal must start with a genesis entry", 1);
  }

  const state: RegistryState = {
    admin: genesis.admin,
    created_at: genesis.created_at,
    records: new Map(),
    seq: 0,
  };

  rest.forEach((entry, index) => {
    const lineNumber = index + 2;
    if (entry.kind !== "event") {
      throw new JournalError("Duplicate genesis entry", lineNumber);
    }
    if (entry.seq !== state.seq + 1) {
      throw new JournalError(`Expected seq ${state.seq + 1}, got ${entry.seq}`, lineNumber);
    }
    applyEvent(state, entry.event, lineNumber);
    state.seq = entry.seq;
  });

  return state;
}

/**
 * Apply one event to the state. The live registry validates before calling
 * this, so a throw here means the journal itself is inconsistent.
 */
export function applyEvent(state: RegistryState, event: RegistryEvent, lineNumber?: number): void {
  switch (event.type) {
    case "Published": {
      const expectedId = state.records.size + 1;
      if (event.dapp_id !== expectedId) {
        throw new JournalError(`Published dapp_id ${event.dapp_id} out of order (expected ${expectedId})`, lineNumber);
      }
      state.records.set(
        event.dapp_id,
        Object.freeze({
          id: event.dapp_id,
          owner: event.developer,
          name: event.name,
          description: event.description,
          repo_link: event.repo_link,
          verified: false,
          created_at: event.timestamp,
        })
      );
      return;
    }

    case "Verified": {
      const record = requireRecord(state, event.dapp_id, lineNumber);
      if (event.verifier !== state.admin) {
        throw new JournalError(`DApp ${event.dapp_id} verified by non-admin "${event.verifier}"`, lineNumber);
      }
      if (record.verified) {
        throw new JournalError(`DApp ${event.dapp_id} verified twice`, lineNumber);
      }
      state.records.set(event.dapp_id, Object.freeze({ ...record, verified: true }));
      return;
    }

    case "OwnershipTransferred": {
      const record = requireRecord(state, event.dapp_id, lineNumber);
      if (event.old_developer !== record.owner) {
        throw new JournalError(
          `DApp ${event.dapp_id} transferred by "${event.old_developer}" but owned by "${record.owner}"`,
          lineNumber
        );
      }
      if (isNullIdentity(event.new_developer)) {
        throw new JournalError(`DApp ${event.dapp_id} transferred to the null identity`, lineNumber);
      }
      state.records.set(event.dapp_id, Object.freeze({ ...record, owner: event.new_developer }));
      return;
    }
  }
}

function requireRecord(state: RegistryState, dappId: number, lineNumber?: number): DappRecord {
  const record = state.records.get(dappId);
  if (!record) {
    throw new JournalError(`Event refers to unknown dapp_id ${dappId}`, lineNumber);
  }
  return record;
}

// ---------------------------------------------------------------------------
// Shape validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function requireString(obj: Record<string, unknown>, field: string, where: string, lineNumber?: number): string {
  const value = obj[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new JournalError(`${where} missing or invalid '${field}' (expected non-empty string)`, lineNumber);
  }
  return value;
}

function validateEntry(raw: unknown, lineNumber?: number): JournalEntry {
  if (!isRecord(raw)) {
    throw new JournalError("Journal entry must be a non-null object", lineNumber);
  }
  const seq = raw.seq;
  if (typeof seq !== "number" || !Number.isInteger(seq) || seq < 0) {
    throw new JournalError("Journal entry missing or invalid 'seq' (expected non-negative integer)", lineNumber);
  }

  if (raw.kind === "genesis") {
    if (seq !== 0) {
      throw new JournalError("Genesis entry must have seq 0", lineNumber);
    }
    const genesis: GenesisEntry = {
      seq: 0,
      kind: "genesis",
      admin: requireString(raw, "admin", "Genesis entry", lineNumber),
      created_at: requireString(raw, "created_at", "Genesis entry", lineNumber),
    };
    return genesis;
  }

  if (raw.kind === "event") {
    const entry: EventEntry = { seq, kind: "event", event: validateEvent(raw.event, lineNumber) };
    return entry;
  }

  throw new JournalError(`Unknown journal entry kind "${String(raw.kind)}"`, lineNumber);
}

function validateEvent(raw: unknown, lineNumber?: number): RegistryEvent {
  if (!isRecord(raw)) {
    throw new JournalError("Journal event must be a non-null object", lineNumber);
  }
  const dappId = raw.dapp_id;
  if (typeof dappId !== "number" || !Number.isInteger(dappId) || dappId < 1) {
    throw new JournalError("Event missing or invalid 'dapp_id' (expected positive integer)", lineNumber);
  }
  const base = {
    event_id: requireString(raw, "event_id", "Event", lineNumber),
    timestamp: requireString(raw, "timestamp", "Event", lineNumber),
    dapp_id: dappId,
  };

  switch (raw.type) {
    case "Published":
      return {
        ...base,
        type: "Published",
        // developer and old_developer may be any string a caller presented
        developer: typeof raw.developer === "string" ? raw.developer : "",
        name: requireString(raw, "name", "Published event", lineNumber),
        description: requireString(raw, "description", "Published event", lineNumber),
        repo_link: requireString(raw, "repo_link", "Published event", lineNumber),
      };
    case "Verified":
      return { ...base, type: "Verified", verifier: requireString(raw, "verifier", "Verified event", lineNumber) };
    case "OwnershipTransferred":
      return {
        ...base,
        type: "OwnershipTransferred",
        old_developer: typeof raw.old_developer === "string" ? raw.old_developer : "",
        new_developer: requireString(raw, "new_developer", "OwnershipTransferred event", lineNumber),
      };
    default:
      throw new JournalError(`Unknown event type "${String(raw.type)}"`, lineNumber);
  }
}

/**
 * JSON with object keys sorted at every depth, so signatures do not depend
 * on property insertion order.
 */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

// ---------------------------------------------------------------------------
// JournalError
// ---------------------------------------------------------------------------

/**
 * Raised when persisted registry state is malformed or inconsistent.
 */
export class JournalError extends Error {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = "JournalError";
  }
}
