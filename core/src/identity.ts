import { Identity } from "./schemas";

/** Zero address. Never a valid owner. */
export const NULL_IDENTITY: Identity = "0x0000000000000000000000000000000000000000";

const ZERO_HEX_RE = /^0x0+$/i;

/**
 * True for identities no authenticated caller can hold: empty or
 * whitespace-only strings and any all-zero `0x` hex string.
 */
export function isNullIdentity(identity: Identity): boolean {
  if (typeof identity !== "string") return true;
  const trimmed = identity.trim();
  return trimmed.length === 0 || ZERO_HEX_RE.test(trimmed);
}
