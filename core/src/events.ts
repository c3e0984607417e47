import { v4 as uuidv4 } from "uuid";
import {
  Identity,
  OwnershipTransferredEvent,
  PublishedEvent,
  VerifiedEvent,
} from "./schemas";

// Events are frozen: the same object reaches the store, the event log and
// every listener.

/**
 * Create a Published event for a newly created record.
 * The event timestamp doubles as the record's `created_at`.
 *
 * @param at Creation time, taken from the registry clock
 */
export function createPublishedEvent(
  params: {
    dappId: number;
    developer: Identity;
    name: string;
    description: string;
    repoLink: string;
  },
  at: Date
): PublishedEvent {
  const event: PublishedEvent = {
    type: "Published",
    event_id: uuidv4(),
    timestamp: at.toISOString(),
    dapp_id: params.dappId,
    developer: params.developer,
    name: params.name,
    description: params.description,
    repo_link: params.repoLink,
  };
  return Object.freeze(event);
}

export function createVerifiedEvent(dappId: number, verifier: Identity, at: Date): VerifiedEvent {
  const event: VerifiedEvent = {
    type: "Verified",
    event_id: uuidv4(),
    timestamp: at.toISOString(),
    dapp_id: dappId,
    verifier,
  };
  return Object.freeze(event);
}

export function createOwnershipTransferredEvent(
  dappId: number,
  oldDeveloper: Identity,
  newDeveloper: Identity,
  at: Date
): OwnershipTransferredEvent {
  const event: OwnershipTransferredEvent = {
    type: "OwnershipTransferred",
    event_id: uuidv4(),
    timestamp: at.toISOString(),
    dapp_id: dappId,
    old_developer: oldDeveloper,
    new_developer: newDeveloper,
  };
  return Object.freeze(event);
}
