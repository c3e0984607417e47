/**
 * DApp Registry - Core
 *
 * Registry state machine for published DApp records: anyone publishes,
 * the admin verifies, owners transfer. Mutations are serialized and
 * journaled through a pluggable store.
 *
 * @example
 * ```typescript
 * import { DappRegistry } from '@dapp-registry/core';
 *
 * const registry = new DappRegistry({
 *   admin: '0xadmin',
 *   onEvent: (event) => console.log(event.type, event.dapp_id),
 * });
 * await registry.init();
 * ```
 */

export * from "./schemas";
export * from "./identity";
export * from "./events";
export * from "./journal";
export * from "./memory-store";
export * from "./registry";
