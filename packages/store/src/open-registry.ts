import { DappRegistry, RegistryConfig } from "@dapp-registry/core";
import { FileStore } from "./file-store";
import { StoreRegistryConfig } from "./config";

/**
 * Build a journal-backed registry and load its persisted state.
 */
export async function openRegistry(
  config: StoreRegistryConfig,
  callbacks: Pick<RegistryConfig, "onEvent" | "onError" | "clock"> = {}
): Promise<DappRegistry> {
  const store = new FileStore({ dataDir: config.dataDir, signatureSecret: config.journalSecret });
  const registry = new DappRegistry({
    ...callbacks,
    admin: config.admin,
    store,
    maxEventLogSize: config.maxEventLogSize,
  });

  try {
    await registry.init();
  } catch (err) {
    await store.close();
    throw err;
  }
  return registry;
}
