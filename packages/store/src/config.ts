/**
 * Registry configuration from environment variables.
 *
 *   REGISTRY_ADMIN           identity allowed to verify (required)
 *   REGISTRY_DATA_DIR        journal directory (default: ./data)
 *   REGISTRY_JOURNAL_SECRET  HMAC secret for journal lines (optional)
 *   REGISTRY_MAX_EVENT_LOG   in-memory event history bound (optional)
 */
export interface StoreRegistryConfig {
  admin: string;
  dataDir: string;
  journalSecret?: string;
  maxEventLogSize?: number;
}

export function loadRegistryConfig(env: NodeJS.ProcessEnv = process.env): StoreRegistryConfig {
  const admin = env.REGISTRY_ADMIN?.trim();
  if (!admin) {
    throw new Error("REGISTRY_ADMIN is required");
  }

  const config: StoreRegistryConfig = {
    admin,
    dataDir: env.REGISTRY_DATA_DIR || "./data",
  };

  if (env.REGISTRY_JOURNAL_SECRET) {
    config.journalSecret = env.REGISTRY_JOURNAL_SECRET;
  }

  const maxEventLog = env.REGISTRY_MAX_EVENT_LOG;
  if (maxEventLog !== undefined && maxEventLog !== "") {
    if (!/^\d+$/.test(maxEventLog)) {
      throw new Error(`REGISTRY_MAX_EVENT_LOG must be a non-negative integer, got "${maxEventLog}"`);
    }
    config.maxEventLogSize = parseInt(maxEventLog, 10);
  }

  return config;
}
