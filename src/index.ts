/**
 * Momentary Switch Service - Application Entry Point
 *
 * Sets up:
 * - Identity store and config store
 * - One-time legacy import
 * - The configured switch group
 * - Periodic restore-state flushing
 * - SIGHUP reload and graceful shutdown
 */
import { getStorageConfig, config } from "./config.js";
import { ConfigStore } from "./config-store/index.js";
import {
  MemoryDeviceRegistry,
  MomentaryIntegration,
  formatIntegrationError,
} from "./integration/index.js";
import { createLogger, logOperationFailed } from "./logger.js";
import {
  FileRestoreStateStore,
  IdentityStore,
  formatStorageError,
  loadLegacyEntries,
} from "./store/index.js";

const log = createLogger("app");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  MOMENTARY SWITCHES");
console.log("========================================");
console.log("");

const storage = getStorageConfig();

// Log configuration summary
log.info(
  {
    env: config.NODE_ENV,
    group: config.MOMENTARY_GROUP,
    switchesFile: storage.switchesFile,
    metaFile: storage.metaFile,
    restoreFile: storage.restoreFile,
    legacyFile: storage.legacyFile ?? null,
  },
  "Configuration loaded",
);

// =============================================================================
// SERVICE WIRING
// =============================================================================

const restoreState = new FileRestoreStateStore(storage.restoreFile);
const configStore = new ConfigStore(new IdentityStore(storage.metaFile));

const integration = new MomentaryIntegration({
  configStore,
  devices: new MemoryDeviceRegistry(),
  restoreState,
  onSnapshot: (groupName, snapshot) => {
    log.info(
      {
        groupName,
        entityId: snapshot.attributes.entity_id,
        toggleUntil: snapshot.attributes.toggle_until,
      },
      `${snapshot.attributes.entity_id} is ${snapshot.is_on ? "ON" : "OFF"}`,
    );
  },
});

/**
 * Persist restore state, logging rather than failing.
 */
async function flushRestoreState(): Promise<void> {
  const flushed = await restoreState.flush();
  if (flushed.isErr()) {
    log.error(
      { error: formatStorageError(flushed.error) },
      "Could not save restore state",
    );
  }
}

async function start(): Promise<void> {
  await restoreState.load();

  if (storage.legacyFile !== undefined) {
    const entries = await loadLegacyEntries(storage.legacyFile);
    const imported = await integration.importLegacy(
      config.MOMENTARY_GROUP,
      storage.switchesFile,
      entries,
    );
    if (imported > 0) {
      log.info({ imported }, "Imported legacy switches");
    }
  }

  const group = await integration.setupGroup(
    config.MOMENTARY_GROUP,
    storage.switchesFile,
  );

  log.info(
    { group: group.groupName, switches: group.switches.size },
    `🚀 ${config.APP_NAME} running`,
  );
}

// =============================================================================
// START
// =============================================================================

start().catch((error) => {
  logOperationFailed(log, "startup", error);
  process.exit(1);
});

const flushTimer = setInterval(() => {
  flushRestoreState().catch((error) => {
    log.error({ error }, "Restore state flush crashed");
  });
}, config.RESTORE_FLUSH_INTERVAL_MS);

// =============================================================================
// RELOAD
// =============================================================================

process.on("SIGHUP", () => {
  integration
    .reloadGroup(config.MOMENTARY_GROUP)
    .then((reloaded) => {
      if (reloaded.isErr()) {
        log.warn(formatIntegrationError(reloaded.error));
      }
    })
    .catch((error) => {
      logOperationFailed(log, "reloadGroup", error, {
        groupName: config.MOMENTARY_GROUP,
      });
    });
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  clearInterval(flushTimer);

  // Stop switch timers; their last state is already recorded
  integration.shutdown();

  flushRestoreState()
    .catch((error) => {
      log.error({ error }, "Final restore state flush crashed");
    })
    .finally(() => {
      log.info("Shutdown complete");
      process.exit(0);
    });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
