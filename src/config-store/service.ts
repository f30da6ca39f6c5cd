/**
 * Config Store Module - Service Layer
 *
 * Loads a group: reads the user's switches file, reconciles it against the
 * identity document inside one locked read-modify-write, and logs what
 * changed. Also owns group deletion and the one-time legacy import.
 */
import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import { mintUniqueId } from "../identity/index.js";
import {
  type IdentityStore,
  formatStorageError,
  loadUserEntries,
  saveUserEntries,
} from "../store/index.js";
import { formatConfigError } from "./errors.js";
import type {
  GroupConfig,
  LegacyImport,
  Reconciliation,
} from "./schema.js";
import { importLegacyEntries, reconcile } from "./transform.js";

const log = createLogger("config-store");

/**
 * Report the outcome of a reconciliation pass.
 */
function logReconciliation(groupName: string, result: Reconciliation): void {
  for (const issue of result.issues) {
    log.warn(
      { groupName, issue: issue.type },
      `Skipping definition: ${formatConfigError(issue)}`,
    );
  }

  for (const orphan of result.orphans.values()) {
    log.info(
      { groupName, uniqueId: orphan.uniqueId, entityId: orphan.entityId },
      `Switch "${orphan.key}" is no longer configured`,
    );
  }

  for (const device of result.orphanedDevices.values()) {
    log.info(
      { groupName, deviceId: device.deviceId },
      `Device "${device.key}" is no longer configured`,
    );
  }
}

/**
 * Reconciled switch groups backed by one identity store.
 */
export class ConfigStore {
  private readonly groups = new Map<string, GroupConfig>();

  constructor(
    private readonly identities: IdentityStore,
    private readonly mint: () => string = mintUniqueId,
  ) {}

  /**
   * Last loaded configuration of a group.
   */
  get(groupName: string): GroupConfig | undefined {
    return this.groups.get(groupName);
  }

  /**
   * Load and reconcile a group. Never fails: unreadable files yield an
   * empty group and write failures leave the in-memory result in charge.
   */
  async load(groupName: string, switchesFile: string): Promise<GroupConfig> {
    const startTime = Date.now();
    logOperationStart(log, "loadGroup", { groupName, switchesFile });

    // Read outside the lock, it only guards the identity document
    const entries = await loadUserEntries(switchesFile);

    const { value: result, write } = await this.identities.updateGroup(
      groupName,
      (persisted) => {
        const reconciliation = reconcile({
          entries,
          persisted,
          mint: this.mint,
        });
        return {
          value: reconciliation,
          next: reconciliation.changed ? reconciliation.identities : null,
        };
      },
    );

    if (write.isErr()) {
      log.error(
        { groupName, error: formatStorageError(write.error) },
        "Could not save identities, keeping them in memory",
      );
    }

    logReconciliation(groupName, result);

    const group: GroupConfig = {
      ...result,
      groupName,
      switchesFile,
      persisted: write.isOk() && write.value,
    };
    this.groups.set(groupName, group);

    logOperationComplete(log, "loadGroup", startTime, {
      groupName,
      switches: group.switches.size,
      devices: group.devices.size,
      orphans: group.orphans.size,
      persisted: group.persisted,
    });

    return group;
  }

  /**
   * Check whether the identity document knows a group.
   */
  async hasGroup(groupName: string): Promise<boolean> {
    return this.identities.hasGroup(groupName);
  }

  /**
   * Remove a group's identities. Idempotent.
   *
   * @returns true if the group was present and removed
   */
  async deleteGroup(groupName: string): Promise<boolean> {
    this.groups.delete(groupName);

    const deleted = await this.identities.deleteGroup(groupName);
    if (deleted.isErr()) {
      log.error(
        { groupName, error: formatStorageError(deleted.error) },
        "Could not delete group identities",
      );
      return false;
    }

    log.info({ groupName, removed: deleted.value }, "Group identities deleted");
    return deleted.value;
  }

  /**
   * Import a flat platform-style list into a new group: writes the group's
   * identities and a new switches file holding the converted definitions.
   * A later `load` picks the imported identities up unchanged.
   */
  async importLegacyGroup(
    groupName: string,
    switchesFile: string,
    legacyEntries: ReadonlyArray<unknown>,
  ): Promise<LegacyImport> {
    const startTime = Date.now();
    logOperationStart(log, "importLegacyGroup", { groupName, switchesFile });

    const imported = importLegacyEntries(legacyEntries);
    for (const issue of imported.issues) {
      log.warn(
        { groupName, issue: issue.type },
        `Skipping legacy switch: ${formatConfigError(issue)}`,
      );
    }

    const savedIdentities = await this.identities.saveGroup(
      groupName,
      imported.identities,
    );
    if (savedIdentities.isErr()) {
      log.error(
        { groupName, error: formatStorageError(savedIdentities.error) },
        "Could not save imported identities",
      );
    }

    const savedEntries = await saveUserEntries(
      switchesFile,
      imported.switches.map((item) => item.entry),
    );
    if (savedEntries.isErr()) {
      log.error(
        { groupName, error: formatStorageError(savedEntries.error) },
        "Could not write imported switches file",
      );
    }

    logOperationComplete(log, "importLegacyGroup", startTime, {
      groupName,
      imported: imported.switches.length,
      skipped: imported.issues.length,
    });

    return imported;
  }
}
