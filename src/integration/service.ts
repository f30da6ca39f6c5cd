/**
 * Integration Module - Service Layer
 *
 * Host-side lifecycle of switch groups: setup, reload, unload and removal,
 * plus the turn on/off service calls. One MomentarySwitch per resolved
 * switch; devices are mirrored into the device registry.
 */
import { type Result, err, ok } from "neverthrow";

import type { ConfigStore } from "../config-store/index.js";
import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import {
  MomentarySwitch,
  type Scheduler,
  type SwitchSnapshot,
  type Transition,
  createTimerScheduler,
} from "../switch/index.js";
import { type IntegrationError, unknownEntity, unknownGroup } from "./errors.js";
import type {
  DeviceRegistry,
  GroupRuntime,
  RestoreStateStore,
  SnapshotListener,
} from "./schema.js";

const log = createLogger("integration");

export type IntegrationOptions = Readonly<{
  configStore: ConfigStore;
  devices: DeviceRegistry;
  restoreState: RestoreStateStore;
  scheduler?: Scheduler;
  onSnapshot?: SnapshotListener;
}>;

/**
 * Flatten a snapshot into the record kept for restore.
 */
const toRestoreRecord = (
  snapshot: SwitchSnapshot,
): Readonly<Record<string, unknown>> => ({
  is_on: snapshot.is_on,
  ...snapshot.attributes,
});

export class MomentaryIntegration {
  private readonly groups = new Map<string, GroupRuntime>();
  private readonly configStore: ConfigStore;
  private readonly devices: DeviceRegistry;
  private readonly restoreState: RestoreStateStore;
  private readonly scheduler: Scheduler;
  private readonly onSnapshot: SnapshotListener | undefined;

  constructor(options: IntegrationOptions) {
    this.configStore = options.configStore;
    this.devices = options.devices;
    this.restoreState = options.restoreState;
    this.scheduler = options.scheduler ?? createTimerScheduler();
    this.onSnapshot = options.onSnapshot;
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  groupNames(): ReadonlyArray<string> {
    return [...this.groups.keys()];
  }

  getGroup(groupName: string): GroupRuntime | undefined {
    return this.groups.get(groupName);
  }

  getSwitch(entityId: string): MomentarySwitch | undefined {
    for (const group of this.groups.values()) {
      for (const momentary of group.switches.values()) {
        if (momentary.entityId === entityId) {
          return momentary;
        }
      }
    }
    return undefined;
  }

  // ===========================================================================
  // Group Lifecycle
  // ===========================================================================

  /**
   * Reconcile a group and create its devices and switches. A group that
   * is already set up is unloaded first.
   */
  async setupGroup(
    groupName: string,
    switchesFile: string,
  ): Promise<GroupRuntime> {
    const startTime = Date.now();
    logOperationStart(log, "setupGroup", { groupName });

    this.unloadGroup(groupName);

    const config = await this.configStore.load(groupName, switchesFile);

    for (const device of config.devices.values()) {
      this.devices.getOrCreate({ groupName, ...device });
    }
    for (const device of config.orphanedDevices.values()) {
      if (this.devices.remove(device.deviceId)) {
        log.info({ groupName, deviceId: device.deviceId }, "Removed device");
      }
    }
    for (const orphan of config.orphans.values()) {
      this.restoreState.forget(orphan.uniqueId);
    }

    const switches = new Map<string, MomentarySwitch>();
    for (const resolved of config.switches.values()) {
      const momentary = new MomentarySwitch({
        config: resolved,
        scheduler: this.scheduler,
        onStateChange: (snapshot) => {
          this.restoreState.record(resolved.uniqueId, toRestoreRecord(snapshot));
          this.onSnapshot?.(groupName, snapshot);
        },
      });
      momentary.restore(this.restoreState.get(resolved.uniqueId));
      switches.set(resolved.uniqueId, momentary);
    }

    const runtime: GroupRuntime = {
      groupName,
      switchesFile,
      switches,
      devices: config.devices,
    };
    this.groups.set(groupName, runtime);

    logOperationComplete(log, "setupGroup", startTime, {
      groupName,
      switches: switches.size,
      devices: config.devices.size,
    });

    return runtime;
  }

  /**
   * Stop a group's switches. Their last state stays in the restore store.
   *
   * @returns true if the group was set up
   */
  unloadGroup(groupName: string): boolean {
    const runtime = this.groups.get(groupName);
    if (runtime === undefined) {
      return false;
    }

    for (const momentary of runtime.switches.values()) {
      momentary.dispose();
    }
    this.groups.delete(groupName);

    log.debug({ groupName }, "Group unloaded");
    return true;
  }

  /**
   * Re-read a group's switches file and rebuild its switches.
   */
  async reloadGroup(
    groupName: string,
  ): Promise<Result<GroupRuntime, IntegrationError>> {
    const runtime = this.groups.get(groupName);
    if (runtime === undefined) {
      return err(unknownGroup(groupName));
    }

    log.info({ groupName }, "Reloading group");
    return ok(await this.setupGroup(groupName, runtime.switchesFile));
  }

  /**
   * Remove a group for good: switches, restore state, identities and
   * devices. Safe to call for a group that is not set up.
   */
  async removeGroup(groupName: string): Promise<boolean> {
    const runtime = this.groups.get(groupName);
    this.unloadGroup(groupName);

    for (const uniqueId of runtime?.switches.keys() ?? []) {
      this.restoreState.forget(uniqueId);
    }

    const removed = await this.configStore.deleteGroup(groupName);

    for (const device of this.devices.list(groupName)) {
      this.devices.remove(device.deviceId);
    }

    log.info({ groupName, removed }, "Group removed");
    return removed;
  }

  /**
   * One-time import of flat platform-style entries into a group that has
   * no identities yet.
   *
   * @returns number of imported switches, 0 if the group already existed
   */
  async importLegacy(
    groupName: string,
    switchesFile: string,
    legacyEntries: ReadonlyArray<unknown>,
  ): Promise<number> {
    if (await this.configStore.hasGroup(groupName)) {
      log.debug({ groupName }, "Group already exists, skipping legacy import");
      return 0;
    }

    const imported = await this.configStore.importLegacyGroup(
      groupName,
      switchesFile,
      legacyEntries,
    );
    return imported.switches.length;
  }

  /**
   * Unload every group.
   */
  shutdown(): void {
    for (const groupName of [...this.groups.keys()]) {
      this.unloadGroup(groupName);
    }
  }

  // ===========================================================================
  // Service Calls
  // ===========================================================================

  turnOn(entityId: string): Result<Transition, IntegrationError> {
    return this.call(entityId, true);
  }

  turnOff(entityId: string): Result<Transition, IntegrationError> {
    return this.call(entityId, false);
  }

  private call(
    entityId: string,
    target: boolean,
  ): Result<Transition, IntegrationError> {
    const momentary = this.getSwitch(entityId);
    if (momentary === undefined) {
      log.warn({ entityId }, "Service call for unknown switch");
      return err(unknownEntity(entityId));
    }
    return ok(momentary.activate(target));
  }
}
