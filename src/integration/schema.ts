/**
 * Integration Module - Schemas and Types
 *
 * Host collaborators the integration talks to, and what it keeps per group.
 */
import type { ResolvedDevice } from "../config-store/index.js";
import type { MomentarySwitch, SwitchSnapshot } from "../switch/index.js";

// =============================================================================
// Host Collaborators
// =============================================================================

export type DeviceEntry = Readonly<{
  groupName: string;
  deviceId: string;
  name: string;
}>;

/**
 * Link to the host's device registry.
 */
export interface DeviceRegistry {
  getOrCreate(device: DeviceEntry): DeviceEntry;
  remove(deviceId: string): boolean;
  list(groupName?: string): ReadonlyArray<DeviceEntry>;
}

/**
 * Per-switch snapshots kept across restarts.
 */
export interface RestoreStateStore {
  get(uniqueId: string): Readonly<Record<string, unknown>> | null;
  record(uniqueId: string, snapshot: Readonly<Record<string, unknown>>): void;
  forget(uniqueId: string): void;
}

/**
 * Optional observer of every reported switch state.
 */
export type SnapshotListener = (
  groupName: string,
  snapshot: SwitchSnapshot,
) => void;

// =============================================================================
// Runtime
// =============================================================================

/**
 * A set-up group: its switches by unique id and its devices.
 */
export type GroupRuntime = Readonly<{
  groupName: string;
  switchesFile: string;
  switches: ReadonlyMap<string, MomentarySwitch>;
  devices: ReadonlyMap<string, ResolvedDevice>;
}>;
