/**
 * Config Store Module - Schemas and Types
 *
 * User-authored switch definitions, the flat legacy platform format, and
 * the resolved output of a reconciliation pass.
 */
import { z } from "zod";

import type { GroupIdentities, NamingStyle } from "../identity/index.js";
import type { SwitchMode } from "../switch/index.js";
import type { ConfigError } from "./errors.js";

/** Platform tag that marks a legacy entry as ours. */
export const LEGACY_PLATFORM = "momentary";

// =============================================================================
// User Definitions
// =============================================================================

/**
 * One switch as written in the switches file. `mode` and `toggle_for` are
 * validated further by the transforms.
 */
export const SwitchDefinitionInputSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  mode: z.union([z.string(), z.boolean()]).optional(),
  toggle_for: z.unknown().optional(),
  cancellable: z.boolean().default(false),
});

export type SwitchDefinitionInput = z.infer<typeof SwitchDefinitionInputSchema>;

/**
 * A validated definition with its sigil and duration resolved.
 */
export type SwitchDefinition = Readonly<{
  /** Raw name, the key of its identity */
  key: string;
  label: string;
  naming: NamingStyle;
  mode: SwitchMode;
  toggleForMs: number;
  cancellable: boolean;
}>;

/**
 * A list item flattened out of the switches file, tagged with its device.
 */
export type DefinitionItem = Readonly<{
  deviceName: string;
  index: number;
  raw: unknown;
}>;

// =============================================================================
// Legacy Platform Format
// =============================================================================

/**
 * Flat platform-style entry:
 * ```yaml
 * switch:
 *   - platform: momentary
 *     name: "!Doorbell"
 *     on_for: 2
 *     allow_off: true
 * ```
 */
export const LegacySwitchSchema = z.object({
  platform: z.string(),
  name: z.string().trim().min(1, "name is required"),
  unique_id: z.string().min(1).optional(),
  mode: z.union([z.string(), z.boolean()]).optional(),
  toggle_for: z.unknown().optional(),
  on_for: z.unknown().optional(),
  cancellable: z.boolean().optional(),
  allow_off: z.boolean().optional(),
});

export type LegacySwitch = z.infer<typeof LegacySwitchSchema>;

// =============================================================================
// Reconciliation Output
// =============================================================================

/**
 * A definition merged with its identity. Keyed by uniqueId.
 */
export type ResolvedSwitch = Readonly<
  SwitchDefinition & {
    uniqueId: string;
    entityId: string;
    deviceId: string;
    /** Display name, same as label */
    name: string;
  }
>;

export type ResolvedDevice = Readonly<{
  deviceId: string;
  name: string;
}>;

/**
 * A persisted switch identity no current definition claims.
 */
export type OrphanRecord = Readonly<{
  uniqueId: string;
  entityId: string;
  key: string;
}>;

export type OrphanedDevice = Readonly<{
  deviceId: string;
  key: string;
}>;

export type Reconciliation = Readonly<{
  switches: ReadonlyMap<string, ResolvedSwitch>;
  devices: ReadonlyMap<string, ResolvedDevice>;
  orphans: ReadonlyMap<string, OrphanRecord>;
  orphanedDevices: ReadonlyMap<string, OrphanedDevice>;
  /** Identities to persist: everything claimed or carried over */
  identities: GroupIdentities;
  /** True if identities differ from what was loaded */
  changed: boolean;
  issues: ReadonlyArray<ConfigError>;
}>;

/**
 * A reconciled group as held by the config store.
 */
export type GroupConfig = Readonly<
  Reconciliation & {
    groupName: string;
    switchesFile: string;
    /** True if the identity document was written during this load */
    persisted: boolean;
  }
>;

/**
 * One legacy entry converted to the steady-state model.
 */
export type ImportedSwitch = Readonly<{
  resolved: ResolvedSwitch;
  /** Entry written to the new switches file */
  entry: Readonly<Record<string, unknown>>;
}>;

export type LegacyImport = Readonly<{
  switches: ReadonlyArray<ImportedSwitch>;
  identities: GroupIdentities;
  issues: ReadonlyArray<ConfigError>;
}>;
