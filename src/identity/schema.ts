/**
 * Identity Module - Schemas and Types
 *
 * Stable identities handed out to user-named switches and devices.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Constants
// =============================================================================

/** Namespace prefixed to generated entity ids and minted unique ids. */
export const NAMESPACE = "momentary";

/** Entity platform the switches are published under. */
export const PLATFORM = "switch";

/** Prefix that opts a switch out of the namespace ("!Kitchen Light"). */
export const BARE_SIGIL = "!";

/** Prefix that spells out the default namespaced naming ("+Kitchen Light"). */
export const NAMESPACED_SIGIL = "+";

// =============================================================================
// Naming
// =============================================================================

/**
 * How the entity id of a switch is built.
 * - namespaced: switch.momentary_<slug>
 * - bare: switch.<slug>
 */
export type NamingStyle = "namespaced" | "bare";

/**
 * A user-provided switch name with its sigil resolved.
 */
export type SwitchName = Readonly<{
  /** Name exactly as written in the user config, sigil included */
  raw: string;
  /** Name shown to the user, sigil removed */
  label: string;
  naming: NamingStyle;
}>;

// =============================================================================
// Persisted Identities
// =============================================================================

/**
 * Identity of a switch, keyed by its raw name inside a group.
 */
export const IdentityRecordSchema = z.object({
  unique_id: z.string().min(1).describe("Stable opaque identity"),
  entity_id: z.string().min(1).describe("Entity id derived once at mint time"),
});

export type IdentityRecord = z.infer<typeof IdentityRecordSchema>;

/**
 * Identity of a device, keyed by its name inside a group.
 */
export const DeviceIdentitySchema = z.object({
  device_id: z.string().min(1).describe("Stable device registry identity"),
});

export type DeviceIdentity = z.infer<typeof DeviceIdentitySchema>;

/**
 * Everything persisted for one group.
 */
export type GroupIdentities = Readonly<{
  devices: Readonly<Record<string, DeviceIdentity>>;
  switches: Readonly<Record<string, IdentityRecord>>;
}>;

export const EMPTY_GROUP_IDENTITIES: GroupIdentities = {
  devices: {},
  switches: {},
};
