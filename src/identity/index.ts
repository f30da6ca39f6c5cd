/**
 * Identity Module - Public API
 *
 * Modules import from other modules via index.ts only - no deep imports.
 */

// Types
export type {
  DeviceIdentity,
  GroupIdentities,
  IdentityRecord,
  NamingStyle,
  SwitchName,
} from "./schema.js";

export {
  BARE_SIGIL,
  DeviceIdentitySchema,
  EMPTY_GROUP_IDENTITIES,
  IdentityRecordSchema,
  NAMESPACE,
  NAMESPACED_SIGIL,
  PLATFORM,
} from "./schema.js";

// Pure transformations
export {
  deriveEntityId,
  displayName,
  legacyDeviceId,
  legacyEntityId,
  legacyUniqueId,
  mintIdentity,
  mintUniqueId,
  parseSwitchName,
  slugify,
} from "./transform.js";
