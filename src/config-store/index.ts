/**
 * Config Store Module - Public API
 */

// Types
export type {
  DefinitionItem,
  GroupConfig,
  ImportedSwitch,
  LegacyImport,
  LegacySwitch,
  OrphanRecord,
  OrphanedDevice,
  Reconciliation,
  ResolvedDevice,
  ResolvedSwitch,
  SwitchDefinition,
} from "./schema.js";
export type { ConfigError } from "./errors.js";
export type { ReconcileInput } from "./transform.js";

export { LEGACY_PLATFORM } from "./schema.js";

// Error utilities
export { formatConfigError } from "./errors.js";

// Service
export { ConfigStore } from "./service.js";

// Pure transformations
export {
  flattenEntries,
  importLegacyEntries,
  importLegacySwitch,
  isLegacyEntry,
  parseDefinition,
  parseLegacyMode,
  parseMode,
  parseToggleFor,
  reconcile,
} from "./transform.js";
