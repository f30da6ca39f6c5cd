/**
 * Store Module - Public API
 */

// Types
export type {
  LegacyConfigFile,
  MetaDocument,
  UserConfigFile,
} from "./schema.js";
export type { StorageError } from "./errors.js";
export type { Lock } from "./lock.js";
export type { GroupUpdate, GroupUpdateResult } from "./service.js";

export { DOCUMENT_VERSION, EMPTY_META_DOCUMENT } from "./schema.js";

// Error utilities
export { formatStorageError } from "./errors.js";

// Service (side effects)
export {
  FileRestoreStateStore,
  IdentityStore,
  loadLegacyEntries,
  loadUserEntries,
  readTextFile,
  saveUserEntries,
  writeFileAtomic,
} from "./service.js";

export { createLock } from "./lock.js";

// Pure transformations
export {
  extractLegacyEntries,
  extractUserEntries,
  getGroup,
  hasGroup,
  parseMetaDocument,
  parseRestoreDocument,
  removeGroup,
  setGroup,
} from "./transform.js";
