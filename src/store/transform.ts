/**
 * Store Module - Pure Transformations
 *
 * Document parsing and group partition edits. No I/O.
 */
import {
  type DeviceIdentity,
  DeviceIdentitySchema,
  type GroupIdentities,
  type IdentityRecord,
  IdentityRecordSchema,
} from "../identity/index.js";
import type {
  LegacyConfigFile,
  MetaDocument,
  UserConfigFile,
} from "./schema.js";
import {
  DOCUMENT_VERSION,
  EMPTY_META_DOCUMENT,
  RawMetaDocumentSchema,
  RestoreStateDocumentSchema,
} from "./schema.js";

// =============================================================================
// Identity Document
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Keep the entries of one partition that `parse` accepts. Reads the raw
 * JSON value so every own key survives, "__proto__" included.
 */
function salvagePartition<T>(
  partition: unknown,
  parse: (value: unknown) => T | null,
): Record<string, Record<string, T>> {
  const groups = new Map<string, Record<string, T>>();
  if (!isRecord(partition)) {
    return {};
  }

  for (const [groupName, entries] of Object.entries(partition)) {
    if (!isRecord(entries)) {
      continue;
    }
    const kept = new Map<string, T>();
    for (const [name, value] of Object.entries(entries)) {
      const parsed = parse(value);
      if (parsed !== null) {
        kept.set(name, parsed);
      }
    }
    groups.set(groupName, Object.fromEntries(kept));
  }

  return Object.fromEntries(groups);
}

/**
 * Own property of a partition, never one inherited from Object.prototype.
 */
function ownSlice<T>(
  partition: Readonly<Record<string, T>>,
  groupName: string,
): T | undefined {
  return Object.hasOwn(partition, groupName) ? partition[groupName] : undefined;
}

const parseIdentity = (value: unknown): IdentityRecord | null => {
  const parsed = IdentityRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

const parseDeviceIdentity = (value: unknown): DeviceIdentity | null => {
  const parsed = DeviceIdentitySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

/**
 * Parse an identity document. Anything unreadable becomes an empty
 * document; unreadable entries are dropped individually.
 */
export function parseMetaDocument(raw: unknown): MetaDocument {
  const parsed = RawMetaDocumentSchema.safeParse(raw);
  if (!parsed.success || !isRecord(raw)) {
    return EMPTY_META_DOCUMENT;
  }

  return {
    version: parsed.data.version ?? DOCUMENT_VERSION,
    devices: salvagePartition(raw.devices, parseDeviceIdentity),
    switches: salvagePartition(raw.switches, parseIdentity),
  };
}

/**
 * Read one group's slice of the document.
 */
export function getGroup(
  document: MetaDocument,
  groupName: string,
): GroupIdentities {
  return {
    devices: ownSlice(document.devices, groupName) ?? {},
    switches: ownSlice(document.switches, groupName) ?? {},
  };
}

/**
 * Replace one group's slice, leaving every other group untouched.
 */
export function setGroup(
  document: MetaDocument,
  groupName: string,
  identities: GroupIdentities,
): MetaDocument {
  return {
    version: DOCUMENT_VERSION,
    devices: { ...document.devices, [groupName]: identities.devices },
    switches: { ...document.switches, [groupName]: identities.switches },
  };
}

/**
 * Check whether a group has a slice in either partition.
 */
export function hasGroup(document: MetaDocument, groupName: string): boolean {
  return (
    Object.hasOwn(document.devices, groupName) ||
    Object.hasOwn(document.switches, groupName)
  );
}

/**
 * Drop one group's slice from both partitions.
 */
export function removeGroup(
  document: MetaDocument,
  groupName: string,
): MetaDocument {
  const { [groupName]: _removedDevices, ...devices } = document.devices;
  const { [groupName]: _removedSwitches, ...switches } = document.switches;

  return { version: DOCUMENT_VERSION, devices, switches };
}

// =============================================================================
// User Switches File
// =============================================================================

/**
 * Pull the definition list out of a parsed switches file.
 */
export function extractUserEntries(file: UserConfigFile): unknown[] {
  if (Array.isArray(file)) {
    return file;
  }
  return file.switches ?? [];
}

/**
 * Pull the platform entries out of a parsed legacy configuration file.
 */
export function extractLegacyEntries(file: LegacyConfigFile): unknown[] {
  if (Array.isArray(file)) {
    return file;
  }
  return file.switch ?? [];
}

/**
 * Shape written back to the switches file.
 */
export function buildUserConfigFile(
  entries: ReadonlyArray<unknown>,
): Readonly<{ version: number; switches: unknown[] }> {
  return { version: DOCUMENT_VERSION, switches: [...entries] };
}

// =============================================================================
// Restore State
// =============================================================================

/**
 * Parse the restore-state file into a snapshot map. Unreadable input is empty.
 */
export function parseRestoreDocument(
  raw: unknown,
): Map<string, Readonly<Record<string, unknown>>> {
  const parsed = RestoreStateDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return new Map();
  }
  return new Map(Object.entries(parsed.data.states));
}
