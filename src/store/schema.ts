/**
 * Store Module - Schemas and Types
 *
 * On-disk shapes: the identity document shared by every group, the
 * user-authored switches file and the restore-state file.
 */
import { z } from "zod";

import type { DeviceIdentity, IdentityRecord } from "../identity/index.js";

/** Version tag written into every document. Not interpreted on read. */
export const DOCUMENT_VERSION = 1;

// =============================================================================
// Identity Document
// =============================================================================

/**
 * One document per installation, partitioned by group name.
 */
export type MetaDocument = Readonly<{
  version: number;
  devices: Readonly<Record<string, Readonly<Record<string, DeviceIdentity>>>>;
  switches: Readonly<Record<string, Readonly<Record<string, IdentityRecord>>>>;
}>;

export const EMPTY_META_DOCUMENT: MetaDocument = {
  version: DOCUMENT_VERSION,
  devices: {},
  switches: {},
};

/**
 * Outer shape only. Entries are validated one by one so a single bad
 * record does not discard the rest of the document.
 */
export const RawMetaDocumentSchema = z.object({
  version: z.number().optional(),
  devices: z.record(z.record(z.unknown())).optional(),
  switches: z.record(z.record(z.unknown())).optional(),
});

// =============================================================================
// User Switches File
// =============================================================================

/**
 * `{ version, switches: [...] }` as written by this service, or a bare
 * list as written by hand.
 */
export const UserConfigFileSchema = z.union([
  z.object({
    version: z.number().optional(),
    switches: z.array(z.unknown()).nullish(),
  }),
  z.array(z.unknown()),
]);

export type UserConfigFile = z.infer<typeof UserConfigFileSchema>;

/**
 * Legacy platform configuration: a `switch:` list as found in the host's
 * main configuration file, or the bare list.
 */
export const LegacyConfigFileSchema = z.union([
  z.object({ switch: z.array(z.unknown()).nullish() }).passthrough(),
  z.array(z.unknown()),
]);

export type LegacyConfigFile = z.infer<typeof LegacyConfigFileSchema>;

// =============================================================================
// Restore State File
// =============================================================================

/**
 * Last reported snapshot per switch unique id. Snapshots stay opaque here,
 * the switch validates its own snapshot when it restores.
 */
export const RestoreStateDocumentSchema = z.object({
  version: z.number().optional(),
  states: z.record(z.record(z.unknown())),
});

export type RestoreStateDocument = z.infer<typeof RestoreStateDocumentSchema>;
