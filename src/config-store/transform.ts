/**
 * Config Store Module - Pure Transformations
 *
 * Reconciliation of user definitions against persisted identities, and the
 * one-time conversion of legacy platform entries. No I/O: identities are
 * minted through the injected `mint` function.
 */
import { type Result, err, ok } from "neverthrow";

import {
  DEFAULT_TOGGLE_FOR_MS,
  msToParts,
  parseDuration,
  resolveDuration,
} from "../duration/index.js";
import {
  type DeviceIdentity,
  type GroupIdentities,
  type IdentityRecord,
  deriveEntityId,
  displayName,
  legacyDeviceId,
  legacyEntityId,
  legacyUniqueId,
  mintIdentity,
  mintUniqueId,
  parseSwitchName,
} from "../identity/index.js";
import { DEFAULT_SWITCH_MODE, type SwitchMode } from "../switch/index.js";
import {
  type ConfigError,
  duplicateEntityId,
  duplicateName,
  invalidField,
  malformedEntry,
  missingName,
} from "./errors.js";
import type {
  DefinitionItem,
  ImportedSwitch,
  LegacyImport,
  OrphanRecord,
  OrphanedDevice,
  Reconciliation,
  ResolvedDevice,
  ResolvedSwitch,
  SwitchDefinition,
} from "./schema.js";
import {
  LEGACY_PLATFORM,
  LegacySwitchSchema,
  SwitchDefinitionInputSchema,
} from "./schema.js";

// =============================================================================
// Field Parsing
// =============================================================================

const TIMED_ON_VALUES: ReadonlyArray<string> = ["timed-on", "old", "off", "false"];
const TIMED_OFF_VALUES: ReadonlyArray<string> = ["timed-off", "on", "true"];

/**
 * Normalize a mode value. Older formats named the idle state ("on" meant
 * idle ON) or used "old" for the earliest ON-only behaviour.
 */
export function parseMode(
  value: string | boolean | undefined,
): Result<SwitchMode, string> {
  if (value === undefined) {
    return ok(DEFAULT_SWITCH_MODE);
  }
  if (typeof value === "boolean") {
    return ok(value ? "timed-off" : "timed-on");
  }

  const normalized = value.trim().toLowerCase();
  if (TIMED_ON_VALUES.includes(normalized)) {
    return ok("timed-on");
  }
  if (TIMED_OFF_VALUES.includes(normalized)) {
    return ok("timed-off");
  }
  return err(`unknown mode "${value}", expected timed-on or timed-off`);
}

/**
 * Mode of a flat platform entry. Only "old" and "off" kept the ON-only
 * behaviour there; any other value it did not know meant timed-off.
 */
export function parseLegacyMode(
  value: string | boolean | undefined,
): SwitchMode {
  return parseMode(value).unwrapOr("timed-off");
}

/**
 * Parse toggle_for, which must be a positive duration when present.
 */
export function parseToggleFor(value: unknown): Result<number, string> {
  if (value === undefined || value === null) {
    return ok(DEFAULT_TOGGLE_FOR_MS);
  }

  const parsed = parseDuration(value);
  if (parsed.isErr()) {
    return err(parsed.error.message);
  }
  if (parsed.value <= 0) {
    return err("toggle_for must be positive");
  }
  return ok(parsed.value);
}

/**
 * Trimmed raw `name` of an entry, if it has a usable one.
 */
export function rawNameOf(raw: unknown): string | null {
  if (typeof raw !== "object" || raw === null || !("name" in raw)) {
    return null;
  }
  const { name } = raw;
  if (typeof name !== "string") {
    return null;
  }
  const trimmed = name.trim();
  return trimmed === "" ? null : trimmed;
}

/**
 * Validate one definition.
 */
export function parseDefinition(
  raw: unknown,
  index: number,
  deviceName?: string,
): Result<SwitchDefinition, ConfigError> {
  const parsed = SwitchDefinitionInputSchema.safeParse(raw);
  if (!parsed.success) {
    const name = rawNameOf(raw);
    if (name === null) {
      return err(missingName(index, deviceName));
    }
    const issue = parsed.error.issues[0];
    return err(
      invalidField(
        name,
        issue?.path.join(".") ?? "entry",
        issue?.message ?? "invalid",
      ),
    );
  }

  const input = parsed.data;

  const mode = parseMode(input.mode);
  if (mode.isErr()) {
    return err(invalidField(input.name, "mode", mode.error));
  }

  const toggleFor = parseToggleFor(input.toggle_for);
  if (toggleFor.isErr()) {
    return err(invalidField(input.name, "toggle_for", toggleFor.error));
  }

  const name = parseSwitchName(input.name);
  return ok({
    key: name.raw,
    label: name.label,
    naming: name.naming,
    mode: mode.value,
    toggleForMs: toggleFor.value,
    cancellable: input.cancellable,
  });
}

// =============================================================================
// List Flattening
// =============================================================================

/**
 * Flatten the switches file into definitions tagged with their device.
 *
 * Two item shapes:
 * - `{ name: ... }` is a switch on a device of the same name
 * - `{ "<device name>": [ ...switches ] }` groups switches under one device
 */
export function flattenEntries(entries: ReadonlyArray<unknown>): Readonly<{
  items: ReadonlyArray<DefinitionItem>;
  issues: ReadonlyArray<ConfigError>;
}> {
  const items: DefinitionItem[] = [];
  const issues: ConfigError[] = [];

  entries.forEach((entry, index) => {
    if (typeof entry !== "object" || entry === null || Array.isArray(entry)) {
      issues.push(malformedEntry(index, "expected a switch or a device"));
      return;
    }

    if ("name" in entry) {
      const name = rawNameOf(entry);
      if (name === null) {
        issues.push(missingName(index));
        return;
      }
      items.push({ deviceName: name, index, raw: entry });
      return;
    }

    const keys = Object.keys(entry);
    const [deviceName] = keys;
    if (keys.length !== 1 || deviceName === undefined) {
      issues.push(malformedEntry(index, "a device must have exactly one key"));
      return;
    }

    const switches: unknown = Object.values(entry)[0];
    if (!Array.isArray(switches)) {
      issues.push(
        malformedEntry(index, `device "${deviceName}" must list its switches`),
      );
      return;
    }

    for (const raw of switches) {
      items.push({ deviceName, index, raw });
    }
  });

  return { items, issues };
}

// =============================================================================
// Reconciliation
// =============================================================================

export type ReconcileInput = Readonly<{
  entries: ReadonlyArray<unknown>;
  persisted: GroupIdentities;
  mint?: () => string;
}>;

/**
 * Match user definitions against persisted identities.
 *
 * - a definition whose name has an identity keeps it
 * - a new name gets a freshly minted identity
 * - a persisted identity no definition names is an orphan; it is reported
 *   here and left out of `identities`, so the next pass no longer sees it
 * - an invalid definition is skipped, but its identity is carried over
 * - two names resolving to one entity id keep it for the name that already
 *   holds it, otherwise for the first; the other is skipped
 *
 * Apart from which of two clashing new names wins, order of definitions
 * does not affect the result.
 */
export function reconcile(input: ReconcileInput): Reconciliation {
  const mint = input.mint ?? mintUniqueId;

  // Working copies: anything still here at the end is orphaned
  const unclaimedSwitches = new Map(Object.entries(input.persisted.switches));
  const unclaimedDevices = new Map(Object.entries(input.persisted.devices));

  const claimedSwitches = new Map<string, IdentityRecord>();
  const claimedDevices = new Map<string, DeviceIdentity>();

  const switches = new Map<string, ResolvedSwitch>();
  const devices = new Map<string, ResolvedDevice>();
  const seen = new Set<string>();
  const carried: Array<Readonly<{ name: string; deviceName: string }>> = [];
  let changed = false;

  const claimDevice = (deviceName: string): DeviceIdentity | null => {
    const claimed = claimedDevices.get(deviceName);
    if (claimed !== undefined) {
      return claimed;
    }
    const persisted = unclaimedDevices.get(deviceName);
    if (persisted === undefined) {
      return null;
    }
    unclaimedDevices.delete(deviceName);
    claimedDevices.set(deviceName, persisted);
    return persisted;
  };

  const flattened = flattenEntries(input.entries);
  const issues: ConfigError[] = [...flattened.issues];

  // Entity ids of persisted names still present are taken before any new
  // name is resolved
  const present = new Set<string>();
  for (const item of flattened.items) {
    const name = rawNameOf(item.raw);
    if (name !== null) {
      present.add(name);
    }
  }
  const entityOwners = new Map<string, string>();
  for (const [key, identity] of unclaimedSwitches) {
    if (present.has(key) && !entityOwners.has(identity.entity_id)) {
      entityOwners.set(identity.entity_id, key);
    }
  }

  for (const item of flattened.items) {
    const parsed = parseDefinition(item.raw, item.index, item.deviceName);

    if (parsed.isErr()) {
      issues.push(parsed.error);

      // Keep the identity of a name that is still present but invalid,
      // unless a valid definition of the same name claims it
      const name = rawNameOf(item.raw);
      if (name !== null) {
        carried.push({ name, deviceName: item.deviceName });
      }
      continue;
    }

    const definition = parsed.value;
    if (seen.has(definition.key)) {
      issues.push(duplicateName(definition.key));
      continue;
    }

    const persisted = unclaimedSwitches.get(definition.key);
    const entityId =
      persisted?.entity_id ?? deriveEntityId(parseSwitchName(definition.key));
    const owner = entityOwners.get(entityId);
    if (owner !== undefined && owner !== definition.key) {
      issues.push(duplicateEntityId(definition.key, entityId, owner));
      carried.push({ name: definition.key, deviceName: item.deviceName });
      continue;
    }
    entityOwners.set(entityId, definition.key);
    seen.add(definition.key);

    let device = claimDevice(item.deviceName);
    if (device === null) {
      device = { device_id: mint() };
      claimedDevices.set(item.deviceName, device);
      changed = true;
    }

    let identity = persisted;
    if (identity === undefined) {
      identity = mintIdentity(parseSwitchName(definition.key), mint);
      changed = true;
    }
    unclaimedSwitches.delete(definition.key);
    claimedSwitches.set(definition.key, identity);

    switches.set(identity.unique_id, {
      ...definition,
      uniqueId: identity.unique_id,
      entityId: identity.entity_id,
      deviceId: device.device_id,
      name: definition.label,
    });
    devices.set(device.device_id, {
      deviceId: device.device_id,
      name: displayName(item.deviceName),
    });
  }

  for (const { name, deviceName } of carried) {
    const identity = unclaimedSwitches.get(name);
    if (identity === undefined) {
      continue;
    }
    unclaimedSwitches.delete(name);
    claimedSwitches.set(name, identity);
    claimDevice(deviceName);
  }

  const orphans = new Map<string, OrphanRecord>();
  for (const [key, identity] of unclaimedSwitches) {
    orphans.set(identity.unique_id, {
      uniqueId: identity.unique_id,
      entityId: identity.entity_id,
      key,
    });
    changed = true;
  }

  const orphanedDevices = new Map<string, OrphanedDevice>();
  for (const [key, device] of unclaimedDevices) {
    orphanedDevices.set(device.device_id, { deviceId: device.device_id, key });
    changed = true;
  }

  return {
    switches,
    devices,
    orphans,
    orphanedDevices,
    identities: {
      devices: Object.fromEntries(claimedDevices),
      switches: Object.fromEntries(claimedSwitches),
    },
    changed,
    issues,
  };
}

// =============================================================================
// Legacy Import
// =============================================================================

/**
 * Convert one flat platform entry, keeping the ids the flat configuration
 * produced so existing history stays attached.
 *
 * A malformed legacy duration falls back to the default instead of failing,
 * and an unrecognised mode to timed-off.
 */
export function importLegacySwitch(
  raw: unknown,
  index = 0,
): Result<ImportedSwitch, ConfigError> {
  const parsed = LegacySwitchSchema.safeParse(raw);
  if (!parsed.success) {
    const name = rawNameOf(raw);
    if (name === null) {
      return err(missingName(index));
    }
    const issue = parsed.error.issues[0];
    return err(
      invalidField(
        name,
        issue?.path.join(".") ?? "entry",
        issue?.message ?? "invalid",
      ),
    );
  }

  const legacy = parsed.data;
  const mode = parseLegacyMode(legacy.mode);

  const name = parseSwitchName(legacy.name);
  const toggleForMs = resolveDuration(
    legacy.toggle_for ?? legacy.on_for,
    DEFAULT_TOGGLE_FOR_MS,
  );
  const cancellable = legacy.cancellable ?? legacy.allow_off ?? false;

  return ok({
    resolved: {
      key: name.raw,
      label: name.label,
      naming: name.naming,
      mode,
      toggleForMs,
      cancellable,
      uniqueId: legacy.unique_id ?? legacyUniqueId(name),
      entityId: legacyEntityId(name),
      deviceId: legacyDeviceId(name),
      name: name.label,
    },
    entry: {
      name: name.raw,
      mode,
      toggle_for: msToParts(toggleForMs),
      cancellable,
    },
  });
}

/**
 * Check whether a legacy entry belongs to this platform.
 */
export function isLegacyEntry(raw: unknown): boolean {
  return (
    typeof raw === "object" &&
    raw !== null &&
    "platform" in raw &&
    raw.platform === LEGACY_PLATFORM
  );
}

/**
 * Convert a whole legacy list into a group: identities to persist and
 * entries for the new switches file. Other platforms are ignored.
 */
export function importLegacyEntries(
  entries: ReadonlyArray<unknown>,
): LegacyImport {
  const switches: ImportedSwitch[] = [];
  const issues: ConfigError[] = [];
  const identities = new Map<string, IdentityRecord>();
  const devices = new Map<string, DeviceIdentity>();
  const entityOwners = new Map<string, string>();

  entries.forEach((raw, index) => {
    if (!isLegacyEntry(raw)) {
      return;
    }

    const imported = importLegacySwitch(raw, index);
    if (imported.isErr()) {
      issues.push(imported.error);
      return;
    }

    const { resolved } = imported.value;
    if (identities.has(resolved.key)) {
      issues.push(duplicateName(resolved.key));
      return;
    }
    const owner = entityOwners.get(resolved.entityId);
    if (owner !== undefined) {
      issues.push(duplicateEntityId(resolved.key, resolved.entityId, owner));
      return;
    }

    entityOwners.set(resolved.entityId, resolved.key);
    identities.set(resolved.key, {
      unique_id: resolved.uniqueId,
      entity_id: resolved.entityId,
    });
    devices.set(resolved.key, { device_id: resolved.deviceId });
    switches.push(imported.value);
  });

  return {
    switches,
    identities: {
      devices: Object.fromEntries(devices),
      switches: Object.fromEntries(identities),
    },
    issues,
  };
}
