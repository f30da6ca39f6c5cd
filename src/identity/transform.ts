/**
 * Identity Module - Pure Transformations
 *
 * Naming rules for switches: sigil parsing, slugs, entity ids and the
 * legacy rules used when importing platform-style configuration.
 */
import { randomUUID } from "node:crypto";

import type { IdentityRecord, SwitchName } from "./schema.js";
import { BARE_SIGIL, NAMESPACE, NAMESPACED_SIGIL, PLATFORM } from "./schema.js";

// =============================================================================
// Names
// =============================================================================

/**
 * Resolve the sigil of a user-provided name.
 *
 * @example
 * parseSwitchName("!Kitchen Light") // { label: "Kitchen Light", naming: "bare" }
 */
export function parseSwitchName(raw: string): SwitchName {
  if (raw.startsWith(BARE_SIGIL)) {
    return { raw, label: raw.slice(1).trim(), naming: "bare" };
  }
  if (raw.startsWith(NAMESPACED_SIGIL)) {
    return { raw, label: raw.slice(1).trim(), naming: "namespaced" };
  }
  return { raw, label: raw.trim(), naming: "namespaced" };
}

/**
 * Name shown to the user. The sigil is never displayed.
 */
export function displayName(raw: string): string {
  return parseSwitchName(raw).label;
}

/**
 * Lower-case ASCII slug with "_" separators.
 *
 * @example
 * slugify("Café Lights #2") // "cafe_lights_2"
 */
export function slugify(text: string): string {
  const slug = text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/['’]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");

  return slug === "" ? "unknown" : slug;
}

// =============================================================================
// Identities
// =============================================================================

/**
 * Entity id for a switch name. Only computed when an identity is minted.
 */
export function deriveEntityId(name: SwitchName): string {
  const slug = slugify(name.label);
  return name.naming === "bare"
    ? `${PLATFORM}.${slug}`
    : `${PLATFORM}.${NAMESPACE}_${slug}`;
}

/**
 * Globally unique id for a new switch or device.
 */
export function mintUniqueId(): string {
  return `${randomUUID()}.${NAMESPACE}`;
}

/**
 * Mint a complete identity for a switch that has none yet.
 */
export function mintIdentity(
  name: SwitchName,
  mint: () => string = mintUniqueId,
): IdentityRecord {
  return {
    unique_id: mint(),
    entity_id: deriveEntityId(name),
  };
}

// =============================================================================
// Legacy Naming
// =============================================================================

/**
 * Unique id the flat platform configuration derived from the name.
 * Reusing it keeps the host's history attached after an import.
 */
export function legacyUniqueId(name: SwitchName): string {
  return slugify(name.label);
}

/**
 * Entity id the flat platform configuration used.
 */
export function legacyEntityId(name: SwitchName): string {
  return deriveEntityId(name);
}

/**
 * Device id given to an imported switch.
 */
export function legacyDeviceId(name: SwitchName): string {
  return slugify(name.label);
}
