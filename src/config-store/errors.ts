/**
 * Config Store Module - Error Types
 *
 * Problems found in user definitions. None of them stop a reconciliation:
 * the offending entry is skipped and reported.
 */

export type ConfigError =
  | {
      readonly type: "MISSING_NAME";
      readonly index: number;
      readonly deviceName?: string;
    }
  | {
      readonly type: "INVALID_FIELD";
      readonly name: string;
      readonly field: string;
      readonly message: string;
    }
  | {
      readonly type: "DUPLICATE_NAME";
      readonly name: string;
    }
  | {
      readonly type: "DUPLICATE_ENTITY_ID";
      readonly name: string;
      readonly entityId: string;
      readonly owner: string;
    }
  | {
      readonly type: "MALFORMED_ENTRY";
      readonly index: number;
      readonly message: string;
    };

/**
 * Create a MISSING_NAME error.
 */
export function missingName(index: number, deviceName?: string): ConfigError {
  if (deviceName !== undefined) {
    return { type: "MISSING_NAME", index, deviceName };
  }
  return { type: "MISSING_NAME", index };
}

/**
 * Create an INVALID_FIELD error.
 */
export function invalidField(
  name: string,
  field: string,
  message: string,
): ConfigError {
  return { type: "INVALID_FIELD", name, field, message };
}

/**
 * Create a DUPLICATE_NAME error.
 */
export function duplicateName(name: string): ConfigError {
  return { type: "DUPLICATE_NAME", name };
}

/**
 * Create a DUPLICATE_ENTITY_ID error. `owner` is the name already holding
 * the entity id.
 */
export function duplicateEntityId(
  name: string,
  entityId: string,
  owner: string,
): ConfigError {
  return { type: "DUPLICATE_ENTITY_ID", name, entityId, owner };
}

/**
 * Create a MALFORMED_ENTRY error.
 */
export function malformedEntry(index: number, message: string): ConfigError {
  return { type: "MALFORMED_ENTRY", index, message };
}

/**
 * Format a ConfigError for logging.
 */
export function formatConfigError(error: ConfigError): string {
  switch (error.type) {
    case "MISSING_NAME":
      return error.deviceName !== undefined
        ? `Entry ${error.index} of device "${error.deviceName}" has no name`
        : `Entry ${error.index} has no name`;
    case "INVALID_FIELD":
      return `Switch "${error.name}": invalid ${error.field} (${error.message})`;
    case "DUPLICATE_NAME":
      return `Switch "${error.name}" is defined more than once`;
    case "DUPLICATE_ENTITY_ID":
      return `Switch "${error.name}" would reuse ${error.entityId} of "${error.owner}"`;
    case "MALFORMED_ENTRY":
      return `Entry ${error.index} is malformed: ${error.message}`;
  }
}
