/**
 * Duration Module - Public API
 */

// Types
export type { DurationParts } from "./schema.js";
export type { DurationError } from "./errors.js";

export {
  DEFAULT_TOGGLE_FOR_MS,
  DurationPartsSchema,
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
} from "./schema.js";

// Pure transformations
export {
  formatDuration,
  msToParts,
  parseDuration,
  partsToMs,
  resolveDuration,
} from "./transform.js";
