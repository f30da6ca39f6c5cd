/**
 * Duration Module - Schemas and Types
 *
 * Durations as users write them in YAML, and as the runtime uses them (ms).
 */
import { z } from "zod";

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

/** Used when a definition leaves out toggle_for, and as the import fallback. */
export const DEFAULT_TOGGLE_FOR_MS = MS_PER_SECOND;

/**
 * Duration split into parts, e.g. `{ minutes: 1, seconds: 30 }`.
 */
export const DurationPartsSchema = z
  .object({
    days: z.number().nonnegative().optional(),
    hours: z.number().nonnegative().optional(),
    minutes: z.number().nonnegative().optional(),
    seconds: z.number().nonnegative().optional(),
    milliseconds: z.number().nonnegative().optional(),
  })
  .strict();

export type DurationParts = z.infer<typeof DurationPartsSchema>;
