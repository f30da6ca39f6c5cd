/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Momentary switch service configuration covering:
 * - Runtime settings
 * - Group and file locations
 * - Legacy import
 * - Restore-state persistence
 */
import { z } from "zod";

/**
 * Parse optional path - empty string becomes undefined
 */
const optionalPath = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime Configuration
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("Momentary").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Group Configuration
  // ==========================================================================
  MOMENTARY_GROUP: z
    .string()
    .min(1, "MOMENTARY_GROUP must not be empty")
    .default("default")
    .describe("Name of the switch group set up at startup"),
  MOMENTARY_SWITCHES_FILE: z
    .string()
    .min(1)
    .default("/config/momentary.yaml")
    .describe("User-authored YAML list of switch definitions"),
  MOMENTARY_META_FILE: z
    .string()
    .min(1)
    .default("/config/.storage/momentary.meta.json")
    .describe("Identity document shared by every group"),

  // ==========================================================================
  // Legacy Import
  // ==========================================================================
  MOMENTARY_LEGACY_FILE: optionalPath.describe(
    "Platform-style YAML to import once when the group has no identities",
  ),

  // ==========================================================================
  // Restore State
  // ==========================================================================
  MOMENTARY_RESTORE_FILE: z
    .string()
    .min(1)
    .default("/config/.storage/momentary.restore_state.json")
    .describe("Last reported switch states, restored after a restart"),
  RESTORE_FLUSH_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(15 * 60 * 1000)
    .describe("Interval between restore-state flushes (ms)"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * File locations used by the stores.
 */
export function getStorageConfig(): Readonly<{
  switchesFile: string;
  metaFile: string;
  restoreFile: string;
  legacyFile: string | undefined;
}> {
  return {
    switchesFile: config.MOMENTARY_SWITCHES_FILE,
    metaFile: config.MOMENTARY_META_FILE,
    restoreFile: config.MOMENTARY_RESTORE_FILE,
    legacyFile: config.MOMENTARY_LEGACY_FILE,
  };
}
