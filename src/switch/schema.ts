/**
 * Switch Module - Schemas and Types
 *
 * Runtime state of a momentary switch and the snapshot it reports to the
 * host (and gets back after a restart).
 */
import { z } from "zod";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Which logical value is the auto-reverting one.
 * - timed-on: idle OFF, timed ON
 * - timed-off: idle ON, timed OFF
 */
export type SwitchMode = "timed-on" | "timed-off";

export const DEFAULT_SWITCH_MODE: SwitchMode = "timed-on";

/**
 * The slice of resolved configuration a switch reads.
 */
export type SwitchConfig = Readonly<{
  uniqueId: string;
  entityId: string;
  name: string;
  mode: SwitchMode;
  toggleForMs: number;
  cancellable: boolean;
}>;

/**
 * Idle and timed values, fixed at construction.
 */
export type Polarity = Readonly<{
  idleState: boolean;
  timedState: boolean;
}>;

// =============================================================================
// Runtime State
// =============================================================================

/**
 * Volatile state owned by one switch.
 */
export type SwitchRuntimeState = Readonly<{
  isOn: boolean;
  /** Epoch ms the timed state ends, null while idle */
  toggleUntil: number | null;
}>;

/**
 * Outcome of an activation request.
 * - timed: entered (or restarted) the timed state
 * - cancelled: left the timed state early
 * - ignored: early exit refused, switch is not cancellable
 * - unchanged: already idle, nothing to do
 */
export type Transition = "timed" | "cancelled" | "ignored" | "unchanged";

// =============================================================================
// Reported Snapshot
// =============================================================================

/**
 * Attributes published with every state change.
 */
export type SwitchAttributes = Readonly<{
  idle_state: boolean;
  timed_state: boolean;
  cancellable: boolean;
  toggle_for: number;
  toggle_until: string | null;
  remaining_ms: number;
  unique_id: string;
  entity_id: string;
}>;

export type SwitchSnapshot = Readonly<{
  is_on: boolean;
  attributes: SwitchAttributes;
}>;

/**
 * What a switch needs back after a restart. Anything else in the stored
 * snapshot is ignored; an unreadable toggle_until counts as absent.
 */
export const RestoredStateSchema = z.object({
  is_on: z.boolean(),
  toggle_until: z.unknown().optional(),
});

export type RestoredState = z.infer<typeof RestoredStateSchema>;
