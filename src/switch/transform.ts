/**
 * Switch Module - Pure Transformations
 *
 * Transition decisions, restore decisions and snapshot building.
 * No timers, no I/O - the service applies what these return.
 */
import type {
  Polarity,
  SwitchConfig,
  SwitchMode,
  SwitchRuntimeState,
  SwitchSnapshot,
  Transition,
} from "./schema.js";
import { RestoredStateSchema } from "./schema.js";

// =============================================================================
// Polarity
// =============================================================================

/**
 * Idle and timed values for a mode.
 */
export function polarityFor(mode: SwitchMode): Polarity {
  return mode === "timed-on"
    ? { idleState: false, timedState: true }
    : { idleState: true, timedState: false };
}

/**
 * State of a switch at rest.
 */
export function idleStateFor(polarity: Polarity): SwitchRuntimeState {
  return { isOn: polarity.idleState, toggleUntil: null };
}

/**
 * Check whether a state is the timed one.
 */
export function isTimed(state: SwitchRuntimeState, polarity: Polarity): boolean {
  return state.isOn === polarity.timedState && state.toggleUntil !== null;
}

// =============================================================================
// Transitions
// =============================================================================

/**
 * Decide what a request for `target` does.
 *
 * Asking for the timed value always (re)starts a full window, even when
 * already timed. Asking for the idle value ends a timed window only if the
 * switch is cancellable.
 */
export function decideActivation(
  state: SwitchRuntimeState,
  target: boolean,
  polarity: Polarity,
  cancellable: boolean,
): Transition {
  if (target === polarity.timedState) {
    return "timed";
  }
  if (!isTimed(state, polarity)) {
    return "unchanged";
  }
  return cancellable ? "cancelled" : "ignored";
}

/**
 * Timed state starting at `now`.
 */
export function startTimed(
  polarity: Polarity,
  toggleForMs: number,
  now: number,
): SwitchRuntimeState {
  return { isOn: polarity.timedState, toggleUntil: now + toggleForMs };
}

/**
 * Milliseconds left in the timed window (0 when idle or past due).
 */
export function remainingMs(state: SwitchRuntimeState, now: number): number {
  if (state.toggleUntil === null) {
    return 0;
  }
  return Math.max(0, state.toggleUntil - now);
}

// =============================================================================
// Restore
// =============================================================================

/**
 * Read a stored toggle_until: epoch ms or an ISO timestamp.
 */
export function parseToggleUntil(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * State to resume after a restart.
 *
 * A timed window still in the future resumes with its original deadline.
 * Anything else, including a window that ended while the process was
 * down, resumes idle; a missed revert is not replayed.
 */
export function decideRestore(
  snapshot: unknown,
  polarity: Polarity,
  now: number,
): SwitchRuntimeState {
  const parsed = RestoredStateSchema.safeParse(snapshot);
  if (!parsed.success) {
    return idleStateFor(polarity);
  }

  const toggleUntil = parseToggleUntil(parsed.data.toggle_until);
  if (
    parsed.data.is_on === polarity.timedState &&
    toggleUntil !== null &&
    toggleUntil > now
  ) {
    return { isOn: polarity.timedState, toggleUntil };
  }

  return idleStateFor(polarity);
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Everything reported to the host for one state.
 */
export function buildSnapshot(
  config: SwitchConfig,
  polarity: Polarity,
  state: SwitchRuntimeState,
  now: number,
): SwitchSnapshot {
  return {
    is_on: state.isOn,
    attributes: {
      idle_state: polarity.idleState,
      timed_state: polarity.timedState,
      cancellable: config.cancellable,
      toggle_for: config.toggleForMs,
      toggle_until:
        state.toggleUntil === null
          ? null
          : new Date(state.toggleUntil).toISOString(),
      remaining_ms: remainingMs(state, now),
      unique_id: config.uniqueId,
      entity_id: config.entityId,
    },
  };
}
