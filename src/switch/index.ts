/**
 * Switch Module - Public API
 */

// Types
export type {
  Polarity,
  RestoredState,
  SwitchAttributes,
  SwitchConfig,
  SwitchMode,
  SwitchRuntimeState,
  SwitchSnapshot,
  Transition,
} from "./schema.js";
export type { CancelHandle, Scheduler } from "./scheduler.js";
export type { MomentarySwitchOptions, StateListener } from "./service.js";

export { DEFAULT_SWITCH_MODE, RestoredStateSchema } from "./schema.js";

// Service
export { MomentarySwitch } from "./service.js";
export { MAX_TIMER_DELAY_MS, createTimerScheduler } from "./scheduler.js";

// Pure transformations
export {
  buildSnapshot,
  decideActivation,
  decideRestore,
  idleStateFor,
  isTimed,
  parseToggleUntil,
  polarityFor,
  remainingMs,
  startTimed,
} from "./transform.js";
