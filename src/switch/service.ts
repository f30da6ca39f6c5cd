/**
 * Switch Module - Service Layer
 *
 * The momentary switch state machine. Owns its runtime state and at most
 * one pending revert; every change is reported through `onStateChange`,
 * which is also how the host persists state for the next restart.
 */
import { DEFAULT_TOGGLE_FOR_MS, formatDuration } from "../duration/index.js";
import { createLogger } from "../logger.js";
import type { CancelHandle, Scheduler } from "./scheduler.js";
import type {
  Polarity,
  SwitchConfig,
  SwitchRuntimeState,
  SwitchSnapshot,
  Transition,
} from "./schema.js";
import {
  buildSnapshot,
  decideActivation,
  decideRestore,
  idleStateFor,
  isTimed,
  polarityFor,
  startTimed,
} from "./transform.js";

const log = createLogger("switch");

export type StateListener = (snapshot: SwitchSnapshot) => void;

export type MomentarySwitchOptions = Readonly<{
  config: SwitchConfig;
  scheduler: Scheduler;
  onStateChange?: StateListener;
}>;

export class MomentarySwitch {
  readonly config: SwitchConfig;
  readonly polarity: Polarity;

  private readonly scheduler: Scheduler;
  private readonly onStateChange: StateListener | undefined;

  private state: SwitchRuntimeState;
  private cancelPending: CancelHandle | null = null;
  /** Bumped whenever the pending revert changes; stale callbacks compare against it */
  private generation = 0;

  constructor(options: MomentarySwitchOptions) {
    const { config } = options;

    if (!(config.toggleForMs > 0)) {
      log.warn(
        { entityId: config.entityId, toggleForMs: config.toggleForMs },
        `Invalid toggle_for, using ${formatDuration(DEFAULT_TOGGLE_FOR_MS)}`,
      );
    }

    this.config =
      config.toggleForMs > 0
        ? config
        : { ...config, toggleForMs: DEFAULT_TOGGLE_FOR_MS };
    this.polarity = polarityFor(this.config.mode);
    this.scheduler = options.scheduler;
    this.onStateChange = options.onStateChange;
    this.state = idleStateFor(this.polarity);

    log.debug(
      {
        entityId: this.config.entityId,
        mode: this.config.mode,
        toggleFor: formatDuration(this.config.toggleForMs),
        cancellable: this.config.cancellable,
      },
      `Switch "${this.config.name}" created`,
    );
  }

  // ===========================================================================
  // State Access
  // ===========================================================================

  get uniqueId(): string {
    return this.config.uniqueId;
  }

  get entityId(): string {
    return this.config.entityId;
  }

  get isOn(): boolean {
    return this.state.isOn;
  }

  get toggleUntil(): number | null {
    return this.state.toggleUntil;
  }

  get isTimed(): boolean {
    return isTimed(this.state, this.polarity);
  }

  get hasPendingRevert(): boolean {
    return this.cancelPending !== null;
  }

  snapshot(): SwitchSnapshot {
    return buildSnapshot(
      this.config,
      this.polarity,
      this.state,
      this.scheduler.now(),
    );
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  /**
   * Request a logical value.
   */
  activate(target: boolean): Transition {
    const transition = decideActivation(
      this.state,
      target,
      this.polarity,
      this.config.cancellable,
    );

    switch (transition) {
      case "timed": {
        const now = this.scheduler.now();
        this.state = startTimed(this.polarity, this.config.toggleForMs, now);
        this.scheduleRevert();
        log.debug(
          { entityId: this.entityId, toggleUntil: this.state.toggleUntil },
          "Entering timed state",
        );
        break;
      }
      case "cancelled":
        this.cancelRevert();
        this.state = idleStateFor(this.polarity);
        log.debug({ entityId: this.entityId }, "Timed state cancelled");
        break;
      case "ignored":
        log.debug(
          { entityId: this.entityId },
          "Not cancellable, timed state continues",
        );
        break;
      case "unchanged":
        break;
    }

    this.report();
    return transition;
  }

  turnOn(): Transition {
    return this.activate(true);
  }

  turnOff(): Transition {
    return this.activate(false);
  }

  /**
   * Resume from the snapshot stored before a restart, or start idle if
   * there is none.
   */
  restore(snapshot: unknown): void {
    this.cancelRevert();
    this.state = decideRestore(snapshot, this.polarity, this.scheduler.now());

    if (this.isTimed) {
      this.scheduleRevert();
      log.info(
        { entityId: this.entityId, toggleUntil: this.state.toggleUntil },
        "Resumed timed state",
      );
    }

    this.report();
  }

  /**
   * Drop the pending revert without touching state (switch unloaded).
   */
  dispose(): void {
    this.cancelRevert();
  }

  // ===========================================================================
  // Revert Timer
  // ===========================================================================

  private scheduleRevert(): void {
    const { toggleUntil } = this.state;
    if (toggleUntil === null) {
      return;
    }

    // Exactly one pending revert: replace whatever was there
    this.cancelRevert();
    const token = this.generation;
    this.cancelPending = this.scheduler.scheduleAt(toggleUntil, () =>
      this.handleRevert(token),
    );
  }

  private cancelRevert(): void {
    this.generation += 1;

    const cancel = this.cancelPending;
    this.cancelPending = null;
    if (cancel === null) {
      return;
    }

    try {
      cancel();
    } catch (error) {
      log.debug(
        { entityId: this.entityId, error: String(error) },
        "Ignoring failed timer cancel",
      );
    }
  }

  private handleRevert(token: number): void {
    if (token !== this.generation) {
      return;
    }
    this.cancelPending = null;

    const { toggleUntil } = this.state;
    if (!this.isTimed || toggleUntil === null) {
      return;
    }

    // Never revert before the deadline, even if woken early
    const now = this.scheduler.now();
    if (now < toggleUntil) {
      this.scheduleRevert();
      return;
    }

    this.state = idleStateFor(this.polarity);
    log.debug({ entityId: this.entityId }, "Timed state ended");
    this.report();
  }

  private report(): void {
    if (this.onStateChange === undefined) {
      return;
    }

    try {
      this.onStateChange(this.snapshot());
    } catch (error) {
      log.error(
        { entityId: this.entityId, error: String(error) },
        "State listener failed",
      );
    }
  }
}
