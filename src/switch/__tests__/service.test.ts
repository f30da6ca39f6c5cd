/**
 * MomentarySwitch Tests
 *
 * Real timer scheduler under fake timers, plus a hand-driven scheduler for
 * callbacks that arrive late or early.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

// Import after mocks
import {
  MAX_TIMER_DELAY_MS,
  type Scheduler,
  createTimerScheduler,
} from "../scheduler.js";
import type { SwitchConfig, SwitchSnapshot } from "../schema.js";
import { MomentarySwitch } from "../service.js";

const START = Date.parse("2026-01-01T00:00:00.000Z");

function makeConfig(overrides: Partial<SwitchConfig> = {}): SwitchConfig {
  return {
    uniqueId: "uid-garage",
    entityId: "switch.momentary_garage",
    name: "Garage",
    mode: "timed-on",
    toggleForMs: 1000,
    cancellable: false,
    ...overrides,
  };
}

type ManualEntry = { at: number; callback: () => void; cancelled: boolean };

/**
 * Scheduler whose callbacks only run when the test calls them.
 */
function createManualScheduler() {
  let time = 0;
  const entries: ManualEntry[] = [];

  const scheduler: Scheduler = {
    now: () => time,
    scheduleAt: (at, callback) => {
      const entry: ManualEntry = { at, callback, cancelled: false };
      entries.push(entry);
      return () => {
        entry.cancelled = true;
      };
    },
  };

  return {
    scheduler,
    entries,
    setTime: (value: number) => {
      time = value;
    },
  };
}

describe("MomentarySwitch", () => {
  let reports: SwitchSnapshot[];

  const createSwitch = (overrides: Partial<SwitchConfig> = {}) =>
    new MomentarySwitch({
      config: makeConfig(overrides),
      scheduler: createTimerScheduler(),
      onStateChange: (snapshot) => {
        reports.push(snapshot);
      },
    });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    reports = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // Activation
  // ===========================================================================

  describe("activate", () => {
    it("turns on and reverts after toggle_for", () => {
      const sw = createSwitch();

      expect(sw.turnOn()).toBe("timed");
      expect(sw.isOn).toBe(true);
      expect(sw.toggleUntil).toBe(START + 1000);

      vi.advanceTimersByTime(999);
      expect(sw.isOn).toBe(true);

      vi.advanceTimersByTime(1);
      expect(sw.isOn).toBe(false);
      expect(sw.toggleUntil).toBeNull();
      expect(sw.hasPendingRevert).toBe(false);
      expect(reports.map((r) => r.is_on)).toEqual([true, false]);
    });

    it("ignores an early off when not cancellable", () => {
      const sw = createSwitch();
      sw.turnOn();

      vi.advanceTimersByTime(500);
      expect(sw.turnOff()).toBe("ignored");
      expect(sw.isOn).toBe(true);

      vi.advanceTimersByTime(499);
      expect(sw.isOn).toBe(true);

      vi.advanceTimersByTime(1);
      expect(sw.isOn).toBe(false);
    });

    it("stops early when cancellable and never reverts afterwards", () => {
      const sw = createSwitch({ cancellable: true });
      sw.turnOn();

      vi.advanceTimersByTime(500);
      expect(sw.turnOff()).toBe("cancelled");
      expect(sw.isOn).toBe(false);
      expect(vi.getTimerCount()).toBe(0);

      vi.advanceTimersByTime(1000);
      expect(sw.isOn).toBe(false);
      expect(reports.map((r) => r.is_on)).toEqual([true, false]);
    });

    it("restarts the window when triggered again", () => {
      const sw = createSwitch();
      sw.turnOn();

      vi.advanceTimersByTime(500);
      sw.turnOn();
      expect(vi.getTimerCount()).toBe(1);

      vi.advanceTimersByTime(500);
      expect(sw.isOn).toBe(true);

      vi.advanceTimersByTime(499);
      expect(sw.isOn).toBe(true);

      vi.advanceTimersByTime(1);
      expect(sw.isOn).toBe(false);
    });

    it("keeps at most one timer pending", () => {
      const sw = createSwitch({ cancellable: true });

      for (let i = 0; i < 5; i++) {
        sw.turnOn();
        expect(vi.getTimerCount()).toBeLessThanOrEqual(1);
        vi.advanceTimersByTime(100);
      }
      sw.turnOff();

      expect(vi.getTimerCount()).toBe(0);
    });

    it("reports an off request while idle as unchanged", () => {
      const sw = createSwitch();

      expect(sw.turnOff()).toBe("unchanged");
      expect(sw.isOn).toBe(false);
      expect(reports).toHaveLength(1);
    });

    it("times the off state for timed-off switches", () => {
      const sw = createSwitch({ mode: "timed-off" });

      expect(sw.isOn).toBe(true);
      expect(sw.turnOff()).toBe("timed");
      expect(sw.isOn).toBe(false);

      vi.advanceTimersByTime(1000);
      expect(sw.isOn).toBe(true);
    });

    it("falls back to one second for a non-positive toggle_for", () => {
      const sw = createSwitch({ toggleForMs: 0 });

      sw.turnOn();

      expect(sw.config.toggleForMs).toBe(1000);
      expect(sw.toggleUntil).toBe(START + 1000);
    });

    it("holds a window longer than the longest timer delay", () => {
      const windowMs = 30 * 24 * 60 * 60 * 1000;
      const sw = createSwitch({ toggleForMs: windowMs });

      sw.turnOn();
      vi.advanceTimersByTime(200);
      expect(sw.isOn).toBe(true);
      expect(vi.getTimerCount()).toBe(1);

      vi.advanceTimersByTime(MAX_TIMER_DELAY_MS - 200);
      expect(sw.isOn).toBe(true);
      expect(sw.toggleUntil).toBe(START + windowMs);
      expect(vi.getTimerCount()).toBe(1);

      vi.advanceTimersByTime(windowMs - MAX_TIMER_DELAY_MS - 1);
      expect(sw.isOn).toBe(true);

      vi.advanceTimersByTime(1);
      expect(sw.isOn).toBe(false);
      expect(reports.map((r) => r.is_on)).toEqual([true, false]);
    });

    it("keeps working when the listener throws", () => {
      const sw = new MomentarySwitch({
        config: makeConfig(),
        scheduler: createTimerScheduler(),
        onStateChange: () => {
          throw new Error("listener broke");
        },
      });

      expect(sw.turnOn()).toBe("timed");
      vi.advanceTimersByTime(1000);
      expect(sw.isOn).toBe(false);
    });
  });

  // ===========================================================================
  // Restore
  // ===========================================================================

  describe("restore", () => {
    it("starts idle when the window ended while down", () => {
      const sw = createSwitch();

      sw.restore({
        is_on: true,
        toggle_until: new Date(START - 10_000).toISOString(),
      });

      expect(sw.isOn).toBe(false);
      expect(sw.hasPendingRevert).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });

    it("resumes a window still running and reverts on time", () => {
      const sw = createSwitch();

      sw.restore({
        is_on: true,
        toggle_until: new Date(START + 2000).toISOString(),
      });

      expect(sw.isOn).toBe(true);
      expect(sw.isTimed).toBe(true);

      vi.advanceTimersByTime(1999);
      expect(sw.isOn).toBe(true);

      vi.advanceTimersByTime(1);
      expect(sw.isOn).toBe(false);
    });

    it("starts idle without a snapshot and still reports", () => {
      const sw = createSwitch();

      sw.restore(null);

      expect(sw.isOn).toBe(false);
      expect(reports).toHaveLength(1);
      expect(reports[0]?.attributes.toggle_until).toBeNull();
    });

    it("resumes from its own flattened snapshot", () => {
      const first = createSwitch();
      first.turnOn();
      vi.advanceTimersByTime(400);
      const saved = first.snapshot();
      first.dispose();

      const second = createSwitch();
      second.restore({ is_on: saved.is_on, ...saved.attributes });

      expect(second.toggleUntil).toBe(START + 1000);
      expect(second.snapshot().attributes.remaining_ms).toBe(600);
    });
  });

  // ===========================================================================
  // Dispose
  // ===========================================================================

  describe("dispose", () => {
    it("drops the pending revert without changing state", () => {
      const sw = createSwitch();
      sw.turnOn();

      sw.dispose();
      vi.advanceTimersByTime(2000);

      expect(sw.isOn).toBe(true);
      expect(sw.hasPendingRevert).toBe(false);
      expect(reports).toHaveLength(1);
    });
  });

  // ===========================================================================
  // Late and early callbacks
  // ===========================================================================

  describe("revert callbacks", () => {
    it("ignores a callback from a superseded timer", () => {
      const manual = createManualScheduler();
      const sw = new MomentarySwitch({
        config: makeConfig(),
        scheduler: manual.scheduler,
      });

      sw.turnOn();
      manual.setTime(500);
      sw.turnOn();

      // The first timer fires anyway, despite being cancelled
      manual.setTime(1000);
      manual.entries[0]?.callback();
      expect(manual.entries[0]?.cancelled).toBe(true);
      expect(sw.isOn).toBe(true);

      manual.setTime(1500);
      manual.entries[1]?.callback();
      expect(sw.isOn).toBe(false);
    });

    it("reschedules when woken before the deadline", () => {
      const manual = createManualScheduler();
      const sw = new MomentarySwitch({
        config: makeConfig(),
        scheduler: manual.scheduler,
      });

      sw.turnOn();
      manual.setTime(900);
      manual.entries[0]?.callback();

      expect(sw.isOn).toBe(true);
      expect(sw.hasPendingRevert).toBe(true);
      expect(manual.entries[1]?.at).toBe(1000);

      manual.setTime(1000);
      manual.entries[1]?.callback();
      expect(sw.isOn).toBe(false);
    });
  });
});
