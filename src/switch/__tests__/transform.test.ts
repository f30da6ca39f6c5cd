/**
 * Transformation tests - switch decisions and snapshots.
 */
import { describe, expect, it } from "vitest";
import type { SwitchConfig } from "../schema.js";
import {
  buildSnapshot,
  decideActivation,
  decideRestore,
  idleStateFor,
  isTimed,
  parseToggleUntil,
  polarityFor,
  remainingMs,
  startTimed,
} from "../transform.js";

const timedOn = polarityFor("timed-on");
const timedOff = polarityFor("timed-off");

describe("polarityFor", () => {
  it("maps each mode to its idle and timed values", () => {
    expect(timedOn).toEqual({ idleState: false, timedState: true });
    expect(timedOff).toEqual({ idleState: true, timedState: false });
  });
});

describe("isTimed", () => {
  it("needs both the timed value and a deadline", () => {
    expect(isTimed(startTimed(timedOn, 1000, 0), timedOn)).toBe(true);
    expect(isTimed(idleStateFor(timedOn), timedOn)).toBe(false);
    expect(isTimed({ isOn: true, toggleUntil: null }, timedOn)).toBe(false);
  });
});

describe("decideActivation", () => {
  const idle = idleStateFor(timedOn);
  const timed = startTimed(timedOn, 1000, 0);

  it("(re)starts the window for the timed value", () => {
    expect(decideActivation(idle, true, timedOn, false)).toBe("timed");
    expect(decideActivation(timed, true, timedOn, false)).toBe("timed");
  });

  it("does nothing when already idle", () => {
    expect(decideActivation(idle, false, timedOn, true)).toBe("unchanged");
  });

  it("ends the window early only when cancellable", () => {
    expect(decideActivation(timed, false, timedOn, true)).toBe("cancelled");
    expect(decideActivation(timed, false, timedOn, false)).toBe("ignored");
  });

  it("follows the timed-off polarity", () => {
    expect(decideActivation(idleStateFor(timedOff), false, timedOff, false)).toBe(
      "timed",
    );
    expect(decideActivation(idleStateFor(timedOff), true, timedOff, false)).toBe(
      "unchanged",
    );
  });
});

describe("remainingMs", () => {
  it("counts down to zero", () => {
    const state = startTimed(timedOn, 1000, 0);

    expect(remainingMs(state, 250)).toBe(750);
    expect(remainingMs(state, 5000)).toBe(0);
    expect(remainingMs(idleStateFor(timedOn), 0)).toBe(0);
  });
});

describe("parseToggleUntil", () => {
  it("accepts epoch ms and ISO timestamps", () => {
    expect(parseToggleUntil(1500)).toBe(1500);
    expect(parseToggleUntil("1970-01-01T00:00:01.500Z")).toBe(1500);
  });

  it("treats anything else as absent", () => {
    expect(parseToggleUntil("tomorrow-ish")).toBeNull();
    expect(parseToggleUntil(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseToggleUntil(null)).toBeNull();
  });
});

describe("decideRestore", () => {
  const now = 10_000;

  it("resumes a window still in the future", () => {
    expect(
      decideRestore({ is_on: true, toggle_until: 12_000 }, timedOn, now),
    ).toEqual({ isOn: true, toggleUntil: 12_000 });
  });

  it("starts idle when the window has passed", () => {
    expect(decideRestore({ is_on: true, toggle_until: 0 }, timedOn, now)).toEqual(
      idleStateFor(timedOn),
    );
  });

  it("starts idle for the idle value, missing or malformed snapshots", () => {
    expect(decideRestore({ is_on: false, toggle_until: 12_000 }, timedOn, now)).toEqual(
      idleStateFor(timedOn),
    );
    expect(decideRestore(null, timedOn, now)).toEqual(idleStateFor(timedOn));
    expect(decideRestore({ is_on: "yes" }, timedOn, now)).toEqual(
      idleStateFor(timedOn),
    );
    expect(
      decideRestore({ is_on: true, toggle_until: "garbage" }, timedOn, now),
    ).toEqual(idleStateFor(timedOn));
  });

  it("restores idle ON for timed-off switches", () => {
    expect(decideRestore(null, timedOff, now)).toEqual({
      isOn: true,
      toggleUntil: null,
    });
  });
});

describe("buildSnapshot", () => {
  const config: SwitchConfig = {
    uniqueId: "uid-1",
    entityId: "switch.momentary_gate",
    name: "Gate",
    mode: "timed-on",
    toggleForMs: 1000,
    cancellable: true,
  };

  it("reports the timed window", () => {
    expect(buildSnapshot(config, timedOn, startTimed(timedOn, 1000, 0), 250)).toEqual({
      is_on: true,
      attributes: {
        idle_state: false,
        timed_state: true,
        cancellable: true,
        toggle_for: 1000,
        toggle_until: "1970-01-01T00:00:01.000Z",
        remaining_ms: 750,
        unique_id: "uid-1",
        entity_id: "switch.momentary_gate",
      },
    });
  });

  it("reports no deadline while idle", () => {
    const snapshot = buildSnapshot(config, timedOn, idleStateFor(timedOn), 0);

    expect(snapshot.is_on).toBe(false);
    expect(snapshot.attributes.toggle_until).toBeNull();
    expect(snapshot.attributes.remaining_ms).toBe(0);
  });
});
