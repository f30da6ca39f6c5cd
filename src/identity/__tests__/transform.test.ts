/**
 * Transformation tests - naming rules for switches.
 */
import { describe, expect, it } from "vitest";
import {
  deriveEntityId,
  displayName,
  legacyDeviceId,
  legacyEntityId,
  legacyUniqueId,
  mintIdentity,
  mintUniqueId,
  parseSwitchName,
  slugify,
} from "../transform.js";

describe("parseSwitchName", () => {
  it("treats a plain name as namespaced", () => {
    expect(parseSwitchName("Garage")).toEqual({
      raw: "Garage",
      label: "Garage",
      naming: "namespaced",
    });
  });

  it("resolves the bare sigil", () => {
    expect(parseSwitchName("!Kitchen Light")).toEqual({
      raw: "!Kitchen Light",
      label: "Kitchen Light",
      naming: "bare",
    });
  });

  it("accepts the explicit namespaced sigil", () => {
    const name = parseSwitchName("+Porch");

    expect(name.label).toBe("Porch");
    expect(name.naming).toBe("namespaced");
  });

  it("trims whitespace after the sigil", () => {
    expect(parseSwitchName("! Attic").label).toBe("Attic");
  });
});

describe("displayName", () => {
  it("never shows the sigil", () => {
    expect(displayName("!Kitchen Light")).toBe("Kitchen Light");
    expect(displayName("+Porch")).toBe("Porch");
    expect(displayName("Garage")).toBe("Garage");
  });
});

describe("slugify", () => {
  it("folds diacritics and joins words with underscores", () => {
    expect(slugify("Café Lights #2")).toBe("cafe_lights_2");
  });

  it("drops apostrophes instead of splitting on them", () => {
    expect(slugify("Bob's Lamp")).toBe("bobs_lamp");
  });

  it("trims leading and trailing separators", () => {
    expect(slugify("  Hello  World ")).toBe("hello_world");
  });

  it("falls back to unknown when nothing is left", () => {
    expect(slugify("!!!")).toBe("unknown");
    expect(slugify("")).toBe("unknown");
  });
});

describe("deriveEntityId", () => {
  it("prefixes namespaced switches", () => {
    expect(deriveEntityId(parseSwitchName("Front Door"))).toBe(
      "switch.momentary_front_door",
    );
  });

  it("leaves bare switches unprefixed", () => {
    expect(deriveEntityId(parseSwitchName("!Front Door"))).toBe(
      "switch.front_door",
    );
  });
});

describe("mintUniqueId", () => {
  it("returns a namespaced uuid", () => {
    expect(mintUniqueId()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}\.momentary$/,
    );
  });

  it("never repeats", () => {
    expect(mintUniqueId()).not.toBe(mintUniqueId());
  });
});

describe("mintIdentity", () => {
  it("uses the injected minter for the unique id", () => {
    const identity = mintIdentity(parseSwitchName("!Gate"), () => "id-1");

    expect(identity).toEqual({ unique_id: "id-1", entity_id: "switch.gate" });
  });
});

describe("legacy naming", () => {
  it("derives unique and device ids from the label slug", () => {
    const name = parseSwitchName("!Hall Light");

    expect(legacyUniqueId(name)).toBe("hall_light");
    expect(legacyDeviceId(name)).toBe("hall_light");
  });

  it("uses the same entity id rules as new switches", () => {
    expect(legacyEntityId(parseSwitchName("Hall Light"))).toBe(
      "switch.momentary_hall_light",
    );
  });
});
