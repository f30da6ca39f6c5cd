/**
 * Config Store Service Tests
 *
 * Real identity store and switches files in a temp directory.
 */
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
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
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import { IdentityStore } from "../../store/index.js";
import { ConfigStore } from "../service.js";

function sequence(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `id-${next}`;
  };
}

describe("ConfigStore", () => {
  let dir: string;
  let metaFile: string;
  let switchesFile: string;
  let identities: IdentityStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "momentary-config-"));
    metaFile = join(dir, "meta.json");
    switchesFile = join(dir, "momentary.yaml");
    identities = new IdentityStore(metaFile);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  // ===========================================================================
  // load
  // ===========================================================================

  describe("load", () => {
    it("mints and persists identities for a new group", async () => {
      await writeFile(switchesFile, "- name: Garage\n  toggle_for: 5\n");
      const store = new ConfigStore(identities, sequence());

      const group = await store.load("home", switchesFile);

      expect(group.persisted).toBe(true);
      expect(group.switches.get("id-2")).toMatchObject({
        entityId: "switch.momentary_garage",
        deviceId: "id-1",
        toggleForMs: 5000,
      });
      expect(await identities.loadGroup("home")).toEqual({
        devices: { Garage: { device_id: "id-1" } },
        switches: {
          Garage: { unique_id: "id-2", entity_id: "switch.momentary_garage" },
        },
      });
      expect(store.get("home")).toBe(group);
    });

    it("does not write again when nothing changed", async () => {
      await writeFile(switchesFile, "- name: Garage\n");
      await new ConfigStore(identities, sequence()).load("home", switchesFile);

      const reloaded = await new ConfigStore(identities, sequence()).load(
        "home",
        switchesFile,
      );

      expect(reloaded.persisted).toBe(false);
      expect([...reloaded.switches.keys()]).toEqual(["id-2"]);
    });

    it("reloads a switch named after an object prototype key without minting", async () => {
      await writeFile(switchesFile, "- name: __proto__\n");
      await new ConfigStore(identities, sequence()).load("home", switchesFile);

      const reloaded = await new ConfigStore(identities, () => {
        throw new Error("persisted identities should be reused");
      }).load("home", switchesFile);

      expect(reloaded.persisted).toBe(false);
      expect([...reloaded.switches.keys()]).toEqual(["id-2"]);
      expect(Object.keys((await identities.loadGroup("home")).switches)).toEqual([
        "__proto__",
      ]);
    });

    it("loads a missing switches file as an empty group", async () => {
      const store = new ConfigStore(identities, sequence());

      const group = await store.load("home", join(dir, "missing.yaml"));

      expect(group.switches.size).toBe(0);
      expect(group.persisted).toBe(false);
      expect(await store.hasGroup("home")).toBe(false);
    });

    it("keeps concurrent loads of different groups", async () => {
      const otherFile = join(dir, "shed.yaml");
      await writeFile(switchesFile, "- name: Garage\n");
      await writeFile(otherFile, "- name: Shed\n");
      const store = new ConfigStore(identities);

      await Promise.all([
        store.load("home", switchesFile),
        store.load("shed", otherFile),
      ]);

      const document = JSON.parse(await readFile(metaFile, "utf8"));
      expect(Object.keys(document.switches).sort()).toEqual(["home", "shed"]);
    });
  });

  // ===========================================================================
  // deleteGroup
  // ===========================================================================

  describe("deleteGroup", () => {
    it("removes the group once", async () => {
      await writeFile(switchesFile, "- name: Garage\n");
      const store = new ConfigStore(identities, sequence());
      await store.load("home", switchesFile);

      expect(await store.deleteGroup("home")).toBe(true);
      expect(await store.deleteGroup("home")).toBe(false);
      expect(store.get("home")).toBeUndefined();
      expect(await store.hasGroup("home")).toBe(false);
    });
  });

  // ===========================================================================
  // importLegacyGroup
  // ===========================================================================

  describe("importLegacyGroup", () => {
    it("writes a switches file whose identities a later load keeps", async () => {
      const store = new ConfigStore(identities, () => {
        throw new Error("imported identities should be reused");
      });

      const imported = await store.importLegacyGroup("home", switchesFile, [
        { platform: "momentary", name: "!Doorbell", on_for: 2, allow_off: true },
        { platform: "template", name: "Other" },
      ]);
      const group = await store.load("home", switchesFile);

      expect(imported.switches).toHaveLength(1);
      expect(group.persisted).toBe(false);
      expect(group.switches.get("doorbell")).toMatchObject({
        entityId: "switch.doorbell",
        deviceId: "doorbell",
        toggleForMs: 2000,
        cancellable: true,
        mode: "timed-on",
      });
    });
  });
});
