/**
 * Store Module - Service Layer
 *
 * File I/O for the identity document, the user switches file and the
 * restore-state file. Reads never fail the caller: a missing or corrupt
 * file reads as empty. Writes return Result so callers can log them.
 */
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type Result, err, ok } from "neverthrow";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

import type { GroupIdentities } from "../identity/index.js";
import { createLogger } from "../logger.js";
import {
  type StorageError,
  formatStorageError,
  notFound,
  parseFailed,
  readFailed,
  writeFailed,
} from "./errors.js";
import { type Lock, createLock } from "./lock.js";
import type { MetaDocument } from "./schema.js";
import {
  DOCUMENT_VERSION,
  LegacyConfigFileSchema,
  UserConfigFileSchema,
} from "./schema.js";
import {
  buildUserConfigFile,
  extractLegacyEntries,
  extractUserEntries,
  getGroup,
  hasGroup,
  parseMetaDocument,
  parseRestoreDocument,
  removeGroup,
  setGroup,
} from "./transform.js";

const log = createLogger("store");

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

// =============================================================================
// File Primitives
// =============================================================================

/**
 * Read a UTF-8 file.
 */
export async function readTextFile(
  path: string,
): Promise<Result<string, StorageError>> {
  try {
    return ok(await readFile(path, "utf8"));
  } catch (error) {
    const cause = toError(error);
    if ("code" in cause && cause.code === "ENOENT") {
      return err(notFound(path));
    }
    return err(readFailed(path, cause));
  }
}

/**
 * Write a file as one unit: write a sibling temp file, then rename over
 * the target. Readers see the old or the new document, never a mix.
 */
export async function writeFileAtomic(
  path: string,
  contents: string,
): Promise<Result<void, StorageError>> {
  const tempPath = `${path}.tmp-${process.pid}`;

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, contents, "utf8");
    await rename(tempPath, path);
    return ok(undefined);
  } catch (error) {
    return err(writeFailed(path, toError(error)));
  }
}

/**
 * Read and JSON-parse a file.
 */
async function readJsonFile(
  path: string,
): Promise<Result<unknown, StorageError>> {
  const text = await readTextFile(path);
  if (text.isErr()) {
    return err(text.error);
  }

  try {
    return ok(JSON.parse(text.value));
  } catch (error) {
    return err(parseFailed(path, toError(error).message));
  }
}

/**
 * Log a failed read at a level matching how unexpected it is.
 */
function logReadFallback(error: StorageError, what: string): void {
  if (error.type === "NOT_FOUND") {
    log.debug({ path: error.path }, `No ${what} yet, starting empty`);
    return;
  }
  log.warn(
    { path: error.path, error: formatStorageError(error) },
    `Unreadable ${what}, starting empty`,
  );
}

// =============================================================================
// Identity Store
// =============================================================================

/**
 * Result of a read-modify-write of one group.
 */
export type GroupUpdateResult<T> = Readonly<{
  value: T;
  /** ok(true) when written, ok(false) when nothing needed writing */
  write: Result<boolean, StorageError>;
}>;

/**
 * Decision returned by an update callback: the value to hand back and the
 * new identities, or null to leave the document as it is.
 */
export type GroupUpdate<T> = Readonly<{
  value: T;
  next: GroupIdentities | null;
}>;

/**
 * Identity document shared by every group of one installation.
 *
 * All access goes through one lock, so concurrent group loads never
 * interleave their read-modify-write cycles.
 */
export class IdentityStore {
  private readonly lock: Lock = createLock();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  private async readDocument(): Promise<MetaDocument> {
    const raw = await readJsonFile(this.filePath);
    if (raw.isErr()) {
      logReadFallback(raw.error, "identity document");
      return parseMetaDocument(null);
    }
    return parseMetaDocument(raw.value);
  }

  private async writeDocument(
    document: MetaDocument,
  ): Promise<Result<void, StorageError>> {
    return writeFileAtomic(
      this.filePath,
      `${JSON.stringify({ ...document, version: DOCUMENT_VERSION }, null, 4)}\n`,
    );
  }

  /**
   * Read one group's identities.
   */
  async loadGroup(groupName: string): Promise<GroupIdentities> {
    return this.lock.runExclusive(async () =>
      getGroup(await this.readDocument(), groupName),
    );
  }

  /**
   * Check whether a group has ever been saved.
   */
  async hasGroup(groupName: string): Promise<boolean> {
    return this.lock.runExclusive(async () =>
      hasGroup(await this.readDocument(), groupName),
    );
  }

  /**
   * Replace one group's identities.
   */
  async saveGroup(
    groupName: string,
    identities: GroupIdentities,
  ): Promise<Result<void, StorageError>> {
    return this.lock.runExclusive(async () => {
      const document = await this.readDocument();
      return this.writeDocument(setGroup(document, groupName, identities));
    });
  }

  /**
   * Remove one group's identities. Idempotent.
   *
   * @returns ok(true) if the group was present
   */
  async deleteGroup(
    groupName: string,
  ): Promise<Result<boolean, StorageError>> {
    return this.lock.runExclusive(
      async (): Promise<Result<boolean, StorageError>> => {
        const document = await this.readDocument();
        if (!hasGroup(document, groupName)) {
          return ok(false);
        }
        const written = await this.writeDocument(
          removeGroup(document, groupName),
        );
        return written.map(() => true);
      },
    );
  }

  /**
   * Read a group, let `update` decide its new identities, and write them
   * back, all inside one critical section. `update` must not await.
   */
  async updateGroup<T>(
    groupName: string,
    update: (current: GroupIdentities) => GroupUpdate<T>,
  ): Promise<GroupUpdateResult<T>> {
    return this.lock.runExclusive(async (): Promise<GroupUpdateResult<T>> => {
      const document = await this.readDocument();
      const { value, next } = update(getGroup(document, groupName));

      if (next === null) {
        return { value, write: ok(false) };
      }

      const written = await this.writeDocument(
        setGroup(document, groupName, next),
      );
      return { value, write: written.map(() => true) };
    });
  }
}

// =============================================================================
// User Switches File
// =============================================================================

/**
 * Read a YAML file. Missing, unreadable and unparseable files all yield
 * undefined after logging; an empty file yields null.
 */
async function readYamlFile(
  path: string,
  what: string,
): Promise<unknown> {
  const text = await readTextFile(path);
  if (text.isErr()) {
    logReadFallback(text.error, what);
    return undefined;
  }

  try {
    return parseYaml(text.value);
  } catch (error) {
    logReadFallback(parseFailed(path, toError(error).message), what);
    return undefined;
  }
}

/**
 * Load the user's definition list. Missing or corrupt files yield [].
 */
export async function loadUserEntries(path: string): Promise<unknown[]> {
  const document = await readYamlFile(path, "switches file");
  if (document === null || document === undefined) {
    return [];
  }

  const parsed = UserConfigFileSchema.safeParse(document);
  if (!parsed.success) {
    logReadFallback(
      parseFailed(path, "expected a list or a `switches:` list"),
      "switches file",
    );
    return [];
  }

  return extractUserEntries(parsed.data);
}

/**
 * Load entries from a legacy platform configuration. Missing or corrupt
 * files yield [].
 */
export async function loadLegacyEntries(path: string): Promise<unknown[]> {
  const document = await readYamlFile(path, "legacy configuration");
  if (document === null || document === undefined) {
    return [];
  }

  const parsed = LegacyConfigFileSchema.safeParse(document);
  if (!parsed.success) {
    logReadFallback(
      parseFailed(path, "expected a list or a `switch:` list"),
      "legacy configuration",
    );
    return [];
  }

  return extractLegacyEntries(parsed.data);
}

/**
 * Write the user's definition list.
 */
export async function saveUserEntries(
  path: string,
  entries: ReadonlyArray<unknown>,
): Promise<Result<void, StorageError>> {
  return writeFileAtomic(path, stringifyYaml(buildUserConfigFile(entries)));
}

// =============================================================================
// Restore State
// =============================================================================

/**
 * Keeps the last reported snapshot of every switch and persists them so
 * timed states survive a restart.
 */
export class FileRestoreStateStore {
  private states = new Map<string, Readonly<Record<string, unknown>>>();
  private dirty = false;

  constructor(private readonly filePath: string) {}

  /**
   * Load snapshots from disk, replacing anything held in memory.
   */
  async load(): Promise<number> {
    const raw = await readJsonFile(this.filePath);
    if (raw.isErr()) {
      logReadFallback(raw.error, "restore state");
      this.states = new Map();
    } else {
      this.states = parseRestoreDocument(raw.value);
    }
    this.dirty = false;

    log.debug({ count: this.states.size }, "Restore state loaded");
    return this.states.size;
  }

  get(uniqueId: string): Readonly<Record<string, unknown>> | null {
    return this.states.get(uniqueId) ?? null;
  }

  record(uniqueId: string, snapshot: Readonly<Record<string, unknown>>): void {
    this.states.set(uniqueId, snapshot);
    this.dirty = true;
  }

  forget(uniqueId: string): void {
    if (this.states.delete(uniqueId)) {
      this.dirty = true;
    }
  }

  /**
   * Write snapshots to disk if anything changed since the last flush.
   *
   * @returns ok(true) if written
   */
  async flush(): Promise<Result<boolean, StorageError>> {
    if (!this.dirty) {
      return ok(false);
    }

    const written = await writeFileAtomic(
      this.filePath,
      `${JSON.stringify(
        {
          version: DOCUMENT_VERSION,
          states: Object.fromEntries(this.states),
        },
        null,
        2,
      )}\n`,
    );

    if (written.isOk()) {
      this.dirty = false;
    }
    return written.map(() => true);
  }
}
