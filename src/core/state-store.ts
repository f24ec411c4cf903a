import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

import fse from "fs-extra";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { SyncStateSchema, type SyncState } from "./state.js";

// =============================================================================
// TYPES
// =============================================================================

export interface SyncStateRepository {
  get(packageName: string): Promise<SyncState | null>;
  put(packageName: string, state: SyncState): Promise<void>;
}

const STATE_HINT = "Delete the state file to force a full rebuild of that package.";

// =============================================================================
// FILE STORE
// =============================================================================

export class SyncStateStore implements SyncStateRepository {
  constructor(public readonly dir: string) {}

  statePath(packageName: string): string {
    return path.join(this.dir, `${packageName}.json`);
  }

  async get(packageName: string): Promise<SyncState | null> {
    const statePath = this.statePath(packageName);
    if (!(await fse.pathExists(statePath))) return null;

    try {
      return await loadSyncState(statePath);
    } catch (error) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.state,
        title: "Sync state load failed.",
        message: `Unable to load sync state at ${statePath}.`,
        hint: STATE_HINT,
        cause: error,
      });
    }
  }

  async put(packageName: string, state: SyncState): Promise<void> {
    const statePath = this.statePath(packageName);
    try {
      await saveSyncState(statePath, state);
    } catch (error) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.state,
        title: "Sync state save failed.",
        message: `Unable to save sync state at ${statePath}.`,
        hint: STATE_HINT,
        cause: error,
      });
    }
  }
}

// =============================================================================
// IO
// =============================================================================

export async function loadSyncState(statePath: string): Promise<SyncState> {
  const raw = await fse.readFile(statePath, "utf8");
  const parsed = SyncStateSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid sync state at ${statePath}: ${parsed.error.toString()}`);
  }

  return parsed.data;
}

export async function saveSyncState(statePath: string, state: SyncState): Promise<void> {
  const parsed = SyncStateSchema.safeParse(state);
  if (!parsed.success) {
    throw new Error(`Cannot save sync state: ${parsed.error.toString()}`);
  }

  await writeStateFile(statePath, parsed.data);
}

async function writeStateFile(statePath: string, state: SyncState): Promise<void> {
  await fse.ensureDir(path.dirname(statePath));

  const tmpPath = `${statePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(JSON.stringify(state, null, 2) + "\n", "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, statePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}
