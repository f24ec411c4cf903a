import type { AppContext } from "../app/context.js";
import { stateDir } from "../core/paths.js";
import type { SyncState } from "../core/state.js";
import { SyncStateStore } from "../core/state-store.js";

import { shortRef } from "./packages.js";

export type StatusRow = {
  package: string;
  ref: string;
  outcome: string;
  syncedAt: string;
  error: string;
};

export async function statusCommand(appContext: AppContext): Promise<StatusRow[]> {
  const store = new SyncStateStore(stateDir(appContext.paths));

  const rows: StatusRow[] = [];
  for (const spec of appContext.config.packages) {
    rows.push(buildStatusRow(spec.name, await store.get(spec.name)));
  }

  if (rows.length === 0) {
    console.log(`No packages configured in ${appContext.configPath}.`);
    return rows;
  }

  console.log(formatStatusTable(rows));
  return rows;
}

export function buildStatusRow(packageName: string, state: SyncState | null): StatusRow {
  if (!state) {
    return { package: packageName, ref: "-", outcome: "never synced", syncedAt: "-", error: "" };
  }

  return {
    package: packageName,
    ref: shortRef(state.last_ref),
    outcome: state.last_outcome,
    syncedAt: state.last_sync_at,
    error: state.last_outcome === "failed" && state.last_error ? state.last_error.kind : "",
  };
}

export function formatStatusTable(rows: StatusRow[]): string {
  const header: StatusRow = {
    package: "Package",
    ref: "Ref",
    outcome: "Outcome",
    syncedAt: "Synced",
    error: "Error",
  };
  const columns: Array<keyof StatusRow> = ["package", "ref", "outcome", "syncedAt", "error"];
  const widths = columns.map((column) =>
    Math.max(header[column].length, ...rows.map((row) => row[column].length)),
  );

  return [header, ...rows]
    .map((row) =>
      columns
        .map((column, index) => row[column].padEnd(widths[index]))
        .join("  ")
        .trimEnd(),
    )
    .join("\n");
}
