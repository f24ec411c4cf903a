/**
 * Orchestrator ports define the boundary between the sync engine and adapters.
 * Purpose: make dependencies explicit and replaceable for testing.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: build with createDefaultPorts() in the CLI; tests pass fakes.
 */

import type { LogSink } from "../../core/logger.js";
import type { VersionControlBackend } from "../../core/source-extractor.js";
import type { SyncStateRepository } from "../../core/state-store.js";
import { isoNow } from "../../core/utils.js";

export type { LogSink, SyncStateRepository, VersionControlBackend };

// =============================================================================
// PORTS
// =============================================================================

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export type OrchestratorPorts = {
  backend: VersionControlBackend;
  stateStore: SyncStateRepository;
  log: LogSink;
  clock: Clock;
};

// =============================================================================
// DEFAULTS
// =============================================================================

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow,
};
