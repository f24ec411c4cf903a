/**
 * HTTP client for NuGet v3 flat-container feeds.
 * Purpose: list the published versions of a package id and download one .nupkg archive.
 * Assumptions: the feed follows the flat-container layout (lowercased ids and versions).
 * Usage: createHttpNugetFeedClient({ timeoutMs }) and hand it to createNugetSourceBackend.
 */

import axios from "axios";
import { z } from "zod";

import { nugetIndexUrl, nugetPackageUrl, type NugetSourceLocator } from "../../../core/config.js";
import { SyncError, toSyncError } from "../../../core/errors.js";
import type { BackendCallOptions } from "../../../core/source-extractor.js";

// =============================================================================
// TYPES
// =============================================================================

export interface NugetFeedClient {
  listVersions(locator: NugetSourceLocator, options?: BackendCallOptions): Promise<string[]>;
  download(
    locator: NugetSourceLocator,
    version: string,
    options?: BackendCallOptions,
  ): Promise<Buffer>;
}

export type HttpNugetFeedClientOptions = {
  timeoutMs?: number;
};

const VersionIndexSchema = z.object({
  versions: z.array(z.string()),
});

// =============================================================================
// PUBLIC API
// =============================================================================

export function createHttpNugetFeedClient(
  options: HttpNugetFeedClientOptions = {},
): NugetFeedClient {
  return {
    async listVersions(locator, callOptions) {
      const url = nugetIndexUrl(locator);
      let data: unknown;
      try {
        const response = await axios.get<unknown>(url, {
          timeout: options.timeoutMs,
          signal: callOptions?.signal,
          responseType: "json",
        });
        data = response.data;
      } catch (error) {
        throw classifyFeedError(error, `Package ${locator.id} in ${locator.feed}`);
      }

      const parsed = VersionIndexSchema.safeParse(data);
      if (!parsed.success) {
        throw new SyncError("SourceUnavailable", `Unexpected version index at ${url}.`);
      }
      return parsed.data.versions;
    },

    async download(locator, version, callOptions) {
      const url = nugetPackageUrl(locator, version);
      try {
        const response = await axios.get<ArrayBuffer>(url, {
          timeout: options.timeoutMs,
          signal: callOptions?.signal,
          responseType: "arraybuffer",
        });
        return Buffer.from(response.data);
      } catch (error) {
        throw classifyFeedError(error, `Package ${locator.id} ${version}`);
      }
    },
  };
}

export function classifyFeedError(error: unknown, subject: string): SyncError {
  if (axios.isCancel(error)) {
    return new SyncError("Cancelled", `Download of ${subject} cancelled.`, error);
  }
  if (axios.isAxiosError(error)) {
    if (error.response?.status === 404) {
      return new SyncError("RefNotFound", `${subject} not found.`, error);
    }
    const detail =
      error.code === "ECONNABORTED" || error.code === "ETIMEDOUT" ? "timed out" : error.message;
    return new SyncError("SourceUnavailable", `${subject} could not be fetched: ${detail}`, error);
  }
  return toSyncError(error, "SourceUnavailable");
}
