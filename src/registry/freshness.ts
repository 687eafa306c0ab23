import type { RemoteValidators } from "../transport/http.js";
import type { CheckMessage } from "../operations/messages.js";
import type { RegistryStore } from "./store.js";
import type { ArtifactRecord, FreshnessReport } from "./types.js";
import { parseArtifactKey } from "./types.js";

/**
 * Compare stored validators with a fresh probe.
 *
 * A field counts as changed when the probe carries it and the stored value
 * is different or missing. A probe that omits a header says nothing about
 * that field, so it cannot make the artifact stale on its own.
 */
export function compareValidators(stored: RemoteValidators, probed: RemoteValidators): "up-to-date" | "stale" {
  const etagChanged = probed.etag !== null && probed.etag !== stored.etag;
  const modifiedChanged = probed.lastModified !== null && probed.lastModified !== stored.lastModified;
  return etagChanged || modifiedChanged ? "stale" : "up-to-date";
}

export function storedValidators(record: ArtifactRecord): RemoteValidators {
  return { etag: record.etag, lastModified: record.last_modified };
}

export function freshnessOf(record: ArtifactRecord): FreshnessReport {
  return record.source_url === null ? "no-provenance" : record.freshness;
}

/**
 * Records a batch staleness sweep should probe. Records without a
 * provenance URL are never part of a sweep.
 */
export function sweepTargets(records: readonly ArtifactRecord[]): ArtifactRecord[] {
  return records.filter((record) => record.source_url !== null);
}

/**
 * Apply a terminal check message to the store.
 * Returns true when the stored record changed.
 */
export function applyCheckResult(store: RegistryStore, message: CheckMessage): boolean {
  const parsed = parseArtifactKey(message.key);
  if (!parsed) return false;

  switch (message.type) {
    case "up-to-date":
    case "stale":
      return store.setFreshness(parsed.series, parsed.filename, message.type);
    case "check-error":
      // Validators stay as they were: an error says nothing about the remote
      return store.setFreshness(parsed.series, parsed.filename, "check-error", message.reason);
    case "no-provenance":
      return false;
  }
}

export interface DownloadedArtifact {
  series: string;
  filename: string;
  url: string;
  catalogId: string | null;
  sha256: string;
  validators: RemoteValidators;
  downloadedAt?: Date;
}

/**
 * Record for a completed download: fresh validators, classified up to date.
 */
export function recordFromDownload(artifact: DownloadedArtifact): ArtifactRecord {
  return {
    series: artifact.series,
    filename: artifact.filename,
    source_url: artifact.url,
    catalog_id: artifact.catalogId,
    sha256: artifact.sha256,
    downloaded_at: (artifact.downloadedAt ?? new Date()).toISOString(),
    etag: artifact.validators.etag,
    last_modified: artifact.validators.lastModified,
    freshness: "up-to-date",
    check_error: null,
  };
}

/**
 * Record for an artifact placed by hand: no provenance, freshness unknown.
 */
export function recordFromLocalFile(series: string, filename: string, sha256: string, placedAt = new Date()): ArtifactRecord {
  return {
    series,
    filename,
    source_url: null,
    catalog_id: null,
    sha256,
    downloaded_at: placedAt.toISOString(),
    etag: null,
    last_modified: null,
    freshness: "unknown",
    check_error: null,
  };
}
