/**
 * Artifact Registry Types
 *
 * One record per (series, filename). Records are owned by the registry
 * store; everyone else reads frozen snapshots and submits replacements.
 */

export const FRESHNESS_VALUES = ["unknown", "up-to-date", "stale", "check-error"] as const;

export type Freshness = (typeof FRESHNESS_VALUES)[number];

/**
 * Freshness as reported to users. Records without a provenance URL are
 * never checked and always report `no-provenance`.
 */
export type FreshnessReport = Freshness | "no-provenance";

export interface ArtifactRecord {
  series: string;            // Compatibility bucket, e.g. "6.13"
  filename: string;
  source_url: string | null; // Null when placed manually
  catalog_id: string | null; // Set only for curated catalog downloads
  sha256: string;            // Hex digest, computed at download time
  downloaded_at: string;     // ISO-8601
  etag: string | null;
  last_modified: string | null;
  freshness: Freshness;
  check_error: string | null; // Reason of the last failed check
}

/**
 * Registry key, e.g. "6.13/pf-6.13.patch"
 */
export function artifactKey(series: string, filename: string): string {
  return `${series}/${filename}`;
}

export function recordKey(record: Pick<ArtifactRecord, "series" | "filename">): string {
  return artifactKey(record.series, record.filename);
}

/**
 * Splits a registry key at its first "/"; series never contain one
 */
export function parseArtifactKey(key: string): { series: string; filename: string } | null {
  const idx = key.indexOf("/");
  if (idx <= 0 || idx === key.length - 1) return null;
  return { series: key.slice(0, idx), filename: key.slice(idx + 1) };
}
