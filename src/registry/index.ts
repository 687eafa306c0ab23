/**
 * Artifact Registry
 *
 * Persisted artifact metadata, freshness rules, curated sources and the
 * files the registry describes.
 */

export * from "./types.js";
export * from "./store.js";
export * from "./freshness.js";
export * from "./catalog.js";
export * from "./artifact-files.js";
