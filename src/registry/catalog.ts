/**
 * Curated artifact sources.
 *
 * Entries live in a JSON file (see workspace.catalog_path) and expand their
 * URL and file name templates per series.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { getWorkspaceConfig } from "../utils/config.js";

const SERIES_PLACEHOLDER = "{series}";

const CatalogEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  url_template: z.string().min(1),
  filename_template: z.string().min(1),
  supported_series: z.array(z.string()),
});

const CatalogFileSchema = z.object({
  entries: z.array(CatalogEntrySchema),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

const cache = new Map<string, CatalogEntry[]>();

export function parseCatalog(content: string): CatalogEntry[] {
  return CatalogFileSchema.parse(JSON.parse(content)).entries;
}

export function loadCatalog(path: string = getWorkspaceConfig().catalog_path): CatalogEntry[] {
  let entries = cache.get(path);
  if (!entries) {
    entries = parseCatalog(readFileSync(path, "utf-8"));
    cache.set(path, entries);
  }
  return entries;
}

export function urlForSeries(entry: CatalogEntry, series: string): string {
  return entry.url_template.replaceAll(SERIES_PLACEHOLDER, series);
}

export function filenameForSeries(entry: CatalogEntry, series: string): string {
  return entry.filename_template.replaceAll(SERIES_PLACEHOLDER, series);
}

export function supportsSeries(entry: CatalogEntry, series: string): boolean {
  return entry.supported_series.includes(series);
}

export function catalogForSeries(series: string, entries: CatalogEntry[] = loadCatalog()): CatalogEntry[] {
  return entries.filter((entry) => supportsSeries(entry, series));
}

export function catalogEntry(id: string, entries: CatalogEntry[] = loadCatalog()): CatalogEntry | undefined {
  return entries.find((entry) => entry.id === id);
}
