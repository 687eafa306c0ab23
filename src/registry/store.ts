/**
 * Artifact Registry Store
 *
 * Persisted mapping of "<series>/<filename>" to artifact metadata.
 * The file is rewritten wholesale on every save via a temporary file and a
 * rename, so a crash leaves either the previous or the new mapping on disk.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { PersistenceError, WorkbenchError, errorMessage } from "../utils/errors.js";
import { registryLogger } from "../utils/logger.js";
import { FRESHNESS_VALUES, artifactKey, recordKey } from "./types.js";
import type { ArtifactRecord, Freshness } from "./types.js";

const REGISTRY_FORMAT_VERSION = 1;

const FreshnessSchema = z.enum(FRESHNESS_VALUES);

const RecordSchema = z.object({
  filename: z.string().min(1),
  series: z.string().min(1),
  source_url: z.string().nullable().default(null),
  catalog_id: z.string().nullable().default(null),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  downloaded_at: z.string().datetime({ offset: true }),
  etag: z.string().nullable().default(null),
  last_modified: z.string().nullable().default(null),
  freshness: FreshnessSchema.default("unknown"),
  check_error: z.string().nullable().default(null),
});

const RegistryFileSchema = z.object({
  version: z.literal(REGISTRY_FORMAT_VERSION),
  artifacts: z.record(z.string(), RecordSchema),
});

type RegistryFile = z.infer<typeof RegistryFileSchema>;

function freeze(record: ArtifactRecord): Readonly<ArtifactRecord> {
  return Object.freeze({ ...record });
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

/**
 * Records are checked against the file schema on the way in, so a saved
 * registry always loads again.
 */
function validated(record: ArtifactRecord): Readonly<ArtifactRecord> {
  const parsed = RecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new WorkbenchError(
      "REGISTRY.INVALID_RECORD",
      `Invalid artifact record ${recordKey(record)}: ${describeIssues(parsed.error)}`
    );
  }
  return freeze(parsed.data);
}

export class RegistryStore {
  readonly filePath: string;
  private records = new Map<string, Readonly<ArtifactRecord>>();
  private dirty = false;

  constructor(filePath: string, records: Iterable<ArtifactRecord> = []) {
    this.filePath = filePath;
    for (const record of records) {
      this.records.set(recordKey(record), validated(record));
    }
  }

  /**
   * Load the registry. A missing file is an empty registry; a file that
   * cannot be read or does not match the format is a PersistenceError.
   */
  static load(filePath: string): RegistryStore {
    if (!existsSync(filePath)) {
      registryLogger.debug("No registry file, starting empty", { filePath });
      return new RegistryStore(filePath);
    }

    let content: string;
    try {
      content = readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new PersistenceError("PERSISTENCE.READ", filePath, `Failed to read registry: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError("PERSISTENCE.CORRUPT", filePath, `Registry is not valid JSON: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = RegistryFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError("PERSISTENCE.CORRUPT", filePath, `Registry format invalid: ${describeIssues(parsed.error)}`);
    }

    const store = new RegistryStore(filePath);
    for (const [key, record] of Object.entries(parsed.data.artifacts)) {
      const expected = artifactKey(record.series, record.filename);
      if (key !== expected) {
        registryLogger.warn("Registry key does not match record, re-keying", { key, expected });
      }
      store.records.set(expected, freeze(record));
    }

    registryLogger.debug("Registry loaded", { filePath, records: store.records.size });
    return store;
  }

  /**
   * Write the whole mapping atomically. On failure the store stays dirty
   * and keeps its in-memory state, so the caller can retry.
   */
  save(): void {
    const file: RegistryFile = {
      version: REGISTRY_FORMAT_VERSION,
      artifacts: Object.fromEntries(this.records),
    };
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(file, null, 2) + "\n", "utf-8");
      renameSync(tmpPath, this.filePath);
    } catch (error) {
      if (existsSync(tmpPath)) {
        try {
          unlinkSync(tmpPath);
        } catch (cleanupError) {
          registryLogger.warn("Could not remove temporary registry file", {
            tmpPath,
            error: errorMessage(cleanupError),
          });
        }
      }
      registryLogger.error("Failed to save registry", { filePath: this.filePath, error: errorMessage(error) });
      throw new PersistenceError("PERSISTENCE.WRITE", this.filePath, `Failed to save registry: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.dirty = false;
    registryLogger.debug("Registry saved", { filePath: this.filePath, records: this.records.size });
  }

  /**
   * Insert or replace a record. Throws REGISTRY.INVALID_RECORD, leaving the
   * store unchanged, when the record would not load back.
   */
  upsert(record: ArtifactRecord): void {
    this.records.set(recordKey(record), validated(record));
    this.dirty = true;
  }

  remove(series: string, filename: string): boolean {
    const removed = this.records.delete(artifactKey(series, filename));
    if (removed) {
      this.dirty = true;
    }
    return removed;
  }

  get(series: string, filename: string): Readonly<ArtifactRecord> | undefined {
    return this.records.get(artifactKey(series, filename));
  }

  /**
   * Records of one series, in insertion order.
   */
  allInSeries(series: string): Readonly<ArtifactRecord>[] {
    return this.all().filter((record) => record.series === series);
  }

  all(): Readonly<ArtifactRecord>[] {
    return [...this.records.values()];
  }

  /**
   * Distinct series present, in insertion order.
   */
  series(): string[] {
    return [...new Set(this.all().map((record) => record.series))];
  }

  /**
   * Returns true when the record exists and its freshness or error changed.
   * The error reason is kept only for "check-error".
   */
  setFreshness(series: string, filename: string, freshness: Freshness, checkError: string | null = null): boolean {
    const current = this.get(series, filename);
    if (!current) return false;
    const check_error = freshness === "check-error" ? checkError : null;
    if (current.freshness === freshness && current.check_error === check_error) return false;
    this.upsert({ ...current, freshness, check_error });
    return true;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  get size(): number {
    return this.records.size;
  }
}
