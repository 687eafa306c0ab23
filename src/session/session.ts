/**
 * Workbench Session
 *
 * Single-threaded owner of the artifact registry. Requests start operations
 * through the dispatcher; `tick()` polls every open operation, folds the
 * terminal messages into the registry and persists it once per tick when
 * something changed. Workers never touch the registry themselves.
 */

import { basename, join } from "path";
import { emitOperationProgress, emitRegistrySaveFailed, emitRegistrySaved, emitSessionTick } from "../events/event-bus.js";
import { BuildLog } from "../logs/classifier.js";
import type { LogLine } from "../logs/classifier.js";
import type { Dispatcher, OperationHandle, ProcessHandle } from "../operations/dispatcher.js";
import type { CommitInfo, ProcessMessage, VersionInfo } from "../operations/messages.js";
import { filenameFromUrl } from "../operations/workers/download.js";
import type { InputResult } from "../operations/workers/subprocess.js";
import { tarballUrl } from "../operations/workers/versions.js";
import { artifactFileAt, registeredName, seriesArtifactDir } from "../registry/artifact-files.js";
import { catalogEntry, filenameForSeries, loadCatalog, supportsSeries, urlForSeries } from "../registry/catalog.js";
import type { CatalogEntry } from "../registry/catalog.js";
import { applyCheckResult, recordFromDownload, recordFromLocalFile, sweepTargets } from "../registry/freshness.js";
import type { RegistryStore } from "../registry/store.js";
import { artifactKey } from "../registry/types.js";
import type { ProcessSpec } from "../transport/process.js";
import { getNetworkConfig, getWorkspaceConfig } from "../utils/config.js";
import { PersistenceError, WorkbenchError, errorCode, errorMessage } from "../utils/errors.js";
import type { WorkbenchErrorCode } from "../utils/errors.js";
import { sessionLogger } from "../utils/logger.js";
import type { NetworkConfig, WorkspaceConfig } from "../utils/types.js";

// =============================================================================
// Types
// =============================================================================

export type SessionEvent =
  | { type: "versions-loaded"; operationId: string; count: number }
  | { type: "versions-failed"; operationId: string; reason: string }
  | { type: "shortlog-loaded"; operationId: string; from: string; to: string; count: number }
  | { type: "shortlog-failed"; operationId: string; reason: string }
  | { type: "download-complete"; operationId: string; key: string | null; path: string; sha256: string }
  | { type: "download-failed"; operationId: string; url: string; code: WorkbenchErrorCode; reason: string }
  | { type: "check-complete"; operationId: string; key: string; result: "up-to-date" | "stale" | "no-provenance" }
  | { type: "check-failed"; operationId: string; key: string; reason: string }
  | { type: "adopted"; operationId: string; key: string; sha256: string }
  | { type: "adopt-failed"; operationId: string; path: string; reason: string }
  | { type: "build-exited"; operationId: string; code: number; stoppedByRequest: boolean }
  | { type: "build-failed"; operationId: string; reason: string };

export interface TickResult {
  events: SessionEvent[];
  saved: boolean;
  saveError: PersistenceError | null;
}

export type BuildState =
  | { status: "idle" }
  | { status: "running"; operationId: string; command: string }
  | { status: "exited"; operationId: string; code: number; stoppedByRequest: boolean }
  | { status: "failed"; operationId: string; reason: string };

export interface DownloadProgress {
  received: number;
  total: number | null;
}

export interface DownloadOptions {
  filename?: string;
  catalogId?: string | null;
  decompress?: boolean;
}

export interface SessionOptions {
  store: RegistryStore;
  dispatcher: Dispatcher;
  workspace?: WorkspaceConfig;
  network?: NetworkConfig;
  catalog?: CatalogEntry[];
}

type OpenOperation =
  | { kind: "fetch-versions"; handle: OperationHandle<"fetch-versions"> }
  | { kind: "fetch-shortlog"; handle: OperationHandle<"fetch-shortlog">; from: string; to: string }
  | {
      kind: "download-artifact";
      handle: OperationHandle<"download-artifact">;
      url: string;
      series: string | null;          // null: not registered (source tarballs)
      catalogId: string | null;
    }
  | { kind: "check-staleness"; handle: OperationHandle<"check-staleness">; key: string }
  | { kind: "hash-local"; handle: OperationHandle<"hash-local">; series: string; filename: string; path: string }
  | { kind: "run-subprocess"; handle: ProcessHandle };

// =============================================================================
// Session
// =============================================================================

export class WorkbenchSession {
  readonly store: RegistryStore;
  private dispatcher: Dispatcher;
  private workspace: WorkspaceConfig;
  private network: NetworkConfig;
  private catalogEntries: CatalogEntry[] | null;

  private open = new Map<string, OpenOperation>();
  private progress = new Map<string, DownloadProgress>();
  private tickCount = 0;

  private versionList: VersionInfo[] = [];
  private commits: CommitInfo[] = [];
  private log = new BuildLog();
  private build: BuildState = { status: "idle" };
  private buildHandle: ProcessHandle | null = null;

  constructor(options: SessionOptions) {
    this.store = options.store;
    this.dispatcher = options.dispatcher;
    this.workspace = options.workspace ?? getWorkspaceConfig();
    this.network = options.network ?? getNetworkConfig();
    this.catalogEntries = options.catalog ?? null;
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  requestVersionList(): string {
    const handle = this.dispatcher.fetchVersions();
    this.track({ kind: "fetch-versions", handle });
    return handle.id;
  }

  requestShortlog(from: string, to: string): string {
    const handle = this.dispatcher.fetchShortlog(from, to);
    this.track({ kind: "fetch-shortlog", handle, from, to });
    return handle.id;
  }

  /**
   * Download an artifact into the series directory and register it on success
   */
  requestDownload(series: string, url: string, options: DownloadOptions = {}): string {
    const handle = this.dispatcher.download({
      url,
      destDir: seriesArtifactDir(series, this.workspace),
      filename: options.filename ?? filenameFromUrl(url),
      decompress: options.decompress ?? true,
    });
    this.track({ kind: "download-artifact", handle, url, series, catalogId: options.catalogId ?? null });
    return handle.id;
  }

  requestCatalogDownload(series: string, catalogId: string): string {
    const entry = catalogEntry(catalogId, this.catalog());
    if (!entry) {
      throw new WorkbenchError("CATALOG.UNKNOWN", `Unknown catalog entry: ${catalogId}`);
    }
    if (!supportsSeries(entry, series)) {
      throw new WorkbenchError("CATALOG.UNKNOWN", `${entry.name} is not available for ${series}`);
    }
    return this.requestDownload(series, urlForSeries(entry, series), {
      filename: filenameForSeries(entry, series),
      catalogId: entry.id,
    });
  }

  /**
   * Kernel source tarball. Stored compressed and never registered.
   */
  requestSourceDownload(version: string, destDir: string = join(this.workspace.root, "sources")): string {
    const url = tarballUrl(version, this.network.tarball_base_url);
    const handle = this.dispatcher.download({
      url,
      destDir,
      filename: filenameFromUrl(url),
      decompress: false,
    });
    this.track({ kind: "download-artifact", handle, url, series: null, catalogId: null });
    return handle.id;
  }

  /**
   * Register a file placed by hand. It gets no provenance URL.
   */
  requestAdopt(series: string, path: string): string {
    const file = artifactFileAt(path);
    const filename = file ? registeredName(file) : basename(path);
    const handle = this.dispatcher.hashLocal(path);
    this.track({ kind: "hash-local", handle, series, filename, path });
    return handle.id;
  }

  requestCheck(series: string, filename: string): string {
    const record = this.store.get(series, filename);
    if (!record) {
      throw new WorkbenchError("REGISTRY.UNKNOWN_ARTIFACT", `No registered artifact ${artifactKey(series, filename)}`);
    }
    const handle = this.dispatcher.checkStaleness(record);
    this.track({ kind: "check-staleness", handle, key: artifactKey(series, filename) });
    return handle.id;
  }

  /**
   * Check every record with a provenance URL, optionally in one series only
   */
  requestSweep(series?: string): string[] {
    const records = series === undefined ? this.store.all() : this.store.allInSeries(series);
    return sweepTargets(records).map((record) => this.requestCheck(record.series, record.filename));
  }

  startBuild(spec: ProcessSpec): string {
    if (this.buildHandle) {
      throw new WorkbenchError("BUILD.RUNNING", "A build is already running");
    }
    const command = [spec.command, ...spec.args].join(" ");
    const handle = this.dispatcher.runSubprocess(spec);
    this.buildHandle = handle;
    this.build = { status: "running", operationId: handle.id, command };
    this.log.clear();
    this.log.pushNote(`==> Running ${command}`, "stage");
    this.track({ kind: "run-subprocess", handle });
    return handle.id;
  }

  sendBuildInput(text: string): InputResult {
    if (!this.buildHandle) {
      return { ok: false, reason: "No build running" };
    }
    const result = this.buildHandle.sendInput(text);
    if (result.ok) {
      this.log.pushInput(text);
    }
    return result;
  }

  stopBuild(): boolean {
    if (!this.buildHandle) return false;
    const stopped = this.buildHandle.stop();
    if (stopped) {
      this.log.pushNote("==> Stopping build", "stage");
    }
    return stopped;
  }

  /**
   * Stop listening to an operation. The worker still runs to completion;
   * its results are discarded.
   */
  dropOperation(id: string): boolean {
    const operation = this.open.get(id);
    if (!operation) return false;

    operation.handle.drop();
    this.open.delete(id);
    this.progress.delete(id);
    if (operation.kind === "run-subprocess" && this.buildHandle === operation.handle) {
      this.buildHandle = null;
      this.build = { status: "idle" };
    }
    sessionLogger.debug("Operation dropped", { id, kind: operation.kind });
    return true;
  }

  // ---------------------------------------------------------------------------
  // Tick
  // ---------------------------------------------------------------------------

  tick(): TickResult {
    this.tickCount++;
    const events: SessionEvent[] = [];
    let changed = false;

    for (const [id, operation] of this.open) {
      if (this.collect(operation, events)) {
        changed = true;
      }
      if (operation.handle.finished) {
        this.open.delete(id);
        this.progress.delete(id);
      }
    }

    let saved = false;
    let saveError: PersistenceError | null = null;
    if (changed) {
      saveError = this.trySave();
      saved = saveError === null;
    }

    emitSessionTick(this.tickCount, this.open.size);
    return { events, saved, saveError };
  }

  /**
   * Persist pending changes, e.g. after a failed save or before exit
   */
  flush(): PersistenceError | null {
    if (!this.store.isDirty()) return null;
    return this.trySave();
  }

  /**
   * Resolves once every currently open worker has finished. Their messages
   * are applied by the next tick.
   */
  async whenIdle(): Promise<void> {
    await Promise.all([...this.open.values()].map((operation) => operation.handle.settled));
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  get versions(): readonly VersionInfo[] {
    return this.versionList;
  }

  get shortlog(): readonly CommitInfo[] {
    return this.commits;
  }

  get buildLog(): readonly LogLine[] {
    return this.log.lines;
  }

  get buildState(): BuildState {
    return this.build;
  }

  get openOperations(): number {
    return this.open.size;
  }

  get isIdle(): boolean {
    return this.open.size === 0;
  }

  progressOf(id: string): DownloadProgress | undefined {
    return this.progress.get(id);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private catalog(): CatalogEntry[] {
    if (!this.catalogEntries) {
      this.catalogEntries = loadCatalog(this.workspace.catalog_path);
    }
    return this.catalogEntries;
  }

  private track(operation: OpenOperation): void {
    this.open.set(operation.handle.id, operation);
  }

  private trySave(): PersistenceError | null {
    try {
      this.store.save();
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      sessionLogger.error("Registry save failed, keeping changes in memory", { error: error.message });
      emitRegistrySaveFailed(error.path, error.message);
      return error;
    }
    emitRegistrySaved(this.store.filePath, this.store.size);
    return null;
  }

  /**
   * Apply every pending message of one operation. Returns true when the
   * registry changed.
   */
  private collect(operation: OpenOperation, events: SessionEvent[]): boolean {
    const id = operation.handle.id;
    let changed = false;

    switch (operation.kind) {
      case "fetch-versions":
        for (const message of operation.handle.drain()) {
          if (message.type === "done") {
            this.versionList = message.items;
            events.push({ type: "versions-loaded", operationId: id, count: message.items.length });
          } else {
            events.push({ type: "versions-failed", operationId: id, reason: message.reason });
          }
        }
        break;

      case "fetch-shortlog":
        for (const message of operation.handle.drain()) {
          if (message.type === "done") {
            this.commits = message.items;
            events.push({
              type: "shortlog-loaded",
              operationId: id,
              from: operation.from,
              to: operation.to,
              count: message.items.length,
            });
          } else {
            events.push({ type: "shortlog-failed", operationId: id, reason: message.reason });
          }
        }
        break;

      case "download-artifact":
        for (const message of operation.handle.drain()) {
          switch (message.type) {
            case "progress":
              this.progress.set(id, { received: message.received, total: message.total });
              emitOperationProgress(id, message.received, message.total);
              break;
            case "success": {
              let key: string | null = null;
              if (operation.series !== null) {
                const record = recordFromDownload({
                  series: operation.series,
                  filename: message.filename,
                  url: operation.url,
                  catalogId: operation.catalogId,
                  sha256: message.sha256,
                  validators: message.validators,
                });
                try {
                  this.store.upsert(record);
                } catch (error) {
                  sessionLogger.error("Downloaded artifact rejected by the registry", { path: message.path, error: errorMessage(error) });
                  events.push({
                    type: "download-failed",
                    operationId: id,
                    url: operation.url,
                    code: errorCode(error),
                    reason: errorMessage(error),
                  });
                  break;
                }
                key = artifactKey(record.series, record.filename);
                changed = true;
              }
              sessionLogger.info("Download complete", { key, path: message.path, bytes: message.bytesWritten });
              events.push({ type: "download-complete", operationId: id, key, path: message.path, sha256: message.sha256 });
              break;
            }
            case "error":
              sessionLogger.warn("Download failed", { url: operation.url, code: message.code, reason: message.reason });
              events.push({
                type: "download-failed",
                operationId: id,
                url: operation.url,
                code: message.code,
                reason: message.reason,
              });
              break;
          }
        }
        break;

      case "check-staleness":
        for (const message of operation.handle.drain()) {
          if (applyCheckResult(this.store, message)) {
            changed = true;
          }
          if (message.type === "check-error") {
            events.push({ type: "check-failed", operationId: id, key: message.key, reason: message.reason });
          } else {
            events.push({ type: "check-complete", operationId: id, key: message.key, result: message.type });
          }
        }
        break;

      case "hash-local":
        for (const message of operation.handle.drain()) {
          if (message.type === "hashed") {
            try {
              this.store.upsert(recordFromLocalFile(operation.series, operation.filename, message.sha256));
            } catch (error) {
              events.push({ type: "adopt-failed", operationId: id, path: operation.path, reason: errorMessage(error) });
              continue;
            }
            changed = true;
            events.push({
              type: "adopted",
              operationId: id,
              key: artifactKey(operation.series, operation.filename),
              sha256: message.sha256,
            });
          } else {
            events.push({ type: "adopt-failed", operationId: id, path: operation.path, reason: message.reason });
          }
        }
        break;

      case "run-subprocess":
        for (const message of operation.handle.drain()) {
          this.applyBuildMessage(id, message, events);
        }
        break;
    }

    return changed;
  }

  private applyBuildMessage(id: string, message: ProcessMessage, events: SessionEvent[]): void {
    const current = this.buildHandle?.id === id;
    switch (message.type) {
      case "line":
        if (current) this.log.push(message.text);
        break;
      case "exit":
        if (current) {
          this.log.exit(message.code);
          this.build = { status: "exited", operationId: id, code: message.code, stoppedByRequest: message.stoppedByRequest };
          this.buildHandle = null;
        }
        events.push({ type: "build-exited", operationId: id, code: message.code, stoppedByRequest: message.stoppedByRequest });
        break;
      case "spawn-error":
        if (current) {
          this.log.pushNote(message.reason, "error");
          this.build = { status: "failed", operationId: id, reason: message.reason };
          this.buildHandle = null;
        }
        sessionLogger.error("Build could not start", { reason: message.reason });
        events.push({ type: "build-failed", operationId: id, reason: message.reason });
        break;
    }
  }
}

