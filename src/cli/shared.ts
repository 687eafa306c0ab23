/**
 * Helpers shared by the command-line scripts
 */

import { eventBus } from "../events/event-bus.js";
import type { WorkbenchEvent } from "../events/event-bus.js";
import { Dispatcher } from "../operations/index.js";
import { RegistryStore } from "../registry/index.js";
import { WorkbenchSession } from "../session/index.js";
import type { SessionEvent } from "../session/index.js";
import { getRegistryPath } from "../utils/config.js";

function reportSaveFailure(event: WorkbenchEvent): void {
  if (event.type === "registry:save_failed") {
    console.log(`⚠️  Registry not saved (tick ${event.tick}): ${String(event.data.error)}`);
  }
}

export function openSession(): WorkbenchSession {
  const store = RegistryStore.load(getRegistryPath());
  eventBus.on("event", reportSaveFailure);
  return new WorkbenchSession({ store, dispatcher: Dispatcher.fromConfig() });
}

export function buildProgressBar(percent: number): string {
  const width = 20;
  const filled = Math.round((Math.min(percent, 100) / 100) * width);
  const empty = width - filled;
  return `[${"█".repeat(filled)}${"░".repeat(empty)}]`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

export function formatTime(timestamp: string): string {
  const date = new Date(timestamp);
  return date.toLocaleDateString() + " " + date.toLocaleTimeString();
}

/**
 * One-line summary of a session event for terminal output
 */
export function describeEvent(event: SessionEvent): string {
  switch (event.type) {
    case "versions-loaded":
      return `✅ Loaded ${event.count} versions`;
    case "versions-failed":
      return `❌ Could not load versions: ${event.reason}`;
    case "shortlog-loaded":
      return `✅ ${event.count} commits between ${event.from} and ${event.to}`;
    case "shortlog-failed":
      return `❌ Could not load shortlog: ${event.reason}`;
    case "download-complete":
      return `✅ Downloaded ${event.path} (sha256 ${event.sha256.slice(0, 16)}…)`;
    case "download-failed":
      return `❌ Download failed [${event.code}]: ${event.reason}`;
    case "check-complete":
      return `${event.result === "stale" ? "⚠️ " : "✅"} ${event.key}: ${event.result}`;
    case "check-failed":
      return `❌ ${event.key}: ${event.reason}`;
    case "adopted":
      return `✅ Registered ${event.key} (no provenance)`;
    case "adopt-failed":
      return `❌ Could not register ${event.path}: ${event.reason}`;
    case "build-exited":
      return event.stoppedByRequest ? `⏹️  Build stopped (exit code ${event.code})` : `🏁 Build exited with code ${event.code}`;
    case "build-failed":
      return `❌ ${event.reason}`;
  }
}

export function fail(message: string): never {
  console.log(`❌ ${message}`);
  process.exit(1);
}
