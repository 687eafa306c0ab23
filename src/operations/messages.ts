/**
 * Message protocol per operation kind.
 *
 * Each kind has a closed set of variants discriminated by `type`. Exactly one
 * terminal variant ends every channel; progress and line variants may come
 * before it.
 */

import type { RemoteValidators } from "../transport/http.js";
import type { WorkbenchErrorCode } from "../utils/errors.js";

export interface VersionInfo {
  version: string;            // Tag name, e.g. "v6.13.1"
  date: string | null;
}

export interface CommitInfo {
  hash: string;               // Abbreviated to 12 characters
  subject: string;
  author: string;
}

// =============================================================================
// Fetch (version list, shortlog)
// =============================================================================

export type FetchMessage<T> =
  | { type: "done"; items: T[] }
  | { type: "error"; reason: string };

// =============================================================================
// Download
// =============================================================================

export interface DownloadSuccess {
  type: "success";
  path: string;               // Final file location
  filename: string;           // May differ from the requested name after decompression
  bytesWritten: number;
  sha256: string;             // Hex digest of exactly the bytes in `path`
  validators: RemoteValidators;
}

export type DownloadMessage =
  | { type: "progress"; received: number; total: number | null }
  | DownloadSuccess
  | { type: "error"; code: WorkbenchErrorCode; reason: string };

// =============================================================================
// Staleness check
// =============================================================================

export type CheckMessage =
  | { type: "up-to-date"; key: string }
  | { type: "stale"; key: string }
  | { type: "check-error"; key: string; reason: string }
  | { type: "no-provenance"; key: string };

// =============================================================================
// Subprocess
// =============================================================================

export type ProcessMessage =
  | { type: "line"; text: string }
  | { type: "exit"; code: number; signal: string | null; stoppedByRequest: boolean }
  | { type: "spawn-error"; reason: string };

// =============================================================================
// Local hash
// =============================================================================

export type HashMessage =
  | { type: "hashed"; path: string; filename: string; sha256: string; bytes: number }
  | { type: "error"; reason: string };

// =============================================================================
// Terminal predicates
// =============================================================================

export function isFetchTerminal<T>(message: FetchMessage<T>): boolean {
  return message.type === "done" || message.type === "error";
}

export function isDownloadTerminal(message: DownloadMessage): boolean {
  return message.type !== "progress";
}

export function isCheckTerminal(_message: CheckMessage): boolean {
  return true;
}

export function isProcessTerminal(message: ProcessMessage): boolean {
  return message.type !== "line";
}

export function isHashTerminal(_message: HashMessage): boolean {
  return true;
}
