#!/usr/bin/env tsx

/**
 * Artifacts CLI
 *
 * Shows the registered artifacts of a kernel series next to the files
 * actually present in the series directory.
 *
 * Usage:
 *   npm run artifacts -- 6.13            # List
 *   npm run artifacts -- 6.13 --check    # Probe every artifact with a source URL first
 *   npm run artifacts -- 6.13 --adopt    # Register files placed by hand
 */

import { freshnessOf, listArtifactFiles, registeredName, seriesArtifactDir } from "../registry/index.js";
import type { FreshnessReport } from "../registry/index.js";
import { runSession } from "../session/index.js";
import { errorMessage } from "../utils/errors.js";
import { describeEvent, fail, formatTime, openSession } from "./shared.js";

const FRESHNESS_ICONS: Record<FreshnessReport, string> = {
  "up-to-date": "✅",
  stale: "⚠️ ",
  "check-error": "❌",
  unknown: "❔",
  "no-provenance": "📎",
};

async function main() {
  const args = process.argv.slice(2);
  const series = args.find((arg) => !arg.startsWith("--"));
  if (!series) {
    fail("Usage: npm run artifacts -- <series> [--check] [--adopt]");
  }

  const session = openSession();
  const dir = seriesArtifactDir(series);
  const files = listArtifactFiles(dir);

  if (args.includes("--adopt")) {
    const unregistered = files.filter((file) => !session.store.get(series, registeredName(file)));
    for (const file of unregistered) {
      session.requestAdopt(series, file.path);
    }
    console.log(`Registering ${unregistered.length} file(s)...`);
  }

  if (args.includes("--check")) {
    const ids = session.requestSweep(series);
    console.log(`Checking ${ids.length} artifact(s)...`);
  }

  await runSession(session, { onEvent: (event) => console.log(describeEvent(event)) });

  console.log();
  console.log(`┌─ ${series} ─ ${dir}`);
  const records = session.store.allInSeries(series);
  if (records.length === 0) {
    console.log("  No registered artifacts");
  }
  for (const record of records) {
    const freshness = freshnessOf(record);
    console.log(`  ${FRESHNESS_ICONS[freshness]} ${record.filename}  ${freshness}`);
    console.log(`      ${record.source_url ?? "(placed by hand)"}  ${formatTime(record.downloaded_at)}`);
    if (record.check_error) {
      console.log(`      ${record.check_error}`);
    }
  }

  const untracked = files.filter((file) => !session.store.get(series, registeredName(file)));
  if (untracked.length > 0) {
    console.log();
    console.log("  Not registered:");
    for (const file of untracked) {
      console.log(`    ${file.enabled ? "●" : "○"} ${file.name}`);
    }
  }
  console.log("└─────────────────────────────────────────────────────────────┘");
}

main().catch((error) => {
  console.error("Error:", errorMessage(error));
  process.exit(1);
});
