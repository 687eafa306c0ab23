#!/usr/bin/env tsx

/**
 * Download CLI
 *
 * Downloads one artifact into a series directory and registers it.
 *
 * Usage:
 *   npm run download -- 6.13 https://example.org/fix.patch [name.patch]
 *   npm run download -- 6.13 <catalog-id>
 *   npm run download -- 6.13 --list     # Catalog entries for the series
 */

import { catalogForSeries } from "../registry/index.js";
import { runSession } from "../session/index.js";
import { errorMessage } from "../utils/errors.js";
import { buildProgressBar, describeEvent, fail, formatBytes, openSession } from "./shared.js";

async function main() {
  const [series, source, filename] = process.argv.slice(2);
  if (!series || !source) {
    fail("Usage: npm run download -- <series> <url|catalog-id|--list> [filename]");
  }

  if (source === "--list") {
    for (const entry of catalogForSeries(series)) {
      console.log(`  ${entry.id.padEnd(16)} ${entry.name}: ${entry.description}`);
    }
    return;
  }

  const session = openSession();
  const id = /^https?:\/\//.test(source)
    ? session.requestDownload(series, source, filename ? { filename } : {})
    : session.requestCatalogDownload(series, source);

  await runSession(session, {
    onEvent: (event) => console.log(describeEvent(event)),
    onTick: (_result, s) => {
      const progress = s.progressOf(id);
      if (!progress) return;
      const line = progress.total
        ? `${buildProgressBar((progress.received / progress.total) * 100)} ${formatBytes(progress.received)} / ${formatBytes(progress.total)}`
        : `${formatBytes(progress.received)}`;
      process.stdout.write(`\r  ${line}`);
    },
  });
}

main().catch((error) => {
  console.error("Error:", errorMessage(error));
  process.exit(1);
});
