#!/usr/bin/env tsx

/**
 * Kernel Workbench
 *
 * Prints the active configuration and a registry summary.
 *
 * Usage:
 *   npm start                         - This summary
 *   npm run versions [-- <version>]   - Kernel versions and shortlogs
 *   npm run artifacts -- <series>     - Registered artifacts and their freshness
 *   npm run download -- <series> <url|catalog-id>
 *   npm run source -- <version>       - Kernel source tarball
 *   npm run build-kernel -- <dir>     - Run the build
 */

import { freshnessOf } from "./registry/freshness.js";
import { RegistryStore } from "./registry/store.js";
import type { FreshnessReport } from "./registry/types.js";
import { getRegistryPath, loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("main");

function main() {
  const config = loadConfig();
  logger.debug("Configuration loaded", { version: config.version });

  const registryPath = getRegistryPath();
  const store = RegistryStore.load(registryPath);

  console.log(`
Kernel Workbench v${config.version}

Registry:  ${registryPath}
Workspace: ${config.workspace.root}
Catalog:   ${config.workspace.catalog_path}
Tags:      ${config.network.tags_url}
`);

  if (store.size === 0) {
    console.log("No registered artifacts yet. Try: npm run download -- <series> <catalog-id>");
    return;
  }

  for (const series of store.series()) {
    const counts = new Map<FreshnessReport, number>();
    const records = store.allInSeries(series);
    for (const record of records) {
      const freshness = freshnessOf(record);
      counts.set(freshness, (counts.get(freshness) ?? 0) + 1);
    }
    const summary = [...counts].map(([freshness, count]) => `${count} ${freshness}`).join(", ");
    console.log(`  ${series.padEnd(8)} ${records.length} artifact(s): ${summary}`);
  }
}

try {
  main();
} catch (error) {
  logger.error("Failed to start", { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
}
