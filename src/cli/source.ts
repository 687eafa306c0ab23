#!/usr/bin/env tsx

/**
 * Source CLI
 *
 * Downloads a kernel source tarball into the workspace.
 *
 * Usage: npm run source -- v6.13.2 [dest-dir]
 */

import { runSession } from "../session/index.js";
import { errorMessage } from "../utils/errors.js";
import { buildProgressBar, describeEvent, fail, formatBytes, openSession } from "./shared.js";

async function main() {
  const [version, destDir] = process.argv.slice(2);
  if (!version) {
    fail("Usage: npm run source -- <version> [dest-dir]");
  }

  const session = openSession();
  const id = destDir ? session.requestSourceDownload(version, destDir) : session.requestSourceDownload(version);

  let lastPercent = -1;
  await runSession(session, {
    onEvent: (event) => console.log(`\n${describeEvent(event)}`),
    onTick: (_result, s) => {
      const progress = s.progressOf(id);
      if (!progress?.total) return;
      const percent = Math.floor((progress.received / progress.total) * 100);
      if (percent === lastPercent) return;
      lastPercent = percent;
      process.stdout.write(`\r  ${buildProgressBar(percent)} ${percent}% of ${formatBytes(progress.total)}`);
    },
  });
}

main().catch((error) => {
  console.error("Error:", errorMessage(error));
  process.exit(1);
});
