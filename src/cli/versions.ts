#!/usr/bin/env tsx

/**
 * Versions CLI
 *
 * Lists the stable kernel versions and, for one version, the commits since
 * the previous release in its series.
 *
 * Usage:
 *   npm run versions                # Newest 25 versions
 *   npm run versions -- v6.13.2     # Shortlog v6.13.1..v6.13.2
 *   npm run versions -- --all       # Every version
 */

import { previousVersion } from "../operations/index.js";
import { runSession } from "../session/index.js";
import { errorMessage } from "../utils/errors.js";
import { describeEvent, fail, openSession } from "./shared.js";

const LIST_LIMIT = 25;

function parseArgs(): { version?: string; all: boolean } {
  const args = process.argv.slice(2);
  let version: string | undefined;
  let all = false;

  for (const arg of args) {
    if (arg === "--all") {
      all = true;
    } else if (!arg.startsWith("--") && !version) {
      version = arg.startsWith("v") ? arg : `v${arg}`;
    }
  }

  return { version, all };
}

async function main() {
  const { version, all } = parseArgs();
  const session = openSession();

  session.requestVersionList();
  await runSession(session, { onEvent: (event) => console.log(describeEvent(event)) });

  const versions = session.versions;
  if (versions.length === 0) {
    fail("No versions available");
  }

  if (!version) {
    console.log();
    const shown = all ? versions : versions.slice(0, LIST_LIMIT);
    for (const info of shown) {
      console.log(`  ${info.version.padEnd(14)} ${info.date ?? ""}`);
    }
    if (shown.length < versions.length) {
      console.log(`  … ${versions.length - shown.length} more (--all)`);
    }
    return;
  }

  const previous = previousVersion(version, versions);
  if (!previous) {
    fail(`No earlier release found for ${version}`);
  }

  session.requestShortlog(previous, version);
  await runSession(session, { onEvent: (event) => console.log(describeEvent(event)) });

  console.log();
  for (const commit of session.shortlog) {
    console.log(`  ${commit.hash}  ${commit.subject}  (${commit.author})`);
  }
}

main().catch((error) => {
  console.error("Error:", errorMessage(error));
  process.exit(1);
});
