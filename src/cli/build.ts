#!/usr/bin/env tsx

/**
 * Build CLI
 *
 * Runs the kernel build in a work directory, printing classified output.
 * Lines typed on the terminal are forwarded to the build; Ctrl+C stops it.
 *
 * Usage: npm run build-kernel -- <work-dir>
 */

import { createInterface } from "readline";
import { resolve } from "path";
import { resolveBuildCommand } from "../kconfig/index.js";
import type { LogLine, Severity } from "../logs/index.js";
import { runSession } from "../session/index.js";
import { errorMessage } from "../utils/errors.js";
import { fail, openSession } from "./shared.js";

const COLORS: Record<Severity, string> = {
  stage: "\x1b[1;36m",
  error: "\x1b[31m",
  warning: "\x1b[33m",
  normal: "",
  input: "\x1b[2m",
};
const RESET = "\x1b[0m";

function render(line: LogLine): string {
  const color = COLORS[line.severity];
  return color ? `${color}${line.text}${RESET}` : line.text;
}

async function main() {
  const workDirArg = process.argv[2];
  if (!workDirArg) {
    fail("Usage: npm run build-kernel -- <work-dir>");
  }

  const workDir = resolve(workDirArg);
  const spec = await resolveBuildCommand(workDir);
  const session = openSession();
  session.startBuild(spec);

  const input = createInterface({ input: process.stdin });
  input.on("line", (text) => {
    const result = session.sendBuildInput(text);
    if (!result.ok) {
      console.log(`❌ ${result.reason}`);
    }
  });
  process.on("SIGINT", () => {
    session.stopBuild();
  });

  let printed = 0;
  try {
    await runSession(session, {
      until: (s) => s.buildState.status !== "running",
      onTick: (_result, s) => {
        const lines = s.buildLog;
        for (; printed < lines.length; printed++) {
          console.log(render(lines[printed]));
        }
      },
    });
  } finally {
    input.close();
  }

  const state = session.buildState;
  process.exit(state.status === "exited" ? state.code : 1);
}

main().catch((error) => {
  console.error("Error:", errorMessage(error));
  process.exit(1);
});
