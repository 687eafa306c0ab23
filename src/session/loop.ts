/**
 * Tick loop for the command-line scripts
 */

import { setTimeout as sleep } from "timers/promises";
import { getSessionConfig } from "../utils/config.js";
import { sessionLogger } from "../utils/logger.js";
import type { SessionEvent, TickResult, WorkbenchSession } from "./session.js";

export interface RunSessionOptions {
  /** Stop condition checked after every tick. Defaults to "no open operations". */
  until?: (session: WorkbenchSession) => boolean;
  onEvent?: (event: SessionEvent) => void;
  onTick?: (result: TickResult, session: WorkbenchSession) => void;
  intervalMs?: number;
}

/**
 * Tick the session until the stop condition holds, then flush the registry.
 * Returns the number of ticks run.
 */
export async function runSession(session: WorkbenchSession, options: RunSessionOptions = {}): Promise<number> {
  const until = options.until ?? ((s: WorkbenchSession) => s.isIdle);
  const intervalMs = options.intervalMs ?? getSessionConfig().tick_interval_ms;
  let ticks = 0;

  for (;;) {
    const result = session.tick();
    ticks++;
    for (const event of result.events) {
      options.onEvent?.(event);
    }
    options.onTick?.(result, session);
    if (until(session)) break;
    await sleep(intervalMs);
  }

  const flushError = session.flush();
  if (flushError) {
    sessionLogger.error("Registry changes could not be saved", { path: flushError.path, error: flushError.message });
    throw flushError;
  }
  return ticks;
}
