/**
 * Subprocess worker.
 *
 * stdout and stderr are split into lines and forwarded in the order they
 * arrive. The terminal message comes after both streams have closed:
 * `exit` when the process ran, `spawn-error` when it never started.
 */

import { createInterface } from "readline";
import type { ChildProcessWithoutNullStreams } from "child_process";
import type { ProcessSpawner, ProcessSpec } from "../../transport/process.js";
import { errorMessage } from "../../utils/errors.js";
import { buildLogger } from "../../utils/logger.js";
import type { Channel } from "../channel.js";
import type { ProcessMessage } from "../messages.js";

export type InputResult = { ok: true } | { ok: false; reason: string };

/**
 * Control surface of a child, handed back to the dispatcher's caller.
 *
 * Input and stop requests made before the child exists are held and applied
 * when it is attached; once the child has exited both are refused.
 */
export class ProcessControl {
  private child: ChildProcessWithoutNullStreams | null = null;
  private exited = false;
  private stopSignal: NodeJS.Signals | null = null;
  private heldInput: string[] = [];

  attach(child: ChildProcessWithoutNullStreams): void {
    this.child = child;
    if (this.stopSignal) {
      this.heldInput = [];
      child.kill(this.stopSignal);
      return;
    }
    for (const text of this.heldInput) {
      child.stdin.write(`${text}\n`);
    }
    this.heldInput = [];
  }

  detach(): void {
    this.child = null;
    this.exited = true;
    this.heldInput = [];
  }

  get running(): boolean {
    return this.child !== null;
  }

  get stoppedByRequest(): boolean {
    return this.stopSignal !== null;
  }

  /**
   * Write one line to the child's stdin
   */
  sendInput(text: string): InputResult {
    if (this.exited || this.stopSignal) {
      return { ok: false, reason: "Process stdin not available" };
    }
    if (!this.child) {
      this.heldInput.push(text);
      return { ok: true };
    }
    const stdin = this.child.stdin;
    if (!stdin.writable) {
      return { ok: false, reason: "Process stdin not available" };
    }
    stdin.write(`${text}\n`);
    return { ok: true };
  }

  /**
   * Terminate the child. Output after this point is not guaranteed.
   */
  stop(signal: NodeJS.Signals = "SIGTERM"): boolean {
    if (this.exited || this.stopSignal) return false;
    this.stopSignal = signal;
    if (!this.child) return true;
    return this.child.kill(signal);
  }
}

export function runSubprocess(
  spawner: ProcessSpawner,
  spec: ProcessSpec,
  control: ProcessControl,
  channel: Channel<ProcessMessage>
): Promise<void> {
  return new Promise((resolve) => {
    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawner(spec);
    } catch (error) {
      control.detach();
      channel.send({ type: "spawn-error", reason: errorMessage(error) });
      resolve();
      return;
    }

    let spawned = false;
    control.attach(child);

    child.once("spawn", () => {
      spawned = true;
      buildLogger.debug("Process started", { command: spec.command, pid: child.pid, cwd: spec.cwd });
    });

    child.on("error", (error) => {
      if (!spawned) {
        control.detach();
        channel.send({ type: "spawn-error", reason: `Failed to spawn ${spec.command}: ${error.message}` });
        resolve();
        return;
      }
      buildLogger.warn("Process error", { command: spec.command, error: error.message });
    });

    child.stdin.on("error", (error) => {
      buildLogger.warn("Process stdin closed", { command: spec.command, error: error.message });
    });

    for (const stream of [child.stdout, child.stderr]) {
      const lines = createInterface({ input: stream, crlfDelay: Infinity });
      lines.on("line", (text) => {
        channel.send({ type: "line", text });
      });
    }

    child.on("close", (code, signal) => {
      control.detach();
      if (!spawned) {
        // The "error" handler reports the spawn failure
        return;
      }
      channel.send({
        type: "exit",
        code: code ?? -1,
        signal,
        stoppedByRequest: control.stoppedByRequest,
      });
      buildLogger.debug("Process exited", { command: spec.command, code, signal });
      resolve();
    });
  });
}
