import { spawn, type ChildProcessWithoutNullStreams } from "child_process";

export interface ProcessSpec {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
}

export type ProcessSpawner = (spec: ProcessSpec) => ChildProcessWithoutNullStreams;

/**
 * Launches a child with all three standard streams piped.
 */
export const spawnPiped: ProcessSpawner = (spec) =>
  spawn(spec.command, spec.args, {
    cwd: spec.cwd,
    env: spec.env ? { ...process.env, ...spec.env } : process.env,
    stdio: "pipe",
  });
