/**
 * Build configuration file (customization.cfg)
 *
 * Shell-style `_option="value"` assignments. Only assignment lines are ever
 * rewritten; everything else is kept as read.
 */

import { existsSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import { join } from "path";
import type { ProcessSpec } from "../transport/process.js";
import { buildLogger } from "../utils/logger.js";

export type ConfigLine =
  | { kind: "empty"; raw: string }
  | { kind: "comment"; raw: string }
  | { kind: "assignment"; key: string; value: string; raw: string };

const ASSIGNMENT = /^(_\w+)\s*=\s*["']?([^"'#\n]*)["']?/;

export const CONFIG_FILE_NAME = "customization.cfg";

export function parseConfigLine(raw: string): ConfigLine {
  const trimmed = raw.trim();
  if (trimmed === "") return { kind: "empty", raw };
  if (trimmed.startsWith("#")) return { kind: "comment", raw };

  const match = ASSIGNMENT.exec(raw);
  if (!match) return { kind: "comment", raw };
  return { kind: "assignment", key: match[1], value: match[2].trim(), raw };
}

export class ConfigFile {
  private lines: ConfigLine[];
  readonly path: string | null;

  private constructor(lines: ConfigLine[], path: string | null) {
    this.lines = lines;
    this.path = path;
  }

  static parse(text: string, path: string | null = null): ConfigFile {
    const body = text.endsWith("\n") ? text.slice(0, -1) : text;
    const lines = body === "" ? [] : body.split("\n").map(parseConfigLine);
    return new ConfigFile(lines, path);
  }

  static async load(path: string): Promise<ConfigFile> {
    const text = await readFile(path, "utf-8");
    return ConfigFile.parse(text, path);
  }

  get(key: string): string | undefined {
    for (const line of this.lines) {
      if (line.kind === "assignment" && line.key === key) return line.value;
    }
    return undefined;
  }

  set(key: string, value: string): void {
    const raw = `${key}="${value}"`;
    const index = this.lines.findIndex((line) => line.kind === "assignment" && line.key === key);
    const updated: ConfigLine = { kind: "assignment", key, value, raw };
    if (index === -1) {
      this.lines.push(updated);
    } else {
      this.lines[index] = updated;
    }
  }

  /**
   * All options; a repeated key keeps its last value
   */
  entries(): Map<string, string> {
    const options = new Map<string, string>();
    for (const line of this.lines) {
      if (line.kind === "assignment") options.set(line.key, line.value);
    }
    return options;
  }

  serialize(): string {
    return this.lines.map((line) => line.raw).join("\n") + "\n";
  }

  async save(path: string | null = this.path): Promise<void> {
    if (path === null) {
      throw new Error("Config file has no path to save to");
    }
    await writeFile(path, this.serialize(), "utf-8");
    buildLogger.debug("Saved build configuration", { path, options: this.entries().size });
  }
}

/**
 * Arch installs go through makepkg; everything else uses the install script
 */
export async function resolveBuildCommand(workDir: string): Promise<ProcessSpec> {
  const configPath = join(workDir, CONFIG_FILE_NAME);
  let distro: string | undefined;
  if (existsSync(configPath)) {
    const config = await ConfigFile.load(configPath);
    distro = config.get("_distro");
  }

  if (distro === "Arch") {
    return { command: "makepkg", args: ["-si"], cwd: workDir };
  }
  return { command: "./install.sh", args: ["install"], cwd: workDir };
}
