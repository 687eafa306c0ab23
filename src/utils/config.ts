import "dotenv/config";
import { readFileSync, existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { findPackageRoot } from "./paths.js";
import type { WorkbenchConfig } from "./types.js";

const DEFAULT_CONFIG_PATH = "./workbench.config.json";

const ConfigFileSchema = z.object({
  version: z.string().optional(),
  storage: z
    .object({
      data_dir: z.string().min(1),
      registry_file: z.string().min(1),
    })
    .partial()
    .optional(),
  workspace: z
    .object({
      root: z.string().min(1),
      series_dir_template: z.string().includes("{series}"),
      catalog_path: z.string().min(1),
    })
    .partial()
    .optional(),
  network: z
    .object({
      timeout_ms: z.number().int().positive(),
      user_agent: z.string().min(1),
      tags_url: z.string().url(),
      log_url: z.string().url(),
      tarball_base_url: z.string().url(),
    })
    .partial()
    .optional(),
  session: z
    .object({
      tick_interval_ms: z.number().int().positive(),
    })
    .partial()
    .optional(),
});

function defaultConfig(): WorkbenchConfig {
  const dataDir = join(homedir(), ".local", "share", "kernel-workbench");
  return {
    version: "0.1.0",
    storage: {
      data_dir: dataDir,
      registry_file: "artifact_registry.json",
    },
    workspace: {
      root: join(dataDir, "linux-tkg"),
      series_dir_template: "linux{series}-tkg-userpatches",
      catalog_path: join(findPackageRoot(), "data", "catalog.json"),
    },
    network: {
      timeout_ms: 30000,
      user_agent: "kernel-workbench/0.1",
      tags_url: "https://git.kernel.org/pub/scm/linux/kernel/git/stable/linux.git/refs/tags",
      log_url: "https://git.kernel.org/pub/scm/linux/kernel/git/stable/linux.git/log/",
      tarball_base_url: "https://cdn.kernel.org/pub/linux/kernel",
    },
    session: {
      tick_interval_ms: 100,
    },
  };
}

let cachedConfig: WorkbenchConfig | null = null;

/**
 * Loads the workbench configuration.
 * A missing file yields the defaults; present sections are merged over them.
 * Caches the config after first load.
 */
export function loadConfig(): WorkbenchConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = process.env.KWB_CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const defaults = defaultConfig();
  let config = defaults;

  if (existsSync(configPath)) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new Error(`Failed to parse configuration ${configPath}: ${error}`);
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new Error(`Invalid configuration ${configPath}: ${fields.join("; ")}`);
    }

    const file = parsed.data;
    config = {
      version: file.version ?? defaults.version,
      storage: { ...defaults.storage, ...file.storage },
      workspace: { ...defaults.workspace, ...file.workspace },
      network: { ...defaults.network, ...file.network },
      session: { ...defaults.session, ...file.session },
    };
  }

  // Apply environment variable overrides
  if (process.env.KWB_DATA_DIR) {
    config.storage.data_dir = process.env.KWB_DATA_DIR;
  }
  if (process.env.KWB_WORKSPACE) {
    config.workspace.root = process.env.KWB_WORKSPACE;
  }

  cachedConfig = config;
  return config;
}

/**
 * Reloads config from disk (useful for testing)
 */
export function reloadConfig(): WorkbenchConfig {
  cachedConfig = null;
  return loadConfig();
}

export function getStorageConfig() {
  return loadConfig().storage;
}

export function getWorkspaceConfig() {
  return loadConfig().workspace;
}

export function getNetworkConfig() {
  return loadConfig().network;
}

export function getSessionConfig() {
  return loadConfig().session;
}

/**
 * Full path of the registry file
 */
export function getRegistryPath(): string {
  const storage = getStorageConfig();
  return join(storage.data_dir, storage.registry_file);
}
