import { existsSync, readdirSync, renameSync, statSync, unlinkSync } from "fs";
import { basename, dirname, join } from "path";
import { getWorkspaceConfig } from "../utils/config.js";

const ENABLED_SUFFIXES = [".patch", ".mypatch"];
const DISABLED_SUFFIX = ".disabled";

export interface ArtifactFile {
  name: string;
  path: string;
  enabled: boolean;
}

/**
 * Directory the toolchain reads a series' artifacts from
 */
export function seriesArtifactDir(series: string, workspace = getWorkspaceConfig()): string {
  return join(workspace.root, workspace.series_dir_template.replaceAll("{series}", series));
}

function classify(name: string): boolean | null {
  if (ENABLED_SUFFIXES.some((suffix) => name.endsWith(suffix))) return true;
  if (ENABLED_SUFFIXES.some((suffix) => name.endsWith(suffix + DISABLED_SUFFIX))) return false;
  return null;
}

/**
 * Artifact files in a directory, sorted by name. A missing directory is empty.
 */
export function listArtifactFiles(dir: string): ArtifactFile[] {
  if (!existsSync(dir)) {
    return [];
  }

  const files: ArtifactFile[] = [];
  for (const name of readdirSync(dir)) {
    const enabled = classify(name);
    const path = join(dir, name);
    if (enabled === null || !statSync(path).isFile()) continue;
    files.push({ name, path, enabled });
  }

  return files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Enable or disable an artifact by adding or removing the ".disabled" suffix
 */
export function toggleArtifactFile(file: ArtifactFile): ArtifactFile {
  const newPath = file.enabled
    ? file.path + DISABLED_SUFFIX
    : file.path.slice(0, -DISABLED_SUFFIX.length);

  renameSync(file.path, newPath);
  return { name: basename(newPath), path: newPath, enabled: !file.enabled };
}

export function deleteArtifactFile(file: ArtifactFile): void {
  unlinkSync(file.path);
}

/**
 * Name the registry knows the file by: the enabled name
 */
export function registeredName(file: ArtifactFile): string {
  return file.enabled ? file.name : file.name.slice(0, -DISABLED_SUFFIX.length);
}

export function artifactFileAt(path: string): ArtifactFile | null {
  const name = basename(path);
  const enabled = classify(name);
  if (enabled === null) return null;
  return { name, path: join(dirname(path), name), enabled };
}
