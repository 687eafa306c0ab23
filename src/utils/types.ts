// =============================================================================
// Configuration
// =============================================================================

export interface StorageConfig {
  data_dir: string;           // Directory holding the artifact registry
  registry_file: string;      // Registry file name inside data_dir
}

export interface WorkspaceConfig {
  root: string;               // Build tree the artifacts are placed into
  series_dir_template: string; // Per-series artifact directory, {series} placeholder
  catalog_path: string;       // Curated artifact source list
}

export interface NetworkConfig {
  timeout_ms: number;
  user_agent: string;
  tags_url: string;           // Stable tag listing page
  log_url: string;            // Commit log page, queried with id/id2
  tarball_base_url: string;   // Source tarball mirror
}

export interface SessionConfig {
  tick_interval_ms: number;
}

export interface WorkbenchConfig {
  version: string;
  storage: StorageConfig;
  workspace: WorkspaceConfig;
  network: NetworkConfig;
  session: SessionConfig;
}
