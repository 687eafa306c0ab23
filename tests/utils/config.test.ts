import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getRegistryPath, loadConfig, reloadConfig } from '../../src/utils/config.js';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kwb-config-'));
    vi.stubEnv('KWB_CONFIG_PATH', join(dir, 'workbench.config.json'));
    vi.stubEnv('KWB_DATA_DIR', '');
    vi.stubEnv('KWB_WORKSPACE', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    reloadConfig();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should use defaults when the file is missing', () => {
    const config = reloadConfig();

    expect(config.storage.registry_file).toBe('artifact_registry.json');
    expect(config.workspace.series_dir_template).toBe('linux{series}-tkg-userpatches');
    expect(config.session.tick_interval_ms).toBe(100);
  });

  it('should merge file sections over the defaults', () => {
    writeFileSync(
      join(dir, 'workbench.config.json'),
      JSON.stringify({ storage: { data_dir: '/srv/kwb' }, network: { timeout_ms: 5000 } })
    );

    const config = reloadConfig();

    expect(config.storage).toEqual({ data_dir: '/srv/kwb', registry_file: 'artifact_registry.json' });
    expect(config.network.timeout_ms).toBe(5000);
    expect(config.network.user_agent).toBe('kernel-workbench/0.1');
    expect(getRegistryPath()).toBe('/srv/kwb/artifact_registry.json');
  });

  it('should let the environment override directories', () => {
    vi.stubEnv('KWB_DATA_DIR', '/env/data');
    vi.stubEnv('KWB_WORKSPACE', '/env/ws');

    const config = reloadConfig();

    expect(config.storage.data_dir).toBe('/env/data');
    expect(config.workspace.root).toBe('/env/ws');
  });

  it('should name the fields of an invalid file', () => {
    writeFileSync(join(dir, 'workbench.config.json'), JSON.stringify({ network: { timeout_ms: -1 } }));

    expect(() => reloadConfig()).toThrow(/^Invalid configuration .*: network\.timeout_ms: /);
  });

  it('should cache the loaded config', () => {
    expect(loadConfig()).toBe(loadConfig());
  });
});
