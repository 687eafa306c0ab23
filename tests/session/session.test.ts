import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Dispatcher } from '../../src/operations/dispatcher.js';
import type { CatalogEntry } from '../../src/registry/catalog.js';
import { RegistryStore } from '../../src/registry/store.js';
import { runSession } from '../../src/session/loop.js';
import { WorkbenchSession } from '../../src/session/session.js';
import type { SessionEvent, TickResult } from '../../src/session/session.js';
import type { ProcessSpec } from '../../src/transport/process.js';
import { TransportError } from '../../src/utils/errors.js';
import type { NetworkConfig, WorkspaceConfig } from '../../src/utils/types.js';
import { FakeHttp } from '../helpers/fake-http.js';
import { makeRecord } from '../helpers/records.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
const X_URL = 'https://patches.test/6.13/x.patch';

const NETWORK: NetworkConfig = {
  timeout_ms: 1000,
  user_agent: 'test-agent',
  tags_url: 'https://git.test/tags',
  log_url: 'https://git.test/log/',
  tarball_base_url: 'https://cdn.test/kernel',
};

const CATALOG: CatalogEntry[] = [
  {
    id: 'tweak',
    name: 'Scheduler tweak',
    description: 'Test entry',
    url_template: 'https://patches.test/{series}/tweak.patch',
    filename_template: 'tweak-{series}.patch',
    supported_series: ['6.13'],
  },
];

function nodeScript(script: string, cwd: string): ProcessSpec {
  return { command: process.execPath, args: ['-e', script], cwd };
}

describe('WorkbenchSession', () => {
  let dir: string;
  let registryPath: string;
  let workspace: WorkspaceConfig;
  let http: FakeHttp;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kwb-session-'));
    registryPath = join(dir, 'data', 'artifact_registry.json');
    workspace = {
      root: join(dir, 'ws'),
      series_dir_template: 'linux{series}-tkg-userpatches',
      catalog_path: join(dir, 'unused-catalog.json'),
    };
    http = new FakeHttp();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function createSession(store = RegistryStore.load(registryPath)): WorkbenchSession {
    const dispatcher = new Dispatcher({ http, tagsUrl: NETWORK.tags_url, logUrl: NETWORK.log_url });
    return new WorkbenchSession({ store, dispatcher, workspace, network: NETWORK, catalog: CATALOG });
  }

  async function settle(session: WorkbenchSession): Promise<TickResult> {
    await session.whenIdle();
    return session.tick();
  }

  it('should do nothing on an idle tick', () => {
    expect(createSession().tick()).toEqual({ events: [], saved: false, saveError: null });
  });

  describe('downloads', () => {
    it('should register and persist a fresh download', async () => {
      http.serve(X_URL, { body: 'abc', etag: '"v1"' });
      const session = createSession();

      const id = session.requestDownload('6.13', X_URL);
      const result = await settle(session);

      const path = join(dir, 'ws', 'linux6.13-tkg-userpatches', 'x.patch');
      expect(result).toEqual({
        events: [{ type: 'download-complete', operationId: id, key: '6.13/x.patch', path, sha256: ABC_SHA256 }],
        saved: true,
        saveError: null,
      });
      expect(session.store.get('6.13', 'x.patch')).toMatchObject({
        source_url: X_URL,
        catalog_id: null,
        sha256: ABC_SHA256,
        etag: '"v1"',
        last_modified: null,
        freshness: 'up-to-date',
        check_error: null,
      });
      expect(RegistryStore.load(registryPath).get('6.13', 'x.patch')).toEqual(session.store.get('6.13', 'x.patch'));
      expect(session.openOperations).toBe(0);
    });

    it('should report failed downloads without touching the registry', async () => {
      const session = createSession();

      const id = session.requestDownload('6.13', X_URL);
      const result = await settle(session);

      expect(result.events).toEqual([
        { type: 'download-failed', operationId: id, url: X_URL, code: 'TRANSPORT.STATUS', reason: `HTTP 404 for ${X_URL}` },
      ]);
      expect(result.saved).toBe(false);
      expect(session.store.size).toBe(0);
      expect(existsSync(registryPath)).toBe(false);
    });

    it('should report a download the registry cannot hold and keep other records', async () => {
      http.serve(X_URL, { body: 'abc' });
      const session = createSession(new RegistryStore(registryPath, [makeRecord({ filename: 'kept.patch' })]));

      const id = session.requestDownload('', X_URL);
      const result = await settle(session);

      expect(result.events).toEqual([
        {
          type: 'download-failed',
          operationId: id,
          url: X_URL,
          code: 'REGISTRY.INVALID_RECORD',
          reason: expect.stringMatching(/^Invalid artifact record \/x\.patch: series: /),
        },
      ]);
      expect(result.saved).toBe(false);
      expect(session.store.all()).toEqual([makeRecord({ filename: 'kept.patch' })]);
    });

    it('should download catalog entries under their series file name', async () => {
      http.serve('https://patches.test/6.13/tweak.patch', { body: 'abc' });
      const session = createSession();

      session.requestCatalogDownload('6.13', 'tweak');
      await settle(session);

      expect(session.store.get('6.13', 'tweak-6.13.patch')).toMatchObject({
        source_url: 'https://patches.test/6.13/tweak.patch',
        catalog_id: 'tweak',
      });
    });

    it('should refuse unknown or unsupported catalog entries', () => {
      const session = createSession();

      expect(() => session.requestCatalogDownload('6.13', 'missing')).toThrow('Unknown catalog entry: missing');
      expect(() => session.requestCatalogDownload('6.12', 'tweak')).toThrow('Scheduler tweak is not available for 6.12');
      expect(session.openOperations).toBe(0);
    });

    it('should download source tarballs without registering them', async () => {
      http.serve('https://cdn.test/kernel/v6.x/linux-6.13.2.tar.xz', { body: 'abc' });
      const session = createSession();

      const id = session.requestSourceDownload('v6.13.2');
      const result = await settle(session);

      expect(result).toEqual({
        events: [
          {
            type: 'download-complete',
            operationId: id,
            key: null,
            path: join(dir, 'ws', 'sources', 'linux-6.13.2.tar.xz'),
            sha256: ABC_SHA256,
          },
        ],
        saved: false,
        saveError: null,
      });
      expect(session.store.size).toBe(0);
    });

    it('should track progress until the download is collected', async () => {
      http.serve(X_URL, { body: 'abcdefgh', chunkSize: 4 });
      const session = createSession();

      const id = session.requestDownload('6.13', X_URL);
      expect(session.progressOf(id)).toBeUndefined();

      await settle(session);
      expect(session.progressOf(id)).toBeUndefined();
      expect(session.store.get('6.13', 'x.patch')?.sha256).toHaveLength(64);
    });
  });

  describe('staleness', () => {
    it('should detect a changed remote', async () => {
      http.serve(X_URL, { body: 'abc', etag: '"v1"' });
      const session = createSession();
      session.requestDownload('6.13', X_URL);
      await settle(session);

      http.serve(X_URL, { body: 'abcd', etag: '"v2"' });
      const id = session.requestCheck('6.13', 'x.patch');
      const result = await settle(session);

      expect(result.events).toEqual([{ type: 'check-complete', operationId: id, key: '6.13/x.patch', result: 'stale' }]);
      expect(result.saved).toBe(true);
      expect(RegistryStore.load(registryPath).get('6.13', 'x.patch')?.freshness).toBe('stale');
    });

    it('should record check errors and keep validators', async () => {
      const store = new RegistryStore(registryPath, [makeRecord()]);
      http.serve(X_URL, { error: new TransportError('TRANSPORT.STATUS', `HTTP 503 for ${X_URL}`, 503) });
      const session = createSession(store);

      const id = session.requestCheck('6.13', 'x.patch');
      const result = await settle(session);

      expect(result.events).toEqual([
        { type: 'check-failed', operationId: id, key: '6.13/x.patch', reason: `HTTP 503 for ${X_URL}` },
      ]);
      expect(store.get('6.13', 'x.patch')).toMatchObject({
        freshness: 'check-error',
        check_error: `HTTP 503 for ${X_URL}`,
        etag: '"v1"',
      });
    });

    it('should refuse to check an unregistered artifact', () => {
      expect(() => createSession().requestCheck('6.13', 'nope.patch')).toThrow('No registered artifact 6.13/nope.patch');
    });

    it('should sweep only records with provenance', async () => {
      const store = new RegistryStore(registryPath, [
        makeRecord(),
        makeRecord({ filename: 'local.patch', source_url: null, etag: null, freshness: 'unknown' }),
        makeRecord({ series: '6.12', filename: 'other.patch', source_url: 'https://patches.test/6.12/other.patch' }),
      ]);
      http.serve(X_URL, { etag: '"v1"' });
      const session = createSession(store);

      const ids = session.requestSweep('6.13');
      const result = await settle(session);

      expect(ids).toHaveLength(1);
      expect(http.requests).toEqual([{ method: 'HEAD', url: X_URL }]);
      expect(result.events).toEqual([{ type: 'check-complete', operationId: ids[0], key: '6.13/x.patch', result: 'up-to-date' }]);
      expect(result.saved).toBe(false);
      expect(store.get('6.13', 'local.patch')?.freshness).toBe('unknown');
    });

    it('should let the later result win when a check races a re-download', async () => {
      const store = new RegistryStore(registryPath, [makeRecord()]);
      http.serve(X_URL, { body: 'abc', etag: '"v2"' });
      const session = createSession(store);

      session.requestCheck('6.13', 'x.patch');
      session.requestDownload('6.13', X_URL);
      await settle(session);

      expect(store.get('6.13', 'x.patch')).toMatchObject({ etag: '"v2"', freshness: 'up-to-date' });
    });

    it('should apply a check collected after the download on top of it', async () => {
      const store = new RegistryStore(registryPath, [makeRecord()]);
      http.serve(X_URL, { body: 'abc', etag: '"v2"' });
      const session = createSession(store);

      session.requestDownload('6.13', X_URL);
      session.requestCheck('6.13', 'x.patch');
      await settle(session);

      expect(store.get('6.13', 'x.patch')).toMatchObject({ etag: '"v2"', freshness: 'stale' });
    });
  });

  describe('local files', () => {
    it('should adopt a file placed by hand', async () => {
      const path = join(dir, 'mine.mypatch.disabled');
      writeFileSync(path, 'abc');
      const session = createSession();

      const id = session.requestAdopt('6.13', path);
      const result = await settle(session);

      expect(result.events).toEqual([{ type: 'adopted', operationId: id, key: '6.13/mine.mypatch', sha256: ABC_SHA256 }]);
      expect(session.store.get('6.13', 'mine.mypatch')).toMatchObject({
        source_url: null,
        freshness: 'unknown',
        sha256: ABC_SHA256,
      });
    });

    it('should report files that cannot be read', async () => {
      const path = join(dir, 'gone.patch');
      const session = createSession();

      const id = session.requestAdopt('6.13', path);
      const result = await settle(session);

      expect(result.events).toEqual([
        { type: 'adopt-failed', operationId: id, path, reason: expect.stringContaining('ENOENT') },
      ]);
    });
  });

  describe('persistence', () => {
    it('should keep changes in memory when saving fails and flush them later', async () => {
      writeFileSync(join(dir, 'data'), 'blocks the registry directory');
      http.serve(X_URL, { body: 'abc', etag: '"v1"' });
      const session = createSession(new RegistryStore(registryPath));

      session.requestDownload('6.13', X_URL);
      const result = await settle(session);

      expect(result.saved).toBe(false);
      expect(result.saveError).toMatchObject({ code: 'PERSISTENCE.WRITE', path: registryPath });
      expect(session.store.isDirty()).toBe(true);
      expect(session.store.get('6.13', 'x.patch')?.etag).toBe('"v1"');

      rmSync(join(dir, 'data'));
      expect(session.flush()).toBeNull();
      expect(session.store.isDirty()).toBe(false);
      expect(RegistryStore.load(registryPath).size).toBe(1);
    });

    it('should have nothing to flush when clean', () => {
      expect(createSession().flush()).toBeNull();
      expect(existsSync(registryPath)).toBe(false);
    });
  });

  describe('versions', () => {
    it('should load versions and a shortlog', async () => {
      http.serve(NETWORK.tags_url, {
        body: "<table><tr><td><a href='/t?h=v6.13.1'>v6.13.1</a></td><td></td><td>2025-02-01</td></tr></table>",
      });
      http.serve('https://git.test/log/?id=v6.13.1&id2=v6.13', {
        body: "<table class='list'><tr><td>1 day</td><td><a href='/c?id=abcdef0123456789'>Linux 6.13.1</a></td><td>Greg Example</td></tr></table>",
      });
      const session = createSession();

      const versionsId = session.requestVersionList();
      const shortlogId = session.requestShortlog('v6.13', 'v6.13.1');
      const result = await settle(session);

      expect(result.events).toEqual([
        { type: 'versions-loaded', operationId: versionsId, count: 1 },
        { type: 'shortlog-loaded', operationId: shortlogId, from: 'v6.13', to: 'v6.13.1', count: 1 },
      ]);
      expect(session.versions).toEqual([{ version: 'v6.13.1', date: '2025-02-01' }]);
      expect(session.shortlog).toEqual([{ hash: 'abcdef012345', subject: 'Linux 6.13.1', author: 'Greg Example' }]);
    });

    it('should report a failed version listing', async () => {
      const session = createSession();

      const id = session.requestVersionList();
      const result = await settle(session);

      expect(result.events).toEqual([
        { type: 'versions-failed', operationId: id, reason: `HTTP 404 for ${NETWORK.tags_url}` },
      ]);
      expect(session.versions).toEqual([]);
    });
  });

  describe('operations', () => {
    it('should discard the results of a dropped operation', async () => {
      http.serve(X_URL, { body: 'abc' });
      const session = createSession();

      const id = session.requestDownload('6.13', X_URL);
      expect(session.dropOperation(id)).toBe(true);
      expect(session.dropOperation(id)).toBe(false);

      const written = join(dir, 'ws', 'linux6.13-tkg-userpatches', 'x.patch');
      await vi.waitFor(() => expect(existsSync(written)).toBe(true));

      const result = await settle(session);
      expect(result.events).toEqual([]);
      expect(session.store.size).toBe(0);
      expect(session.isIdle).toBe(true);
    });
  });

  describe('builds', () => {
    it('should classify build output and summarise the exit', async () => {
      const session = createSession();
      const spec = nodeScript("console.log('==> Patching'); console.log('cc: warning: unused x'); console.log('done')", dir);

      const id = session.startBuild(spec);
      expect(session.buildState).toEqual({
        status: 'running',
        operationId: id,
        command: `${process.execPath} -e ${spec.args[1]}`,
      });

      const result = await settle(session);

      expect(result.events).toEqual([{ type: 'build-exited', operationId: id, code: 0, stoppedByRequest: false }]);
      expect(session.buildLog).toEqual([
        { text: `==> Running ${process.execPath} -e ${spec.args[1]}`, severity: 'stage' },
        { text: '==> Patching', severity: 'stage' },
        { text: 'cc: warning: unused x', severity: 'warning' },
        { text: 'done', severity: 'normal' },
        { text: '==> Build finished with exit code 0', severity: 'stage' },
      ]);
      expect(session.buildState).toEqual({ status: 'exited', operationId: id, code: 0, stoppedByRequest: false });
    });

    it('should forward input and echo it in the log', async () => {
      const session = createSession();
      session.startBuild(
        nodeScript("process.stdin.once('data', (d) => { console.log('got ' + d.toString().trim()); process.exit(0); })", dir)
      );

      await vi.waitFor(() => expect(session.sendBuildInput('y')).toEqual({ ok: true }));
      await settle(session);

      expect(session.buildLog.slice(1)).toEqual([
        { text: '> y', severity: 'input' },
        { text: 'got y', severity: 'normal' },
        { text: '==> Build finished with exit code 0', severity: 'stage' },
      ]);
    });

    it('should refuse input when no build is running', () => {
      expect(createSession().sendBuildInput('y')).toEqual({ ok: false, reason: 'No build running' });
    });

    it('should run one build at a time and stop it on request', async () => {
      const session = createSession();
      const id = session.startBuild(nodeScript("process.stdin.resume(); console.log('ready')", dir));

      expect(() => session.startBuild(nodeScript('', dir))).toThrow('A build is already running');

      expect(session.stopBuild()).toBe(true);
      expect(session.stopBuild()).toBe(false);
      const result = await settle(session);

      expect(result.events).toEqual([{ type: 'build-exited', operationId: id, code: -1, stoppedByRequest: true }]);
      expect(session.buildState).toEqual({ status: 'exited', operationId: id, code: -1, stoppedByRequest: true });
      expect(session.buildLog).toContainEqual({ text: '==> Stopping build', severity: 'stage' });
      expect(session.buildLog[session.buildLog.length - 1]).toEqual({
        text: '==> Build finished with exit code -1',
        severity: 'error',
      });
    });

    it('should report a build that cannot start', async () => {
      const session = createSession();

      const id = session.startBuild({ command: '/nonexistent/kwb-missing-tool', args: [], cwd: dir });
      const result = await settle(session);

      expect(result.events).toEqual([{ type: 'build-failed', operationId: id, reason: expect.stringMatching(/^Failed to spawn /) }]);
      expect(session.buildState).toMatchObject({ status: 'failed', operationId: id });
      expect(session.buildLog[session.buildLog.length - 1]).toMatchObject({ severity: 'error' });
      expect(session.stopBuild()).toBe(false);
    });
  });

  describe('runSession', () => {
    it('should tick until idle and report events', async () => {
      http.serve(X_URL, { body: 'abc', etag: '"v1"' });
      const session = createSession();
      const events: SessionEvent[] = [];

      session.requestDownload('6.13', X_URL);
      const ticks = await runSession(session, { intervalMs: 1, onEvent: (event) => events.push(event) });

      expect(ticks).toBeGreaterThanOrEqual(1);
      expect(events.map((e) => e.type)).toEqual(['download-complete']);
      expect(RegistryStore.load(registryPath).get('6.13', 'x.patch')?.freshness).toBe('up-to-date');
    });

    it('should stop on a custom condition', async () => {
      const session = createSession();
      let seen = 0;

      const ticks = await runSession(session, {
        intervalMs: 1,
        until: () => ++seen === 3,
      });

      expect(ticks).toBe(3);
    });
  });
});
