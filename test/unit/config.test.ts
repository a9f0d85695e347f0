import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../../src/lib/config';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'snsync-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, contents: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, typeof contents === 'string' ? contents : JSON.stringify(contents));
    return path;
  }

  it('falls back to defaults', () => {
    const config = loadConfig({ env: {}, searchPaths: [] });

    expect(config.api).toEqual({
      token: '',
      url: 'https://storj.cloud/api/v1',
      timeout: 30,
      sessionMode: 'per-call'
    });
    expect(config.discovery.commonPorts).toEqual([14000, 14001, 14002, 14003, 14004, 14005]);
    expect(config.discovery.portRange).toEqual([14000, 14010]);
    expect(config.sync).toEqual({ interval: 300, batchSize: 10, probeTimeout: 10, sessionMode: 'shared' });
    expect(config.logging).toEqual({ level: 'info', file: '' });
  });

  it('reads settings from the environment', () => {
    const config = loadConfig({
      env: {
        SNSYNC_API_TOKEN: 'test-token',
        SNSYNC_SYNC_INTERVAL: '60',
        SNSYNC_FROM_DOCKER: 'false',
        SNSYNC_COMMON_PORTS: '14100,14101'
      },
      searchPaths: []
    });

    expect(config.api.token).toBe('test-token');
    expect(config.sync.interval).toBe(60);
    expect(config.discovery.fromDocker).toBe(false);
    expect(config.discovery.commonPorts).toEqual([14100, 14101]);
  });

  it('uses the first config file that exists', () => {
    const second = writeConfig('second.json', { sync: { interval: 120 } });
    const first = writeConfig('first.json', { sync: { interval: 90 } });

    const config = loadConfig({ env: {}, searchPaths: [join(dir, 'missing.json'), first, second] });

    expect(config.sync.interval).toBe(90);
  });

  it('lets cli overrides win over the file and the environment', () => {
    const path = writeConfig('config.json', { api: { token: 'file-token', url: 'https://file.test/api' } });

    const config = loadConfig({
      configPath: path,
      env: { SNSYNC_API_TOKEN: 'env-token', SNSYNC_LOG_LEVEL: 'warn' },
      overrides: { token: 'flag-token', logLevel: 'debug', dockerHost: 'tcp://10.0.0.5:2375' }
    });

    expect(config.api.token).toBe('flag-token');
    expect(config.api.url).toBe('https://file.test/api');
    expect(config.logging.level).toBe('debug');
    expect(config.discovery.dockerHost).toBe('tcp://10.0.0.5:2375');
  });

  it('fails on a missing explicit path', () => {
    const path = join(dir, 'nope.json');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(`config file not found: ${path}`);
  });

  it('fails on a file that is not json', () => {
    const path = writeConfig('broken.json', '{ not json');
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow(`invalid config file ${path}`);
  });

  it('rejects unknown keys and bad values', () => {
    const unknown = writeConfig('unknown.json', { sync: { intervall: 60 } });
    const badMode = writeConfig('mode.json', { sync: { sessionMode: 'pooled' } });

    expect(() => loadConfig({ configPath: unknown, env: {} })).toThrow();
    expect(() => loadConfig({ configPath: badMode, env: {} })).toThrow();
  });

  it('rejects zero for intervals, batch sizes and timeouts', () => {
    const interval = writeConfig('interval.json', { sync: { interval: 0 } });

    expect(() => loadConfig({ configPath: interval, env: {} })).toThrow('sync.interval: must be a positive integer');
    expect(() => loadConfig({ env: { SNSYNC_BATCH_SIZE: '0' }, searchPaths: [] }))
      .toThrow('sync.batchSize: must be a positive integer');
    expect(() => loadConfig({ env: { SNSYNC_PROBE_TIMEOUT: 'soon' }, searchPaths: [] }))
      .toThrow('sync.probeTimeout: must be a positive integer');
  });

  it('requires a two element port range', () => {
    const path = writeConfig('range.json', { discovery: { portRange: [14000] } });
    expect(() => loadConfig({ configPath: path, env: {} })).toThrow('discovery.portRange must be [start, end]');
  });
});
