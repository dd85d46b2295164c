import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigStore } from '../../src/config.js';
import { ConfigKeyError, ConfigLoadError, PathTypeError } from '../../src/errors.js';
import { Logger } from '../../src/observability/logger.js';

describe('ConfigStore.fromFile', () => {
  let tmpDir: string;
  let logLines: string[];
  let logger: Logger;

  beforeEach(() => {
    tmpDir = join(tmpdir(), `nestconf-test-store-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tmpDir, { recursive: true });
    logLines = [];
    logger = new Logger({ output: { write: (s: string) => logLines.push(s) } });
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const fullPath = join(tmpDir, name);
    writeFileSync(fullPath, content, 'utf-8');
    return fullPath;
  }

  it('layers a user file over a defaults file', () => {
    const values = writeConfig('app.yaml', `
db:
  host: localhost
workers:
  - name: mailer
`);
    const defaults = writeConfig('defaults.yaml', `
db:
  host: example.com
  port: 5432
workers:
  - name: indexer
  - name: cleaner
log_level: info
`);
    const cfg = ConfigStore.fromFile(values, defaults, { logger });

    expect(cfg.get('db.host')).toBe('localhost');
    expect(cfg.get('db.port')).toBe(5432);
    expect(cfg.get('workers.0.name')).toBe('mailer');
    expect(cfg.has('workers.1')).toBe(true);
    expect(cfg.get('log_level')).toBe('info');
    expect(cfg.toMapping()).toEqual({
      db: { host: 'localhost', port: 5432 },
      workers: [{ name: 'mailer' }],
      log_level: 'info',
    });
    expect(logLines).toHaveLength(4);
  });

  it('loads without a defaults file', () => {
    const file = writeConfig('app.json', '{"name": "demo"}');
    const cfg = ConfigStore.fromFile(file, null, { logger });
    expect(cfg.get('name')).toBe('demo');
    expect(cfg.defaults).toEqual({});
    expect(() => cfg.get('version')).toThrow(ConfigKeyError);
  });

  it('passes the delimiter through', () => {
    const file = writeConfig('app.yaml', 'hosts:\n  api.internal: 10.0.0.1\n');
    const cfg = ConfigStore.fromFile(file, undefined, { logger, delimiter: '/' });
    expect(cfg.get('hosts/api.internal')).toBe('10.0.0.1');
  });

  it('surfaces ConfigLoadError from the values file', () => {
    expect(() => ConfigStore.fromFile(join(tmpDir, 'missing.yaml'), null, { logger })).toThrow(ConfigLoadError);
  });

  it('surfaces ConfigLoadError from the defaults file', () => {
    const file = writeConfig('app.yaml', 'a: 1\n');
    const defaults = writeConfig('defaults.yaml', 'a: [1\n');
    try {
      ConfigStore.fromFile(file, defaults, { logger });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigLoadError);
      expect((e as ConfigLoadError).reason).toBe('parse_failed');
      expect((e as ConfigLoadError).filePath).toBe(defaults);
    }
  });

  it('reports an empty YAML section as a type mismatch', () => {
    const file = writeConfig('app.yaml', 'db:\n');
    const defaults = writeConfig('defaults.yaml', 'db:\n  port: 5432\n');
    const cfg = ConfigStore.fromFile(file, defaults, { logger });
    expect(cfg.get('db')).toBeNull();
    expect(() => cfg.get('db.port')).toThrow(PathTypeError);
  });
});
