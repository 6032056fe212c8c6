/**
 * Unit tests for config loading
 *
 * Tests merging config.yaml over defaults and schema validation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { getCharsetsConfig, getLogConfig, initConfig, loadConfigFrom } from '../../src/app/config.js';
import { resolvePackagePath } from '../../src/app/paths.js';
import { testConfig } from '../helpers/test-config.js';

const DEFAULTS = `
log:
  level: info
  target: stdout
  filePath: test.log
  pretty: true
charsets:
  default: UTF-8
`;

let tmpDir: string;
let defaultsPath: string;
let userPath: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'config-test-'));
  defaultsPath = join(tmpDir, 'config.defaults.yaml');
  userPath = join(tmpDir, 'config.yaml');
  writeFileSync(defaultsPath, DEFAULTS);
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  vi.restoreAllMocks();
  initConfig(testConfig);
});

describe('loadConfigFrom', () => {
  it('uses defaults when config.yaml does not exist', () => {
    expect(loadConfigFrom(defaultsPath, userPath)).toEqual({
      log: { level: 'info', target: 'stdout', filePath: 'test.log', pretty: true },
      charsets: { default: 'UTF-8' },
    });
  });

  it('treats an empty config.yaml as no overrides', () => {
    writeFileSync(userPath, '');
    expect(loadConfigFrom(defaultsPath, userPath).log.level).toBe('info');
  });

  it('deep-merges user values over defaults', () => {
    writeFileSync(userPath, 'log:\n  level: debug\ncharsets:\n  default: latin1\n');
    const config = loadConfigFrom(defaultsPath, userPath);
    expect(config.log).toEqual({ level: 'debug', target: 'stdout', filePath: 'test.log', pretty: true });
    expect(config.charsets.default).toBe('latin1');
  });

  it('rejects invalid values and reports each issue', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(userPath, 'log:\n  level: loud\n');
    expect(() => loadConfigFrom(defaultsPath, userPath)).toThrow(
      'Invalid configuration. Please check config.yaml and config.defaults.yaml',
    );
    expect(consoleError).toHaveBeenCalledWith('Configuration validation failed:');
  });

  it('rejects a config.yaml that is not a mapping', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(userPath, '- just\n- a list\n');
    expect(() => loadConfigFrom(defaultsPath, userPath)).toThrow('Invalid configuration');
  });

  it('loads the bundled config.defaults.yaml', () => {
    const config = loadConfigFrom(resolvePackagePath('config.defaults.yaml'), join(tmpDir, 'missing.yaml'));
    expect(config.log.level).toBe('info');
    expect(config.charsets.default).toBe('UTF-8');
  });
});

describe('initConfig', () => {
  it('installs the given config for the getters', () => {
    initConfig({ ...testConfig, charsets: { default: 'ascii' } });
    expect(getCharsetsConfig()).toEqual({ default: 'ascii' });
    expect(getLogConfig().level).toBe('silent');
  });
});

describe('project config on first use', () => {
  // Point the package root at tmpDir, then load fresh module instances
  async function loadFresh() {
    vi.resetModules();
    vi.doMock('../../src/app/paths.js', () => ({
      DEFAULTS_FILE: 'config.defaults.yaml',
      PACKAGE_ROOT: tmpDir,
      findPackageRoot: () => tmpDir,
      resolvePackagePath: (path: string) => join(tmpDir, path),
    }));
    const config = await import('../../src/app/config.js');
    const backport = await import('../../src/shims/backport.js');
    return { config, backport };
  }

  afterEach(() => {
    vi.doUnmock('../../src/app/paths.js');
    vi.resetModules();
  });

  it('loads config.defaults.yaml and config.yaml when first read', async () => {
    writeFileSync(userPath, 'charsets:\n  default: ascii\n');
    const { config } = await loadFresh();
    expect(config.getLogConfig()).toEqual({ level: 'info', target: 'stdout', filePath: 'test.log', pretty: true });
    expect(config.getCharsetsConfig()).toEqual({ default: 'ascii' });
  });

  it('a broken config.yaml does not affect encoding or decoding', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(userPath, 'log:\n  level: loud\n');
    const { config, backport } = await loadFresh();

    expect(Array.from(backport.getBytes('a', backport.ISO_8859_1))).toEqual([0x61]);
    expect(Array.from(backport.getBytes('€', backport.ISO_8859_1))).toEqual([0x3f]);
    expect(Array.from(backport.getBytes('x', 'latin1'))).toEqual([0x78]);
    expect(backport.getString([0xff], 'UTF-8')).toBe('\uFFFD');
    expect(() => config.getLogConfig()).toThrow('Invalid configuration');
  });
});
