import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createSettingsProvider, loadSettings } from '../src/utils/config';
import { ConfigError } from '../src/utils/errors';

describe('loadSettings', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'httpprobe-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('falls back to defaults', () => {
    expect(loadSettings({ env: {}, cwd: dir })).toEqual({
      environment: 'dev',
      baseUrl: 'https://httpbin.org',
      logLevel: 'INFO',
      logDir: 'logs',
    });
  });

  test('returns a frozen object', () => {
    expect(Object.isFrozen(loadSettings({ env: {}, cwd: dir }))).toBe(true);
  });

  test('matches keys case-insensitively and upper-cases the log level', () => {
    const settings = loadSettings({
      env: { api_base_url: 'https://lower.test', Log_Level: 'debug', api_key: 'test-secret' },
      cwd: dir,
    });

    expect(settings.baseUrl).toBe('https://lower.test');
    expect(settings.logLevel).toBe('DEBUG');
    expect(settings.apiKey).toBe('test-secret');
  });

  test('accepts WARN as WARNING', () => {
    expect(loadSettings({ env: { LOG_LEVEL: 'warn' }, cwd: dir }).logLevel).toBe('WARNING');
  });

  test('treats an empty API key as absent', () => {
    const settings = loadSettings({ env: { API_KEY: '  ' }, cwd: dir });
    expect(settings.apiKey).toBeUndefined();
    expect('apiKey' in settings).toBe(false);
  });

  test('reads the .env file and lets the environment override it', () => {
    writeFileSync(join(dir, '.env'), 'ENV=staging\napi_base_url=https://file.test\nLOG_LEVEL=ERROR\n');

    const settings = loadSettings({ env: { ENV: 'prod' }, cwd: dir });

    expect(settings.environment).toBe('prod');
    expect(settings.baseUrl).toBe('https://file.test');
    expect(settings.logLevel).toBe('ERROR');
  });

  test('reads an explicit env file path', () => {
    const envFile = join(dir, 'custom.env');
    writeFileSync(envFile, 'LOG_DIR=/var/tmp/probe-logs\n');

    expect(loadSettings({ env: {}, envFile }).logDir).toBe('/var/tmp/probe-logs');
  });

  test('rejects a malformed base URL', () => {
    expect(() => loadSettings({ env: { API_BASE_URL: 'not a url' }, cwd: dir })).toThrow(ConfigError);
    expect(() => loadSettings({ env: { API_BASE_URL: 'not a url' }, cwd: dir })).toThrow(/^Invalid settings:/);
  });

  test('rejects an unknown log level', () => {
    const error = (() => {
      try {
        loadSettings({ env: { LOG_LEVEL: 'loud' }, cwd: dir });
      } catch (err) {
        return err;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: 'CONFIG_ERROR' });
    expect(String(error)).toContain('LOG_LEVEL');
  });
});

describe('createSettingsProvider', () => {
  test('returns the identical object on every call', () => {
    const dir = mkdtempSync(join(tmpdir(), 'httpprobe-config-'));
    const env: NodeJS.ProcessEnv = { ENV: 'first' };
    const getSettings = createSettingsProvider({ env, cwd: dir });

    const first = getSettings();
    env['ENV'] = 'second';
    const second = getSettings();

    expect(second).toBe(first);
    expect(second.environment).toBe('first');
    rmSync(dir, { recursive: true, force: true });
  });
});
