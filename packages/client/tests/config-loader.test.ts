/**
 * Config loader tests: precedence, env parsing, prefs files and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ConfigValidationError,
  DEFAULT_CLIENT_CONFIG,
  loadClientConfig,
  readEnvOverrides,
  readPrefsFile,
} from '../src/config/loader.js';

describe('Config Loader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chronokv-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writePrefs(content: unknown): Promise<string> {
    const file = path.join(tempDir, 'prefs.json');
    await fs.writeFile(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  describe('loadClientConfig', () => {
    it('returns the defaults when nothing overrides them', async () => {
      await expect(loadClientConfig({ env: {} })).resolves.toEqual(DEFAULT_CLIENT_CONFIG);
    });

    it('applies prefs file, then env, then explicit options', async () => {
      const prefs = await writePrefs({ host: 'prefs-host', port: 2000, username: 'prefs-user' });
      const config = await loadClientConfig({
        prefs,
        env: { CHRONOKV_PORT: '3000', CHRONOKV_USERNAME: 'env-user' },
        username: 'explicit-user',
      });
      expect(config.host).toBe('prefs-host');
      expect(config.port).toBe(3000);
      expect(config.username).toBe('explicit-user');
    });

    it('ignores explicit options left undefined', async () => {
      const config = await loadClientConfig({ env: { CHRONOKV_HOST: 'env-host' }, host: undefined });
      expect(config.host).toBe('env-host');
    });

    it('rejects an out-of-range port and names the path', async () => {
      try {
        await loadClientConfig({ env: {}, port: 70_000 });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigValidationError);
        if (err instanceof ConfigValidationError) {
          expect(err.code).toBe('CONFIG_INVALID');
          expect(err.issues.map((issue) => issue.path)).toEqual(['port']);
        }
      }
    });

    it('rejects an empty username', async () => {
      await expect(loadClientConfig({ env: { CHRONOKV_USERNAME: '' } })).rejects.toThrow(ConfigValidationError);
    });
  });

  describe('readEnvOverrides', () => {
    it('parses numbers and booleans', () => {
      expect(
        readEnvOverrides({
          CHRONOKV_PORT: '1818',
          CHRONOKV_TIMEOUT_MS: '500',
          CHRONOKV_DEBUG: 'yes',
          CHRONOKV_ENVIRONMENT: 'production',
          CHRONOKV_PASSWORD: 'test-secret',
        }),
      ).toEqual({ port: 1818, timeoutMs: 500, debug: true, environment: 'production', password: 'test-secret' });
    });

    it('skips values that do not parse', () => {
      expect(readEnvOverrides({ CHRONOKV_PORT: 'abc', CHRONOKV_DEBUG: 'maybe' })).toEqual({});
    });
  });

  describe('readPrefsFile', () => {
    it('reads a partial config', async () => {
      const prefs = await writePrefs({ environment: 'test', debug: true });
      await expect(readPrefsFile(prefs)).resolves.toEqual({ environment: 'test', debug: true });
    });

    it('rejects unknown settings', async () => {
      const prefs = await writePrefs({ hostname: 'typo' });
      await expect(readPrefsFile(prefs)).rejects.toThrow(/^Invalid prefs file/);
    });

    it('rejects malformed JSON', async () => {
      const prefs = await writePrefs('{ not json');
      await expect(readPrefsFile(prefs)).rejects.toThrow('is not valid JSON');
    });

    it('rejects a missing file', async () => {
      await expect(readPrefsFile(path.join(tempDir, 'missing.json'))).rejects.toThrow('Cannot read prefs file');
    });
  });
});
