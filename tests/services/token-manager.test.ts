import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TokenManager } from '../../src/services/token-manager.js';
import { MissingCredentialsError } from '../../src/lib/errors.js';
import { loggers } from '../../src/lib/logger.js';
import type { AuthSettings } from '../../src/types/auth.js';
import { FakeClock, START_TIME, instantSleep } from '../helpers/fake-clock.js';
import { httpError } from '../helpers/fetch-error.js';
import { getFreePort, isPortFree } from '../helpers/ports.js';

vi.mock('ofetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ofetch')>();
  return { ...actual, ofetch: vi.fn() };
});

import { ofetch } from 'ofetch';

const BASE_URL = 'https://developer.api.autodesk.com';

describe('TokenManager', () => {
  let dir: string;
  let port: number;
  let clock: FakeClock;
  let settings: AuthSettings;
  let openBrowser: Mock<[string], Promise<void>>;
  let manager: TokenManager;

  function readCacheFile(): unknown {
    return JSON.parse(fs.readFileSync(settings.tokenCacheFile, 'utf-8'));
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(loggers.auth, 'warn').mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'accbi-manager-'));
    port = await getFreePort();
    clock = new FakeClock();
    settings = {
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
      baseUrl: BASE_URL,
      tokenEndpoint: `${BASE_URL}/authentication/v2/token`,
      authorizeEndpoint: `${BASE_URL}/authentication/v2/authorize`,
      twoLeggedScope: 'account:read data:read',
      threeLeggedScope: 'data:read',
      callbackHost: '127.0.0.1',
      callbackPort: port,
      redirectUri: `http://localhost:${port}/`,
      tokenCacheFile: path.join(dir, 'token_cache.json'),
      strategy: 'interactive',
    };
    // 模擬使用者在瀏覽器中完成授權，provider 重導回 listener
    openBrowser = vi.fn<[string], Promise<void>>(async () => {
      await fetch(`http://127.0.0.1:${port}/?code=abc123`);
    });
    manager = new TokenManager(settings, {
      clock,
      openBrowser,
      prompt: () => {},
      sleep: instantSleep(clock),
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should require client credentials', () => {
    expect(() => new TokenManager({ ...settings, clientSecret: '' })).toThrow(MissingCredentialsError);
  });

  describe('3-legged lifecycle', () => {
    it('should authorize once, reuse the cache, and re-authorize after expiry', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'first-token', expires_in: 3600, token_type: 'Bearer' })
        .mockResolvedValueOnce({ access_token: 'second-token', expires_in: 3600, token_type: 'Bearer' });

      // 第一次：沒有快取，走完整授權流程
      await expect(manager.getThreeLeggedToken()).resolves.toBe('first-token');

      expect(readCacheFile()).toEqual({
        access_token: 'first-token',
        expires_at: (clock.now() + 3540 * 1000) / 1000,
      });
      expect(await isPortFree(port)).toBe(true);
      const exchangeBody = new URLSearchParams(String(vi.mocked(ofetch).mock.calls[0][1]?.body));
      expect(exchangeBody.get('code')).toBe('abc123');

      // 第二次：直接讀快取，不連網
      await expect(manager.getThreeLeggedToken()).resolves.toBe('first-token');
      expect(ofetch).toHaveBeenCalledTimes(1);
      expect(openBrowser).toHaveBeenCalledTimes(1);

      // 快取過期：重新授權
      fs.writeFileSync(
        settings.tokenCacheFile,
        JSON.stringify({ access_token: 'first-token', expires_at: clock.now() / 1000 - 1 })
      );

      await expect(manager.getThreeLeggedToken()).resolves.toBe('second-token');
      expect(ofetch).toHaveBeenCalledTimes(2);
      expect(openBrowser).toHaveBeenCalledTimes(2);
    });

    it('should delete the cache on invalidation', async () => {
      fs.writeFileSync(
        settings.tokenCacheFile,
        JSON.stringify({ access_token: 'cached-token', expires_at: START_TIME / 1000 + 3600 })
      );

      expect(manager.invalidateThreeLeggedToken()).toBe(true);

      expect(fs.existsSync(settings.tokenCacheFile)).toBe(false);
      expect(loggers.auth.warn).toHaveBeenCalledWith('3-legged token invalidated', {
        file: settings.tokenCacheFile,
        deleted: true,
      });
      expect(manager.invalidateThreeLeggedToken()).toBe(false);
    });
  });

  describe('2-legged token', () => {
    it('should keep the 2-legged cache independent of the 3-legged cache', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'app-token', expires_in: 3600 });

      await expect(manager.getTwoLeggedToken()).resolves.toBe('app-token');
      manager.invalidateThreeLeggedToken();

      await expect(manager.getTwoLeggedToken()).resolves.toBe('app-token');
      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should return null when the 2-legged request fails', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(httpError(401, { developerMessage: 'bad client' }, 'Unauthorized'));

      await expect(manager.getTwoLeggedToken()).resolves.toBeNull();
    });

    it('should throw from requireTwoLeggedToken when the request fails', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(httpError(401, { developerMessage: 'bad client' }, 'Unauthorized'));

      await expect(manager.requireTwoLeggedToken()).rejects.toThrow(
        'OAuth provider returned 401: {"developerMessage":"bad client"}'
      );
    });
  });

  describe('getStatus', () => {
    it('should report empty caches', () => {
      expect(manager.getStatus()).toEqual({
        strategy: 'interactive',
        twoLegged: { cached: false, expiresAt: null },
        threeLegged: {
          cached: false,
          usable: false,
          expiresAt: null,
          cacheFile: settings.tokenCacheFile,
        },
        redirectUri: `http://localhost:${port}/`,
      });
    });

    it('should report cached tokens and their expiry', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'app-token', expires_in: 3600 });
      await manager.getTwoLeggedToken();
      fs.writeFileSync(
        settings.tokenCacheFile,
        JSON.stringify({ access_token: 'cached-token', expires_at: START_TIME / 1000 + 200 })
      );

      const status = manager.getStatus();

      expect(status.twoLegged).toEqual({
        cached: true,
        expiresAt: new Date(START_TIME + 3600 * 1000).toISOString(),
      });
      // 還沒過期，但已進入 300 秒的安全邊界
      expect(status.threeLegged).toMatchObject({
        cached: true,
        usable: false,
        expiresAt: new Date(START_TIME + 200 * 1000).toISOString(),
      });
    });
  });

  describe('getTokenExpiresIn', () => {
    it('should report zero when nothing is cached', () => {
      expect(manager.getTokenExpiresIn('two-legged')).toBe(0);
      expect(manager.getTokenExpiresIn('three-legged')).toBe(0);
    });

    it('should count down the remaining seconds of each cache', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce({ access_token: 'app-token', expires_in: 3600 })
        .mockResolvedValueOnce({ access_token: 'user-token', expires_in: 3600 });
      await manager.requireTwoLeggedToken();
      await manager.getThreeLeggedToken();

      expect(manager.getTokenExpiresIn('two-legged')).toBe(3600);
      // 寫入磁碟時已扣掉 60 秒
      expect(manager.getTokenExpiresIn('three-legged')).toBe(3540);

      clock.advance(40 * 1000);
      expect(manager.getTokenExpiresIn('two-legged')).toBe(3560);
      expect(manager.getTokenExpiresIn('three-legged')).toBe(3500);
    });

    it('should not go below zero for an expired record', () => {
      fs.writeFileSync(
        settings.tokenCacheFile,
        JSON.stringify({ access_token: 'stale-token', expires_at: START_TIME / 1000 - 10 })
      );

      expect(manager.getTokenExpiresIn('three-legged')).toBe(0);
    });
  });
});
