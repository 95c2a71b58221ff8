import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ThreeLeggedTokenProvider,
  AUTHORIZATION_WAIT,
  type ThreeLeggedOptions,
} from '../../src/services/three-legged-auth.js';
import { PersistedTokenStore } from '../../src/services/token-store.js';
import { TokenEndpointClient } from '../../src/services/token-endpoint.js';
import {
  AuthorizationAbortedError,
  AuthorizationDeniedError,
  AuthorizationTimeoutError,
  ListenerBindError,
  NonInteractiveNoCacheError,
  TokenExchangeError,
} from '../../src/lib/errors.js';
import { loggers } from '../../src/lib/logger.js';
import { FakeClock, START_TIME, instantSleep } from '../helpers/fake-clock.js';
import { httpError } from '../helpers/fetch-error.js';
import { closeServer, getFreePort, isPortFree, occupyPort } from '../helpers/ports.js';

vi.mock('ofetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ofetch')>();
  return { ...actual, ofetch: vi.fn() };
});

import { ofetch } from 'ofetch';

const AUTHORIZE_URL = 'https://developer.api.autodesk.com/authentication/v2/authorize';

describe('ThreeLeggedTokenProvider', () => {
  let dir: string;
  let cacheFile: string;
  let port: number;
  let clock: FakeClock;
  let store: PersistedTokenStore;
  let endpoint: TokenEndpointClient;
  let prompts: string[];
  let openBrowser: Mock<[string], Promise<void>>;

  const callback = (query: string) => fetch(`http://127.0.0.1:${port}/?${query}`);

  function createProvider(overrides: Partial<ThreeLeggedOptions> = {}): ThreeLeggedTokenProvider {
    return new ThreeLeggedTokenProvider(store, endpoint, {
      clientId: 'test-client-id',
      authorizeEndpoint: AUTHORIZE_URL,
      redirectUri: `http://localhost:${port}/`,
      callbackPort: port,
      openBrowser,
      prompt: (message) => prompts.push(message),
      clock,
      sleep: instantSleep(clock),
      ...overrides,
    });
  }

  function readCacheFile(): unknown {
    return JSON.parse(fs.readFileSync(cacheFile, 'utf-8'));
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(loggers.auth, 'warn').mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'accbi-3lo-'));
    cacheFile = path.join(dir, 'token_cache.json');
    port = await getFreePort();
    clock = new FakeClock();
    store = new PersistedTokenStore(cacheFile, { clock });
    endpoint = new TokenEndpointClient({
      tokenEndpoint: 'https://developer.api.autodesk.com/authentication/v2/token',
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
    });
    prompts = [];
    openBrowser = vi.fn<[string], Promise<void>>(async () => {
      await callback('code=abc123');
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('cached token', () => {
    it('should return a valid cached token without network or browser', async () => {
      fs.writeFileSync(
        cacheFile,
        JSON.stringify({ access_token: 'cached-token', expires_at: START_TIME / 1000 + 3600 })
      );
      const provider = createProvider();

      await expect(provider.getToken()).resolves.toBe('cached-token');

      expect(ofetch).not.toHaveBeenCalled();
      expect(openBrowser).not.toHaveBeenCalled();
      expect(prompts).toEqual([]);
    });

    it('should return a cached token in non-interactive mode', async () => {
      fs.writeFileSync(
        cacheFile,
        JSON.stringify({ access_token: 'cached-token', expires_at: START_TIME / 1000 + 3600 })
      );
      const provider = createProvider({ strategy: 'non-interactive' });

      await expect(provider.getToken()).resolves.toBe('cached-token');
    });
  });

  describe('interactive authorization', () => {
    it('should tag the code exchange log with the authorization requestId', async () => {
      const infoSpy = vi.spyOn(loggers.auth, 'info').mockImplementation(() => {});
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'fresh-token', expires_in: 3600 });
      const provider = createProvider();

      await provider.getToken();

      expect(infoSpy).toHaveBeenCalledWith(
        'token request (authorization_code) completed',
        expect.objectContaining({
          requestId: expect.stringMatching(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/),
        })
      );
      expect(loggers.auth.getCurrentRequestId()).toBeUndefined();
    });

    it('should exchange the delivered code and persist the token', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({
        access_token: 'fresh-token',
        expires_in: 3600,
        token_type: 'Bearer',
      });
      const provider = createProvider();

      await expect(provider.getToken()).resolves.toBe('fresh-token');

      expect(openBrowser).toHaveBeenCalledOnce();
      expect(openBrowser).toHaveBeenCalledWith(provider.buildAuthorizationUrl());
      expect(readCacheFile()).toEqual({
        access_token: 'fresh-token',
        expires_at: (START_TIME + 3540 * 1000) / 1000,
      });

      const body = new URLSearchParams(String(vi.mocked(ofetch).mock.calls[0][1]?.body));
      expect(body.get('code')).toBe('abc123');
      expect(body.get('redirect_uri')).toBe(`http://localhost:${port}/`);

      expect(prompts).toEqual([
        'Authentication required. Open this URL in your browser to authorize:',
        `  ${provider.buildAuthorizationUrl()}`,
        'Waiting for authorization (max 120s)...',
        'Authorization code received.',
        'Access token obtained (valid for 60 minutes).',
      ]);
      expect(await isPortFree(port)).toBe(true);
    });

    it('should build the authorization URL', () => {
      const provider = createProvider({ scope: 'data:read account:read' });
      const url = new URL(provider.buildAuthorizationUrl());

      expect(`${url.origin}${url.pathname}`).toBe(AUTHORIZE_URL);
      expect(url.searchParams.get('response_type')).toBe('code');
      expect(url.searchParams.get('client_id')).toBe('test-client-id');
      expect(url.searchParams.get('redirect_uri')).toBe(`http://localhost:${port}/`);
      expect(url.searchParams.get('scope')).toBe('data:read account:read');
    });

    it('should continue when the browser cannot be opened', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'manual-token', expires_in: 3600 });
      openBrowser.mockRejectedValueOnce(new Error('spawn xdg-open ENOENT'));

      let delivered = false;
      const provider = createProvider({
        // 使用者手動開啟網址，在第一次等待期間完成授權
        sleep: async (ms) => {
          if (!delivered) {
            delivered = true;
            await callback('code=manual-code');
          }
          clock.advance(ms);
        },
      });

      await expect(provider.getToken()).resolves.toBe('manual-token');

      expect(prompts).toContain('Could not open a browser automatically; open the URL above manually.');
      expect(loggers.auth.warn).toHaveBeenCalledWith('Could not open browser automatically', {
        reason: 'spawn xdg-open ENOENT',
      });
      expect(readCacheFile()).toEqual({
        access_token: 'manual-token',
        expires_at: (START_TIME + 1000 + 3540 * 1000) / 1000,
      });
    });

    it('should time out after 120 seconds with progress every 15 seconds', async () => {
      openBrowser.mockResolvedValueOnce(undefined);
      const provider = createProvider();

      const error = await provider.getToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthorizationTimeoutError);
      expect(error).toMatchObject({ code: 'AUTHORIZATION_TIMEOUT', timeoutMs: AUTHORIZATION_WAIT.TIMEOUT_MS });
      expect(clock.now() - START_TIME).toBe(120_000);
      expect(prompts.filter((message) => message.startsWith('  Still waiting'))).toEqual([
        '  Still waiting... (15s)',
        '  Still waiting... (30s)',
        '  Still waiting... (45s)',
        '  Still waiting... (60s)',
        '  Still waiting... (75s)',
        '  Still waiting... (90s)',
        '  Still waiting... (105s)',
      ]);
      expect(ofetch).not.toHaveBeenCalled();
      expect(fs.existsSync(cacheFile)).toBe(false);
      expect(await isPortFree(port)).toBe(true);
    });

    it('should fail with TokenExchangeError and write nothing when the exchange is rejected', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(
        httpError(400, { error: 'invalid_grant' }, 'Bad Request')
      );
      const provider = createProvider();

      const error = await provider.getToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TokenExchangeError);
      expect(error).toMatchObject({ detail: '400 {"error":"invalid_grant"}' });
      expect(fs.existsSync(cacheFile)).toBe(false);
      expect(await isPortFree(port)).toBe(true);
    });

    it('should fail with AuthorizationDeniedError when the provider redirects with an error', async () => {
      openBrowser.mockImplementationOnce(async () => {
        await callback('error=access_denied&error_description=User%20denied%20access');
      });
      const provider = createProvider();

      const error = await provider.getToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthorizationDeniedError);
      expect(error).toMatchObject({ providerError: 'access_denied', description: 'User denied access' });
      expect(ofetch).not.toHaveBeenCalled();
    });

    it('should stop waiting when the signal is aborted', async () => {
      const controller = new AbortController();
      openBrowser.mockImplementationOnce(async () => {
        controller.abort();
      });
      const provider = createProvider();

      await expect(provider.getToken({ signal: controller.signal })).rejects.toBeInstanceOf(
        AuthorizationAbortedError
      );
      expect(await isPortFree(port)).toBe(true);
      expect(loggers.auth.getCurrentRequestId()).toBeUndefined();
    });

    it('should share one authorization between concurrent callers', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'shared-token', expires_in: 3600 });
      const provider = createProvider();

      const [first, second] = await Promise.all([provider.getToken(), provider.getToken()]);

      expect(first).toBe('shared-token');
      expect(second).toBe('shared-token');
      expect(openBrowser).toHaveBeenCalledOnce();
      expect(ofetch).toHaveBeenCalledOnce();
    });
  });

  describe('failures before the browser', () => {
    it('should fail with ListenerBindError when the callback port is taken', async () => {
      const blocker = await occupyPort(port);
      try {
        const provider = createProvider();

        const error = await provider.getToken().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ListenerBindError);
        expect(openBrowser).not.toHaveBeenCalled();
        expect(prompts).toEqual([]);
      } finally {
        await closeServer(blocker);
      }
    });

    it('should fail fast in non-interactive mode without a cached token', async () => {
      const provider = createProvider({ strategy: 'non-interactive' });

      const error = await provider.getToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NonInteractiveNoCacheError);
      expect(error).toMatchObject({ cachePath: cacheFile });
      expect(openBrowser).not.toHaveBeenCalled();
      expect(ofetch).not.toHaveBeenCalled();
      expect(await isPortFree(port)).toBe(true);
    });

    it('should treat an expiring cached token as missing in non-interactive mode', async () => {
      fs.writeFileSync(
        cacheFile,
        JSON.stringify({ access_token: 'old-token', expires_at: START_TIME / 1000 + 120 })
      );
      const provider = createProvider({ strategy: 'non-interactive' });

      await expect(provider.getToken()).rejects.toBeInstanceOf(NonInteractiveNoCacheError);
    });
  });
});
