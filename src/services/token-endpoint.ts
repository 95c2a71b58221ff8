/**
 * Token Endpoint Client
 * APS OAuth2 token endpoint - client_credentials 與 authorization_code 兩種 grant
 */

import { ofetch, FetchError } from 'ofetch';
import { z } from 'zod';
import { AuthProviderError, NetworkError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { TokenResponse } from '../types/auth.js';

// token endpoint 請求逾時（逾時視同一般請求失敗）
export const TOKEN_REQUEST_TIMEOUT_MS = 30 * 1000;

// provider 沒給 expires_in 時的預設值（秒）
const DEFAULT_EXPIRES_IN = 3600;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(DEFAULT_EXPIRES_IN),
  token_type: z.string().default('Bearer'),
  refresh_token: z.string().optional(),
});

export interface TokenEndpointOptions {
  tokenEndpoint: string;
  clientId: string;
  clientSecret: string;
  timeoutMs?: number;
}

/**
 * 把 FetchError.data（可能已被解析成 JSON）還原成可讀字串
 */
export function describeBody(data: unknown, fallback: string): string {
  if (data === undefined || data === null || data === '') {
    return fallback;
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

export class TokenEndpointClient {
  private readonly tokenEndpoint: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly timeoutMs: number;

  constructor(options: TokenEndpointOptions) {
    this.tokenEndpoint = options.tokenEndpoint;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.timeoutMs = options.timeoutMs ?? TOKEN_REQUEST_TIMEOUT_MS;
  }

  /**
   * grant_type=client_credentials
   */
  async requestClientCredentials(scope: string): Promise<TokenResponse> {
    return this.post('client_credentials', { scope });
  }

  /**
   * grant_type=authorization_code
   */
  async exchangeAuthorizationCode(code: string, redirectUri: string): Promise<TokenResponse> {
    return this.post('authorization_code', { code, redirect_uri: redirectUri });
  }

  private async post(grantType: string, params: Record<string, string>): Promise<TokenResponse> {
    const body = new URLSearchParams({
      client_id: this.clientId,
      client_secret: this.clientSecret,
      grant_type: grantType,
      ...params,
    }).toString();

    const raw = await loggers.auth.trackAsync(
      `token request (${grantType})`,
      async () => {
        try {
          return await ofetch<unknown>(this.tokenEndpoint, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/x-www-form-urlencoded',
            },
            body,
            timeout: this.timeoutMs,
            retry: 0,
          });
        } catch (error) {
          throw this.toAuthError(error);
        }
      },
      { method: 'POST', url: this.tokenEndpoint }
    );

    const parsed = tokenResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AuthProviderError(200, `Unexpected token response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private toAuthError(error: unknown): Error {
    if (error instanceof FetchError) {
      const status = error.statusCode ?? error.status;
      if (status) {
        return new AuthProviderError(status, describeBody(error.data, error.statusText ?? ''), {
          cause: error,
        });
      }
      return new NetworkError(this.tokenEndpoint, error.message, { cause: error });
    }
    if (error instanceof Error) {
      return new NetworkError(this.tokenEndpoint, error.message, { cause: error });
    }
    return new NetworkError(this.tokenEndpoint, String(error));
  }
}
