/**
 * CLI 退出碼與錯誤訊息
 */

import { ApsApiError, AuthError, ConfigError } from './errors.js';

export const EXIT_CODES = {
  OK: 0,
  GENERAL: 1,
  API_ERROR: 2,
  CONFIG_ERROR: 3,
  AUTH_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof ApsApiError) {
    return EXIT_CODES.API_ERROR;
  }
  if (error instanceof AuthError) {
    switch (error.code) {
      case 'MISSING_CREDENTIALS':
        return EXIT_CODES.CONFIG_ERROR;
      case 'NETWORK_FAILURE':
      case 'AUTH_PROVIDER_ERROR':
      case 'TOKEN_EXCHANGE_FAILED':
        return EXIT_CODES.API_ERROR;
      default:
        return EXIT_CODES.AUTH_FAILED;
    }
  }
  return EXIT_CODES.GENERAL;
}

/**
 * 每一種失敗對應一行明確的終端訊息
 */
export function describeError(error: unknown): string {
  if (error instanceof AuthError) {
    switch (error.code) {
      case 'AUTHORIZATION_TIMEOUT':
        return `Authorization timeout: ${error.message}`;
      case 'AUTHORIZATION_DENIED':
        return `Authorization rejected by provider: ${error.message}`;
      case 'LISTENER_BIND_FAILURE':
        return `Callback listener failed: ${error.message}`;
      case 'TOKEN_EXCHANGE_FAILED':
        return `Token exchange rejected: ${error.message}`;
      case 'NON_INTERACTIVE_NO_CACHE':
        return `Non-interactive mode: ${error.message}`;
      case 'AUTHORIZATION_ABORTED':
        return `Cancelled: ${error.message}`;
      case 'MISSING_CREDENTIALS':
        return `Missing credentials: ${error.message}`;
      case 'NETWORK_FAILURE':
        return `Network error: ${error.message}`;
      case 'AUTH_PROVIDER_ERROR':
        return `OAuth provider error: ${error.message}`;
    }
  }
  if (error instanceof ApsApiError) {
    if (error.statusCode === 401 && error.tokenKind === 'two-legged') {
      return `APS rejected the 2-legged token (401). The in-memory token was cleared; check the app's client credentials and scopes`;
    }
    if (error.statusCode === 401) {
      return `APS rejected the token (401). The cached token was cleared; run: accbi auth login`;
    }
    return `APS API error: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
