/**
 * API Client Helper
 * 提供共用的 TokenManager / ApsClient 建立函數
 */

import { ApsClient } from '../services/aps-client.js';
import { getConfigService } from '../services/config.js';
import { TokenManager } from '../services/token-manager.js';
import { MissingCredentialsError } from './errors.js';
import type { AuthStrategy } from '../types/auth.js';

let cachedManager: TokenManager | null = null;

/**
 * 取得 TokenManager 實例
 * 指定 strategy 時（例如 --non-interactive）會依該模式重新建立
 * @throws MissingCredentialsError 如果未設定 APS 憑證
 */
export function getTokenManager(strategy?: AuthStrategy): TokenManager {
  const config = getConfigService();
  if (!config.hasCredentials()) {
    throw new MissingCredentialsError();
  }

  if (!cachedManager || (strategy && cachedManager.getSettings().strategy !== strategy)) {
    cachedManager = new TokenManager(config.getAuthSettings({ strategy }));
  }

  return cachedManager;
}

export function getApsClient(strategy?: AuthStrategy): ApsClient {
  return new ApsClient(getTokenManager(strategy));
}

/**
 * 清除快取的實例（用於測試）
 */
export function clearApiClientCache(): void {
  cachedManager = null;
}
