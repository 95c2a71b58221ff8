/**
 * 設定檔結構
 */
export interface AppConfig {
  /** APS Client ID */
  clientId?: string;
  /** APS Client Secret */
  clientSecret?: string;
  /** APS API 根網址 */
  baseUrl?: string;
  /** client_credentials 使用的 scope */
  twoLeggedScope?: string;
  /** authorization_code 使用的 scope */
  threeLeggedScope?: string;
  /** OAuth callback listener port（需與 APS app 註冊的 redirect URI 一致） */
  callbackPort?: number;
  /** 3-legged token 快取檔路徑 */
  tokenCacheFile?: string;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;
