/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { AppConfig, ConfigKey } from '../types/config.js';
import type { AuthSettings, AuthStrategy } from '../types/auth.js';
import { DEFAULT_TWO_LEGGED_SCOPE } from './auth.js';
import { DEFAULT_CALLBACK_HOST } from './callback-listener.js';
import { DEFAULT_CALLBACK_PORT, DEFAULT_THREE_LEGGED_SCOPE } from './three-legged-auth.js';
import { DEFAULT_TOKEN_CACHE_FILE } from './token-store.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'acc-bi');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_BASE_URL = 'https://developer.api.autodesk.com';

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'clientId',
  'clientSecret',
  'baseUrl',
  'twoLeggedScope',
  'threeLeggedScope',
  'callbackPort',
  'tokenCacheFile',
];

/** 設定鍵對應的環境變數（環境變數優先） */
const ENV_KEYS: Record<ConfigKey, string> = {
  clientId: 'APS_CLIENT_ID',
  clientSecret: 'APS_CLIENT_SECRET',
  baseUrl: 'APS_BASE_URL',
  twoLeggedScope: 'APS_TWO_LEGGED_SCOPE',
  threeLeggedScope: 'APS_THREE_LEGGED_SCOPE',
  callbackPort: 'APS_CALLBACK_PORT',
  tokenCacheFile: 'APS_TOKEN_CACHE_FILE',
};

const appConfigSchema = z.object({
  clientId: z.string().optional(),
  clientSecret: z.string().optional(),
  baseUrl: z.string().optional(),
  twoLeggedScope: z.string().optional(),
  threeLeggedScope: z.string().optional(),
  callbackPort: z.number().int().optional(),
  tokenCacheFile: z.string().optional(),
});

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * 解析 port 字串／數字；不合法時拋出 ConfigError
 */
export function parsePort(value: string | number): number {
  const port = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid callback port: ${value} (expected an integer between 1 and 65535)`);
  }
  return port;
}

/**
 * SERVER_MODE=true / 1 / yes 視為 non-interactive
 */
export function parseServerMode(value: string | undefined): boolean {
  if (!value) return false;
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || process.env.ACCBI_CONFIG || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔；不存在或無法解析時使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const parsed = appConfigSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      loggers.config.warn('Ignoring invalid config file', {
        file: this.configPath,
        reason: parsed.error.message,
      });
    } catch (error) {
      loggers.config.warn('Ignoring unreadable config file', {
        file: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return {};
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  /**
   * 以字串設定值（給 CLI 使用），callbackPort 會先驗證
   */
  setFromString(key: ConfigKey, value: string): void {
    if (key === 'callbackPort') {
      this.set('callbackPort', parsePort(value));
      return;
    }
    this.set(key, value);
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得設定值（優先環境變數）
   */
  private resolve(key: Exclude<ConfigKey, 'callbackPort'>): string | undefined {
    const envValue = process.env[ENV_KEYS[key]];
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config[key];
  }

  getClientId(): string | undefined {
    return this.resolve('clientId');
  }

  getClientSecret(): string | undefined {
    return this.resolve('clientSecret');
  }

  hasCredentials(): boolean {
    return Boolean(this.getClientId() && this.getClientSecret());
  }

  getCallbackPort(): number {
    const envValue = process.env[ENV_KEYS.callbackPort];
    if (envValue && envValue.length > 0) {
      return parsePort(envValue);
    }
    return this.config.callbackPort === undefined ? DEFAULT_CALLBACK_PORT : parsePort(this.config.callbackPort);
  }

  getStrategy(): AuthStrategy {
    return parseServerMode(process.env.SERVER_MODE) ? 'non-interactive' : 'interactive';
  }

  /**
   * 解析出啟動時固定的認證設定
   * redirect URI 與 port 只在這裡決定一次
   */
  getAuthSettings(overrides: { strategy?: AuthStrategy } = {}): AuthSettings {
    const baseUrl = (this.resolve('baseUrl') || DEFAULT_BASE_URL).replace(/\/+$/, '');
    const callbackPort = this.getCallbackPort();

    return Object.freeze({
      clientId: this.getClientId() ?? '',
      clientSecret: this.getClientSecret() ?? '',
      baseUrl,
      tokenEndpoint: `${baseUrl}/authentication/v2/token`,
      authorizeEndpoint: `${baseUrl}/authentication/v2/authorize`,
      twoLeggedScope: this.resolve('twoLeggedScope') || DEFAULT_TWO_LEGGED_SCOPE,
      threeLeggedScope: this.resolve('threeLeggedScope') || DEFAULT_THREE_LEGGED_SCOPE,
      callbackHost: DEFAULT_CALLBACK_HOST,
      callbackPort,
      redirectUri: `http://localhost:${callbackPort}/`,
      tokenCacheFile: path.resolve(this.resolve('tokenCacheFile') || DEFAULT_TOKEN_CACHE_FILE),
      strategy: overrides.strategy ?? this.getStrategy(),
    });
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}
