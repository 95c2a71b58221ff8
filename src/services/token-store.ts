/**
 * Persisted Token Store
 * 3-legged token 的磁碟快取（token_cache.json）
 *
 * 檔案格式：{ "access_token": string, "expires_at": epoch 秒 }
 * 不存在、無法解析或即將過期的紀錄一律視為 cache miss。
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { loggers } from '../lib/logger.js';
import { systemClock, type Clock } from '../lib/clock.js';
import { isUsable, PERSISTED_MARGIN_MS } from '../lib/token-validity.js';
import type { CachedToken, PersistedTokenRecord } from '../types/auth.js';

export const DEFAULT_TOKEN_CACHE_FILE = 'token_cache.json';

const persistedRecordSchema = z.object({
  access_token: z.string().min(1),
  expires_at: z.number().finite(),
});

export interface TokenStoreOptions {
  marginMs?: number;
  clock?: Clock;
}

export class PersistedTokenStore {
  private filePath: string;
  private marginMs: number;
  private clock: Clock;

  constructor(filePath: string = path.resolve(DEFAULT_TOKEN_CACHE_FILE), options: TokenStoreOptions = {}) {
    this.filePath = filePath;
    this.marginMs = options.marginMs ?? PERSISTED_MARGIN_MS;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * 讀取原始紀錄（不檢查有效期限）
   */
  read(): PersistedTokenRecord | null {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch {
      return null;
    }

    try {
      const parsed = persistedRecordSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      loggers.auth.warn('Ignoring malformed token cache', { file: this.filePath });
    } catch {
      loggers.auth.warn('Ignoring unreadable token cache', { file: this.filePath });
    }
    return null;
  }

  /**
   * 取得可用的 token；只接受 expires_at > now + margin 的紀錄
   */
  load(): CachedToken | null {
    const record = this.read();
    if (!record) {
      return null;
    }

    const token: CachedToken = {
      accessToken: record.access_token,
      expiresAt: record.expires_at * 1000,
      kind: 'three-legged',
    };

    if (!isUsable(token, this.clock.now(), this.marginMs)) {
      loggers.auth.info('Cached 3-legged token is expired or about to expire', {
        expiresAt: new Date(token.expiresAt).toISOString(),
      });
      return null;
    }

    return token;
  }

  /**
   * 覆寫紀錄（0600）
   */
  save(token: Pick<CachedToken, 'accessToken' | 'expiresAt'>): void {
    const record: PersistedTokenRecord = {
      access_token: token.accessToken,
      expires_at: token.expiresAt / 1000,
    };

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JSON.stringify(record, null, 2), { encoding: 'utf-8', mode: 0o600 });
    // mode 只在建立檔案時生效
    fs.chmodSync(this.filePath, 0o600);

    loggers.auth.info('3-legged token persisted', {
      file: this.filePath,
      expiresAt: new Date(token.expiresAt).toISOString(),
    });
  }

  /**
   * 刪除紀錄；回傳是否真的刪了檔案
   */
  delete(): boolean {
    try {
      fs.unlinkSync(this.filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
    loggers.auth.info('3-legged token cache deleted', { file: this.filePath });
    return true;
  }

  getPath(): string {
    return this.filePath;
  }
}
