/**
 * Token 有效性判斷
 */

import type { CachedToken } from '../types/auth.js';

/** 記憶體中的 2-legged token 提前 60 秒視為過期 */
export const TWO_LEGGED_MARGIN_MS = 60 * 1000;

/** 磁碟上的 3-legged token 提前 5 分鐘視為過期，避免操作中途失效 */
export const PERSISTED_MARGIN_MS = 5 * 60 * 1000;

/**
 * usable iff now < expiresAt - margin
 */
export function isUsable(
  token: Pick<CachedToken, 'expiresAt'> | null | undefined,
  now: number,
  marginMs: number
): boolean {
  if (!token) {
    return false;
  }
  return now < token.expiresAt - marginMs;
}

