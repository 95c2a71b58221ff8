/**
 * Output Formatter Module
 * 輸出格式化模組 - 支援 JSON、Table 格式
 */

import Table from 'cli-table3';
import type { TokenStatus } from '../types/auth.js';
import type { AppConfig } from '../types/config.js';

/**
 * 輸出格式類型
 */
export type OutputFormat = 'json' | 'table';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'table';
}

export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 兩欄（項目／值）表格
 */
export function formatKeyValueTable(rows: Array<[string, string]>): string {
  const table = new Table({
    head: ['Item', 'Value'],
    style: { head: ['cyan'] },
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

export function formatTokenStatus(status: TokenStatus, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return formatJSON(status);
  }

  return formatKeyValueTable([
    ['Mode', status.strategy],
    ['2-legged cached', status.twoLegged.cached ? 'yes' : 'no'],
    ['2-legged expires', status.twoLegged.expiresAt ?? '-'],
    ['3-legged cached', status.threeLegged.cached ? 'yes' : 'no'],
    ['3-legged usable', status.threeLegged.usable ? 'yes' : 'no'],
    ['3-legged expires', status.threeLegged.expiresAt ?? '-'],
    ['Cache file', status.threeLegged.cacheFile],
    ['Redirect URI', status.redirectUri],
  ]);
}

/**
 * 遮蔽密碼類設定值，只保留前 4 碼
 */
export function maskSecret(value: string): string {
  if (value.length <= 4) {
    return '****';
  }
  return `${value.slice(0, 4)}${'*'.repeat(Math.min(value.length - 4, 16))}`;
}

export function formatConfig(config: AppConfig, format: OutputFormat = 'json'): string {
  const display: AppConfig = config.clientSecret
    ? { ...config, clientSecret: maskSecret(config.clientSecret) }
    : { ...config };

  if (format === 'json') {
    return formatJSON(display);
  }

  const rows: Array<[string, string]> = Object.entries(display).map(([key, value]) => [key, String(value)]);
  return formatKeyValueTable(rows);
}
