/**
 * Auth Command
 * 認證指令 - 3-legged 登入、token 狀態、登出與驗證
 */

import { Command } from 'commander';
import { getApsClient, getTokenManager } from '../lib/api-client.js';
import { describeError, exitCodeFor } from '../lib/exit-codes.js';
import { getConfigService } from '../services/config.js';
import { PersistedTokenStore } from '../services/token-store.js';
import { formatJSON, formatKeyValueTable, formatTokenStatus, isOutputFormat, type OutputFormat } from '../utils/output.js';
import type { TokenKind } from '../types/auth.js';

interface HubsResponse {
  data?: Array<{
    id: string;
    attributes?: { name?: string; region?: string };
  }>;
}

/**
 * 從全域選項取得輸出格式
 */
export function resolveFormat(cmd: Command): OutputFormat {
  const value: unknown = cmd.optsWithGlobals().format;
  return typeof value === 'string' && isOutputFormat(value) ? value : 'json';
}

/**
 * 執行指令；錯誤轉成一行訊息與退出碼
 */
export async function runAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    process.exitCode = exitCodeFor(error);
  }
}

export const authCommand = new Command('auth')
  .description('Manage APS OAuth tokens');

/**
 * accbi auth login
 */
authCommand
  .command('login')
  .description('Run the 3-legged authorization flow and cache the token')
  .option('--force', 'Discard the cached token and authorize again')
  .option('--non-interactive', 'Fail instead of opening a browser when no cached token exists')
  .action(async (options: { force?: boolean; nonInteractive?: boolean }) => {
    await runAction(async () => {
      const manager = getTokenManager(options.nonInteractive ? 'non-interactive' : undefined);
      if (options.force) {
        manager.invalidateThreeLeggedToken();
      }

      // Ctrl+C 時停止等待並釋放 port
      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);
      try {
        await manager.getThreeLeggedToken({ signal: controller.signal });
      } finally {
        process.removeListener('SIGINT', onSigint);
      }

      const status = manager.getStatus();
      console.error(`✓ Logged in. Token cached at ${status.threeLegged.cacheFile} (expires ${status.threeLegged.expiresAt ?? 'unknown'})`);
    });
  });

/**
 * accbi auth status
 */
authCommand
  .command('status')
  .description('Show cached token state')
  .action(async (_options: unknown, cmd: Command) => {
    await runAction(async () => {
      const manager = getTokenManager();
      console.log(formatTokenStatus(manager.getStatus(), resolveFormat(cmd)));
    });
  });

/**
 * accbi auth token
 * token 本身輸出到 stdout，方便給其他腳本使用
 * --json 輸出 { access_token, expires_in }，給 viewer 之類需要剩餘秒數的呼叫端
 */
authCommand
  .command('token')
  .description('Print a valid access token (3-legged by default)')
  .option('--two-legged', 'Print a 2-legged (client credentials) token instead')
  .option('--json', 'Print {"access_token", "expires_in"} with the remaining lifetime in seconds')
  .action(async (options: { twoLegged?: boolean; json?: boolean }) => {
    await runAction(async () => {
      const manager = getTokenManager();
      const kind: TokenKind = options.twoLegged ? 'two-legged' : 'three-legged';
      const token = kind === 'two-legged'
        ? await manager.requireTwoLeggedToken()
        : await manager.getThreeLeggedToken();

      if (options.json) {
        console.log(formatJSON({ access_token: token, expires_in: manager.getTokenExpiresIn(kind) }));
      } else {
        console.log(token);
      }
    });
  });

/**
 * accbi auth logout
 * 不需要 client 憑證，只刪除快取檔
 */
authCommand
  .command('logout')
  .description('Delete the cached 3-legged token')
  .action(async () => {
    await runAction(async () => {
      const settings = getConfigService().getAuthSettings();
      const store = new PersistedTokenStore(settings.tokenCacheFile);
      if (store.delete()) {
        console.error(`✓ Removed ${store.getPath()}`);
      } else {
        console.error(`No cached token at ${store.getPath()}`);
      }
    });
  });

/**
 * accbi auth verify
 * 用 token 呼叫 project/v1/hubs；401 時快取會被清除
 */
authCommand
  .command('verify')
  .description('Call the APS hubs endpoint to confirm the token is accepted')
  .option('--two-legged', 'Verify the 2-legged token instead')
  .action(async (options: { twoLegged?: boolean }, cmd: Command) => {
    await runAction(async () => {
      const auth: TokenKind = options.twoLegged ? 'two-legged' : 'three-legged';
      const client = getApsClient();
      const response = await client.get<HubsResponse>('project/v1/hubs', { auth });
      const hubs = (response.data ?? []).map((hub) => ({
        id: hub.id,
        name: hub.attributes?.name ?? '',
      }));

      if (resolveFormat(cmd) === 'table') {
        console.log(formatKeyValueTable(hubs.map((hub) => [hub.id, hub.name])));
      } else {
        console.log(formatJSON({ auth, hubCount: hubs.length, hubs }));
      }
    });
  });
