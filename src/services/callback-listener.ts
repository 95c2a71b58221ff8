/**
 * OAuth Callback Listener
 * 綁定在固定 loopback port 上的最小 HTTP server，只為了接收一次帶有
 * authorization code 的 redirect，並交給等待中的 ThreeLeggedTokenProvider。
 *
 * 不輸出 per-request access log（只有 debug 級的結構化日誌）。
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { ListenerBindError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { AuthorizationSession } from './authorization-session.js';

export const DEFAULT_CALLBACK_HOST = '127.0.0.1';

export interface CallbackListenerOptions {
  port: number;
  host?: string;
}

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

function page(title: string, body: string, color: string): string {
  return `<!DOCTYPE html>
<html>
<head><title>${title}</title></head>
<body style="font-family: Arial, sans-serif; text-align: center; padding: 50px;">
  <h1 style="color: ${color};">${title}</h1>
  <p>${body}</p>
</body>
</html>`;
}

export const SUCCESS_PAGE = page(
  'Authorization Successful',
  'You can close this window and return to your terminal.',
  '#28a745'
);

export const WAITING_PAGE = page(
  'Waiting for Authorization',
  'No authorization code in this request. Complete the sign-in in the window that opened.',
  '#666666'
);

function errorPage(error: string, description?: string): string {
  const detail = escapeHtml(description ? `${error}: ${description}` : error);
  return page('Authorization Failed', `${detail}<br>Please close this window and try again.`, '#dc3545');
}

export class CallbackListener {
  private server: Server | null = null;
  private closing: Promise<void> | null = null;
  private readonly session: AuthorizationSession;
  private readonly port: number;
  private readonly host: string;

  constructor(session: AuthorizationSession, options: CallbackListenerOptions) {
    this.session = session;
    this.port = options.port;
    this.host = options.host ?? DEFAULT_CALLBACK_HOST;
  }

  /**
   * 綁定 port 並開始接收請求
   * 綁定失敗（port 被佔用）時拋出 ListenerBindError，不嘗試其他 port
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = createServer((req, res) => this.handleRequest(req, res));

    await new Promise<void>((resolve, reject) => {
      const onError = (error: NodeJS.ErrnoException) => {
        server.removeListener('listening', onListening);
        const reason = error.code === 'EADDRINUSE' ? 'port already in use' : error.code ?? error.message;
        reject(new ListenerBindError(this.port, reason, { cause: error }));
      };
      const onListening = () => {
        server.removeListener('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.port, this.host);
    });

    server.on('error', (error) => {
      loggers.callback.error('Callback listener error', error, { port: this.port });
    });

    this.server = server;
    this.closing = null;
    this.session.setListenerActive(true);
    loggers.callback.debug('Callback listener started', { host: this.host, port: this.port });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    let url: URL;
    try {
      url = new URL(req.url ?? '/', `http://${this.host}:${this.port}`);
    } catch {
      // 無法解析的 request target 不影響 session
      loggers.callback.debug('Ignoring unparseable callback request', { target: req.url });
      this.respond(res, WAITING_PAGE);
      return;
    }

    const code = url.searchParams.get('code');
    const error = url.searchParams.get('error');

    let html = WAITING_PAGE;
    let captured = false;

    if (code) {
      captured = this.session.deliver(code);
      html = SUCCESS_PAGE;
    } else if (error) {
      captured = this.session.deny(error, url.searchParams.get('error_description') ?? undefined);
      html = errorPage(error, url.searchParams.get('error_description') ?? undefined);
    }

    loggers.callback.debug('Callback request handled', {
      path: url.pathname,
      captured,
    });

    this.respond(res, html);

    // 取得結果後不再接受新的連線
    if (captured) {
      this.server?.close();
    }
  }

  private respond(res: ServerResponse, html: string): void {
    res.writeHead(200, {
      'Content-Type': 'text/html; charset=utf-8',
      Connection: 'close',
    });
    res.end(html);
  }

  /**
   * 停止並釋放 port；可重複呼叫
   */
  stop(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }

    this.closing = new Promise<void>((resolve) => {
      if (server.listening) {
        server.close(() => resolve());
      } else {
        // 收到授權碼時 handler 已經關閉 listening socket
        resolve();
      }
      server.closeAllConnections();
    }).then(() => {
      this.server = null;
      this.session.setListenerActive(false);
      loggers.callback.debug('Callback listener stopped', { port: this.port });
    });

    return this.closing;
  }
}
