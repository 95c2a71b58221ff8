/**
 * Cross-platform browser opener for the authorization step.
 *
 * - macOS: `open "url"`
 * - Linux: `xdg-open "url"`
 * - Windows: `rundll32 url.dll,FileProtocolHandler url`
 *   (not `cmd /c start`: cmd splits the query string at every `&`)
 *
 * Resolves once the opener is spawned (not when the user finishes).
 * Rejects when the opener cannot be started; callers treat that as
 * non-fatal since the URL is always printed as well.
 */

import { spawn } from 'node:child_process';

export type BrowserOpener = (url: string) => Promise<void>;

export function browserCommand(platform: NodeJS.Platform, url: string): { command: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

export const openBrowser: BrowserOpener = (url) => {
  const { command, args } = browserCommand(process.platform, url);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
    });

    child.on('error', (error) => {
      reject(error);
    });

    child.on('spawn', () => {
      child.unref();
      resolve();
    });
  });
};
