/**
 * Authorization Session
 * 一次 3-legged 授權流程的共享狀態
 *
 * callback listener 是唯一的寫入者，等待迴圈是唯一的讀取者。
 * 結果只能寫入一次：第一個 redirect 生效，之後的 deliver/deny 都不改變狀態。
 */

export type AuthorizationOutcome =
  | { type: 'code'; code: string }
  | { type: 'denied'; error: string; description?: string };

export class AuthorizationSession {
  private result: AuthorizationOutcome | null = null;
  private listenerActive = false;

  /**
   * 記錄授權碼；已有結果時回傳 false
   */
  deliver(code: string): boolean {
    if (this.result) {
      return false;
    }
    this.result = { type: 'code', code };
    return true;
  }

  /**
   * 記錄 provider 回傳的錯誤；已有結果時回傳 false
   */
  deny(error: string, description?: string): boolean {
    if (this.result) {
      return false;
    }
    this.result = description ? { type: 'denied', error, description } : { type: 'denied', error };
    return true;
  }

  get outcome(): AuthorizationOutcome | null {
    return this.result;
  }

  isSettled(): boolean {
    return this.result !== null;
  }

  get isListenerActive(): boolean {
    return this.listenerActive;
  }

  setListenerActive(active: boolean): void {
    this.listenerActive = active;
  }
}
