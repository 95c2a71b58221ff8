/**
 * 可替換的時間來源，讓等待迴圈在測試中不必真的等 120 秒
 */

export interface Clock {
  /** epoch milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
