import { sleep as defaultSleep } from '../../shared/utils/time';

export const PAGE_FETCH_INTERVAL_MS = 1000;

export interface RateLimiter {
  /**
   * 次のリクエストを開始してよいタイミングまで待つ。初回は待たない
   */
  wait(): Promise<void>;
}

export interface RateLimiterOptions {
  intervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * リクエスト開始間隔を一定以上空けるレートリミッターを作成する
 */
export function createRateLimiter(options: RateLimiterOptions = {}): RateLimiter {
  const intervalMs = options.intervalMs ?? PAGE_FETCH_INTERVAL_MS;
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  let lastStartedAt: number | null = null;

  const wait = async (): Promise<void> => {
    if (lastStartedAt !== null) {
      const remaining = lastStartedAt + intervalMs - now();
      if (remaining > 0) {
        await sleep(remaining);
      }
    }
    lastStartedAt = now();
  };

  return { wait };
}
