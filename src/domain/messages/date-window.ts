import { createBaseError } from '../../shared/errors/base-error';

/**
 * 両端を含む期間 [oldest, newest]
 */
export interface DateWindow {
  readonly oldest: Date;
  readonly newest: Date;
}

export type WindowPosition = 'before' | 'inside' | 'after';

/**
 * 期間が newest > oldest を満たすことを確認する
 */
export function assertValidWindow(window: DateWindow): void {
  const oldest = window.oldest.getTime();
  const newest = window.newest.getTime();

  if (Number.isNaN(oldest) || Number.isNaN(newest)) {
    throw createBaseError('日付が不正です', 'VALIDATION_ERROR', {
      oldest: String(window.oldest),
      newest: String(window.newest),
    });
  }

  if (newest <= oldest) {
    throw createBaseError(
      `終了日 ${window.newest.toISOString()} は開始日 ${window.oldest.toISOString()} より後である必要があります`,
      'VALIDATION_ERROR',
      { oldest: window.oldest.toISOString(), newest: window.newest.toISOString() }
    );
  }
}

/**
 * 期間を作成する
 */
export function createDateWindow(oldest: Date, newest: Date): DateWindow {
  const window = { oldest: new Date(oldest.getTime()), newest: new Date(newest.getTime()) };
  assertValidWindow(window);
  return Object.freeze(window);
}

/**
 * タイムスタンプが期間の前・中・後のどこにあるかを判定する
 * before は oldest より古い（後方ページングの終了条件）、after は newest より新しい（読み飛ばす）
 */
export function classifyTimestamp(timestamp: Date, window: DateWindow): WindowPosition {
  const time = timestamp.getTime();
  if (time < window.oldest.getTime()) return 'before';
  if (time > window.newest.getTime()) return 'after';
  return 'inside';
}
