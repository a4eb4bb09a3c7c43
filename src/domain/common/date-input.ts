import { createBaseError } from '../../shared/errors/base-error';

const YMD_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * YYYY-MM-DD をローカルタイムゾーンの 0 時として解釈する。不正な日付は null
 */
export function parseDateInput(input: string): Date | null {
  const match = YMD_PATTERN.exec(input.trim());
  if (!match) return null;

  const [, year, month, day] = match.map(Number);
  const date = new Date(year, month - 1, day);

  // 2024-02-30 のような繰り上がりを弾く
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * コマンドライン引数の日付を解釈する。不正なら VALIDATION_ERROR
 */
export function parseDateFlag(input: string, flag: string): Date {
  const date = parseDateInput(input);
  if (!date) {
    throw createBaseError(
      `${flag} の日付形式が正しくありません (YYYY-MM-DD): ${input}`,
      'VALIDATION_ERROR',
      { flag, input }
    );
  }
  return date;
}

/**
 * Date を YYYY-MM-DD（ローカルタイムゾーン）に整形する
 */
export function formatDateInput(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * 月初の 0 時に丸め、months か月ずらす
 */
export function roundMonth(date: Date, months: number): Date {
  return new Date(date.getFullYear(), date.getMonth() + months, 1);
}
