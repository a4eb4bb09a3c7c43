import type { MediaExtension } from './attachments';

export const UNKNOWN_USER_NAME = 'unknown';

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * 添付ファイルの保存ファイル名を生成する
 * 例) 2024-06-10T08_05_03.0.alice.jpeg （日時はローカルタイムゾーン）
 */
export function buildAttachmentFilename(
  createdAt: Date,
  index: number,
  userName: string,
  ext: MediaExtension
): string {
  const date = [
    createdAt.getFullYear(),
    pad(createdAt.getMonth() + 1),
    pad(createdAt.getDate()),
  ].join('-');
  const time = [createdAt.getHours(), createdAt.getMinutes(), createdAt.getSeconds()]
    .map(pad)
    .join('_');
  const safeName = userName.replace(/[/\\]/g, '_');

  return `${date}T${time}.${index}.${safeName}.${ext}`;
}
