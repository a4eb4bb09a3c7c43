import type { MessageAttachment } from '../messages/types';

export type MediaExtension = 'jpeg' | 'png' | 'mp4';

export interface DownloadTarget {
  url: string;
  ext: MediaExtension;
}

/**
 * 添付ファイルのダウンロード URL と拡張子を取得する
 * 画像・リンク画像・動画以外、または拡張子が判別できない場合は null
 */
export function resolveDownloadTarget(attachment: MessageAttachment): DownloadTarget | null {
  let url: string;
  switch (attachment.type) {
    case 'image':
    case 'linked_image':
    case 'video':
      url = attachment.url;
      break;
    default:
      return null;
  }

  // GroupMe の画像 URL は https://i.groupme.com/1024x768.jpeg.<hash> の形式
  if (url.includes('.jpeg.')) return { url, ext: 'jpeg' };
  if (url.includes('.png.')) return { url, ext: 'png' };
  if (url.endsWith('.mp4')) return { url, ext: 'mp4' };
  return null;
}
