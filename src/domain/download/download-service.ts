import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import pLimit from 'p-limit';

import { logger } from '../../infrastructure/logging/logger';
import { createBaseError } from '../../shared/errors/base-error';
import { fileExists } from '../../shared/utils/fs';
import type { DateWindow } from '../messages/date-window';
import type { MessageStream } from '../messages/message-stream';
import type { Group, Message } from '../messages/types';

import { resolveDownloadTarget, type DownloadTarget } from './attachments';
import { buildAttachmentFilename, UNKNOWN_USER_NAME } from './file-naming';

export interface MediaDownloader {
  download(url: string): Promise<Uint8Array>;
}

export interface DownloadServiceConfig {
  concurrency?: number;
}

export interface DownloadRequest {
  group: Group;
  window: DateWindow;
  imageDir: string;
}

export interface DownloadSummary {
  messages: number;
  downloaded: number;
  skipped: number;
}

export interface DownloadService {
  downloadGroupMedia(request: DownloadRequest): Promise<DownloadSummary>;
}

type SaveResult = 'downloaded' | 'skipped';

/**
 * グループのメディアをダウンロードするサービスを作成する
 */
export function createDownloadService(
  stream: MessageStream,
  downloader: MediaDownloader,
  config: DownloadServiceConfig = {}
): DownloadService {
  const concurrency = config.concurrency ?? 4;

  /**
   * 1 つの添付ファイルを保存する。既に存在する場合はスキップ
   */
  const saveAttachment = async (target: DownloadTarget, filePath: string): Promise<SaveResult> => {
    let exists: boolean;
    try {
      exists = await fileExists(filePath);
    } catch (error) {
      throw createBaseError(`保存先を確認できません: ${filePath}`, 'PERSISTENCE_ERROR', {
        filePath,
        error,
      });
    }

    if (exists) {
      logger.info(`file already exists: ${filePath}`);
      return 'skipped';
    }

    logger.info(`downloading file: ${filePath}`);
    const bytes = await downloader.download(target.url);

    try {
      await writeFile(filePath, bytes);
    } catch (error) {
      throw createBaseError(`ファイルを保存できません: ${filePath}`, 'PERSISTENCE_ERROR', {
        filePath,
        error,
      });
    }
    return 'downloaded';
  };

  /**
   * 1 つのメッセージの添付ファイルをすべて保存する
   * すべて完了してから次のメッセージを取りに行く
   */
  const saveMessageMedia = async (
    message: Message,
    userName: string,
    imageDir: string
  ): Promise<SaveResult[]> => {
    const limit = pLimit(concurrency);
    const tasks: Array<Promise<SaveResult>> = [];

    message.attachments.forEach((attachment, index) => {
      const target = resolveDownloadTarget(attachment);
      if (!target) return;

      const filename = buildAttachmentFilename(message.createdAt, index, userName, target.ext);
      tasks.push(limit(() => saveAttachment(target, path.join(imageDir, filename))));
    });

    const results = await Promise.allSettled(tasks);
    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    if (failure) {
      throw failure.reason;
    }

    return results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
  };

  const downloadGroupMedia = async ({
    group,
    window,
    imageDir,
  }: DownloadRequest): Promise<DownloadSummary> => {
    const nicknames = new Map(group.members.map((member) => [member.userId, member.nickname]));
    const summary: DownloadSummary = { messages: 0, downloaded: 0, skipped: 0 };

    logger.info(
      `Downloading media from group ${group.name} (${group.id}) between ${window.oldest.toISOString()} and ${window.newest.toISOString()}`
    );

    for await (const message of stream.produce(group.id, window)) {
      summary.messages++;
      const userName = nicknames.get(message.userId) ?? UNKNOWN_USER_NAME;

      for (const result of await saveMessageMedia(message, userName, imageDir)) {
        summary[result]++;
      }
    }

    logger.info(
      `✓ ${summary.downloaded} files downloaded, ${summary.skipped} skipped (${summary.messages} messages)`
    );
    return summary;
  };

  return { downloadGroupMedia };
}
