import { logger } from '../../infrastructure/logging/logger';

import { assertValidWindow, classifyTimestamp, type DateWindow } from './date-window';
import { createRateLimiter, type RateLimiterOptions } from './rate-limiter';
import type { Cursor, Message, MessagePageFetcher } from './types';

export interface MessageStream {
  produce(
    groupId: string,
    window: DateWindow
  ): AsyncGenerator<Message, void, undefined>;
}

export type MessageStreamOptions = RateLimiterOptions;

/**
 * グループのメッセージ履歴を新しい順にたどり、期間内のメッセージだけを返すストリームを作成する
 */
export function createMessageStream(
  fetcher: MessagePageFetcher,
  options: MessageStreamOptions = {}
): MessageStream {
  async function* paginate(
    groupId: string,
    window: DateWindow
  ): AsyncGenerator<Message, void, undefined> {
    // レートリミッターは取得処理ごとに作る
    const limiter = createRateLimiter(options);
    let cursor: Cursor = null;
    let fetchCount = 0;
    let emitted = 0;

    while (true) {
      await limiter.wait();
      const page = await fetcher.fetchMessagePage(groupId, cursor);
      fetchCount++;

      if (page.length === 0) {
        logger.info(
          `  → group ${groupId}: history exhausted, ${emitted} messages in range (${fetchCount} API calls)`
        );
        return;
      }

      // フィルタ前にカーソルを進める
      cursor = page[page.length - 1].id;
      logger.debug(
        `  → group ${groupId}: page ${fetchCount} has ${page.length} messages, next before_id=${cursor}`
      );

      for (const message of page) {
        switch (classifyTimestamp(message.createdAt, window)) {
          case 'before':
            logger.info(
              `  → group ${groupId}: reached ${window.oldest.toISOString()}, ${emitted} messages in range (${fetchCount} API calls)`
            );
            return;
          case 'after':
            continue;
          case 'inside':
            emitted++;
            yield message;
        }
      }
    }
  }

  /**
   * 期間を検証してからストリームを返す。検証エラーは通信前にその場で投げる
   */
  const produce = (groupId: string, window: DateWindow) => {
    assertValidWindow(window);
    return paginate(groupId, window);
  };

  return { produce };
}
