import { logger } from '../../infrastructure/logging/logger';
import type { Group, GroupPageFetcher } from '../messages/types';

// 取得するグループ数の上限。これを超えた時点で打ち切る（最大で上限 + 1 ページ分になる）
export const MAX_LISTED_GROUPS = 100;

export interface GroupLister {
  listGroups(): Promise<Group[]>;
}

/**
 * 所属グループを先頭ページから順に取得するリスターを作成する
 */
export function createGroupLister(fetcher: GroupPageFetcher): GroupLister {
  const listGroups = async (): Promise<Group[]> => {
    const groups: Group[] = [];
    let page = 1;

    while (true) {
      const batch = await fetcher.fetchGroupPage(page);
      if (batch.length === 0) break;

      page++;
      groups.push(...batch);

      if (groups.length > MAX_LISTED_GROUPS) {
        logger.warn(`Group list truncated at ${groups.length} groups`);
        break;
      }
    }

    logger.info(`✓ Found ${groups.length} groups`);
    return groups;
  };

  return { listGroups };
}
