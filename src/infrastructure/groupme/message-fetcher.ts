import type {
  Cursor,
  Group,
  GroupPageFetcher,
  Message,
  MessageAttachment,
  MessagePage,
  MessagePageFetcher,
} from '../../domain/messages/types';

import type { ApiClient } from './api-client';
import {
  groupMessagesResponseSchema,
  groupsResponseSchema,
  type WireAttachment,
  type WireGroup,
  type WireMessage,
} from './schemas';

export const MESSAGE_PAGE_SIZE = 100;
export const GROUP_PAGE_SIZE = 10;

/**
 * 添付ファイルをドメインの形式に変換する
 */
function toAttachment(attachment: WireAttachment): MessageAttachment {
  switch (attachment.type) {
    case 'video':
      return { type: 'video', url: attachment.url, previewUrl: attachment.preview_url };
    case 'reply':
      return {
        type: 'reply',
        userId: attachment.user_id,
        replyId: attachment.reply_id,
        baseReplyId: attachment.base_reply_id,
      };
    default:
      return attachment;
  }
}

function toMessage(message: WireMessage): Message {
  return {
    id: message.id,
    sourceGuid: message.source_guid,
    createdAt: message.created_at,
    userId: message.user_id,
    groupId: message.group_id,
    name: message.name,
    avatarUrl: message.avatar_url ?? undefined,
    text: message.text ?? undefined,
    system: message.system,
    favoritedBy: message.favorited_by,
    attachments: message.attachments.map(toAttachment),
  };
}

function toGroup(group: WireGroup): Group {
  return {
    id: group.id,
    name: group.name,
    type: group.type,
    description: group.description ?? '',
    creatorUserId: group.creator_user_id,
    imageUrl: group.image_url ?? undefined,
    shareUrl: group.share_url ?? undefined,
    createdAt: group.created_at,
    updatedAt: group.updated_at,
    members: group.members.map((member) => ({
      userId: member.user_id,
      nickname: member.nickname,
      muted: member.muted,
      imageUrl: member.image_url ?? undefined,
    })),
  };
}

/**
 * メッセージとグループ一覧をページ単位で取得するフェッチャーを作成する
 */
export function createMessageFetcher(client: ApiClient): MessagePageFetcher & GroupPageFetcher {
  /**
   * before より古いメッセージを新しい順に 1 ページ取得する
   * 履歴の終端では API が 304 を返すので空ページとして扱う
   */
  const fetchMessagePage = async (groupId: string, before: Cursor): Promise<MessagePage> => {
    const body = await client.get(
      `/groups/${encodeURIComponent(groupId)}/messages`,
      [
        ['limit', MESSAGE_PAGE_SIZE],
        ['before_id', before],
      ],
      groupMessagesResponseSchema
    );

    return body ? body.response.messages.map(toMessage) : [];
  };

  /**
   * グループ一覧を 1 ページ取得する（page は 1 始まり）
   */
  const fetchGroupPage = async (page: number): Promise<Group[]> => {
    const body = await client.get(
      '/groups',
      [
        ['per_page', GROUP_PAGE_SIZE],
        ['page', page],
      ],
      groupsResponseSchema
    );

    return body ? body.response.map(toGroup) : [];
  };

  return { fetchMessagePage, fetchGroupPage };
}
