export type MessageAttachment =
  | { type: 'image'; url: string }
  | { type: 'linked_image'; url: string }
  | { type: 'video'; url: string; previewUrl: string }
  | { type: 'file'; url: string }
  | { type: 'location'; lat: string; lon: string; name: string }
  | { type: 'split'; token: string }
  | { type: 'emoji'; placeholder: string; charmap: string[][] }
  | { type: 'reply'; userId: string; replyId: string; baseReplyId: string }
  | { type: 'other'; originalType: string };

export interface Message {
  readonly id: string;
  readonly sourceGuid: string;
  readonly createdAt: Date;
  readonly userId: string;
  readonly groupId: string;
  readonly name: string;
  readonly avatarUrl?: string;
  readonly text?: string;
  readonly system: boolean;
  readonly favoritedBy: readonly string[];
  readonly attachments: readonly MessageAttachment[];
}

/**
 * 1 回の取得で返るメッセージ列（新しい順）。空ならそれ以上の履歴はない
 */
export type MessagePage = readonly Message[];

/**
 * 「このメッセージより古いもの」を要求するためのカーソル。null は最新から
 */
export type Cursor = string | null;

export interface GroupMember {
  userId: string;
  nickname: string;
  muted: boolean;
  imageUrl?: string;
}

export interface Group {
  id: string;
  name: string;
  type: string;
  description: string;
  creatorUserId: string;
  imageUrl?: string;
  shareUrl?: string;
  createdAt: Date;
  updatedAt: Date;
  members: GroupMember[];
}

export interface MessagePageFetcher {
  fetchMessagePage(groupId: string, before: Cursor): Promise<MessagePage>;
}

export interface GroupPageFetcher {
  fetchGroupPage(page: number): Promise<Group[]>;
}
