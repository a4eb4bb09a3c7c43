import { z } from 'zod';

// GroupMe のタイムスタンプは UNIX 秒
const timestampSchema = z
  .number()
  .int()
  .transform((seconds) => new Date(seconds * 1000));

const metaSchema = z.object({
  code: z.number().int(),
});

const knownAttachmentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('image'), url: z.string() }),
  z.object({ type: z.literal('linked_image'), url: z.string() }),
  z.object({ type: z.literal('video'), url: z.string(), preview_url: z.string() }),
  z.object({ type: z.literal('file'), url: z.string() }),
  z.object({
    type: z.literal('location'),
    lat: z.string(),
    lon: z.string(),
    name: z.string(),
  }),
  z.object({ type: z.literal('split'), token: z.string() }),
  z.object({
    type: z.literal('emoji'),
    placeholder: z.string(),
    charmap: z.array(z.array(z.string())),
  }),
  z.object({
    type: z.literal('reply'),
    user_id: z.string(),
    reply_id: z.string(),
    base_reply_id: z.string(),
  }),
]);

const KNOWN_ATTACHMENT_TYPES: ReadonlySet<string> = new Set(
  knownAttachmentSchema.options.map((option) => option.shape.type.value)
);

// mentions や poll など未対応の種類は type だけ保持する
const otherAttachmentSchema = z
  .object({
    type: z.string().refine((type) => !KNOWN_ATTACHMENT_TYPES.has(type), {
      message: 'Known attachment type with unexpected fields',
    }),
  })
  .transform(({ type }) => ({ type: 'other' as const, originalType: type }));

const attachmentSchema = z.union([knownAttachmentSchema, otherAttachmentSchema]);

const messageSchema = z.object({
  id: z.string(),
  source_guid: z.string(),
  created_at: timestampSchema,
  user_id: z.string(),
  group_id: z.string(),
  name: z.string(),
  avatar_url: z.string().nullish(),
  text: z.string().nullish(),
  system: z.boolean(),
  favorited_by: z.array(z.string()),
  attachments: z.array(attachmentSchema),
});

export const groupMessagesResponseSchema = z.object({
  meta: metaSchema,
  response: z.object({
    count: z.number().int(),
    messages: z.array(messageSchema),
  }),
});

const groupMemberSchema = z.object({
  user_id: z.string(),
  nickname: z.string(),
  muted: z.boolean(),
  image_url: z.string().nullish(),
});

const groupSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  description: z.string().nullish(),
  creator_user_id: z.string(),
  image_url: z.string().nullish(),
  share_url: z.string().nullish(),
  created_at: timestampSchema,
  updated_at: timestampSchema,
  members: z.array(groupMemberSchema),
});

export const groupsResponseSchema = z.object({
  meta: metaSchema,
  response: z.array(groupSchema),
});

export type WireAttachment = z.infer<typeof attachmentSchema>;
export type WireMessage = z.infer<typeof messageSchema>;
export type WireGroup = z.infer<typeof groupSchema>;
