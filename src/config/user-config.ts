import { z } from 'zod';

/**
 * ディスクに保存するユーザー設定
 * apiToken は秘密情報なのでログに出さないこと
 */
export const userConfigSchema = z.object({
  apiToken: z.string().min(1),
  imageDir: z.string().min(1),
});

export type UserConfig = z.infer<typeof userConfigSchema>;
