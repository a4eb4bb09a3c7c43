import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  GROUPME_API_BASE_URL: z.string().url().default('https://api.groupme.com/v3'),
  GROUPME_CONFIG_DIR: z.string().min(1).optional(),
  XDG_CONFIG_HOME: z.string().min(1).optional(),
  APPDATA: z.string().min(1).optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  DOWNLOAD_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

export type Env = z.infer<typeof envSchema>;

let cached: Env | null = null;

/**
 * 環境変数を読み込み、バリデーションして返す
 */
export function loadEnv(): Env {
  if (!cached) {
    cached = envSchema.parse(process.env);
  }
  return cached;
}
