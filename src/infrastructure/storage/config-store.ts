import { mkdir, open, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { z } from 'zod';

import { userConfigSchema, type UserConfig } from '../../config/user-config';
import { createBaseError } from '../../shared/errors/base-error';
import { formatIssuePath } from '../../shared/errors/issue-path';
import { fileExists } from '../../shared/utils/fs';
import { logger } from '../logging/logger';

export const CONFIG_FILENAME = 'config.json';
const TEST_FILENAME = '.test_file';

export interface ConfigStore {
  readonly configFilePath: string;
  init(): Promise<void>;
  readConfig(): Promise<UserConfig | null>;
  writeConfig(config: UserConfig): Promise<void>;
}

/**
 * JSON ファイルを読み込んでスキーマで検証する。ファイルがなければ null
 */
async function readJson<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<z.output<S> | null> {
  let raw: string;
  try {
    if (!(await fileExists(filePath))) return null;
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw createBaseError(`ファイルを読み込めません: ${filePath}`, 'PERSISTENCE_ERROR', {
      filePath,
      error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw createBaseError(`ファイルが壊れています: ${filePath}`, 'PERSISTENCE_ERROR', {
      filePath,
      path: '(root)',
      error,
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const issuePath = formatIssuePath(issue?.path ?? []);
    throw createBaseError(
      `ファイルの内容が不正です (${issuePath}): ${filePath}`,
      'PERSISTENCE_ERROR',
      { filePath, path: issuePath }
    );
  }

  return parsed.data;
}

/**
 * JSON を書き込む。既存のファイルは上書きし、所有者のみ読み書き可能にする
 */
async function writeJson(filePath: string, data: unknown): Promise<void> {
  try {
    const handle = await open(filePath, 'w', 0o600);
    try {
      if (process.platform !== 'win32') {
        await handle.chmod(0o600);
      }
      await handle.writeFile(`${JSON.stringify(data, null, 2)}\n`, 'utf8');
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw createBaseError(`ファイルに書き込めません: ${filePath}`, 'PERSISTENCE_ERROR', {
      filePath,
      error,
    });
  }
}

/**
 * ユーザー設定を保存するストアを作成する
 */
export function createConfigStore(configDir: string): ConfigStore {
  const configFilePath = path.join(configDir, CONFIG_FILENAME);

  /**
   * ディレクトリを作成し、書き込み・削除ができることを確認する
   */
  const init = async (): Promise<void> => {
    const testFile = path.join(configDir, TEST_FILENAME);
    try {
      await mkdir(configDir, { recursive: true });
      await writeFile(testFile, '');
      await rm(testFile);
    } catch (error) {
      throw createBaseError(
        `設定ディレクトリを利用できません: ${configDir}`,
        'PERSISTENCE_ERROR',
        { configDir, error }
      );
    }
    logger.debug(`Config directory ready: ${configDir}`);
  };

  const readConfig = (): Promise<UserConfig | null> => readJson(configFilePath, userConfigSchema);

  const writeConfig = async (config: UserConfig): Promise<void> => {
    await writeJson(configFilePath, config);
    logger.info(`Saved configuration to ${configFilePath}`);
  };

  return { configFilePath, init, readConfig, writeConfig };
}
