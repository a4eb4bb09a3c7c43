import { mkdir } from 'node:fs/promises';

import { resolveUserPath } from '../../../config/paths';
import type { UserConfig } from '../../../config/user-config';
import type { Prompter } from '../../../infrastructure/cli/prompter';
import { logger } from '../../../infrastructure/logging/logger';
import type { ConfigStore } from '../../../infrastructure/storage/config-store';
import { createBaseError, isBaseError } from '../../../shared/errors/base-error';
import type { CommandController } from '../router/command-router';

export interface SetConfigControllerDeps {
  configStore: ConfigStore;
  prompter: Prompter;
  defaultImageDir: string;
}

/**
 * 設定コマンドのコントローラーを作成する
 * API トークンと画像の保存先を入力させて保存する
 */
export function createSetConfigController({
  configStore,
  prompter,
  defaultImageDir,
}: SetConfigControllerDeps): CommandController {
  /**
   * 既存の設定を読む。壊れている場合は上書きするので null とする
   */
  const readPreviousConfig = async (): Promise<UserConfig | null> => {
    try {
      return await configStore.readConfig();
    } catch (error) {
      if (isBaseError(error) && error.code === 'PERSISTENCE_ERROR') {
        logger.warn(`Ignoring unreadable configuration: ${error.message}`);
        return null;
      }
      throw error;
    }
  };

  return async (): Promise<void> => {
    await configStore.init();
    const previous = await readPreviousConfig();

    const apiToken = await prompter.password('API トークンを入力または貼り付けてください');
    if (!apiToken) {
      throw createBaseError('API トークンが入力されていません', 'VALIDATION_ERROR');
    }

    const imageDirInput = await prompter.input('画像の保存先ディレクトリを入力してください', {
      defaultValue: previous?.imageDir ?? defaultImageDir,
      validate: (value) => (value ? null : '保存先ディレクトリを入力してください。'),
    });
    const imageDir = resolveUserPath(imageDirInput);

    try {
      await mkdir(imageDir, { recursive: true });
    } catch (error) {
      throw createBaseError(`保存先ディレクトリを作成できません: ${imageDir}`, 'PERSISTENCE_ERROR', {
        imageDir,
        error,
      });
    }

    await configStore.writeConfig({ apiToken, imageDir });
    prompter.print('✅ 設定を保存しました。画像をダウンロードできます。');
  };
}
