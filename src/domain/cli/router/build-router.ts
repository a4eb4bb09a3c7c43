import type { Env } from '../../../config/env';
import { defaultImageDir, resolveConfigDir } from '../../../config/paths';
import type { UserConfig } from '../../../config/user-config';
import type { Prompter } from '../../../infrastructure/cli/prompter';
import { createApiClient } from '../../../infrastructure/groupme/api-client';
import { createMessageFetcher } from '../../../infrastructure/groupme/message-fetcher';
import { createConfigStore } from '../../../infrastructure/storage/config-store';
import { createDownloadService } from '../../download/download-service';
import { createGroupLister } from '../../groups/group-lister';
import { createMessageStream } from '../../messages/message-stream';
import { createDownloadController, type DownloadServices } from '../controllers/download-controller';
import { createHelpController } from '../controllers/help-controller';
import { createSetConfigController } from '../controllers/set-config-controller';

import { createCommandRouter, HELP_COMMAND } from './command-router';

/**
 * コマンドルーターを構築し、すべてのコマンドを登録する
 */
export function buildRouter(env: Env, prompter: Prompter) {
  const router = createCommandRouter({
    print: prompter.print,
    error: (message) => console.error(message),
  });
  const configStore = createConfigStore(resolveConfigDir(env));

  /**
   * 保存済みの設定から API 関連のサービスを組み立てる
   */
  const createServices = (config: UserConfig): DownloadServices => {
    const client = createApiClient({
      baseUrl: env.GROUPME_API_BASE_URL,
      apiToken: config.apiToken,
      timeoutMs: env.HTTP_TIMEOUT_MS,
    });
    const fetcher = createMessageFetcher(client);

    return {
      groupLister: createGroupLister(fetcher),
      downloadService: createDownloadService(createMessageStream(fetcher), client, {
        concurrency: env.DOWNLOAD_CONCURRENCY,
      }),
    };
  };

  router.register(
    'set-config',
    createSetConfigController({ configStore, prompter, defaultImageDir: defaultImageDir() })
  );
  router.register('download', createDownloadController({ configStore, prompter, createServices }));
  router.register(HELP_COMMAND, createHelpController(prompter.print));

  return router;
}
