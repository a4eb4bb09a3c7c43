import { getHelpMessage } from '../../common/help-service';
import type { CommandController } from '../router/command-router';

/**
 * ヘルプコマンドのコントローラーを作成する
 */
export function createHelpController(print: (message: string) => void): CommandController {
  return async (): Promise<void> => {
    print(getHelpMessage());
  };
}
