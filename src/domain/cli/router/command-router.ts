import type { CommandArgs } from '../../../infrastructure/cli/args';
import { logger } from '../../../infrastructure/logging/logger';
import { describeError, isBaseError } from '../../../shared/errors/base-error';

export type CommandController = (args: CommandArgs) => Promise<void>;

export interface CommandOutput {
  print(message: string): void;
  error(message: string): void;
}

export const HELP_COMMAND = 'help';

/**
 * コマンドルーターを作成する
 */
export function createCommandRouter(output: CommandOutput) {
  const controllers = new Map<string, CommandController>();

  /**
   * コマンド名とコントローラーを登録する
   */
  const register = (commandName: string, controller: CommandController) => {
    controllers.set(commandName, controller);
  };

  /**
   * 引数に対応するコントローラーを実行し、終了コードを返す
   */
  const handle = async (args: CommandArgs): Promise<number> => {
    const commandName = args.help || !args.command ? HELP_COMMAND : args.command;
    const controller = controllers.get(commandName);

    if (!controller) {
      logger.warn(`No controller registered for command ${commandName}`);
      output.error(`不明なコマンドです: ${commandName}`);
      const help = controllers.get(HELP_COMMAND);
      if (help) await help(args);
      return 1;
    }

    try {
      await controller(args);
      return 0;
    } catch (error) {
      if (isBaseError(error)) {
        logger.debug(`Command ${commandName} failed`, error.details);
      } else {
        logger.error('Command handling failed', error);
      }
      output.error(`❌ ${describeError(error)}`);
      return 1;
    }
  };

  return { register, handle };
}
