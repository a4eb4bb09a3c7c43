#!/usr/bin/env node
import { loadEnv } from './config/env';
import { buildRouter } from './domain/cli/router/build-router';
import { parseCommandArgs } from './infrastructure/cli/args';
import { createPrompter } from './infrastructure/cli/prompter';
import { logger } from './infrastructure/logging/logger';
import { describeError } from './shared/errors/base-error';

/**
 * CLI を起動する
 * 引数を解釈して対応するコマンドを実行し、終了コードを返す
 */
async function bootstrap(): Promise<number> {
  const env = loadEnv();
  const args = parseCommandArgs(process.argv.slice(2));
  const prompter = createPrompter();

  try {
    return await buildRouter(env, prompter).handle(args);
  } finally {
    prompter.close();
  }
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    logger.error('Fatal error during bootstrap', error);
    console.error(`❌ ${describeError(error)}`);
    process.exitCode = 1;
  });

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', reason);
});
