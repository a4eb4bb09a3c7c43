import { parseArgs } from 'node:util';

import { createBaseError } from '../../shared/errors/base-error';

export interface CommandArgs {
  command: string | undefined;
  start?: string;
  end?: string;
  help: boolean;
}

const parseOptions = {
  start: { type: 'string', short: 's' },
  end: { type: 'string', short: 'e' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseRaw(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: parseOptions });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createBaseError(`引数が正しくありません: ${message}`, 'VALIDATION_ERROR', { argv });
  }
}

/**
 * コマンドライン引数を解釈する
 */
export function parseCommandArgs(argv: string[]): CommandArgs {
  const { values, positionals } = parseRaw(argv);
  if (positionals.length > 1) {
    throw createBaseError(
      `余分な引数があります: ${positionals.slice(1).join(' ')}`,
      'VALIDATION_ERROR',
      { argv }
    );
  }

  return {
    command: positionals.length > 0 ? positionals[0] : undefined,
    start: values.start,
    end: values.end,
    help: values.help ?? false,
  };
}
