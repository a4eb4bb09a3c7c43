import readline from 'node:readline/promises';
import { Writable } from 'node:stream';

import { createBaseError } from '../../shared/errors/base-error';

export interface InputOptions {
  defaultValue?: string;
  /**
   * 不正な入力ならエラーメッセージを返す
   */
  validate?: (value: string) => string | null;
}

export interface Prompter {
  input(message: string, options?: InputOptions): Promise<string>;
  password(message: string): Promise<string>;
  select(message: string, items: readonly string[], defaultIndex?: number): Promise<number>;
  print(message: string): void;
  close(): void;
}

/**
 * 番号入力を 0 始まりのインデックスに変換する。空入力は既定値、範囲外は null
 */
export function parseSelection(
  answer: string,
  itemCount: number,
  defaultIndex: number
): number | null {
  const trimmed = answer.trim();
  if (trimmed === '') return defaultIndex;
  if (!/^\d+$/.test(trimmed)) return null;

  const selected = Number(trimmed);
  return selected >= 1 && selected <= itemCount ? selected - 1 : null;
}

/**
 * ターミナルで入力を受け付けるプロンプターを作成する
 */
export function createPrompter(
  inputStream: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  let muted = false;
  let ended = false;
  let rl: readline.Interface | null = null;
  let rejectPending: ((error: Error) => void) | null = null;

  const inputEnded = () => createBaseError('入力が終了しました', 'VALIDATION_ERROR');

  // パスワード入力中はエコーを捨てる
  const echo = new Writable({
    write(chunk, _encoding, callback) {
      if (!muted) output.write(chunk);
      callback();
    },
  });

  const getInterface = (): readline.Interface => {
    if (!rl) {
      rl = readline.createInterface({
        input: inputStream,
        output: echo,
        terminal: 'isTTY' in inputStream && inputStream.isTTY === true,
      });
      // 入力が閉じられたら（Ctrl-D など）待機中の質問を失敗させる
      rl.once('close', () => {
        ended = true;
        rejectPending?.(inputEnded());
      });
    }
    return rl;
  };

  const ask = async (question: string, hidden = false): Promise<string> => {
    if (ended) throw inputEnded();

    const rli = getInterface();
    output.write(question);
    muted = hidden;
    try {
      return await new Promise<string>((resolve, reject) => {
        rejectPending = reject;
        rli.question('').then(resolve, reject);
      });
    } finally {
      rejectPending = null;
      if (hidden) {
        muted = false;
        output.write('\n');
      }
    }
  };

  const print = (message: string) => {
    output.write(`${message}\n`);
  };

  const input = async (message: string, options: InputOptions = {}): Promise<string> => {
    const suffix = options.defaultValue ? ` [${options.defaultValue}]` : '';

    while (true) {
      const answer = (await ask(`${message}${suffix}: `)).trim();
      const value = answer === '' && options.defaultValue !== undefined ? options.defaultValue : answer;
      const problem = options.validate?.(value) ?? null;
      if (!problem) return value;
      print(`  ${problem}`);
    }
  };

  const password = async (message: string): Promise<string> =>
    (await ask(`${message}: `, true)).trim();

  const select = async (
    message: string,
    items: readonly string[],
    defaultIndex = 0
  ): Promise<number> => {
    print(message);
    items.forEach((item, index) => print(`  ${index + 1}) ${item}`));

    while (true) {
      const answer = await ask(`番号を入力してください [${defaultIndex + 1}]: `);
      const selected = parseSelection(answer, items.length, defaultIndex);
      if (selected !== null) return selected;
      print(`  1 から ${items.length} の番号を入力してください。`);
    }
  };

  const close = () => {
    rl?.close();
    rl = null;
  };

  return { input, password, select, print, close };
}
