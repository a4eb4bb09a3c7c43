import os from 'node:os';
import path from 'node:path';

import type { Env } from './env';

const APP_DIRNAME = 'groupme_downloader';

type ConfigDirEnv = Pick<Env, 'GROUPME_CONFIG_DIR' | 'XDG_CONFIG_HOME' | 'APPDATA'>;

/**
 * 設定ファイルを置くディレクトリを解決する
 * GROUPME_CONFIG_DIR があればそれを優先し、なければ OS 標準の設定ディレクトリを使う
 */
export function resolveConfigDir(
  env: ConfigDirEnv,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): string {
  if (env.GROUPME_CONFIG_DIR) {
    return path.resolve(env.GROUPME_CONFIG_DIR);
  }

  switch (platform) {
    case 'win32':
      return path.join(env.APPDATA ?? path.join(homeDir, 'AppData', 'Roaming'), APP_DIRNAME);
    case 'darwin':
      return path.join(homeDir, 'Library', 'Application Support', APP_DIRNAME);
    default:
      return path.join(env.XDG_CONFIG_HOME ?? path.join(homeDir, '.config'), APP_DIRNAME);
  }
}

/**
 * 画像保存先の既定ディレクトリ
 */
export function defaultImageDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, 'Pictures', 'groupme');
}

/**
 * 先頭の ~ をホームディレクトリに展開して絶対パスにする
 */
export function resolveUserPath(input: string, homeDir: string = os.homedir()): string {
  if (input === '~') return homeDir;
  if (input.startsWith('~/')) return path.join(homeDir, input.slice(2));
  return path.resolve(input);
}
