import type { UserConfig } from '../../../config/user-config';
import type { CommandArgs } from '../../../infrastructure/cli/args';
import type { Prompter } from '../../../infrastructure/cli/prompter';
import type { ConfigStore } from '../../../infrastructure/storage/config-store';
import { createBaseError } from '../../../shared/errors/base-error';
import { formatDateInput, parseDateFlag, parseDateInput, roundMonth } from '../../common/date-input';
import type { DownloadService } from '../../download/download-service';
import type { GroupLister } from '../../groups/group-lister';
import { createDateWindow } from '../../messages/date-window';
import type { Group } from '../../messages/types';
import type { CommandController } from '../router/command-router';

export interface DownloadServices {
  groupLister: GroupLister;
  downloadService: DownloadService;
}

export interface DownloadControllerDeps {
  configStore: ConfigStore;
  prompter: Prompter;
  createServices: (config: UserConfig) => DownloadServices;
  now?: () => Date;
}

/**
 * グループの表示名を作る
 */
export function formatGroupLabel(group: Group): string {
  return `${group.name} (group id #${group.id})`;
}

/**
 * ダウンロードコマンドのコントローラーを作成する
 */
export function createDownloadController({
  configStore,
  prompter,
  createServices,
  now = () => new Date(),
}: DownloadControllerDeps): CommandController {
  /**
   * 引数の日付を使うか、なければ入力させる
   */
  const resolveDate = async (
    flagValue: string | undefined,
    flag: string,
    label: string,
    defaultDate: Date
  ): Promise<Date> => {
    if (flagValue !== undefined) {
      return parseDateFlag(flagValue, flag);
    }

    const answer = await prompter.input(`${label} (YYYY-MM-DD)`, {
      defaultValue: formatDateInput(defaultDate),
      validate: (value) => (parseDateInput(value) ? null : '日付の形式が正しくありません。'),
    });
    return parseDateFlag(answer, flag);
  };

  return async (args: CommandArgs): Promise<void> => {
    await configStore.init();
    const config = await configStore.readConfig();
    if (!config) {
      throw createBaseError(
        'ユーザー設定が見つかりません。先に `set-config` コマンドを実行してください。',
        'CONFIG_NOT_FOUND'
      );
    }

    const { groupLister, downloadService } = createServices(config);

    const groups = await groupLister.listGroups();
    if (groups.length === 0) {
      throw createBaseError('ダウンロードできるグループがありません。', 'NO_GROUPS');
    }

    const groupIndex = await prompter.select(
      '画像をダウンロードするグループを選択してください',
      groups.map(formatGroupLabel),
      0
    );
    const group = groups[groupIndex];

    const today = now();
    const start = await resolveDate(
      args.start,
      '--start',
      '開始日を入力してください',
      roundMonth(today, -1)
    );
    const end = await resolveDate(args.end, '--end', '終了日を入力してください', roundMonth(today, 0));
    const window = createDateWindow(start, end);

    const summary = await downloadService.downloadGroupMedia({
      group,
      window,
      imageDir: config.imageDir,
    });

    prompter.print(
      `✅ ${summary.downloaded} 件をダウンロード、${summary.skipped} 件をスキップしました（対象メッセージ ${summary.messages} 件）`
    );
  };
}
