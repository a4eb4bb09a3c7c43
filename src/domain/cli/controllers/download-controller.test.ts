import { describe, expect, it, vi } from 'vitest';

import type { UserConfig } from '../../../config/user-config';
import type { CommandArgs } from '../../../infrastructure/cli/args';
import type { Prompter } from '../../../infrastructure/cli/prompter';
import type { ConfigStore } from '../../../infrastructure/storage/config-store';
import type { DownloadService } from '../../download/download-service';
import type { Group } from '../../messages/types';

import { createDownloadController, formatGroupLabel } from './download-controller';

const group = (id: string, name: string): Group => ({
  id,
  name,
  type: 'private',
  description: '',
  creatorUserId: 'u1',
  createdAt: new Date('2020-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
  members: [],
});

const groups = [group('g1', 'Family'), group('g2', 'Work')];

const args = (overrides: Partial<CommandArgs> = {}): CommandArgs => ({
  command: 'download',
  help: false,
  ...overrides,
});

function setup({
  config = { apiToken: 'test-token', imageDir: '/tmp/pictures' },
  listed = groups,
}: { config?: UserConfig | null; listed?: Group[] } = {}) {
  const configStore: ConfigStore = {
    configFilePath: '/tmp/config/config.json',
    init: vi.fn(async () => undefined),
    readConfig: vi.fn(async () => config),
    writeConfig: vi.fn(async () => undefined),
  };
  const prompter = {
    input: vi.fn<Prompter['input']>(async (_message, options) => options?.defaultValue ?? ''),
    password: vi.fn<Prompter['password']>(async () => ''),
    select: vi.fn<Prompter['select']>(async () => 1),
    print: vi.fn<Prompter['print']>(),
    close: vi.fn<Prompter['close']>(),
  };
  const downloadGroupMedia = vi.fn<DownloadService['downloadGroupMedia']>(async () => ({
    messages: 3,
    downloaded: 2,
    skipped: 1,
  }));
  const listGroups = vi.fn(async () => listed);
  const createServices = vi.fn((_config: UserConfig) => ({
    groupLister: { listGroups },
    downloadService: { downloadGroupMedia },
  }));

  const controller = createDownloadController({
    configStore,
    prompter,
    createServices,
    now: () => new Date(2024, 5, 17, 10, 30),
  });

  return { controller, prompter, createServices, downloadGroupMedia };
}

describe('formatGroupLabel', () => {
  it('shows the name followed by the group id', () => {
    expect(formatGroupLabel(group('123', 'Family'))).toBe('Family (group id #123)');
  });
});

describe('createDownloadController', () => {
  it('downloads the selected group over the window given by flags', async () => {
    const { controller, prompter, createServices, downloadGroupMedia } = setup();

    await controller(args({ start: '2024-03-01', end: '2024-04-01' }));

    expect(createServices).toHaveBeenCalledWith({
      apiToken: 'test-token',
      imageDir: '/tmp/pictures',
    });
    expect(prompter.select).toHaveBeenCalledWith(
      '画像をダウンロードするグループを選択してください',
      ['Family (group id #g1)', 'Work (group id #g2)'],
      0
    );
    expect(prompter.input).not.toHaveBeenCalled();
    expect(downloadGroupMedia).toHaveBeenCalledWith({
      group: groups[1],
      window: { oldest: new Date(2024, 2, 1), newest: new Date(2024, 3, 1) },
      imageDir: '/tmp/pictures',
    });
    expect(prompter.print).toHaveBeenCalledWith(
      '✅ 2 件をダウンロード、1 件をスキップしました（対象メッセージ 3 件）'
    );
  });

  it('asks for missing dates, defaulting to the previous calendar month', async () => {
    const { controller, prompter, downloadGroupMedia } = setup();

    await controller(args());

    expect(prompter.input).toHaveBeenNthCalledWith(
      1,
      '開始日を入力してください (YYYY-MM-DD)',
      expect.objectContaining({ defaultValue: '2024-05-01' })
    );
    expect(prompter.input).toHaveBeenNthCalledWith(
      2,
      '終了日を入力してください (YYYY-MM-DD)',
      expect.objectContaining({ defaultValue: '2024-06-01' })
    );
    expect(downloadGroupMedia).toHaveBeenCalledWith(
      expect.objectContaining({
        window: { oldest: new Date(2024, 4, 1), newest: new Date(2024, 5, 1) },
      })
    );
  });

  it('rejects prompted dates that do not parse', async () => {
    const { controller, prompter } = setup();

    await controller(args({ end: '2024-07-01' }));

    const options = prompter.input.mock.calls[0]?.[1];
    expect(options?.validate?.('2024-02-30')).toBe('日付の形式が正しくありません。');
    expect(options?.validate?.('2024-02-29')).toBeNull();
  });

  it('requires a saved configuration', async () => {
    const { controller, createServices } = setup({ config: null });

    await expect(controller(args())).rejects.toMatchObject({ code: 'CONFIG_NOT_FOUND' });
    expect(createServices).not.toHaveBeenCalled();
  });

  it('fails when the account has no groups', async () => {
    const { controller, prompter } = setup({ listed: [] });

    await expect(controller(args())).rejects.toMatchObject({ code: 'NO_GROUPS' });
    expect(prompter.select).not.toHaveBeenCalled();
  });

  it('rejects an end date that is not after the start date', async () => {
    const { controller, downloadGroupMedia } = setup();

    await expect(
      controller(args({ start: '2024-06-01', end: '2024-06-01' }))
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    expect(downloadGroupMedia).not.toHaveBeenCalled();
  });

  it('rejects a malformed date flag', async () => {
    const { controller } = setup();

    await expect(controller(args({ start: '06/01/2024' }))).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { flag: '--start', input: '06/01/2024' },
    });
  });
});
