/**
 * ヘルプメッセージを取得する
 */
export function getHelpMessage(): string {
  return [
    'groupme-downloader: GroupMe グループの画像・動画を期間指定でダウンロードします',
    '',
    '使い方:',
    '  groupme-downloader set-config',
    '      API トークンと保存先ディレクトリを設定します。',
    '  groupme-downloader download [--start YYYY-MM-DD] [--end YYYY-MM-DD]',
    '      グループを選んで期間内のメディアを保存します（設定が必要です）。',
    '      日付を省略すると入力を求めます。',
    '  groupme-downloader help',
    '      このヘルプを表示します。',
  ].join('\n');
}
