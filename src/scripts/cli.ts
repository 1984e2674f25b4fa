#!/usr/bin/env node
// 対話型コンソール

import readline from 'readline';
import { Calendar } from '../calendar/calendar';
import { CommandInterpreter } from '../cli/commands';
import { loadConfig } from '../common/config';

/**
 * メイン関数
 */
function main(): void {
  // コマンドライン引数から設定ファイルパスを取得
  const configArg = process.argv.find((arg) => arg.startsWith('--config='));
  const configPath = configArg ? configArg.split('=')[1] : undefined;

  const config = loadConfig(configPath);
  const calendar = new Calendar({
    defaultReminderType: config.calendar.defaultReminderType,
  });
  const interpreter = new CommandInterpreter(calendar, config);

  console.log('カレンダーを起動しました。helpでコマンド一覧を表示します');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: config.cli.prompt,
  });

  rl.on('line', (line) => {
    const result = interpreter.execute(line);
    if (result.output) {
      console.log(result.output);
    }
    if (result.exit) {
      rl.close();
      return;
    }
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('カレンダーを終了しました（データは保存されません）');
  });

  rl.prompt();
}

try {
  main();
} catch (error) {
  console.error('カレンダーの起動に失敗しました:', error);
  process.exit(1);
}
