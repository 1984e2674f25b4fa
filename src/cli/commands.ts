// コンソール用コマンドの解釈と実行

import { Calendar } from '../calendar/calendar';
import { CalendarError } from '../common/errors';
import { isReminderType } from '../common/config';
import { addDaysToDate, parseDateTime, toDateString } from '../common/time';
import { AppConfig } from '../types/config';
import { ReminderType } from '../types/calendar';

export interface CommandResult {
  output: string;
  exit: boolean;
}

/** コマンドの使い方の誤り */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export const HELP_TEXT = `
コマンド一覧:
  add <タイトル> <説明> <日付> <開始> <終了>          イベントを作成
  update <ID> <タイトル> <説明> <日付> <開始> <終了>  イベントを更新
  delete <ID>                                      イベントを削除
  slots <日付>                                     空き時間枠を表示
  events [開始日] [終了日]                          期間内のイベントを表示
  remind <ID> <YYYY-MM-DDTHH:mm> [email|system]    リマインダーを追加
  reminders <ID>                                   リマインダー一覧を表示
  unremind <ID> <番号>                              リマインダーを削除
  help                                             このヘルプを表示
  exit                                             終了
日付はYYYY-MM-DD、時刻はHH:mm形式。空白を含む値は "..." で囲む
`.trim();

/**
 * 入力行を引数に分割する
 * ダブルクォートで囲まれた部分は空白を含めて1つの引数になる
 * @param line 入力行
 * @returns 引数の配列
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inQuotes = false;
  let hasToken = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
      hasToken = true;
    } else if (!inQuotes && /\s/.test(char)) {
      if (hasToken) {
        tokens.push(current);
        current = '';
        hasToken = false;
      }
    } else {
      current += char;
      hasToken = true;
    }
  }

  if (inQuotes) {
    throw new CommandError('引用符が閉じられていません');
  }
  if (hasToken) {
    tokens.push(current);
  }
  return tokens;
}

function expectArgs(args: string[], count: number, usage: string): void {
  if (args.length !== count) {
    throw new CommandError(`使い方: ${usage}`);
  }
}

export class CommandInterpreter {
  private calendar: Calendar;
  private config: AppConfig;
  private now: () => Date;

  constructor(
    calendar: Calendar,
    config: AppConfig,
    now: () => Date = () => new Date()
  ) {
    this.calendar = calendar;
    this.config = config;
    this.now = now;
  }

  /**
   * 1行分のコマンドを実行する
   * カレンダー操作のエラーと使い方の誤りは出力として返し、それ以外は呼び出し元に伝播する
   * @param line 入力行
   */
  execute(line: string): CommandResult {
    try {
      const tokens = tokenize(line);
      if (tokens.length === 0) {
        return { output: '', exit: false };
      }
      const [command, ...args] = tokens;
      if (command === 'exit' || command === 'quit') {
        return { output: '終了します', exit: true };
      }
      return { output: this.run(command, args), exit: false };
    } catch (error) {
      if (error instanceof CalendarError || error instanceof CommandError) {
        return { output: `エラー: ${error.message}`, exit: false };
      }
      throw error;
    }
  }

  private run(command: string, args: string[]): string {
    switch (command) {
      case 'help':
        return HELP_TEXT;
      case 'add':
        return this.add(args);
      case 'update':
        return this.update(args);
      case 'delete':
        expectArgs(args, 1, 'delete <ID>');
        this.calendar.deleteEvent(args[0]);
        return `イベントを削除しました: ${args[0]}`;
      case 'slots':
        return this.slots(args);
      case 'events':
        return this.events(args);
      case 'remind':
        return this.remind(args);
      case 'reminders':
        return this.reminders(args);
      case 'unremind':
        return this.unremind(args);
      default:
        throw new CommandError(
          `不明なコマンドです: ${command}。helpでコマンド一覧を表示します`
        );
    }
  }

  private add(args: string[]): string {
    expectArgs(args, 5, 'add <タイトル> <説明> <日付> <開始> <終了>');
    const [title, description, date, startAt, endAt] = args;
    const eventId = this.calendar.addEvent({
      title,
      description,
      date,
      startAt,
      endAt,
    });
    return `イベントを作成しました: ${eventId}`;
  }

  private update(args: string[]): string {
    expectArgs(args, 6, 'update <ID> <タイトル> <説明> <日付> <開始> <終了>');
    const [eventId, title, description, date, startAt, endAt] = args;
    this.calendar.updateEvent(eventId, {
      title,
      description,
      date,
      startAt,
      endAt,
    });
    return `イベントを更新しました: ${eventId}`;
  }

  private slots(args: string[]): string {
    expectArgs(args, 1, 'slots <日付>');
    const slots = this.calendar.findAvailableSlots(args[0]);
    if (slots.length === 0) {
      return `${args[0]} の空き時間枠はありません`;
    }
    return `${args[0]} の空き時間枠 (${slots.length}件):\n${slots.join(', ')}`;
  }

  private events(args: string[]): string {
    if (args.length > 2) {
      throw new CommandError('使い方: events [開始日] [終了日]');
    }
    const startDate = args.length > 0 ? args[0] : toDateString(this.now());
    const endDate =
      args.length > 1
        ? args[1]
        : addDaysToDate(startDate, this.config.calendar.searchDays);

    const grouped = this.calendar.findEvents(startDate, endDate);
    if (grouped.size === 0) {
      return `${startDate} から ${endDate} までのイベントはありません`;
    }

    const sections: string[] = [];
    for (const [date, events] of grouped) {
      sections.push(
        [`=== ${date} ===`, ...events.map((event) => event.toString())].join(
          '\n'
        )
      );
    }
    return sections.join('\n\n');
  }

  private remind(args: string[]): string {
    if (args.length !== 2 && args.length !== 3) {
      throw new CommandError(
        '使い方: remind <ID> <YYYY-MM-DDTHH:mm> [email|system]'
      );
    }
    const [eventId, dateTime, typeArg] = args;
    let type: ReminderType | undefined;
    if (args.length === 3) {
      if (!isReminderType(typeArg)) {
        throw new CommandError(`リマインダー種別が不正です: ${typeArg}`);
      }
      type = typeArg;
    }

    const reminder = this.calendar.addReminder(
      eventId,
      parseDateTime(dateTime),
      type
    );
    return `リマインダーを追加しました: ${reminder.toString()}`;
  }

  private reminders(args: string[]): string {
    expectArgs(args, 1, 'reminders <ID>');
    const reminders = this.calendar.listReminders(args[0]);
    if (reminders.length === 0) {
      return 'リマインダーはありません';
    }
    return reminders
      .map((reminder, index) => `${index}: ${reminder.toString()}`)
      .join('\n');
  }

  private unremind(args: string[]): string {
    expectArgs(args, 2, 'unremind <ID> <番号>');
    const index = Number(args[1]);
    if (!/^-?\d+$/.test(args[1]) || !Number.isInteger(index)) {
      throw new CommandError(`番号は整数で指定してください: ${args[1]}`);
    }
    const removed = this.calendar.deleteReminder(args[0], index);
    return `リマインダーを削除しました: ${removed.toString()}`;
  }
}
