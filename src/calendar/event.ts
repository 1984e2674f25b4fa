// イベントとリマインダー

import { isValid } from 'date-fns';
import {
  DateString,
  EventInput,
  ReminderType,
  TimeSlot,
} from '../types/calendar';
import {
  InvalidFormatError,
  InvalidTimeRangeError,
  ReminderNotFoundError,
} from '../common/errors';
import { assertDate, assertTime, formatDateTime } from '../common/time';

export class Reminder {
  private readonly timestamp: number;
  readonly type: ReminderType;

  constructor(dateTime: Date, type: ReminderType = 'email') {
    if (!isValid(dateTime)) {
      throw new InvalidFormatError('リマインダーの日時が不正です');
    }
    this.timestamp = dateTime.getTime();
    this.type = type;
  }

  get dateTime(): Date {
    return new Date(this.timestamp);
  }

  toString(): string {
    return `リマインダー ${formatDateTime(this.dateTime)} [${this.type}]`;
  }
}

export class CalendarEvent {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly date: DateString;
  readonly startAt: TimeSlot;
  readonly endAt: TimeSlot;
  private reminders: Reminder[];

  /**
   * @param input イベント内容
   * @param id イベントID（更新時は既存のIDを引き継ぐ）
   * @param reminders 引き継ぐリマインダー
   * @throws 日付・時刻の形式が不正、または開始時刻が終了時刻以降の場合
   */
  constructor(input: EventInput, id: string, reminders: Reminder[] = []) {
    this.date = assertDate(input.date);
    this.startAt = assertTime(input.startAt);
    this.endAt = assertTime(input.endAt, true);

    if (this.startAt >= this.endAt) {
      throw new InvalidTimeRangeError(this.startAt, this.endAt);
    }

    this.id = id;
    this.title = input.title;
    this.description = input.description;
    this.reminders = [...reminders];
  }

  addReminder(dateTime: Date, type: ReminderType = 'email'): Reminder {
    const reminder = new Reminder(dateTime, type);
    this.reminders.push(reminder);
    return reminder;
  }

  /**
   * 指定位置のリマインダーを削除する
   * 以降のリマインダーのインデックスは1つずつ前に詰まる
   * @param index 0始まりのインデックス
   * @returns 削除したリマインダー
   */
  deleteReminder(index: number): Reminder {
    if (
      !Number.isInteger(index) ||
      index < 0 ||
      index >= this.reminders.length
    ) {
      throw new ReminderNotFoundError(this.id, index);
    }
    const [removed] = this.reminders.splice(index, 1);
    return removed;
  }

  listReminders(): Reminder[] {
    return [...this.reminders];
  }

  toString(): string {
    return `
ID: ${this.id}
タイトル: ${this.title}
説明: ${this.description}
日付: ${this.date}
時間: ${this.startAt} - ${this.endAt}
`.trim();
  }
}
