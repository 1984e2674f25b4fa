// カレンダー本体（イベント台帳と日別の時間枠を管理）

import { randomUUID } from 'crypto';
import {
  CalendarOptions,
  DateString,
  EventInput,
  IdGenerator,
  ReminderType,
  TimeSlot,
} from '../types/calendar';
import {
  DateLowerThanTodayError,
  DuplicateEventIdError,
  EventNotFoundError,
} from '../common/errors';
import { assertDate, generateDaySlots, toDateString } from '../common/time';
import { CalendarEvent, Reminder } from './event';
import { Day } from './day';

export class Calendar {
  private readonly events = new Map<string, CalendarEvent>();
  private readonly days = new Map<DateString, Day>();
  private readonly idGenerator: IdGenerator;
  private readonly now: () => Date;
  private readonly defaultReminderType: ReminderType;

  constructor(options: CalendarOptions = {}) {
    this.idGenerator = options.idGenerator || randomUUID;
    this.now = options.now || (() => new Date());
    this.defaultReminderType = options.defaultReminderType || 'email';
  }

  /**
   * イベントを作成する
   * @param input イベント内容
   * @returns 作成されたイベントのID
   * @throws DateLowerThanTodayError 今日より前の日付の場合
   * @throws SlotNotAvailableError 時間枠が他のイベントと重なる場合
   * @throws DuplicateEventIdError IDジェネレーターが既存のIDを返した場合
   */
  addEvent(input: EventInput): string {
    const date = assertDate(input.date);
    const today = toDateString(this.now());
    if (date < today) {
      throw new DateLowerThanTodayError(date, today);
    }

    const event = new CalendarEvent(input, this.idGenerator());
    if (this.events.has(event.id)) {
      throw new DuplicateEventIdError(event.id);
    }
    this.getOrCreateDay(date).addEvent(event.id, event.startAt, event.endAt);
    this.events.set(event.id, event);
    return event.id;
  }

  getEvent(eventId: string): CalendarEvent {
    const event = this.events.get(eventId);
    if (!event) {
      throw new EventNotFoundError(eventId);
    }
    return event;
  }

  addReminder(eventId: string, dateTime: Date, type?: ReminderType): Reminder {
    return this.getEvent(eventId).addReminder(
      dateTime,
      type || this.defaultReminderType
    );
  }

  deleteReminder(eventId: string, index: number): Reminder {
    return this.getEvent(eventId).deleteReminder(index);
  }

  listReminders(eventId: string): Reminder[] {
    return this.getEvent(eventId).listReminders();
  }

  /**
   * 指定日の空き時間枠を昇順で取得する
   * まだ一度も使われていない日は全96枠が空き
   */
  findAvailableSlots(date: DateString): TimeSlot[] {
    const day = this.days.get(assertDate(date));
    if (!day) {
      return generateDaySlots();
    }
    return day.availableSlots();
  }

  /**
   * イベントを同じIDのまま置き換える
   * 移動先の時間枠を先に検査するため、失敗時は元のイベントと予約がそのまま残る
   * リマインダーは新しいイベントに引き継がれる
   */
  updateEvent(eventId: string, input: EventInput): void {
    const current = this.getEvent(eventId);
    const next = new CalendarEvent(input, eventId, current.listReminders());

    // 日付の登録は検査に通ってから行う
    const targetDay = this.days.get(next.date) ?? new Day(next.date);
    targetDay.assertAvailable(eventId, next.startAt, next.endAt);

    this.releaseSlots(current);
    this.days.set(next.date, targetDay);
    targetDay.addEvent(eventId, next.startAt, next.endAt);
    this.events.set(eventId, next);
  }

  deleteEvent(eventId: string): void {
    const event = this.getEvent(eventId);
    this.events.delete(eventId);
    this.releaseSlots(event);
  }

  /**
   * 期間内（両端を含む）のイベントを日付ごとにまとめて取得する
   * @returns 日付の昇順、同じ日付内は開始時刻順
   */
  findEvents(
    startDate: DateString,
    endDate: DateString
  ): Map<DateString, CalendarEvent[]> {
    assertDate(startDate);
    assertDate(endDate);

    const matched = [...this.events.values()]
      .filter((event) => startDate <= event.date && event.date <= endDate)
      .sort(
        (a, b) =>
          a.date.localeCompare(b.date) || a.startAt.localeCompare(b.startAt)
      );

    const result = new Map<DateString, CalendarEvent[]>();
    for (const event of matched) {
      const events = result.get(event.date) || [];
      events.push(event);
      result.set(event.date, events);
    }
    return result;
  }

  private getOrCreateDay(date: DateString): Day {
    let day = this.days.get(date);
    if (!day) {
      day = new Day(date);
      this.days.set(date, day);
    }
    return day;
  }

  /**
   * イベントが予約している時間枠を解放する
   * 時間枠の境界をまたがない短いイベント (09:05-09:10 など) は枠を持たない
   */
  private releaseSlots(event: CalendarEvent): void {
    const day = this.days.get(event.date);
    if (day && day.hasEvent(event.id)) {
      day.deleteEvent(event.id);
    }
  }
}
