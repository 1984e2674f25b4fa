// カレンダー操作のエラー定義

import { DateString, TimeSlot } from '../types/calendar';

export type CalendarErrorCode =
  | 'EVENT_NOT_FOUND'
  | 'REMINDER_NOT_FOUND'
  | 'SLOT_NOT_AVAILABLE'
  | 'DATE_LOWER_THAN_TODAY'
  | 'INVALID_TIME_RANGE'
  | 'INVALID_FORMAT'
  | 'DUPLICATE_EVENT_ID';

/**
 * カレンダー操作で発生するエラーの基底クラス
 * いずれも呼び出し元の入力に起因するもので、リトライ対象ではない
 */
export class CalendarError extends Error {
  readonly code: CalendarErrorCode;

  constructor(code: CalendarErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EventNotFoundError extends CalendarError {
  readonly eventId: string;

  constructor(eventId: string) {
    super('EVENT_NOT_FOUND', `イベントが見つかりません: ${eventId}`);
    this.eventId = eventId;
  }
}

export class ReminderNotFoundError extends CalendarError {
  readonly index: number;

  constructor(eventId: string, index: number) {
    super(
      'REMINDER_NOT_FOUND',
      `リマインダーが見つかりません: ${eventId} [${index}]`
    );
    this.index = index;
  }
}

export class SlotNotAvailableError extends CalendarError {
  readonly date: DateString;
  readonly slot: TimeSlot;
  readonly occupiedBy: string;

  constructor(date: DateString, slot: TimeSlot, occupiedBy: string) {
    super(
      'SLOT_NOT_AVAILABLE',
      `時間枠が埋まっています: ${date} ${slot} (イベント: ${occupiedBy})`
    );
    this.date = date;
    this.slot = slot;
    this.occupiedBy = occupiedBy;
  }
}

export class DateLowerThanTodayError extends CalendarError {
  constructor(date: DateString, today: DateString) {
    super(
      'DATE_LOWER_THAN_TODAY',
      `過去の日付にはイベントを作成できません: ${date} (今日: ${today})`
    );
  }
}

export class InvalidTimeRangeError extends CalendarError {
  constructor(startAt: TimeSlot, endAt: TimeSlot) {
    super(
      'INVALID_TIME_RANGE',
      `終了時刻は開始時刻より後である必要があります: ${startAt} - ${endAt}`
    );
  }
}

export class InvalidFormatError extends CalendarError {
  constructor(message: string) {
    super('INVALID_FORMAT', message);
  }
}

export class DuplicateEventIdError extends CalendarError {
  readonly eventId: string;

  constructor(eventId: string) {
    super('DUPLICATE_EVENT_ID', `イベントIDが重複しています: ${eventId}`);
    this.eventId = eventId;
  }
}
