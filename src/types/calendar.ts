// カレンダー関連の型定義

/** 日付文字列 (YYYY-MM-DD) */
export type DateString = string;

/** 時刻スロット (HH:mm) */
export type TimeSlot = string;

export const REMINDER_TYPES = ['email', 'system'] as const;

export type ReminderType = (typeof REMINDER_TYPES)[number];

export interface EventInput {
  title: string;
  description: string;
  date: DateString;
  startAt: TimeSlot;
  endAt: TimeSlot;
}

/** 衝突しない一意なIDを生成する関数 */
export type IdGenerator = () => string;

export interface CalendarOptions {
  idGenerator?: IdGenerator;
  now?: () => Date;
  defaultReminderType?: ReminderType;
}
