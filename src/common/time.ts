// 日付・時刻ユーティリティ

import { addDays, format, isValid, parse } from 'date-fns';
import { DateString, TimeSlot } from '../types/calendar';
import { InvalidFormatError } from './errors';

export const SLOT_MINUTES = 15;
export const SLOTS_PER_DAY = (24 * 60) / SLOT_MINUTES;

/** 終了時刻としてのみ使える1日の終わり */
export const END_OF_DAY: TimeSlot = '24:00';

const DATE_FORMAT = 'yyyy-MM-dd';
const DATE_TIME_FORMAT = "yyyy-MM-dd'T'HH:mm";

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * 実在する日付 (YYYY-MM-DD) かどうか
 * 2025-02-30 のような値は不正とみなす
 */
export function isValidDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const parsed = parse(value, DATE_FORMAT, new Date());
  return isValid(parsed) && format(parsed, DATE_FORMAT) === value;
}

/**
 * 時刻 (HH:mm) として有効かどうか
 * @param allowEndOfDay 24:00 を許容するか（終了時刻用）
 */
export function isValidTime(value: string, allowEndOfDay = false): boolean {
  if (allowEndOfDay && value === END_OF_DAY) {
    return true;
  }
  return /^([01]\d|2[0-3]):[0-5]\d$/.test(value);
}

export function assertDate(value: string): DateString {
  if (!isValidDate(value)) {
    throw new InvalidFormatError(`日付フォーマットが不正です (YYYY-MM-DD): ${value}`);
  }
  return value;
}

export function assertTime(value: string, allowEndOfDay = false): TimeSlot {
  if (!isValidTime(value, allowEndOfDay)) {
    throw new InvalidFormatError(`時刻フォーマットが不正です (HH:mm): ${value}`);
  }
  return value;
}

/**
 * 1日分のスロットを昇順で生成する（00:00 から 23:45 まで15分刻み）
 */
export function generateDaySlots(): TimeSlot[] {
  return Array.from({ length: SLOTS_PER_DAY }, (_, i) => {
    const minutes = i * SLOT_MINUTES;
    return `${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
  });
}

/**
 * ローカル時刻での日付文字列に変換
 */
export function toDateString(value: Date): DateString {
  return format(value, DATE_FORMAT);
}

/**
 * 日時文字列 (YYYY-MM-DDTHH:mm) をパースする
 */
export function parseDateTime(value: string): Date {
  const parsed = parse(value, DATE_TIME_FORMAT, new Date());
  if (!isValid(parsed) || format(parsed, DATE_TIME_FORMAT) !== value) {
    throw new InvalidFormatError(
      `日時フォーマットが不正です (YYYY-MM-DDTHH:mm): ${value}`
    );
  }
  return parsed;
}

export function formatDateTime(value: Date): string {
  return format(value, 'yyyy-MM-dd HH:mm');
}

/**
 * 日付文字列に日数を加算する
 */
export function addDaysToDate(date: DateString, days: number): DateString {
  const parsed = parse(assertDate(date), DATE_FORMAT, new Date());
  return format(addDays(parsed, days), DATE_FORMAT);
}
