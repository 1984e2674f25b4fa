// 1日分の時間枠（15分刻み × 96枠）の予約状況

import { DateString, TimeSlot } from '../types/calendar';
import { EventNotFoundError, SlotNotAvailableError } from '../common/errors';
import { assertDate, generateDaySlots } from '../common/time';

export class Day {
  readonly date: DateString;
  private readonly slots = new Map<TimeSlot, string | null>();

  constructor(date: DateString) {
    this.date = assertDate(date);
    for (const slot of generateDaySlots()) {
      this.slots.set(slot, null);
    }
  }

  /**
   * 開始時刻以上・終了時刻未満の全スロットにイベントを割り当てる
   * 先に全スロットを検査するため、失敗時にはどのスロットも変更されない
   */
  addEvent(eventId: string, startAt: TimeSlot, endAt: TimeSlot): void {
    this.assertAvailable(eventId, startAt, endAt);
    for (const slot of this.slotsInRange(startAt, endAt)) {
      this.slots.set(slot, eventId);
    }
  }

  deleteEvent(eventId: string): void {
    let deleted = false;
    for (const [slot, savedId] of this.slots) {
      if (savedId === eventId) {
        this.slots.set(slot, null);
        deleted = true;
      }
    }
    if (!deleted) {
      throw new EventNotFoundError(eventId);
    }
  }

  /**
   * 予約済みイベントの時間帯を変更する
   * 新しい時間帯が他のイベントと重なる場合は元の予約を残したまま失敗する
   */
  updateEvent(eventId: string, startAt: TimeSlot, endAt: TimeSlot): void {
    if (!this.hasEvent(eventId)) {
      throw new EventNotFoundError(eventId);
    }
    this.assertAvailable(eventId, startAt, endAt);
    this.deleteEvent(eventId);
    this.addEvent(eventId, startAt, endAt);
  }

  /**
   * 指定範囲に別のイベントが入っていないか検査する
   * 同じイベントIDが入っているスロットは空きとして扱う
   * @throws SlotNotAvailableError 最初に見つかった埋まっているスロット
   */
  assertAvailable(eventId: string, startAt: TimeSlot, endAt: TimeSlot): void {
    for (const slot of this.slotsInRange(startAt, endAt)) {
      const occupant = this.getOccupant(slot);
      if (occupant !== null && occupant !== eventId) {
        throw new SlotNotAvailableError(this.date, slot, occupant);
      }
    }
  }

  hasEvent(eventId: string): boolean {
    for (const savedId of this.slots.values()) {
      if (savedId === eventId) {
        return true;
      }
    }
    return false;
  }

  getOccupant(slot: TimeSlot): string | null {
    return this.slots.get(slot) ?? null;
  }

  availableSlots(): TimeSlot[] {
    return [...this.slots]
      .filter(([, eventId]) => eventId === null)
      .map(([slot]) => slot);
  }

  bookedSlots(eventId: string): TimeSlot[] {
    return [...this.slots]
      .filter(([, savedId]) => savedId === eventId)
      .map(([slot]) => slot);
  }

  private slotsInRange(startAt: TimeSlot, endAt: TimeSlot): TimeSlot[] {
    return [...this.slots.keys()].filter(
      (slot) => startAt <= slot && slot < endAt
    );
  }
}
