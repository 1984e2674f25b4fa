// 設定関連の型定義

import { ReminderType } from './calendar';

export interface CalendarConfig {
  defaultReminderType: ReminderType;
  searchDays: number;
}

export interface CliConfig {
  prompt: string;
}

export interface AppConfig {
  calendar: CalendarConfig;
  cli: CliConfig;
}
