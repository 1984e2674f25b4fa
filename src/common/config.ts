// 設定管理
// 方針: デフォルト値を基本とし、環境変数（.env）と設定ファイルで上書きする

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { AppConfig } from '../types/config';
import { REMINDER_TYPES, ReminderType } from '../types/calendar';

// .envファイルがあれば読み込む
dotenv.config();

interface FileConfig {
  calendar?: {
    defaultReminderType?: unknown;
    searchDays?: unknown;
  };
  cli?: {
    prompt?: unknown;
  };
}

export function isReminderType(value: unknown): value is ReminderType {
  return REMINDER_TYPES.some((type) => type === value);
}

/**
 * リマインダー種別の文字列をパースする
 * @param value 文字列（email / system）
 */
function parseReminderType(value: string): ReminderType {
  const normalized = value.trim().toLowerCase();
  if (!isReminderType(normalized)) {
    throw new Error(
      `リマインダー種別が不正です: ${value}。指定可能な値: ${REMINDER_TYPES.join(', ')}`
    );
  }
  return normalized;
}

/**
 * 設定を読み込む
 * 環境変数で指定された値は設定ファイルより優先される
 * @param configPath 設定ファイルパス（オプション）
 * @returns 設定オブジェクト
 */
export function loadConfig(configPath?: string): AppConfig {
  try {
    const config = getDefaultConfig();

    if (process.env.CALENDAR_DEFAULT_REMINDER_TYPE) {
      config.calendar.defaultReminderType = parseReminderType(
        process.env.CALENDAR_DEFAULT_REMINDER_TYPE
      );
    }

    if (process.env.CALENDAR_SEARCH_DAYS) {
      config.calendar.searchDays = Number(process.env.CALENDAR_SEARCH_DAYS);
    }

    if (process.env.CALENDAR_PROMPT) {
      config.cli.prompt = process.env.CALENDAR_PROMPT;
    }

    if (configPath) {
      try {
        const absolutePath = path.resolve(process.cwd(), configPath);
        if (fs.existsSync(absolutePath)) {
          const configData = fs.readFileSync(absolutePath, 'utf8');
          const fileConfig: FileConfig = JSON.parse(configData);

          const reminderType = fileConfig.calendar?.defaultReminderType;
          if (
            !process.env.CALENDAR_DEFAULT_REMINDER_TYPE &&
            isReminderType(reminderType)
          ) {
            config.calendar.defaultReminderType = reminderType;
          }

          const searchDays = fileConfig.calendar?.searchDays;
          if (
            !process.env.CALENDAR_SEARCH_DAYS &&
            typeof searchDays === 'number'
          ) {
            config.calendar.searchDays = searchDays;
          }

          const prompt = fileConfig.cli?.prompt;
          if (!process.env.CALENDAR_PROMPT && typeof prompt === 'string') {
            config.cli.prompt = prompt;
          }
        } else {
          console.warn(`設定ファイルが見つかりません: ${absolutePath}`);
        }
      } catch (error) {
        console.warn(
          `設定ファイルの読み込みに失敗しましたが、デフォルト値と環境変数で続行します: ${error}`
        );
      }
    }

    validateConfig(config);
    return config;
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`設定の読み込みに失敗しました: ${error.message}`);
    }
    throw error;
  }
}

/**
 * 設定の有効性を検証する
 * @param config 検証する設定オブジェクト
 * @throws 設定が無効な場合はエラーをスロー
 */
export function validateConfig(config: AppConfig): void {
  if (!isReminderType(config.calendar.defaultReminderType)) {
    throw new Error(
      'リマインダー種別が不正です。CALENDAR_DEFAULT_REMINDER_TYPEにはemailまたはsystemを設定してください'
    );
  }

  const { searchDays } = config.calendar;
  if (!Number.isInteger(searchDays) || searchDays < 0) {
    throw new Error(
      `検索日数が不正です: ${searchDays}。CALENDAR_SEARCH_DAYSには0以上の整数を設定してください`
    );
  }
}

/**
 * デフォルト設定を取得
 */
export function getDefaultConfig(): AppConfig {
  return {
    calendar: {
      defaultReminderType: 'email',
      searchDays: 30,
    },
    cli: {
      prompt: 'calendar> ',
    },
  };
}
