import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  getDefaultConfig,
  loadConfig,
  validateConfig,
} from '../src/common/config';

const ENV_KEYS = [
  'CALENDAR_DEFAULT_REMINDER_TYPE',
  'CALENDAR_SEARCH_DAYS',
  'CALENDAR_PROMPT',
];

describe('config', () => {
  const savedEnv: Record<string, string | undefined> = {};
  let tmpDir: string;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'calendar-config-'));
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
    warnSpy.mockRestore();
  });

  function writeConfig(content: string): string {
    const filePath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  describe('loadConfig', () => {
    it('returns defaults without env or file', () => {
      expect(loadConfig()).toEqual({
        calendar: { defaultReminderType: 'email', searchDays: 30 },
        cli: { prompt: 'calendar> ' },
      });
    });

    it('reads values from environment variables', () => {
      process.env.CALENDAR_DEFAULT_REMINDER_TYPE = 'SYSTEM';
      process.env.CALENDAR_SEARCH_DAYS = '7';
      process.env.CALENDAR_PROMPT = '> ';

      expect(loadConfig()).toEqual({
        calendar: { defaultReminderType: 'system', searchDays: 7 },
        cli: { prompt: '> ' },
      });
    });

    it('throws for an unknown reminder type', () => {
      process.env.CALENDAR_DEFAULT_REMINDER_TYPE = 'sms';

      expect(() => loadConfig()).toThrow(
        '設定の読み込みに失敗しました: リマインダー種別が不正です: sms'
      );
    });

    it('throws for a non-numeric search range', () => {
      process.env.CALENDAR_SEARCH_DAYS = 'abc';

      expect(() => loadConfig()).toThrow('検索日数が不正です: NaN');
    });

    it('reads values from a config file', () => {
      const filePath = writeConfig(
        JSON.stringify({
          calendar: { defaultReminderType: 'system', searchDays: 14 },
          cli: { prompt: 'cal$ ' },
        })
      );

      expect(loadConfig(filePath)).toEqual({
        calendar: { defaultReminderType: 'system', searchDays: 14 },
        cli: { prompt: 'cal$ ' },
      });
    });

    it('prefers environment variables over the config file', () => {
      process.env.CALENDAR_SEARCH_DAYS = '10';
      const filePath = writeConfig(
        JSON.stringify({ calendar: { searchDays: 14 } })
      );

      expect(loadConfig(filePath).calendar.searchDays).toBe(10);
    });

    it('ignores values of the wrong type in the config file', () => {
      const filePath = writeConfig(
        JSON.stringify({
          calendar: { defaultReminderType: 'sms', searchDays: '14' },
        })
      );

      expect(loadConfig(filePath).calendar).toEqual({
        defaultReminderType: 'email',
        searchDays: 30,
      });
    });

    it('falls back to defaults with a warning for a broken file', () => {
      const filePath = writeConfig('{ not json');

      expect(loadConfig(filePath)).toEqual(getDefaultConfig());
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('warns when the config file does not exist', () => {
      const filePath = path.join(tmpDir, 'missing.json');

      expect(loadConfig(filePath)).toEqual(getDefaultConfig());
      expect(warnSpy).toHaveBeenCalledWith(
        `設定ファイルが見つかりません: ${filePath}`
      );
    });
  });

  describe('validateConfig', () => {
    it('rejects a negative search range', () => {
      const config = getDefaultConfig();
      config.calendar.searchDays = -1;

      expect(() => validateConfig(config)).toThrow('検索日数が不正です: -1');
    });

    it('accepts the default config', () => {
      expect(() => validateConfig(getDefaultConfig())).not.toThrow();
    });
  });
});
