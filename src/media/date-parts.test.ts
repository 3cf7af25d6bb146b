import { describe, it, expect } from 'vitest';
import {
  parseDateParts,
  parseUtcOffset,
  hasFullDateTime,
  toIsoPartial,
  toInstant,
  isValidCalendarDate,
  type DateParts,
} from './date-parts.js';

function iso(text: string): string | undefined {
  const parts = parseDateParts(text);
  return parts ? toIsoPartial(parts) : undefined;
}

describe('date-parts', () => {
  describe('parseDateParts', () => {
    it('年のみの場合は年の精度のまま保持する', () => {
      const parsed = parseDateParts('2020');
      expect(parsed).toEqual({ precision: 'year', year: 2020 });
      expect(parsed && hasFullDateTime(parsed)).toBe(false);
    });

    it('年月を保持する', () => {
      expect(parseDateParts('2020-07')).toEqual({ precision: 'yearMonth', year: 2020, month: 7 });
    });

    it('日付のみを保持する', () => {
      expect(parseDateParts('2020-07-18')).toEqual({ precision: 'date', year: 2020, month: 7, day: 18 });
    });

    it('秒なしの日時は完全な日時として扱う', () => {
      const parsed = parseDateParts('2020-07-18T14:30');
      expect(parsed).toEqual({ precision: 'dateTime', year: 2020, month: 7, day: 18, hour: 14, minute: 30 });
      expect(parsed && hasFullDateTime(parsed)).toBe(true);
    });

    it('秒とオフセットを読み取る', () => {
      expect(parseDateParts('2020-07-18T14:30:45+05:30')).toEqual({
        precision: 'dateTime',
        year: 2020,
        month: 7,
        day: 18,
        hour: 14,
        minute: 30,
        second: 45,
        utcOffsetMinutes: 330,
      });
    });

    it('前後に文章があっても日時を抽出する', () => {
      expect(parseDateParts('Recorded on 2020-07-18 14:30')).toEqual(parseDateParts('2020-07-18T14:30'));
    });

    it('区切りなし・スラッシュ区切りの日付も読み取る', () => {
      expect(iso('20200718')).toBe('2020-07-18');
      expect(iso('2020/07/18')).toBe('2020-07-18');
    });

    it('日付らしい部分がなければundefinedを返す', () => {
      expect(parseDateParts('release someday')).toBeUndefined();
      expect(parseDateParts('')).toBeUndefined();
      expect(parseDateParts('   ')).toBeUndefined();
      expect(parseDateParts(null)).toBeUndefined();
      expect(parseDateParts(undefined)).toBeUndefined();
    });

    it('長い数字の並びを日付に分割しない', () => {
      expect(parseDateParts('Catalog 1202007189')).toBeUndefined();
    });

    it('範囲外の年は無視する', () => {
      expect(parseDateParts('1899')).toBeUndefined();
      expect(parseDateParts('2101')).toBeUndefined();
      expect(iso('2100')).toBe('2100');
    });

    it('月に対して不正な日は年月にフォールバックする', () => {
      expect(parseDateParts('2021-02-30')).toEqual({ precision: 'yearMonth', year: 2021, month: 2 });
      expect(iso('2019-02-29')).toBe('2019-02');
      expect(iso('2020-02-29')).toBe('2020-02-29');
    });

    it('不正な月を含む日付からは年だけを取り出す', () => {
      expect(parseDateParts('2020-13-01')).toEqual({ precision: 'year', year: 2020 });
    });

    it('範囲外のオフセットはオフセットなしとして扱う', () => {
      expect(iso('2020-07-18T14:30+19:00')).toBe('2020-07-18T14:30');
    });
  });

  describe('toIsoPartial', () => {
    it.each([
      '2020',
      '2020-07',
      '2020-07-18',
      '2020-07-18T14:30',
      '2020-07-18T14:30:05',
      '2020-07-18T14:30:05Z',
      '2020-07-18T14:30-03:00',
    ])('%s を同じ精度で書き戻す', (text) => {
      expect(iso(text)).toBe(text);
    });

    it('区切りを正規化する', () => {
      expect(iso('2020-07-18 14:30:00+0900')).toBe('2020-07-18T14:30:00+09:00');
      expect(iso('2020-07-18T14:30+00:00')).toBe('2020-07-18T14:30Z');
    });
  });

  describe('toInstant', () => {
    it('オフセットがなければUTCとみなす', () => {
      const parts = parseDateParts('2020-07-18T14:30');
      expect(parts && toInstant(parts)?.toISOString()).toBe('2020-07-18T14:30:00.000Z');
    });

    it('オフセットを考慮してUTCに変換する', () => {
      const parts = parseDateParts('2020-07-18T14:30:15+02:00');
      expect(parts && toInstant(parts)?.toISOString()).toBe('2020-07-18T12:30:15.000Z');
    });

    it('完全な日時でなければundefinedを返す', () => {
      const parts: DateParts = { precision: 'date', year: 2020, month: 7, day: 18 };
      expect(toInstant(parts)).toBeUndefined();
    });

    it('暦として不正な日時はundefinedを返す', () => {
      const parts: DateParts = { precision: 'dateTime', year: 2021, month: 2, day: 30, hour: 1, minute: 0 };
      expect(toInstant(parts)).toBeUndefined();
    });
  });

  describe('parseUtcOffset', () => {
    it('Zと±HH:MM、±HHMMを分に変換する', () => {
      expect(parseUtcOffset('Z')).toBe(0);
      expect(parseUtcOffset('+09:00')).toBe(540);
      expect(parseUtcOffset('-0530')).toBe(-330);
    });

    it('不正な値はundefinedを返す', () => {
      expect(parseUtcOffset('+18:30')).toBeUndefined();
      expect(parseUtcOffset('JST')).toBeUndefined();
      expect(parseUtcOffset(undefined)).toBeUndefined();
    });
  });

  describe('isValidCalendarDate', () => {
    it('うるう年の2月29日だけを許可する', () => {
      expect(isValidCalendarDate(2024, 2, 29)).toBe(true);
      expect(isValidCalendarDate(2100, 2, 29)).toBe(false);
      expect(isValidCalendarDate(2020, 4, 31)).toBe(false);
    });
  });
});
