/**
 * タグに書かれた日付を、見つかった精度のまま保持する。
 *
 * 年だけ・年月だけのタグに架空の月日や時刻を補わないため、精度ごとに
 * 持てるフィールドを型で分けている（月のない日、時刻のない秒は表現できない）。
 * RSSでは完全な日時があるときだけpubDateを出し、それ以外はdc:dateで精度を残す。
 */

export type DatePrecision = 'year' | 'yearMonth' | 'date' | 'dateTime';

export interface YearParts {
  readonly precision: 'year';
  readonly year: number;
}

export interface YearMonthParts {
  readonly precision: 'yearMonth';
  readonly year: number;
  readonly month: number;
}

export interface CalendarDateParts {
  readonly precision: 'date';
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export interface DateTimeParts {
  readonly precision: 'dateTime';
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second?: number;
  /** UTCからのオフセット（分）。タグに無ければundefined */
  readonly utcOffsetMinutes?: number;
}

export type DateParts = YearParts | YearMonthParts | CalendarDateParts | DateTimeParts;

// 年は1900〜2100のみ。前後を数字で挟まれた部分は拾わない（8桁の数値などを日付と誤認しない）
const YEAR = '(19\\d{2}|20\\d{2}|2100)';
const MONTH = '(0[1-9]|1[0-2])';
const DAY = '(0[1-9]|[12]\\d|3[01])';
const TIME = '([01]\\d|2[0-3]):([0-5]\\d)(?::([0-5]\\d))?';
const OFFSET = '(Z|[+-](?:[01]\\d|2[0-3]):?[0-5]\\d)';

const DATETIME_PATTERN = new RegExp(
  `(?<!\\d)${YEAR}[-/]?${MONTH}[-/]?${DAY}[T\\s]+${TIME}(?:\\s*${OFFSET})?(?!\\d)`
);
const DATE_PATTERN = new RegExp(`(?<!\\d)${YEAR}[-/]?${MONTH}[-/]?${DAY}(?!\\d)`);
const YEAR_MONTH_PATTERN = new RegExp(`(?<!\\d)${YEAR}[-/]?${MONTH}(?!\\d)`);
const YEAR_PATTERN = new RegExp(`(?<!\\d)${YEAR}(?!\\d)`);

// ±18:00を超えるオフセットは無効
const MAX_OFFSET_MINUTES = 18 * 60;

type StageParser = (text: string) => DateParts | undefined;

function toInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * `Z`、`+09:00`、`-0530` をUTCからの分に変換する。範囲外や不正な値はundefined。
 */
export function parseUtcOffset(value: string | undefined): number | undefined {
  const normalized = value?.trim();
  if (!normalized) {
    return undefined;
  }
  if (normalized.toUpperCase() === 'Z') {
    return 0;
  }

  const match = /^([+-])(\d{2}):?(\d{2})$/.exec(normalized);
  if (!match) {
    return undefined;
  }
  const hours = toInt(match[2]);
  const minutes = toInt(match[3]);
  if (hours === undefined || minutes === undefined || minutes > 59) {
    return undefined;
  }
  const total = hours * 60 + minutes;
  if (total > MAX_OFFSET_MINUTES) {
    return undefined;
  }
  return match[1] === '-' ? -total : total;
}

const parseDateTime: StageParser = (text) => {
  const match = DATETIME_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const [, y, mo, d, h, mi, s, offset] = match;
  const year = toInt(y);
  const month = toInt(mo);
  const day = toInt(d);
  const hour = toInt(h);
  const minute = toInt(mi);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    !isValidCalendarDate(year, month, day)
  ) {
    return undefined;
  }

  const second = toInt(s);
  const utcOffsetMinutes = parseUtcOffset(offset);
  return {
    precision: 'dateTime',
    year,
    month,
    day,
    hour,
    minute,
    ...(second !== undefined ? { second } : {}),
    ...(utcOffsetMinutes !== undefined ? { utcOffsetMinutes } : {}),
  };
};

const parseDate: StageParser = (text) => {
  const match = DATE_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const year = toInt(match[1]);
  const month = toInt(match[2]);
  const day = toInt(match[3]);
  if (year === undefined || month === undefined || day === undefined || !isValidCalendarDate(year, month, day)) {
    return undefined;
  }
  return { precision: 'date', year, month, day };
};

const parseYearMonth: StageParser = (text) => {
  const match = YEAR_MONTH_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const year = toInt(match[1]);
  const month = toInt(match[2]);
  if (year === undefined || month === undefined) {
    return undefined;
  }
  return { precision: 'yearMonth', year, month };
};

const parseYear: StageParser = (text) => {
  const match = YEAR_PATTERN.exec(text);
  const year = toInt(match?.[1]);
  return year === undefined ? undefined : { precision: 'year', year };
};

// 厳しい精度から順に試す。各段は元のテキストを独立に走査する
const STAGES: readonly StageParser[] = [parseDateTime, parseDate, parseYearMonth, parseYear];

/**
 * テキストから最も精度の高い日付を取り出す。
 *
 * 前後に文章があっても拾う（`Recorded on 2020-07-18 14:30`）。
 * 日が月に対して不正な日付（`2021-02-30`）は次の段に回るので、
 * 同じテキストから年月や年だけが取れることがある。これは意図した動作。
 */
export function parseDateParts(rawValue: string | null | undefined): DateParts | undefined {
  const value = rawValue?.trim();
  if (!value) {
    return undefined;
  }

  for (const stage of STAGES) {
    const parsed = stage(value);
    if (parsed) {
      return parsed;
    }
  }
  return undefined;
}

export function hasFullDateTime(parts: DateParts): parts is DateTimeParts {
  return parts.precision === 'dateTime';
}

function pad(value: number, length = 2): string {
  return value.toString().padStart(length, '0');
}

export function formatUtcOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0) {
    return 'Z';
  }
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}

/**
 * 見つかった精度そのままのISO 8601文字列（`2020`、`2020-07`、`2020-07-18T14:30+09:00`など）
 */
export function toIsoPartial(parts: DateParts): string {
  const year = pad(parts.year, 4);
  switch (parts.precision) {
    case 'year':
      return year;
    case 'yearMonth':
      return `${year}-${pad(parts.month)}`;
    case 'date':
      return `${year}-${pad(parts.month)}-${pad(parts.day)}`;
    case 'dateTime': {
      const seconds = parts.second !== undefined ? `:${pad(parts.second)}` : '';
      const offset = parts.utcOffsetMinutes !== undefined ? formatUtcOffset(parts.utcOffsetMinutes) : '';
      return `${year}-${pad(parts.month)}-${pad(parts.day)}T${pad(parts.hour)}:${pad(parts.minute)}${seconds}${offset}`;
    }
  }
}

/**
 * 完全な日時のときだけ絶対時刻に変換する。秒が無ければ0秒、オフセットが無ければUTCとみなす。
 */
export function toInstant(parts: DateParts): Date | undefined {
  if (!hasFullDateTime(parts) || !isValidCalendarDate(parts.year, parts.month, parts.day)) {
    return undefined;
  }
  const utcMillis = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second ?? 0);
  const instant = new Date(utcMillis - (parts.utcOffsetMinutes ?? 0) * 60_000);
  return Number.isNaN(instant.getTime()) ? undefined : instant;
}
