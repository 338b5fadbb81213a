import { DateKey, toDateKey } from '@/export/date-key';

/**
 * 타임존 변환 유틸
 *
 * - Intl.DateTimeFormat 으로 특정 타임존의 벽시계 시각을 계산
 * - 사이트가 내려주는 "2025-11-15 23:59:59" 같은 오프셋 없는 시각은 실행 타임존 기준으로 해석
 */

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

function toWallClock(date: Date, timeZone: string): WallClock {
  const values: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }

  return {
    year: values.year,
    month: values.month,
    day: values.day,
    hour: values.hour,
    minute: values.minute,
    second: values.second,
  };
}

const pad = (value: number, length = 2): string => String(value).padStart(length, '0');

/**
 * 순간(Date)을 타임존의 달력 날짜 키로 변환
 */
export function formatDateKey(date: Date, timeZone: string): DateKey {
  const wall = toWallClock(date, timeZone);
  return toDateKey(`${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}`);
}

/**
 * 순간(Date)을 타임존의 "YYYY-MM-DD HH:mm:ss" 문자열로 변환
 */
export function formatWallTime(date: Date, timeZone: string): string {
  const wall = toWallClock(date, timeZone);
  return (
    `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)} ` +
    `${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second)}`
  );
}

export function todayDateKey(timeZone: string, now: Date = new Date()): DateKey {
  return formatDateKey(now, timeZone);
}

/**
 * 타임존의 UTC 오프셋(ms), 초 단위 정밀도
 */
function getZoneOffsetMs(instant: number, timeZone: string): number {
  const truncated = Math.floor(instant / 1000) * 1000;
  const wall = toWallClock(new Date(truncated), timeZone);
  const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return asUtc - truncated;
}

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?\s*(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * 사이트 타임스탬프 파싱 (초 단위로 절사)
 *
 * - 오프셋/Z가 있으면 그대로 사용
 * - 없으면 timeZone 의 벽시계 시각으로 해석
 * - 해석할 수 없으면 null
 */
export function parseSourceTimestamp(value: string | null | undefined, timeZone: string): Date | null {
  if (!value) return null;

  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second = '0', offset] = match;
  const wall = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };
  const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  if (Number.isNaN(wallAsUtc)) return null;

  // Date.UTC 는 2월 30일, 25시 같은 값을 다음 날로 넘기므로 되돌려 보고 다르면 거부
  const check = new Date(wallAsUtc);
  if (
    check.getUTCFullYear() !== wall.year ||
    check.getUTCMonth() + 1 !== wall.month ||
    check.getUTCDate() !== wall.day ||
    check.getUTCHours() !== wall.hour ||
    check.getUTCMinutes() !== wall.minute ||
    check.getUTCSeconds() !== wall.second
  ) {
    return null;
  }

  if (offset) {
    if (offset === 'Z') return new Date(wallAsUtc);

    const sign = offset.startsWith('-') ? -1 : 1;
    const digits = offset.slice(1).replace(':', '');
    const offsetMs = sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2))) * 60_000;
    return new Date(wallAsUtc - offsetMs);
  }

  // DST 경계 보정을 위해 오프셋을 한 번 더 계산
  let instant = wallAsUtc - getZoneOffsetMs(wallAsUtc, timeZone);
  instant = wallAsUtc - getZoneOffsetMs(instant, timeZone);
  return new Date(instant);
}

/**
 * 사이트 타임스탬프를 실행 타임존 기준 "YYYY-MM-DD HH:mm:ss" 로 정규화 (실패 시 null)
 */
export function normalizeSourceTimestamp(
  value: string | null | undefined,
  timeZone: string,
): string | null {
  const parsed = parseSourceTimestamp(value, timeZone);
  return parsed ? formatWallTime(parsed, timeZone) : null;
}
