/**
 * 파티션 키: 실행 타임존 기준 `YYYY-MM-DD`
 *
 * 문자열과 구분되는 브랜드 타입이라 toDateKey / formatDateKey 를 거쳐야만 만들어진다.
 */
export type DateKey = string & { readonly __brand: 'DateKey' };

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isDateKey(value: string): value is DateKey {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}

export function toDateKey(value: string): DateKey {
  if (!isDateKey(value)) {
    throw new RangeError(`잘못된 날짜 키: ${value} (YYYY-MM-DD 형식 필요)`);
  }
  return value;
}

/**
 * 날짜 키를 days 만큼 이동 (음수면 과거)
 */
export function shiftDateKey(dateKey: DateKey, days: number): DateKey {
  const [year, month, day] = dateKey.split('-').map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return toDateKey(shifted.toISOString().slice(0, 10));
}
