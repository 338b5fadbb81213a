import { z } from 'zod';
import { todayDateKey } from '@/common/utils/date.util';
import { DateKey, isDateKey, shiftDateKey } from '@/export/date-key';

export interface DateRange {
  startDate: DateKey;
  endDate: DateKey;
}

// Swagger 기본값 "string" 은 값이 없는 것으로 본다
const PLACEHOLDER = 'string';

/**
 * 선택 날짜 필드: 빈 값/"string" -> undefined, 나머지는 YYYY-MM-DD 여야 한다
 */
export const optionalDateKeySchema = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value && value !== PLACEHOLDER ? value : undefined))
  .pipe(
    z
      .custom<DateKey>((value) => typeof value === 'string' && isDateKey(value), {
        message: '날짜는 YYYY-MM-DD 형식이어야 합니다',
      })
      .optional(),
  );

/**
 * 기간 결정: end 기본값은 오늘(실행 타임존), start 기본값은 end 에서 lookbackDays 전
 */
export function resolveDateRange(
  input: { startDate?: DateKey; endDate?: DateKey },
  lookbackDays: number,
  timeZone: string,
  now: Date = new Date(),
): DateRange {
  const endDate = input.endDate ?? todayDateKey(timeZone, now);
  const startDate = input.startDate ?? shiftDateKey(endDate, -lookbackDays);
  return { startDate, endDate };
}
