import { formatDateKey } from '@/common/utils/date.util';
import { DateKey } from './date-key';
import { DataError } from './export.errors';
import { ScrapedRecord } from './record.types';

export function hasValidTimestamp(record: ScrapedRecord): record is ScrapedRecord & { timestamp: Date } {
  return record.timestamp instanceof Date && !Number.isNaN(record.timestamp.getTime());
}

/**
 * 레코드의 파티션 키 (timeZone 기준 달력 날짜)
 */
export function dateKeyOf(record: ScrapedRecord, timeZone: string): DateKey {
  if (!hasValidTimestamp(record)) {
    throw new DataError(
      `타임스탬프를 해석할 수 없는 레코드 (source=${record.source}, id=${record.recordId})`,
      record.recordId,
      record.source,
    );
  }
  return formatDateKey(record.timestamp, timeZone);
}

/**
 * 레코드를 날짜별로 묶는다.
 *
 * 그룹 안에서는 입력 순서를 유지하고, 모든 레코드는 정확히 한 그룹에 들어간다.
 */
export function partitionByDate(
  records: readonly ScrapedRecord[],
  timeZone: string,
): Map<DateKey, ScrapedRecord[]> {
  const partitions = new Map<DateKey, ScrapedRecord[]>();

  for (const record of records) {
    const dateKey = dateKeyOf(record, timeZone);
    const group = partitions.get(dateKey);
    if (group) {
      group.push(record);
    } else {
      partitions.set(dateKey, [record]);
    }
  }

  return partitions;
}
