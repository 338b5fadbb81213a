import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { formatWallTime } from '@/common/utils/date.util';
import { DateKey } from '@/export/date-key';
import { RecordSerializer, ScrapedRecord } from '@/export/record.types';

/**
 * 파티션 파일 스키마 (12 컬럼)
 *
 * BigQuery 외부 테이블이 읽는 컬럼명이므로 snake_case 유지
 */
export const DISCUSSION_SCHEMA = new ParquetSchema({
  stock_code: { type: 'UTF8' },
  isin_code: { type: 'UTF8', optional: true },
  stock_name: { type: 'UTF8' },
  comment_id: { type: 'INT64' },
  author_name: { type: 'UTF8' },
  date: { type: 'UTF8', optional: true },
  content: { type: 'UTF8' },
  likes_count: { type: 'INT64' },
  dislikes_count: { type: 'INT64' },
  comment_data: { type: 'UTF8' },
  dt: { type: 'UTF8' },
  source: { type: 'UTF8' },
});

export type DiscussionRow = Record<string, string | number | undefined>;

export function toDiscussionRow(
  record: ScrapedRecord,
  dateKey: DateKey,
  timeZone: string,
): DiscussionRow {
  return {
    stock_code: record.entityCode,
    isin_code: record.entitySecondaryId ?? undefined,
    stock_name: record.entityName,
    comment_id: record.recordId,
    author_name: record.author,
    date: record.timestamp ? formatWallTime(record.timestamp, timeZone) : undefined,
    content: record.content,
    likes_count: record.likes,
    dislikes_count: record.dislikes,
    comment_data: record.extra,
    dt: dateKey,
    source: record.source,
  };
}

/**
 * Parquet 직렬화기
 *
 * parquetjs 는 파일/스트림 단위로 쓰므로 임시 디렉토리에 쓰고 바이트를 읽어 돌려준다.
 * 임시 디렉토리는 성공/실패와 관계없이 삭제.
 */
export class ParquetRecordSerializer implements RecordSerializer {
  readonly extension = 'parquet';
  readonly contentType = 'application/vnd.apache.parquet';

  constructor(private readonly timeZone: string) {}

  async serialize(records: readonly ScrapedRecord[], dateKey: DateKey): Promise<Buffer> {
    const workDir = await mkdtemp(path.join(tmpdir(), 'stock-discussion-'));
    const filePath = path.join(workDir, `${dateKey}.parquet`);

    try {
      const writer = await ParquetWriter.openFile(DISCUSSION_SCHEMA, filePath);
      try {
        for (const record of records) {
          await writer.appendRow(toDiscussionRow(record, dateKey, this.timeZone));
        }
      } finally {
        await writer.close();
      }

      return await readFile(filePath);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
