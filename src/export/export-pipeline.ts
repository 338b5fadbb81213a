import { Logger } from '@nestjs/common';
import { batchName, partitionPath } from './batch-namer';
import { DateKey } from './date-key';
import {
  EmptyInputError,
  ExportCancelledError,
  SerializationError,
  UploadError,
} from './export.errors';
import { hasValidTimestamp, partitionByDate } from './partitioner';
import {
  ExportMeta,
  ExportResult,
  InvalidRecordPolicy,
  PartitionDescriptor,
  PartitionUploader,
  RecordSerializer,
  ScrapedRecord,
} from './record.types';

export interface ExportCollaborators {
  serializer: RecordSerializer;
  uploader: PartitionUploader;
}

export interface ExportOptions {
  /** 업로드 경로 루트 (예: marketing/stock_discussion) */
  basePath: string;
  invalidRecordPolicy: InvalidRecordPolicy;
  /** 파티션 경계에서만 확인한다 */
  signal?: AbortSignal;
}

const logger = new Logger('ExportPipeline');

/**
 * 레코드 스트림을 날짜 파티션으로 나눠 직렬화 후 업로드
 *
 * 1. 빈 입력이면 EmptyInputError (직렬화기/업로더 호출 없음)
 * 2. 날짜별 파티션 구성 (타임스탬프 불량 레코드는 정책에 따라 중단 또는 건너뜀)
 * 3. 최신 날짜부터 순서대로 직렬화 -> 업로드
 * 4. 첫 실패에서 중단하고, 그때까지 끝난 파티션을 에러에 담아 보고
 *
 * 재시도는 하지 않는다 (업로더 책임).
 */
export async function exportRecords(
  records: readonly ScrapedRecord[],
  meta: ExportMeta,
  { serializer, uploader }: ExportCollaborators,
  options: ExportOptions,
): Promise<ExportResult> {
  if (records.length === 0) {
    throw new EmptyInputError();
  }

  const tag = `[${meta.source}:${meta.entityCode}]`;
  let accepted: readonly ScrapedRecord[] = records;

  if (options.invalidRecordPolicy === 'skip') {
    accepted = records.filter((record) => {
      if (hasValidTimestamp(record)) return true;
      logger.warn(`${tag} 타임스탬프 없는 레코드 제외: id=${record.recordId}`);
      return false;
    });

    if (accepted.length === 0) {
      throw new EmptyInputError(`${tag} 유효한 타임스탬프를 가진 레코드가 없습니다`);
    }
  }

  const partitions = partitionByDate(accepted, meta.timeZone);
  const dateKeys = [...partitions.keys()].sort(compareDateKeyDesc);
  const identifier = meta.entityIdentifier ?? meta.entityCode;
  const completed: PartitionDescriptor[] = [];

  logger.log(`${tag} ${accepted.length}건 -> ${dateKeys.length}개 파티션 업로드 시작`);

  for (const dateKey of dateKeys) {
    if (options.signal?.aborted) {
      logger.warn(`${tag} 취소 요청으로 중단 (완료 ${completed.length}/${dateKeys.length})`);
      throw new ExportCancelledError([...completed]);
    }

    const group = partitions.get(dateKey) ?? [];
    const name = batchName(identifier, dateKey);
    const logicalPath = partitionPath(options.basePath, dateKey, name, serializer.extension);

    let payload: Buffer;
    try {
      payload = await serializer.serialize(group, dateKey);
    } catch (error) {
      throw new SerializationError(dateKey, [...completed], error);
    }

    let uri: string;
    try {
      uri = await uploader.upload(payload, logicalPath, serializer.contentType);
    } catch (error) {
      logger.error(`${tag} ${dateKey} 업로드 실패, 남은 파티션 중단`);
      throw new UploadError(dateKey, [...completed], error);
    }

    completed.push({ dateKey, uri, recordCount: group.length });
    logger.log(`${tag} ${dateKey} 업로드 완료 → ${uri}`);
  }

  return {
    entityCode: meta.entityCode,
    entityName: meta.entityName,
    source: meta.source,
    totalRecords: completed.reduce((sum, partition) => sum + partition.recordCount, 0),
    skippedRecords: records.length - accepted.length,
    partitions: completed,
  };
}

function compareDateKeyDesc(a: DateKey, b: DateKey): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}
