import { DateKey } from './date-key';

export type RecordSource = 'naver' | 'toss';

/**
 * 정규화된 수집 레코드 (게시글 또는 댓글)
 *
 * source + entityCode + recordId 가 한 번의 실행 안에서 유일 키.
 * 중복 제거는 수집기 책임이며 내보내기 단계는 입력을 그대로 다룬다.
 */
export interface ScrapedRecord {
  entityCode: string;
  /** 종목 코드와 별개인 보조 식별자 (ISIN 등) */
  entitySecondaryId: string | null;
  entityName: string;
  recordId: number;
  author: string;
  /** 파티션 기준 시각. 파싱 실패 시 null */
  timestamp: Date | null;
  content: string;
  likes: number;
  dislikes: number;
  /** 답글 등 부가 데이터를 직렬화한 문자열 (그대로 통과) */
  extra: string;
  source: RecordSource;
}

export interface PartitionDescriptor {
  dateKey: DateKey;
  uri: string;
  recordCount: number;
}

export interface ExportResult {
  entityCode: string;
  entityName: string;
  source: RecordSource;
  totalRecords: number;
  skippedRecords: number;
  /** dateKey 내림차순 (최신 날짜 먼저) */
  partitions: PartitionDescriptor[];
}

export interface ExportMeta {
  entityCode: string;
  entityName: string;
  source: RecordSource;
  timeZone: string;
  /** 파일명에 쓸 식별자. 생략 시 entityCode */
  entityIdentifier?: string;
}

/**
 * 파티션 직렬화기 (컬럼 포맷)
 */
export interface RecordSerializer {
  readonly extension: string;
  readonly contentType: string;
  serialize(records: readonly ScrapedRecord[], dateKey: DateKey): Promise<Buffer>;
}

/**
 * 오브젝트 스토리지 업로더
 *
 * 같은 logicalPath 로 다시 올리면 덮어쓴다. 재시도는 구현체 책임.
 */
export interface PartitionUploader {
  upload(payload: Buffer, logicalPath: string, contentType: string): Promise<string>;
}

export type InvalidRecordPolicy = 'abort' | 'skip';

export const RECORD_SERIALIZER = Symbol('RECORD_SERIALIZER');
export const PARTITION_UPLOADER = Symbol('PARTITION_UPLOADER');
export const EXPORT_SETTINGS = Symbol('EXPORT_SETTINGS');
