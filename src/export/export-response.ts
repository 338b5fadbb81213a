import { ExportResult } from './record.types';

export interface ExportResponse {
  code: 200;
  message: string;
  total_records: number;
  skipped_records: number;
  partitions: number;
  urls: string[];
}

/**
 * HTTP 응답 본문 형태로 변환 (urls 는 최신 날짜 먼저)
 */
export function toExportResponse<T extends object>(
  result: ExportResult,
  message: string,
  extra: T,
): ExportResponse & T {
  return {
    code: 200,
    message,
    ...extra,
    total_records: result.totalRecords,
    skipped_records: result.skippedRecords,
    partitions: result.partitions.length,
    urls: result.partitions.map((partition) => partition.uri),
  };
}
