import { ErrorResponse, ScrapeError } from '@/common/errors/scrape.error';
import {
  EmptyInputError,
  ExportCancelledError,
  PartialExportError,
  describeCause,
} from '@/export/export.errors';
import { ExportResponse } from '@/export/export-response';

export interface NoContentResponse {
  code: 204;
  message: string;
  total_records: 0;
}

export interface PartialFailureResponse extends ErrorResponse {
  uploaded_urls: string[];
  failed_date: string | null;
}

export type CollectResponse<T extends object> =
  | (ExportResponse & T)
  | (NoContentResponse & T)
  | PartialFailureResponse
  | ErrorResponse;

/**
 * 수집/내보내기 에러를 응답 본문으로 변환
 *
 * - EmptyInputError -> 204 (수집된 게시물 없음)
 * - 일부 업로드 후 중단 -> 502 / 499(취소) + 업로드된 URL
 * - ScrapeError -> 에러가 가진 code
 * - 그 외 -> 500
 */
export function toCollectErrorResponse<T extends object>(
  error: unknown,
  context: T,
  emptyMessage: string,
): CollectResponse<T> {
  if (error instanceof EmptyInputError) {
    return { code: 204, message: emptyMessage, ...context, total_records: 0 };
  }

  if (error instanceof PartialExportError) {
    return {
      code: error instanceof ExportCancelledError ? 499 : 502,
      message: error.message,
      uploaded_urls: error.completed.map((partition) => partition.uri),
      failed_date: error.failedDateKey,
    };
  }

  if (error instanceof ScrapeError) {
    return error.toResponse();
  }

  return {
    code: 500,
    message: `알 수 없는 내부 서버 오류: ${describeCause(error)}`,
  };
}
