import { DateKey } from './date-key';
import { PartitionDescriptor, RecordSource } from './record.types';

/**
 * 타임스탬프가 없거나 해석할 수 없는 레코드
 */
export class DataError extends Error {
  constructor(
    message: string,
    readonly recordId: number,
    readonly source: RecordSource,
  ) {
    super(message);
    this.name = 'DataError';
  }
}

/**
 * 내보낼 레코드가 0건 (호출자가 "할 일 없음"으로 매핑)
 */
export class EmptyInputError extends Error {
  constructor(message = '내보낼 레코드가 없습니다') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

/**
 * 파티션 일부만 업로드된 채 중단된 실행
 *
 * completed 에는 중단 전에 끝까지 업로드된 파티션만 들어간다.
 */
export abstract class PartialExportError extends Error {
  protected constructor(
    message: string,
    readonly completed: readonly PartitionDescriptor[],
    readonly failedDateKey: DateKey | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class UploadError extends PartialExportError {
  constructor(failedDateKey: DateKey, completed: readonly PartitionDescriptor[], cause: unknown) {
    super(`파티션 업로드 실패 (dt=${failedDateKey}): ${describeCause(cause)}`, completed, failedDateKey, {
      cause,
    });
    this.name = 'UploadError';
  }
}

export class SerializationError extends PartialExportError {
  constructor(failedDateKey: DateKey, completed: readonly PartitionDescriptor[], cause: unknown) {
    super(`파티션 직렬화 실패 (dt=${failedDateKey}): ${describeCause(cause)}`, completed, failedDateKey, {
      cause,
    });
    this.name = 'SerializationError';
  }
}

export class ExportCancelledError extends PartialExportError {
  constructor(completed: readonly PartitionDescriptor[]) {
    super(`내보내기 취소됨 (완료 파티션 ${completed.length}개)`, completed, null);
    this.name = 'ExportCancelledError';
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
