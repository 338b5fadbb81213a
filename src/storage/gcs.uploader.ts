import { Logger } from '@nestjs/common';
import { executeWithRetry } from '@/common/utils/retry.util';
import { PartitionUploader } from '@/export/record.types';

/**
 * 업로더가 쓰는 @google-cloud/storage 의 최소 표면
 */
export interface ObjectStorage {
  bucket(name: string): {
    file(path: string): {
      save(data: Buffer, options: { contentType: string; resumable: boolean }): Promise<void>;
    };
  };
}

/**
 * ApiError.code 가 4xx 이면 408/429 만 재시도. 코드가 없으면 전송 오류로 보고 재시도
 */
export function isRetryableUploadError(error: unknown): boolean {
  const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
  if (typeof code !== 'number') return true;
  if (code === 408 || code === 429) return true;
  return code < 400 || code >= 500;
}

export interface GcsUploaderOptions {
  bucketName: string;
  maxRetries: number;
  baseDelayMs?: number;
}

/**
 * GCS 업로더: 파티션 파일을 gs://{bucket}/{logicalPath} 로 저장
 *
 * - 같은 경로면 덮어쓰기 (재실행 안전)
 * - 전송 오류, 5xx, 408, 429 는 지수 백오프로 재시도 후 마지막 에러를 던진다
 * - 그 밖의 4xx (인증/권한/버킷 없음) 는 바로 던진다
 */
export class GcsPartitionUploader implements PartitionUploader {
  private readonly logger = new Logger(GcsPartitionUploader.name);

  constructor(
    private readonly storage: ObjectStorage,
    private readonly options: GcsUploaderOptions,
  ) {}

  async upload(payload: Buffer, logicalPath: string, contentType: string): Promise<string> {
    const { bucketName, maxRetries, baseDelayMs = 500 } = this.options;
    const file = this.storage.bucket(bucketName).file(logicalPath);

    await executeWithRetry(() => file.save(payload, { contentType, resumable: false }), {
      maxRetries,
      baseDelayMs,
      label: `GCS 업로드 ${logicalPath}`,
      logger: this.logger,
      shouldRetry: isRetryableUploadError,
    });

    return `gs://${bucketName}/${logicalPath}`;
  }
}
