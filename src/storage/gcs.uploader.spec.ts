import { GcsPartitionUploader, isRetryableUploadError, ObjectStorage } from './gcs.uploader';

interface SavedObject {
  bucket: string;
  path: string;
  data: Buffer;
  contentType: string;
}

function apiError(code: number): Error {
  return Object.assign(new Error(`${code} api error`), { code });
}

/**
 * 메모리 버킷: failuresBeforeSuccess 번 실패한 뒤 저장
 */
class InMemoryStorage implements ObjectStorage {
  readonly saved: SavedObject[] = [];
  attempts = 0;

  constructor(
    private failuresBeforeSuccess = 0,
    private readonly failure: () => Error = () => new Error('503 backend error'),
  ) {}

  bucket(bucketName: string) {
    return {
      file: (filePath: string) => ({
        save: async (data: Buffer, options: { contentType: string; resumable: boolean }) => {
          this.attempts += 1;
          if (this.failuresBeforeSuccess > 0) {
            this.failuresBeforeSuccess -= 1;
            throw this.failure();
          }
          this.saved.push({ bucket: bucketName, path: filePath, data, contentType: options.contentType });
        },
      }),
    };
  }
}

const PATH = 'marketing/stock_discussion/dt=2025-11-15/005930_2025-11-15.parquet';

describe('GcsPartitionUploader', () => {
  it('gs:// URI 를 돌려준다', async () => {
    const storage = new InMemoryStorage();
    const uploader = new GcsPartitionUploader(storage, { bucketName: 'test-bucket', maxRetries: 3, baseDelayMs: 0 });

    const uri = await uploader.upload(Buffer.from('PAR1'), PATH, 'application/vnd.apache.parquet');

    expect(uri).toBe(`gs://test-bucket/${PATH}`);
    expect(storage.saved).toEqual([
      {
        bucket: 'test-bucket',
        path: PATH,
        data: Buffer.from('PAR1'),
        contentType: 'application/vnd.apache.parquet',
      },
    ]);
  });

  it('일시 오류는 재시도', async () => {
    const storage = new InMemoryStorage(2);
    const uploader = new GcsPartitionUploader(storage, { bucketName: 'test-bucket', maxRetries: 3, baseDelayMs: 0 });

    await expect(uploader.upload(Buffer.from('x'), PATH, 'application/octet-stream')).resolves.toBe(
      `gs://test-bucket/${PATH}`,
    );
    expect(storage.attempts).toBe(3);
  });

  it('재시도를 다 쓰면 마지막 에러를 던진다', async () => {
    const storage = new InMemoryStorage(5);
    const uploader = new GcsPartitionUploader(storage, { bucketName: 'test-bucket', maxRetries: 2, baseDelayMs: 0 });

    await expect(uploader.upload(Buffer.from('x'), PATH, 'application/octet-stream')).rejects.toThrow(
      '503 backend error',
    );
    expect(storage.attempts).toBe(2);
    expect(storage.saved).toHaveLength(0);
  });

  it('권한 오류(403)는 재시도하지 않는다', async () => {
    const storage = new InMemoryStorage(5, () => apiError(403));
    const uploader = new GcsPartitionUploader(storage, { bucketName: 'test-bucket', maxRetries: 3, baseDelayMs: 0 });

    await expect(uploader.upload(Buffer.from('x'), PATH, 'application/octet-stream')).rejects.toThrow(
      '403 api error',
    );
    expect(storage.attempts).toBe(1);
  });

  it('429 는 재시도', async () => {
    const storage = new InMemoryStorage(1, () => apiError(429));
    const uploader = new GcsPartitionUploader(storage, { bucketName: 'test-bucket', maxRetries: 3, baseDelayMs: 0 });

    await expect(uploader.upload(Buffer.from('x'), PATH, 'application/octet-stream')).resolves.toBe(
      `gs://test-bucket/${PATH}`,
    );
    expect(storage.attempts).toBe(2);
  });

  it('isRetryableUploadError', () => {
    expect(isRetryableUploadError(new Error('socket hang up'))).toBe(true);
    expect(isRetryableUploadError(apiError(503))).toBe(true);
    expect(isRetryableUploadError(apiError(408))).toBe(true);
    expect(isRetryableUploadError(apiError(401))).toBe(false);
    expect(isRetryableUploadError(apiError(404))).toBe(false);
  });
});
