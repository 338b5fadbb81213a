import { DateKey } from './date-key';
import { exportRecords, ExportOptions } from './export-pipeline';
import {
  DataError,
  EmptyInputError,
  ExportCancelledError,
  SerializationError,
  UploadError,
} from './export.errors';
import { ExportMeta, PartitionUploader, RecordSerializer, ScrapedRecord } from './record.types';

const BASE_PATH = 'marketing/stock_discussion';

class FakeSerializer implements RecordSerializer {
  readonly extension = 'parquet';
  readonly contentType = 'application/vnd.apache.parquet';
  readonly calls: Array<{ dateKey: DateKey; ids: number[] }> = [];

  constructor(private readonly failOn: string | null = null) {}

  async serialize(records: readonly ScrapedRecord[], dateKey: DateKey): Promise<Buffer> {
    this.calls.push({ dateKey, ids: records.map((record) => record.recordId) });
    if (dateKey === this.failOn) {
      throw new Error('schema mismatch');
    }
    return Buffer.from(records.map((record) => record.recordId).join(','));
  }
}

class FakeUploader implements PartitionUploader {
  readonly paths: string[] = [];

  constructor(
    private readonly failOnCall: number | null = null,
    private readonly afterUpload?: (count: number) => void,
  ) {}

  async upload(_payload: Buffer, logicalPath: string): Promise<string> {
    this.paths.push(logicalPath);
    if (this.paths.length === this.failOnCall) {
      throw new Error('quota exceeded');
    }
    this.afterUpload?.(this.paths.length);
    return `gs://test-bucket/${logicalPath}`;
  }
}

function record(recordId: number, timestamp: string | null): ScrapedRecord {
  return {
    entityCode: '005930',
    entitySecondaryId: 'KR7005930003',
    entityName: '삼성전자',
    recordId,
    author: 'tester',
    timestamp: timestamp === null ? null : new Date(timestamp),
    content: `본문 ${recordId}`,
    likes: 1,
    dislikes: 0,
    extra: '[]',
    source: 'naver',
  };
}

const meta: ExportMeta = {
  entityCode: '005930',
  entityName: '삼성전자',
  source: 'naver',
  timeZone: 'Asia/Seoul',
};

const options: ExportOptions = { basePath: BASE_PATH, invalidRecordPolicy: 'skip' };

// 서울 기준 11-13, 11-14, 11-15 (UTC 03시 = 서울 12시)
const threeDays = [
  record(1, '2025-11-13T03:00:00Z'),
  record(2, '2025-11-15T03:00:00Z'),
  record(3, '2025-11-14T03:00:00Z'),
  record(4, '2025-11-15T04:00:00Z'),
];

describe('exportRecords', () => {
  it('최신 날짜부터 업로드하고 결과도 같은 순서', async () => {
    const serializer = new FakeSerializer();
    const uploader = new FakeUploader();

    const result = await exportRecords(threeDays, meta, { serializer, uploader }, options);

    expect(uploader.paths).toEqual([
      `${BASE_PATH}/dt=2025-11-15/005930_2025-11-15.parquet`,
      `${BASE_PATH}/dt=2025-11-14/005930_2025-11-14.parquet`,
      `${BASE_PATH}/dt=2025-11-13/005930_2025-11-13.parquet`,
    ]);
    expect(serializer.calls).toEqual([
      { dateKey: '2025-11-15', ids: [2, 4] },
      { dateKey: '2025-11-14', ids: [3] },
      { dateKey: '2025-11-13', ids: [1] },
    ]);
    expect(result.partitions.map((partition) => partition.dateKey)).toEqual([
      '2025-11-15',
      '2025-11-14',
      '2025-11-13',
    ]);
    expect(result.totalRecords).toBe(4);
    expect(result.skippedRecords).toBe(0);
    expect(result.partitions[0]).toEqual({
      dateKey: '2025-11-15',
      uri: `gs://test-bucket/${BASE_PATH}/dt=2025-11-15/005930_2025-11-15.parquet`,
      recordCount: 2,
    });
  });

  it('빈 입력은 직렬화기/업로더를 부르지 않고 EmptyInputError', async () => {
    const serializer = new FakeSerializer();
    const uploader = new FakeUploader();

    await expect(exportRecords([], meta, { serializer, uploader }, options)).rejects.toBeInstanceOf(
      EmptyInputError,
    );
    expect(serializer.calls).toHaveLength(0);
    expect(uploader.paths).toHaveLength(0);
  });

  it('두 번째 업로드 실패 시 첫 파티션만 완료로 보고하고 세 번째는 시도하지 않는다', async () => {
    const serializer = new FakeSerializer();
    const uploader = new FakeUploader(2);

    const error = await exportRecords(threeDays, meta, { serializer, uploader }, options).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(UploadError);
    if (!(error instanceof UploadError)) return;
    expect(error.failedDateKey).toBe('2025-11-14');
    expect(error.completed.map((partition) => partition.dateKey)).toEqual(['2025-11-15']);
    expect(error.message).toBe('파티션 업로드 실패 (dt=2025-11-14): quota exceeded');
    expect(uploader.paths).toHaveLength(2);
    expect(serializer.calls).toHaveLength(2);
  });

  it('직렬화 실패는 SerializationError', async () => {
    const serializer = new FakeSerializer('2025-11-15');
    const uploader = new FakeUploader();

    const error = await exportRecords(threeDays, meta, { serializer, uploader }, options).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(SerializationError);
    if (!(error instanceof SerializationError)) return;
    expect(error.failedDateKey).toBe('2025-11-15');
    expect(error.completed).toEqual([]);
    expect(uploader.paths).toHaveLength(0);
  });

  it('사흘에 걸친 50건은 총 50건, 서로 다른 3개 URL', async () => {
    const records = Array.from({ length: 50 }, (_, index) =>
      record(index + 1, `2025-11-${13 + (index % 3)}T03:00:00Z`),
    );
    const uploader = new FakeUploader();

    const result = await exportRecords(records, meta, { serializer: new FakeSerializer(), uploader }, options);

    expect(result.totalRecords).toBe(50);
    expect(result.partitions.map((partition) => partition.recordCount)).toEqual([16, 17, 17]);
    const urls = result.partitions.map((partition) => partition.uri);
    expect(new Set(urls).size).toBe(3);
    urls.forEach((url, position) => {
      expect(url).toContain(`/dt=2025-11-${15 - position}/`);
    });
  });

  it('같은 입력으로 다시 실행하면 같은 경로에 쓴다', async () => {
    const first = new FakeUploader();
    const second = new FakeUploader();

    await exportRecords(threeDays, meta, { serializer: new FakeSerializer(), uploader: first }, options);
    await exportRecords(threeDays, meta, { serializer: new FakeSerializer(), uploader: second }, options);

    expect(second.paths).toEqual(first.paths);
  });

  it('entityIdentifier 가 있으면 파일 이름에 사용', async () => {
    const uploader = new FakeUploader();

    await exportRecords(
      [record(1, '2025-11-15T03:00:00Z')],
      { ...meta, source: 'toss', entityIdentifier: 'KR7005930003' },
      { serializer: new FakeSerializer(), uploader },
      options,
    );

    expect(uploader.paths).toEqual([`${BASE_PATH}/dt=2025-11-15/KR7005930003_2025-11-15.parquet`]);
  });

  describe('타임스탬프 불량 레코드', () => {
    it('skip 정책이면 제외하고 개수를 보고', async () => {
      const result = await exportRecords(
        [...threeDays, record(9, null)],
        meta,
        { serializer: new FakeSerializer(), uploader: new FakeUploader() },
        options,
      );

      expect(result.totalRecords).toBe(4);
      expect(result.skippedRecords).toBe(1);
    });

    it('skip 정책에서 남는 레코드가 없으면 EmptyInputError', async () => {
      const uploader = new FakeUploader();

      await expect(
        exportRecords([record(9, null)], meta, { serializer: new FakeSerializer(), uploader }, options),
      ).rejects.toBeInstanceOf(EmptyInputError);
      expect(uploader.paths).toHaveLength(0);
    });

    it('abort 정책이면 업로드 전에 DataError', async () => {
      const uploader = new FakeUploader();

      await expect(
        exportRecords(
          [...threeDays, record(9, null)],
          meta,
          { serializer: new FakeSerializer(), uploader },
          { ...options, invalidRecordPolicy: 'abort' },
        ),
      ).rejects.toBeInstanceOf(DataError);
      expect(uploader.paths).toHaveLength(0);
    });
  });

  it('취소되면 다음 파티션 경계에서 멈추고 완료분을 보고', async () => {
    const controller = new AbortController();
    const uploader = new FakeUploader(null, (count) => {
      if (count === 1) controller.abort();
    });

    const error = await exportRecords(
      threeDays,
      meta,
      { serializer: new FakeSerializer(), uploader },
      { ...options, signal: controller.signal },
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExportCancelledError);
    if (!(error instanceof ExportCancelledError)) return;
    expect(error.failedDateKey).toBeNull();
    expect(error.completed.map((partition) => partition.dateKey)).toEqual(['2025-11-15']);
    expect(uploader.paths).toHaveLength(1);
  });
});
