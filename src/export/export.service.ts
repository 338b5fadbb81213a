import { Inject, Injectable } from '@nestjs/common';
import { exportRecords } from './export-pipeline';
import {
  EXPORT_SETTINGS,
  ExportMeta,
  ExportResult,
  InvalidRecordPolicy,
  PARTITION_UPLOADER,
  PartitionUploader,
  RECORD_SERIALIZER,
  RecordSerializer,
  ScrapedRecord,
} from './record.types';

/**
 * 내보내기 설정: ExportModule 팩토리가 ConfigService 값으로 한 번 만든다
 */
export interface ExportSettings {
  basePath: string;
  timeZone: string;
  invalidRecordPolicy: InvalidRecordPolicy;
}

/**
 * 내보내기 서비스: 주입된 직렬화기/업로더로 파이프라인 실행
 *
 * - 수집 서비스(네이버, 토스)는 레코드와 종목 메타데이터만 넘긴다
 * - 타임존은 실행 설정에서 고정 (한 실행 안에서 일관성 유지)
 */
@Injectable()
export class ExportService {
  constructor(
    @Inject(RECORD_SERIALIZER) private readonly serializer: RecordSerializer,
    @Inject(PARTITION_UPLOADER) private readonly uploader: PartitionUploader,
    @Inject(EXPORT_SETTINGS) private readonly settings: ExportSettings,
  ) {}

  get timeZone(): string {
    return this.settings.timeZone;
  }

  async export(
    records: readonly ScrapedRecord[],
    meta: Omit<ExportMeta, 'timeZone'>,
    signal?: AbortSignal,
  ): Promise<ExportResult> {
    return exportRecords(
      records,
      { ...meta, timeZone: this.settings.timeZone },
      { serializer: this.serializer, uploader: this.uploader },
      {
        basePath: this.settings.basePath,
        invalidRecordPolicy: this.settings.invalidRecordPolicy,
        signal,
      },
    );
  }
}
