import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppEnv } from '@/config/app.config';
import { StorageModule } from '@/storage/storage.module';
import { ExportService, ExportSettings } from './export.service';
import { EXPORT_SETTINGS } from './record.types';

/**
 * 내보내기 모듈: 날짜 파티션 -> Parquet -> GCS
 *
 * - StorageModule 이 직렬화기/업로더 구현을 제공
 * - ExportService 를 export 하여 수집 모듈(네이버, 토스)에서 사용
 */
@Module({
  imports: [StorageModule],
  providers: [
    {
      provide: EXPORT_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppEnv, true>): ExportSettings => ({
        basePath: config.get('GCS_BASE_PATH', { infer: true }),
        timeZone: config.get('TIMEZONE', { infer: true }),
        invalidRecordPolicy: config.get('EXPORT_INVALID_RECORD_POLICY', { infer: true }),
      }),
    },
    ExportService,
  ],
  exports: [ExportService],
})
export class ExportModule {}
