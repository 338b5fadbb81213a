import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Storage } from '@google-cloud/storage';
import { AppEnv } from '@/config/app.config';
import { PARTITION_UPLOADER, RECORD_SERIALIZER } from '@/export/record.types';
import { GcsPartitionUploader } from './gcs.uploader';
import { ParquetRecordSerializer } from './parquet.serializer';

/**
 * 스토리지 모듈: 파티션 직렬화기(Parquet)와 업로더(GCS) 제공
 *
 * - 자격 증명 파일이 없으면 ADC(Application Default Credentials) 사용
 * - 토큰(RECORD_SERIALIZER, PARTITION_UPLOADER)으로 export 하여 테스트에서 교체 가능
 */
@Module({
  providers: [
    {
      provide: RECORD_SERIALIZER,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppEnv, true>) =>
        new ParquetRecordSerializer(config.get('TIMEZONE', { infer: true })),
    },
    {
      provide: PARTITION_UPLOADER,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppEnv, true>) => {
        const keyFilename = config.get('GCS_CREDENTIALS_PATH', { infer: true });
        const storage = new Storage({
          projectId: config.get('GCP_PROJECT_ID', { infer: true }),
          keyFilename,
        });

        return new GcsPartitionUploader(storage, {
          bucketName: config.get('GCS_BUCKET_NAME', { infer: true }),
          maxRetries: config.get('GCS_UPLOAD_MAX_RETRIES', { infer: true }),
        });
      },
    },
  ],
  exports: [RECORD_SERIALIZER, PARTITION_UPLOADER],
})
export class StorageModule {}
