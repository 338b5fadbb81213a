import { z } from 'zod';
import { isValidTimeZone } from '@/common/utils/date.util';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true');

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * 환경 변수 스키마
 *
 * ConfigModule.forRoot({ validate }) 에서 한 번 검증하고,
 * 이후 서비스는 ConfigService<AppEnv, true> 로 타입이 붙은 값을 읽는다.
 */
export const appEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  TIMEZONE: z
    .string()
    .default('Asia/Seoul')
    .refine(isValidTimeZone, { message: '알 수 없는 타임존입니다' }),

  // GCS 업로드
  GCS_BUCKET_NAME: z.string().trim().min(1),
  GCS_CREDENTIALS_PATH: optionalString,
  GCS_BASE_PATH: z.string().trim().min(1).default('marketing/stock_discussion'),
  GCS_UPLOAD_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  EXPORT_INVALID_RECORD_POLICY: z.enum(['abort', 'skip']).default('skip'),

  // BigQuery 종목 테이블
  GCP_PROJECT_ID: optionalString,
  BQ_DATASET_ID: optionalString,
  BQ_STOCK_TABLE_ID: optionalString,
  BQ_LIMIT: z.coerce.number().int().min(0).default(0),

  // 브라우저
  PLAYWRIGHT_HEADLESS: booleanFlag(true),

  // 네이버 크롤러
  NAVER_REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  NAVER_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  NAVER_DETAIL_CONCURRENCY: z.coerce.number().int().min(1).default(10),
  NAVER_PLAYWRIGHT_SWITCH_PAGE: z.coerce.number().int().min(1).default(100),
  NAVER_MAX_EMPTY_PAGES: z.coerce.number().int().min(1).default(5),
  NAVER_BLOCK_BACKOFF_MS: z.coerce.number().int().min(0).default(60_000),
  BATCH_CONCURRENCY: z.coerce.number().int().min(1).default(1),

  // 토스 크롤러
  TOSS_MAX_COMMENTS: z.coerce.number().int().min(1).default(1000),
  TOSS_REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(500),
});

export type AppEnv = z.infer<typeof appEnvSchema>;

/**
 * ConfigModule 검증 함수: 실패 시 어떤 변수가 잘못됐는지 모아서 던진다
 */
export function validateEnv(raw: Record<string, unknown>): AppEnv {
  const result = appEnvSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`환경 변수 검증 실패: ${details}`);
  }
  return result.data;
}
