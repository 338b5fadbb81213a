import { Logger } from '@nestjs/common';

export interface RetryOptions {
  maxRetries: number;
  /** 첫 대기 시간. 시도마다 2배 (기본 100ms -> 200ms -> 400ms) */
  baseDelayMs?: number;
  /** 로그 접두사 */
  label?: string;
  logger?: Logger;
  /** false 를 돌려주면 즉시 포기 */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * 재시도 헬퍼: 네트워크 일시 오류 시 지수 백오프로 다시 실행
 *
 * 마지막 시도의 에러를 그대로 던진다.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxRetries, baseDelayMs = 100, label = '작업', logger, shouldRetry } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      logger?.warn(
        `⚠️ ${label} 실패 (시도 ${attempt}/${maxRetries}): ${error instanceof Error ? error.message : String(error)}`,
      );

      if (shouldRetry && !shouldRetry(error)) {
        break;
      }

      if (attempt < maxRetries) {
        await delay(baseDelayMs * Math.pow(2, attempt - 1));
      }
    }
  }

  throw lastError;
}

/**
 * 딜레이 헬퍼
 */
export function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}
