import { DateKey } from '@/export/date-key';
import { ScrapedRecord } from '@/export/record.types';

export interface ScrapeRequest {
  stockCode: string;
  /** 요청에서 받은 종목명 (없으면 수집기가 찾는다) */
  stockName?: string;
  isinCode: string | null;
  startDate: DateKey;
  endDate: DateKey;
  maxItems?: number;
  signal?: AbortSignal;
}

export interface ScrapeOutcome {
  entityName: string;
  records: ScrapedRecord[];
}

/**
 * 사이트 수집기 공통 인터페이스
 *
 * 타임아웃/차단/구조 변경 같은 실패는 ScrapeError 로 HTTP 계층까지 올린다.
 */
export interface Scraper {
  scrape(request: ScrapeRequest): Promise<ScrapeOutcome>;
}

export const NAVER_SCRAPER = Symbol('NAVER_SCRAPER');
export const TOSS_SCRAPER = Symbol('TOSS_SCRAPER');
