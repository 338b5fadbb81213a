import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BrowserContext } from 'playwright-core';
import { AppEnv } from '@/config/app.config';
import { TossError } from '@/common/errors/scrape.error';
import { delay, executeWithRetry } from '@/common/utils/retry.util';
import { describeCause } from '@/export/export.errors';
import { ScrapedRecord } from '@/export/record.types';
import { PlaywrightService } from '@/playwright/playwright.service';
import { ScrapeOutcome, ScrapeRequest, Scraper } from '@/scraping/scraper.types';
import {
  nextTossCursor,
  parseTossCommentPage,
  selectTossComments,
  TossCommentPage,
} from './parsers/toss-comment.parser';
import { TossStockContext, toTossRecord } from './toss-record.mapper';

const TOSS_ORIGIN = 'https://www.tossinvest.com';
const COMMENTS_API_URL = 'https://wts-cert-api.tossinvest.com/api/v3/comments';
const XSRF_COOKIE = 'XSRF-TOKEN';

/**
 * 토스증권 종목 커뮤니티 댓글 수집기
 *
 * 1. 토스증권 페이지를 열어 XSRF-TOKEN 쿠키 발급
 * 2. 같은 컨텍스트에서 댓글 API 를 최신순으로 페이지 단위 호출 (cursor = 마지막 댓글 id)
 *
 * 종료 조건: 빈 페이지, hasNext=false, start 이전 댓글 도달, max_items 도달
 */
@Injectable()
export class TossCommentClient implements Scraper {
  private readonly logger = new Logger(TossCommentClient.name);

  constructor(
    private readonly configService: ConfigService<AppEnv, true>,
    private readonly playwrightService: PlaywrightService,
  ) {}

  async scrape(request: ScrapeRequest): Promise<ScrapeOutcome> {
    const isinCode = request.isinCode;
    if (!isinCode) {
      throw new TossError(`[${request.stockCode}] ISIN 코드 없이 토스 댓글을 조회할 수 없습니다`, 400);
    }

    const stock: TossStockContext = {
      stockCode: request.stockCode,
      stockName: request.stockName ?? '',
      isinCode,
    };

    return this.playwrightService.withContext(async (context) => {
      const xsrfToken = await this.issueXsrfToken(context, stock.stockCode);
      const records = await this.collectComments(context, stock, xsrfToken, request);
      return { entityName: stock.stockName, records };
    });
  }

  private communityUrl(stockCode: string): string {
    return `${TOSS_ORIGIN}/stocks/A${stockCode}/community`;
  }

  /**
   * 페이지 방문 후 XSRF-TOKEN 쿠키 대기
   */
  private async issueXsrfToken(context: BrowserContext, stockCode: string): Promise<string> {
    const page = await context.newPage();
    try {
      await page.goto(this.communityUrl(stockCode), { waitUntil: 'domcontentloaded', timeout: 30_000 });
    } catch (error) {
      throw new TossError(`토스 증권 페이지 접속 실패: ${describeCause(error)}`, 500);
    } finally {
      await page.close();
    }

    const cookie = await this.playwrightService.waitForCookie(context, XSRF_COOKIE);
    if (!cookie) {
      throw new TossError('토스 증권 쿠키 획득에 실패했습니다. 사이트 구조 변경을 확인해주세요.', 500);
    }

    this.logger.log(`[${stockCode}] ${XSRF_COOKIE} 쿠키 획득`);
    return decodeURIComponent(cookie.value);
  }

  private async collectComments(
    context: BrowserContext,
    stock: TossStockContext,
    xsrfToken: string,
    request: ScrapeRequest,
  ): Promise<ScrapedRecord[]> {
    const tag = `[${stock.stockCode}]`;
    const timeZone = this.configService.get('TIMEZONE', { infer: true });
    const maxItems: number = request.maxItems ?? this.configService.get('TOSS_MAX_COMMENTS', { infer: true });
    const requestDelay = this.configService.get('TOSS_REQUEST_DELAY_MS', { infer: true });

    const records: ScrapedRecord[] = [];
    const seen = new Set<number>();
    let cursor: number | null = null;
    let pageNo = 0;

    this.logger.log(`${tag} 토스 댓글 수집 시작 (기간: ${request.startDate} ~ ${request.endDate}, 최대 ${maxItems}개)`);

    while (records.length < maxItems) {
      if (request.signal?.aborted) {
        throw new TossError(`${tag} 요청이 취소되었습니다`, 499);
      }
      pageNo += 1;

      const commentId = cursor;
      const page = await executeWithRetry(() => this.fetchPage(context, stock, xsrfToken, commentId), {
        maxRetries: 3,
        baseDelayMs: 1000,
        label: `${tag} 댓글 페이지 ${pageNo}`,
        logger: this.logger,
      });

      if (page.comments.length === 0) {
        this.logger.log(`${tag} 빈 페이지, 수집 종료`);
        break;
      }

      const selection = selectTossComments(
        page.comments,
        { startDate: request.startDate, endDate: request.endDate, timeZone, remaining: maxItems - records.length },
        seen,
      );
      records.push(...selection.comments.map((comment) => toTossRecord(stock, comment, timeZone)));

      this.logger.log(`${tag} 페이지 ${pageNo}: ${page.comments.length}개 응답, 누적 ${records.length}개`);

      if (selection.reachedStart) {
        this.logger.log(`${tag} start(${request.startDate}) 이전 댓글 도달, 수집 종료`);
        break;
      }

      const nextCursor = nextTossCursor(page, cursor);
      if (nextCursor === null) break;
      cursor = nextCursor;

      await delay(requestDelay);
    }

    this.logger.log(`${tag} 토스 댓글 수집 완료: ${records.length}개`);
    return records;
  }

  private async fetchPage(
    context: BrowserContext,
    stock: TossStockContext,
    xsrfToken: string,
    commentId: number | null,
  ): Promise<TossCommentPage> {
    const response = await context.request.post(COMMENTS_API_URL, {
      data: {
        subjectId: stock.isinCode,
        subjectType: 'STOCK',
        commentSortType: 'RECENT',
        ...(commentId !== null ? { commentId: String(commentId) } : {}),
      },
      headers: {
        Accept: 'application/json',
        'Accept-Language': 'ko-KR,ko;q=0.8,en-US;q=0.5,en;q=0.3',
        'X-XSRF-TOKEN': xsrfToken,
        Origin: TOSS_ORIGIN,
        Referer: this.communityUrl(stock.stockCode),
      },
      timeout: 30_000,
    });

    if (!response.ok()) {
      throw new TossError(`토스 댓글 API 응답 오류: HTTP ${response.status()}`, 502);
    }

    const json: unknown = await response.json();
    const page = parseTossCommentPage(json);
    if (!page) {
      throw new TossError('토스 댓글 API 응답 형식이 올바르지 않습니다', 502);
    }
    return page;
  }
}
