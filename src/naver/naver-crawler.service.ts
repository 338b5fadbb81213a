import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Bottleneck from 'bottleneck';
import { BrowserContext, Page } from 'playwright-core';
import { AppEnv } from '@/config/app.config';
import { NaverError } from '@/common/errors/scrape.error';
import { todayDateKey } from '@/common/utils/date.util';
import { delay, executeWithRetry } from '@/common/utils/retry.util';
import { DateKey } from '@/export/date-key';
import { ScrapedRecord } from '@/export/record.types';
import { PlaywrightService } from '@/playwright/playwright.service';
import { ScrapeOutcome, ScrapeRequest, Scraper } from '@/scraping/scraper.types';
import { NaverStockContext, toNaverRecord } from './naver-record.mapper';
import { evaluateBoardRows, isBlockedPage, parseBoardList } from './parsers/board-list.parser';
import { NaverComment, parseCommentResponse } from './parsers/comment.parser';
import { parseDiscussionDetail } from './parsers/discussion-detail.parser';

const BASE_URL = 'https://finance.naver.com';
const MOBILE_URL = 'https://m.stock.naver.com';
const COMMENT_API_URL = 'https://apis.naver.com/commentBox/cbox/web_naver_list_jsonp.json';
const MOBILE_USER_AGENT =
  'Mozilla/5.0 (iPhone; CPU iPhone OS 13_3 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/13.0.4 Mobile/15E148 Safari/604.1';

const MAX_BLOCK_RETRIES = 3;
const PAGE_RETRY_DELAY_MS = 5_000;
const ROW_SELECTOR = 'table.type2 tbody tr td.title a';
const NEXT_BLOCK_SELECTOR = 'table.Nnavi td.pgR a';

/**
 * 네이버 증권 종목토론실 크롤러
 *
 * 1. 목록 1단계: 1 ~ NAVER_PLAYWRIGHT_SWITCH_PAGE 페이지를 컨텍스트 request API 로 수집
 * 2. 목록 2단계: 그 이후는 실제 페이지에서 "다음"(pgR) 버튼을 눌러 10페이지씩 이동
 *    (1단계 연속 실패 시에도 강제 전환)
 * 3. 상세: 모바일 페이지 __NEXT_DATA__ + 댓글 API, Bottleneck 으로 동시성/간격 제한
 */
@Injectable()
export class NaverCrawlerService implements Scraper {
  private readonly logger = new Logger(NaverCrawlerService.name);

  constructor(
    private readonly configService: ConfigService<AppEnv, true>,
    private readonly playwrightService: PlaywrightService,
  ) {}

  private get timeZone(): string {
    return this.configService.get('TIMEZONE', { infer: true });
  }

  async scrape(request: ScrapeRequest): Promise<ScrapeOutcome> {
    const tag = `[${request.stockCode}]`;
    this.logger.log(`${tag} 크롤링 시작 (기간: ${request.startDate} ~ ${request.endDate})`);

    return this.playwrightService.withContext(async (context) => {
      await context.addCookies([
        { name: 'hide_cleanbot_contents', value: 'off', domain: '.naver.com', path: '/' },
      ]);

      const { nids, stockName } = await this.collectDiscussionIds(context, request);
      const entityName = request.stockName || stockName || '';

      if (nids.length === 0) {
        this.logger.log(`${tag} 게시물 없음`);
        return { entityName, records: [] };
      }

      const stock: NaverStockContext = {
        stockCode: request.stockCode,
        stockName: entityName,
        isinCode: request.isinCode,
      };
      const records = await this.collectDetails(context, stock, nids, request.signal);

      this.logger.log(`${tag} 크롤링 완료: ${records.length}개 수집`);
      return { entityName, records };
    });
  }

  private boardUrl(stockCode: string, page: number): string {
    return `${BASE_URL}/item/board.naver?code=${stockCode}&page=${page}`;
  }

  private ensureNotAborted(signal: AbortSignal | undefined, tag: string): void {
    if (signal?.aborted) {
      throw new NaverError(`${tag} 요청이 취소되었습니다`, 499);
    }
  }

  private async fetchText(
    context: BrowserContext,
    url: string,
    options?: { params?: Record<string, string | number | boolean>; headers?: Record<string, string> },
  ): Promise<string> {
    const response = await context.request.get(url, { timeout: 30_000, ...options });
    if (!response.ok()) {
      throw new NaverError(`HTTP ${response.status()} 응답: ${url}`, 502);
    }
    return response.text();
  }

  /**
   * 게시물 목록 수집 (날짜 조건, 1단계 -> 2단계)
   */
  private async collectDiscussionIds(
    context: BrowserContext,
    request: ScrapeRequest,
  ): Promise<{ nids: string[]; stockName: string | null }> {
    const tag = `[${request.stockCode}]`;
    const switchPage = this.configService.get('NAVER_PLAYWRIGHT_SWITCH_PAGE', { infer: true });
    const maxEmptyPages = this.configService.get('NAVER_MAX_EMPTY_PAGES', { infer: true });
    const requestDelay = this.configService.get('NAVER_REQUEST_DELAY_MS', { infer: true });
    const blockBackoff = this.configService.get('NAVER_BLOCK_BACKOFF_MS', { infer: true });
    const today = todayDateKey(this.timeZone);

    const seen = new Set<string>();
    const nids: string[] = [];
    let stockName: string | null = null;
    let emptyPages = 0;
    let blockRetries = 0;
    let page = 0;
    let continueWithBrowser = false;

    while (page < switchPage) {
      this.ensureNotAborted(request.signal, tag);
      page += 1;

      let html: string;
      try {
        html = await executeWithRetry(() => this.fetchText(context, this.boardUrl(request.stockCode, page)), {
          maxRetries: this.configService.get('NAVER_MAX_RETRIES', { infer: true }),
          baseDelayMs: PAGE_RETRY_DELAY_MS,
          label: `${tag} 목록 페이지 ${page}`,
          logger: this.logger,
        });
      } catch {
        this.logger.warn(`${tag} 페이지 ${page} 연속 실패, Playwright로 강제 전환`);
        continueWithBrowser = true;
        break;
      }

      if (isBlockedPage(html)) {
        blockRetries += 1;
        if (blockRetries > MAX_BLOCK_RETRIES) {
          this.logger.warn(`${tag} IP 차단 ${MAX_BLOCK_RETRIES}회 재시도 실패, 수집 중단`);
          break;
        }
        this.logger.warn(
          `${tag} 페이지 ${page}: IP 차단 감지, ${blockBackoff}ms 대기 후 재시도 (${blockRetries}/${MAX_BLOCK_RETRIES})`,
        );
        await delay(blockBackoff);
        page -= 1;
        continue;
      }
      blockRetries = 0;

      const board = parseBoardList(html, today);
      if (page === 1 && board.stockName) {
        stockName = board.stockName;
        this.logger.log(`${tag} 종목명: ${stockName}`);
      }
      if (!board.hasTable) {
        this.logger.warn(`${tag} 페이지 ${page}: 테이블 없음`);
        break;
      }

      const evaluation = evaluateBoardRows(board.rows, request, seen);
      nids.push(...evaluation.nids);
      this.logger.log(
        `${tag} 페이지 ${page}: ${evaluation.nids.length}개 발견 (유효 행: ${board.rows.length}, 미래 스킵: ${evaluation.skippedFuture})`,
      );

      emptyPages = evaluation.hasValidRows ? 0 : emptyPages + 1;
      if (emptyPages >= maxEmptyPages) {
        this.logger.log(`${tag} 연속 ${maxEmptyPages}페이지 빈 결과, 수집 중단`);
        break;
      }
      if (evaluation.reachedStart) {
        this.logger.log(`${tag} start_date(${request.startDate}) 이전 게시물 도달, 탐색 종료`);
        break;
      }
      if (page === switchPage) {
        this.logger.log(`${tag} ${switchPage}페이지 도달, Playwright 클릭 기반 수집으로 전환`);
        continueWithBrowser = true;
      }

      await delay(requestDelay);
    }

    if (continueWithBrowser) {
      const more = await this.collectWithBrowser(context, request, Math.max(page, 1), seen, today);
      nids.push(...more);
    }

    this.logger.log(`${tag} 총 ${nids.length}개 게시물 발견`);
    return { nids, stockName };
  }

  /**
   * 2단계: 실제 페이지에서 "다음" 버튼으로 이동하며 수집
   *
   * alert(차단), 버튼 없음, 연속 빈 페이지, start_date 이전 도달 시 종료
   */
  private async collectWithBrowser(
    context: BrowserContext,
    request: ScrapeRequest,
    startPage: number,
    seen: Set<string>,
    today: DateKey,
  ): Promise<string[]> {
    const tag = `[${request.stockCode}]`;
    const maxEmptyPages = this.configService.get('NAVER_MAX_EMPTY_PAGES', { infer: true });
    const nids: string[] = [];
    const alertState: { message: string | null } = { message: null };

    const page = await context.newPage();
    page.on('dialog', (dialog) => {
      alertState.message = dialog.message();
      this.logger.warn(`${tag} Playwright: Alert 감지 - ${alertState.message}`);
      dialog.dismiss().catch((error: unknown) => {
        this.logger.warn(`${tag} Alert 닫기 실패: ${error instanceof Error ? error.message : String(error)}`);
      });
    });

    let currentPage = startPage;
    try {
      this.logger.log(`${tag} Playwright: 페이지 ${startPage}부터 '다음' 버튼 클릭 수집 시작`);

      try {
        await executeWithRetry(
          async () => {
            await page.goto(this.boardUrl(request.stockCode, startPage), {
              waitUntil: 'domcontentloaded',
              timeout: 30_000,
            });
            await page.waitForSelector(ROW_SELECTOR, { timeout: 10_000 });
          },
          { maxRetries: 3, baseDelayMs: PAGE_RETRY_DELAY_MS, label: `${tag} Playwright 초기 로드`, logger: this.logger },
        );
      } catch {
        this.logger.warn(`${tag} Playwright: 초기 테이블 로드 실패, 수집 종료`);
        return nids;
      }

      let emptyPages = 0;
      for (;;) {
        const board = parseBoardList(await page.content(), today);
        const evaluation = evaluateBoardRows(board.rows, request, seen);
        nids.push(...evaluation.nids);
        this.logger.log(`${tag} Playwright 페이지 ${currentPage}: ${evaluation.nids.length}개`);

        emptyPages = evaluation.hasValidRows ? 0 : emptyPages + 1;
        if (evaluation.reachedStart) {
          this.logger.log(`${tag} start_date 이전 도달, Playwright 수집 종료`);
          break;
        }
        if (emptyPages >= maxEmptyPages) {
          this.logger.log(`${tag} 연속 ${maxEmptyPages}페이지 빈 결과, Playwright 수집 종료`);
          break;
        }
        if (alertState.message) {
          this.logger.warn(`${tag} Playwright: Alert으로 인해 수집 중단 - ${alertState.message}`);
          break;
        }
        this.ensureNotAborted(request.signal, tag);

        if (!(await this.moveToNextBlock(page, tag))) {
          break;
        }
        currentPage += 10;
      }
    } finally {
      await page.close();
    }

    this.logger.log(`${tag} Playwright 수집 완료: 총 ${nids.length}개 (마지막 페이지 ~${currentPage})`);
    return nids;
  }

  /**
   * "다음"(pgR) 버튼 클릭 -> 10페이지 뒤로 이동. 이동 못 하면 false
   */
  private async moveToNextBlock(page: Page, tag: string): Promise<boolean> {
    const nextButton = page.locator(NEXT_BLOCK_SELECTOR);

    if ((await nextButton.count()) === 0 || !(await nextButton.first().isVisible())) {
      this.logger.log(`${tag} Playwright: '다음' 버튼(pgR) 없음, 마지막 페이지 도달`);
      return false;
    }

    try {
      await page.waitForTimeout(500);
      await nextButton.first().click();
    } catch (error) {
      this.logger.warn(`${tag} Playwright: 클릭 에러 - ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }

    try {
      await page.waitForSelector(ROW_SELECTOR, { timeout: 15_000 });
    } catch {
      this.logger.warn(`${tag} Playwright: 페이지 로드 지연, 추가 대기...`);
      await page.waitForTimeout(2000);
    }
    return true;
  }

  /**
   * 상세 수집: 동시 NAVER_DETAIL_CONCURRENCY 개, 요청 간격 NAVER_REQUEST_DELAY_MS
   */
  private async collectDetails(
    context: BrowserContext,
    stock: NaverStockContext,
    nids: readonly string[],
    signal?: AbortSignal,
  ): Promise<ScrapedRecord[]> {
    const tag = `[${stock.stockCode}]`;
    const limiter = new Bottleneck({
      maxConcurrent: this.configService.get('NAVER_DETAIL_CONCURRENCY', { infer: true }),
      minTime: this.configService.get('NAVER_REQUEST_DELAY_MS', { infer: true }),
    });

    this.logger.log(`${tag} ${nids.length}개 게시물 상세 수집 시작`);
    let completed = 0;

    const results = await Promise.all(
      nids.map((nid) =>
        limiter.schedule(async () => {
          if (signal?.aborted) return null;

          const record = await this.fetchDiscussion(context, stock, nid);
          completed += 1;
          if (record) {
            this.logger.log(`${tag} 진행: ${completed}/${nids.length}`);
          }
          return record;
        }),
      ),
    );

    this.ensureNotAborted(signal, tag);
    return results.filter((record): record is ScrapedRecord => record !== null);
  }

  /**
   * 게시물 상세 + 댓글 (NAVER_MAX_RETRIES 재시도, 끝내 실패하면 로그 후 제외)
   */
  private async fetchDiscussion(
    context: BrowserContext,
    stock: NaverStockContext,
    nid: string,
  ): Promise<ScrapedRecord | null> {
    const tag = `[${stock.stockCode}]`;
    const detailUrl = `${MOBILE_URL}/pc/domestic/stock/${stock.stockCode}/discussion/${nid}`;

    try {
      return await executeWithRetry(
        async () => {
          const detail = parseDiscussionDetail(await this.fetchText(context, detailUrl));
          if (!detail) {
            this.logger.warn(`${tag} nid=${nid}: 토론 데이터 없음`);
            return null;
          }

          const comments = await this.fetchComments(context, stock.stockCode, nid);
          this.logger.debug(`${tag} nid=${nid}: 수집 완료 (${comments.length}개 댓글)`);
          return toNaverRecord(stock, nid, detail, comments, this.timeZone);
        },
        {
          maxRetries: this.configService.get('NAVER_MAX_RETRIES', { infer: true }),
          baseDelayMs: 1000,
          label: `${tag} nid=${nid} 상세`,
          logger: this.logger,
        },
      );
    } catch (error) {
      this.logger.error(
        `${tag} nid=${nid}: 최대 재시도 초과 - ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  /**
   * 댓글 API (첫 페이지 100개). 실패해도 게시물은 수집
   */
  private async fetchComments(context: BrowserContext, stockCode: string, nid: string): Promise<NaverComment[]> {
    try {
      const text = await this.fetchText(context, COMMENT_API_URL, {
        params: {
          ticket: 'finance',
          templateId: 'community',
          pool: 'cbox12',
          lang: 'ko',
          country: 'KR',
          objectId: nid,
          categoryId: '',
          pageSize: 100,
          indexSize: 10,
          groupId: '',
          listType: 'OBJECT',
          pageType: 'more',
          page: 1,
          initialize: 'true',
          followSize: 5,
          useAltSort: 'true',
          replyPageSize: 5,
          _callback: 'jQuery',
          _: Date.now(),
        },
        headers: {
          'User-Agent': MOBILE_USER_AGENT,
          Referer: `${MOBILE_URL}/domestic/stock/${stockCode}/discussion/${nid}`,
        },
      });
      return parseCommentResponse(text, this.timeZone);
    } catch (error) {
      this.logger.warn(
        `[${stockCode}] nid=${nid}: 댓글 수집 실패 - ${error instanceof Error ? error.message : String(error)}`,
      );
      return [];
    }
  }
}
