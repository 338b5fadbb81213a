import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Bottleneck from 'bottleneck';
import { AppEnv } from '@/config/app.config';
import { ErrorResponse, NaverError } from '@/common/errors/scrape.error';
import { CollectResponse, NoContentResponse, toCollectErrorResponse } from '@/common/http/collect-response';
import { DateKey } from '@/export/date-key';
import { describeCause, EmptyInputError } from '@/export/export.errors';
import { toExportResponse } from '@/export/export-response';
import { ExportService } from '@/export/export.service';
import { ExportResult } from '@/export/record.types';
import { DateRange, resolveDateRange } from '@/scraping/date-range';
import { NAVER_SCRAPER, Scraper } from '@/scraping/scraper.types';
import { STOCK_DIRECTORY, StockDirectory, StockInfo } from '@/stocks/stock.types';
import { NaverBatchBody, NaverDiscussionBody } from './dto/naver-request.schema';

/** 날짜 미지정 시 end_date 로부터 7일 전부터 수집 */
export const NAVER_LOOKBACK_DAYS = 7;

export interface NaverRangeContext {
  stock_code: string;
  start_date: string;
  end_date: string;
}

export type NaverManualResponse = CollectResponse<NaverRangeContext>;

export type NaverBatchStockResult =
  | { stock_code: string; status: 'success'; total_records: number; urls: string[] }
  | { stock_code: string; status: 'no_data'; total_records: 0 }
  | { stock_code: string; status: 'failed'; error: string };

export interface NaverBatchResponse {
  code: 200;
  message: string;
  start_date: string;
  end_date: string;
  total_stocks: number;
  success_count: number;
  fail_count: number;
  results: NaverBatchStockResult[];
}

export type NaverBatchNoStocksResponse = Omit<NoContentResponse, 'total_records'> & { total_stocks: 0 };

interface NaverTarget {
  stockCode: string;
  stockName?: string;
  isinCode: string | null;
  directoryName?: string;
}

/**
 * 네이버 종목토론실 수집 서비스
 *
 * 수집(NAVER_SCRAPER) -> 종목명 결정 -> 내보내기(ExportService)
 * 파일 이름 식별자는 종목 코드
 */
@Injectable()
export class NaverService {
  private readonly logger = new Logger(NaverService.name);

  constructor(
    @Inject(NAVER_SCRAPER) private readonly scraper: Scraper,
    @Inject(STOCK_DIRECTORY) private readonly stockDirectory: StockDirectory,
    private readonly exportService: ExportService,
    private readonly configService: ConfigService<AppEnv, true>,
  ) {}

  private resolveRange(body: { start_date?: DateKey; end_date?: DateKey }): DateRange {
    return resolveDateRange(
      { startDate: body.start_date, endDate: body.end_date },
      NAVER_LOOKBACK_DAYS,
      this.exportService.timeZone,
    );
  }

  /**
   * 단일 종목 수집 (POST /api/naver/discussions/manual)
   */
  async collectDiscussions(body: NaverDiscussionBody, signal?: AbortSignal): Promise<NaverManualResponse> {
    const range = this.resolveRange(body);
    const context: NaverRangeContext = {
      stock_code: body.stock_code,
      start_date: range.startDate,
      end_date: range.endDate,
    };

    try {
      if (range.startDate > range.endDate) {
        throw new NaverError(`start_date(${range.startDate}) 가 end_date(${range.endDate}) 보다 늦습니다`, 400);
      }

      const stock = await this.lookupStock(body.stock_code);
      const result = await this.collectStock(
        {
          stockCode: body.stock_code,
          stockName: body.stock_name,
          isinCode: stock?.isinCode ?? null,
          directoryName: stock?.stockName,
        },
        range,
        signal,
      );

      return toExportResponse(result, '네이버 토론 게시물 수집 및 업로드 완료', context);
    } catch (error) {
      if (!(error instanceof EmptyInputError)) {
        this.logger.error(`[${body.stock_code}] 네이버 수집 실패: ${describeCause(error)}`);
      }
      return toCollectErrorResponse(error, context, `[${body.stock_code}] 수집된 게시물 없음`);
    }
  }

  /**
   * 전체 대상 종목 수집 (POST /api/naver/discussions/batch)
   *
   * BATCH_CONCURRENCY 개씩 동시에 처리, 종목별 결과(success/no_data/failed)를 모은다
   */
  async collectBatch(
    body: NaverBatchBody,
    signal?: AbortSignal,
  ): Promise<NaverBatchResponse | NaverBatchNoStocksResponse | ErrorResponse> {
    const range = this.resolveRange(body);
    if (range.startDate > range.endDate) {
      return new NaverError(`start_date(${range.startDate}) 가 end_date(${range.endDate}) 보다 늦습니다`, 400).toResponse();
    }

    let stocks: StockInfo[];
    try {
      stocks = await this.stockDirectory.listTargetStocks();
    } catch (error) {
      this.logger.error(`배치 수집 에러: 종목 목록 조회 실패 - ${describeCause(error)}`);
      return { code: 500, message: `배치 수집 오류: ${describeCause(error)}` };
    }

    if (stocks.length === 0) {
      this.logger.warn('BigQuery에서 종목 목록을 가져올 수 없음');
      return { code: 204, message: 'BigQuery에서 종목 목록을 가져올 수 없음', total_stocks: 0 };
    }

    this.logger.log(`배치 수집 시작: ${stocks.length}개 종목 (기간: ${range.startDate} ~ ${range.endDate})`);

    const limiter = new Bottleneck({
      maxConcurrent: this.configService.get('BATCH_CONCURRENCY', { infer: true }),
    });

    const results = await Promise.all(
      stocks.map((stock, index) =>
        limiter.schedule(() => {
          this.logger.log(`[${index + 1}/${stocks.length}] ${stock.stockCode} (${stock.stockName}) 수집 시작`);
          return this.collectBatchStock(stock, range, signal);
        }),
      ),
    );

    const successCount = results.filter((result) => result.status === 'success').length;
    const failCount = results.filter((result) => result.status === 'failed').length;
    this.logger.log(`배치 수집 완료: 성공 ${successCount}, 실패 ${failCount}`);

    return {
      code: 200,
      message: '배치 수집 완료',
      start_date: range.startDate,
      end_date: range.endDate,
      total_stocks: stocks.length,
      success_count: successCount,
      fail_count: failCount,
      results,
    };
  }

  private async collectBatchStock(
    stock: StockInfo,
    range: DateRange,
    signal?: AbortSignal,
  ): Promise<NaverBatchStockResult> {
    const stockCode = stock.stockCode;

    if (signal?.aborted) {
      return { stock_code: stockCode, status: 'failed', error: '요청이 취소되었습니다' };
    }

    try {
      const result = await this.collectStock(
        { stockCode, isinCode: stock.isinCode, directoryName: stock.stockName },
        range,
        signal,
      );
      return {
        stock_code: stockCode,
        status: 'success',
        total_records: result.totalRecords,
        urls: result.partitions.map((partition) => partition.uri),
      };
    } catch (error) {
      if (error instanceof EmptyInputError) {
        this.logger.log(`[${stockCode}] 수집된 게시물 없음`);
        return { stock_code: stockCode, status: 'no_data', total_records: 0 };
      }
      this.logger.error(`[${stockCode}] 수집 실패: ${describeCause(error)}`);
      return { stock_code: stockCode, status: 'failed', error: describeCause(error) };
    }
  }

  /**
   * 한 종목 수집 + 내보내기. 게시물이 없으면 EmptyInputError
   */
  private async collectStock(target: NaverTarget, range: DateRange, signal?: AbortSignal): Promise<ExportResult> {
    const outcome = await this.scraper.scrape({
      stockCode: target.stockCode,
      stockName: target.stockName,
      isinCode: target.isinCode,
      startDate: range.startDate,
      endDate: range.endDate,
      signal,
    });

    // 종목명 우선순위: 요청 -> 게시판 헤더 -> 종목 테이블
    const entityName = outcome.entityName || target.directoryName || '';
    const records = outcome.records.map((record) => ({ ...record, entityName }));

    return this.exportService.export(
      records,
      {
        entityCode: target.stockCode,
        entityName,
        source: 'naver',
        entityIdentifier: target.stockCode,
      },
      signal,
    );
  }

  private async lookupStock(stockCode: string): Promise<StockInfo | null> {
    try {
      return await this.stockDirectory.findByCode(stockCode);
    } catch (error) {
      this.logger.warn(`[${stockCode}] 종목 정보 조회 실패, ISIN 없이 진행: ${describeCause(error)}`);
      return null;
    }
  }
}
