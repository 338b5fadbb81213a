import { Inject, Injectable, Logger } from '@nestjs/common';
import { TossError } from '@/common/errors/scrape.error';
import { CollectResponse, toCollectErrorResponse } from '@/common/http/collect-response';
import { describeCause, EmptyInputError } from '@/export/export.errors';
import { toExportResponse } from '@/export/export-response';
import { ExportService } from '@/export/export.service';
import { resolveDateRange } from '@/scraping/date-range';
import { Scraper, TOSS_SCRAPER } from '@/scraping/scraper.types';
import { STOCK_DIRECTORY, StockDirectory, StockInfo, toKrxIsin } from '@/stocks/stock.types';
import { TossCommentBody } from './dto/toss-request.schema';

/** 수동(비정기) 수집: 1년치 */
export const TOSS_MANUAL_LOOKBACK_DAYS = 365;
/** 정기 수집: 하루치 */
export const TOSS_SCHEDULED_LOOKBACK_DAYS = 1;

export interface TossRangeContext {
  stock_code: string;
  isin_code: string | null;
  start_date: string;
  end_date: string;
}

export type TossCollectResponse = CollectResponse<TossRangeContext>;

/**
 * 토스증권 댓글 수집 서비스
 *
 * 파일 이름 식별자는 ISIN (종목 테이블 값, 없으면 종목 코드로 계산)
 */
@Injectable()
export class TossService {
  private readonly logger = new Logger(TossService.name);

  constructor(
    @Inject(TOSS_SCRAPER) private readonly scraper: Scraper,
    @Inject(STOCK_DIRECTORY) private readonly stockDirectory: StockDirectory,
    private readonly exportService: ExportService,
  ) {}

  async collectManual(body: TossCommentBody, signal?: AbortSignal): Promise<TossCollectResponse> {
    return this.collect(body, TOSS_MANUAL_LOOKBACK_DAYS, signal);
  }

  async collectScheduled(body: TossCommentBody, signal?: AbortSignal): Promise<TossCollectResponse> {
    return this.collect(body, TOSS_SCHEDULED_LOOKBACK_DAYS, signal);
  }

  private async collect(body: TossCommentBody, lookbackDays: number, signal?: AbortSignal): Promise<TossCollectResponse> {
    const stockCode = body.stock_code;
    const range = resolveDateRange({ startDate: body.start, endDate: body.end }, lookbackDays, this.exportService.timeZone);
    const context: TossRangeContext = {
      stock_code: stockCode,
      isin_code: null,
      start_date: range.startDate,
      end_date: range.endDate,
    };

    try {
      if (range.startDate > range.endDate) {
        throw new TossError(`start(${range.startDate}) 가 end(${range.endDate}) 보다 늦습니다`, 400);
      }

      const stock = await this.lookupStock(stockCode);
      const isinCode = stock?.isinCode ?? toKrxIsin(stockCode);
      if (!isinCode) {
        throw new TossError(`[${stockCode}] ISIN 코드를 결정할 수 없습니다`, 400);
      }
      context.isin_code = isinCode;

      const outcome = await this.scraper.scrape({
        stockCode,
        stockName: stock?.stockName,
        isinCode,
        startDate: range.startDate,
        endDate: range.endDate,
        maxItems: body.max_items,
        signal,
      });

      const result = await this.exportService.export(
        outcome.records,
        {
          entityCode: stockCode,
          entityName: outcome.entityName,
          source: 'toss',
          entityIdentifier: isinCode,
        },
        signal,
      );

      return toExportResponse(result, '토스 댓글 수집 및 업로드 완료', context);
    } catch (error) {
      if (!(error instanceof EmptyInputError)) {
        this.logger.error(`[${stockCode}] 토스 댓글 수집 실패: ${describeCause(error)}`);
      }
      return toCollectErrorResponse(error, context, `[${stockCode}] 수집된 댓글 없음`);
    }
  }

  private async lookupStock(stockCode: string): Promise<StockInfo | null> {
    try {
      return await this.stockDirectory.findByCode(stockCode);
    } catch (error) {
      this.logger.warn(`[${stockCode}] 종목 정보 조회 실패, 종목 코드로 ISIN 계산: ${describeCause(error)}`);
      return null;
    }
  }
}
