import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BigQuery } from '@google-cloud/bigquery';
import { z } from 'zod';
import { AppEnv } from '@/config/app.config';
import { StockDirectory, StockInfo } from './stock.types';

const stockRowSchema = z.object({
  stock_code: z.string(),
  stock_name: z.string().nullable().default(''),
  isin_code: z.string().nullable().default(null),
});

/**
 * BigQuery 종목 디렉토리
 *
 * - GCP_PROJECT_ID / BQ_DATASET_ID / BQ_STOCK_TABLE_ID 가 모두 있어야 조회
 * - 설정이 없으면 경고 후 빈 결과 (단일 종목 수집은 계속 가능)
 */
@Injectable()
export class BigQueryStockDirectory implements StockDirectory {
  private readonly logger = new Logger(BigQueryStockDirectory.name);
  private readonly client: BigQuery | null;
  private readonly table: string | null;
  private readonly limit: number;

  constructor(configService: ConfigService<AppEnv, true>) {
    const projectId = configService.get('GCP_PROJECT_ID', { infer: true });
    const datasetId = configService.get('BQ_DATASET_ID', { infer: true });
    const tableId = configService.get('BQ_STOCK_TABLE_ID', { infer: true });

    this.limit = configService.get('BQ_LIMIT', { infer: true });

    if (projectId && datasetId && tableId) {
      this.client = new BigQuery({
        projectId,
        keyFilename: configService.get('GCS_CREDENTIALS_PATH', { infer: true }),
      });
      this.table = `\`${projectId}.${datasetId}.${tableId}\``;
    } else {
      this.client = null;
      this.table = null;
    }
  }

  async findByCode(stockCode: string): Promise<StockInfo | null> {
    if (!this.client || !this.table) {
      this.logger.warn(`[${stockCode}] BigQuery 설정 없음, 종목 정보 조회 생략`);
      return null;
    }

    const [rows] = await this.client.query({
      query: `
        SELECT stock_code, stock_name, isin_code
        FROM ${this.table}
        WHERE stock_code = @stock_code
        LIMIT 1
      `,
      params: { stock_code: stockCode },
    });

    const stocks = this.toStocks(rows);
    if (stocks.length === 0) {
      this.logger.warn(`[${stockCode}] BigQuery에서 종목 정보를 찾을 수 없음`);
      return null;
    }

    this.logger.log(`[${stockCode}] BigQuery 종목 정보: isin_code=${stocks[0].isinCode ?? '-'}`);
    return stocks[0];
  }

  async listTargetStocks(): Promise<StockInfo[]> {
    if (!this.client || !this.table) {
      this.logger.warn('BigQuery 설정 없음, 종목 목록 조회 생략');
      return [];
    }

    let query = `
      SELECT stock_code, stock_name, isin_code
      FROM ${this.table}
      WHERE stock_code IS NOT NULL
      AND target_stock = 1
    `;
    if (this.limit > 0) {
      query += ` LIMIT ${this.limit}`;
    }

    const [rows] = await this.client.query({ query });
    return this.toStocks(rows);
  }

  private toStocks(rows: unknown[]): StockInfo[] {
    const stocks: StockInfo[] = [];

    for (const row of rows) {
      const parsed = stockRowSchema.safeParse(row);
      if (!parsed.success) {
        this.logger.warn(`종목 행 형식 불일치, 건너뜀: ${JSON.stringify(row)}`);
        continue;
      }
      stocks.push({
        stockCode: parsed.data.stock_code,
        stockName: parsed.data.stock_name ?? '',
        isinCode: parsed.data.isin_code,
      });
    }

    return stocks;
  }
}
