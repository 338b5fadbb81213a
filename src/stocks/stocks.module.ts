import { Module } from '@nestjs/common';
import { BigQueryStockDirectory } from './bigquery-stock.directory';
import { STOCK_DIRECTORY } from './stock.types';

/**
 * 종목 모듈: BigQuery stocks 테이블 조회
 */
@Module({
  providers: [{ provide: STOCK_DIRECTORY, useClass: BigQueryStockDirectory }],
  exports: [STOCK_DIRECTORY],
})
export class StocksModule {}
