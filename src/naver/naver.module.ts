import { Module } from '@nestjs/common';
import { ExportModule } from '@/export/export.module';
import { NAVER_SCRAPER } from '@/scraping/scraper.types';
import { StocksModule } from '@/stocks/stocks.module';
import { NaverController } from './naver.controller';
import { NaverCrawlerService } from './naver-crawler.service';
import { NaverService } from './naver.service';

/**
 * 네이버 모듈: 종목토론실 크롤링 -> GCS 내보내기
 *
 * - PlaywrightModule 은 전역 모듈이라 import 하지 않는다
 */
@Module({
  imports: [ExportModule, StocksModule],
  controllers: [NaverController],
  providers: [{ provide: NAVER_SCRAPER, useClass: NaverCrawlerService }, NaverService],
})
export class NaverModule {}
