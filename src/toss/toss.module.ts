import { Module } from '@nestjs/common';
import { ExportModule } from '@/export/export.module';
import { TOSS_SCRAPER } from '@/scraping/scraper.types';
import { StocksModule } from '@/stocks/stocks.module';
import { TossCommentClient } from './toss-comment.client';
import { TossController } from './toss.controller';
import { TossService } from './toss.service';

@Module({
  imports: [ExportModule, StocksModule],
  controllers: [TossController],
  providers: [{ provide: TOSS_SCRAPER, useClass: TossCommentClient }, TossService],
})
export class TossModule {}
