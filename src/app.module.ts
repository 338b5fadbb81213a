import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { LoggingInterceptor } from '@/common/interceptors/logging.interceptor';
import { validateEnv } from '@/config/app.config';
import { NaverModule } from '@/naver/naver.module';
import { PlaywrightModule } from '@/playwright/playwright.module';
import { TossModule } from '@/toss/toss.module';
import { AppController } from './app.controller';

/**
 * 루트 애플리케이션 모듈
 *
 * 구성:
 * - ConfigModule: 환경 변수 관리 (전역, zod 검증)
 * - PlaywrightModule: 공유 브라우저 (전역)
 * - NaverModule: 네이버 종목토론실 수집
 * - TossModule: 토스증권 댓글 수집
 *
 * ExportModule / StocksModule 은 각 수집 모듈이 import 한다.
 */
@Module({
  imports: [
    // 환경 변수 설정 (전역)
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnv,
    }),

    PlaywrightModule,
    NaverModule,
    TossModule,
  ],
  controllers: [AppController],
  providers: [{ provide: APP_INTERCEPTOR, useClass: LoggingInterceptor }],
})
export class AppModule {}
