import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppEnv } from '@/config/app.config';
import { AppModule } from './app.module';

/**
 * NestJS 애플리케이션 부트스트랩
 * Fastify 어댑터를 사용하여 HTTP 서버 구성
 */
async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({
      logger: true, // Fastify 로거 활성화
      trustProxy: true, // 프록시 환경에서 실행 시 필요
    }),
  );

  app.enableCors();

  // SIGTERM 시 onModuleDestroy 호출 (브라우저 종료)
  app.enableShutdownHooks();

  const port = app.get<ConfigService<AppEnv, true>>(ConfigService).get('PORT', { infer: true });

  // 모든 네트워크 인터페이스에서 리스닝 (Docker 컨테이너 내부에서 필수)
  await app.listen(port, '0.0.0.0');

  logger.log(`✅ 애플리케이션이 실행 중입니다: ${await app.getUrl()}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`❌ 애플리케이션 시작 실패: ${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
