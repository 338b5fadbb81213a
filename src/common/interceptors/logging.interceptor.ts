import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { Observable, tap } from 'rxjs';

/**
 * 요청/응답 로깅 인터셉터
 *
 * --> POST from 127.0.0.1 [/api/naver/discussions/manual]
 * <-- 200 after 1234.56ms [/api/naver/discussions/manual]
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<FastifyRequest>();
    const reply = http.getResponse<FastifyReply>();
    const route = request.url;
    const startTime = Date.now();

    this.logger.log(`--> ${request.method} from ${request.ip} [${route}]`);

    return next.handle().pipe(
      tap({
        next: () => {
          const elapsed = (Date.now() - startTime).toFixed(2);
          this.logger.log(`<-- ${reply.statusCode} after ${elapsed}ms [${route}]`);
        },
        error: (error: unknown) => {
          const elapsed = (Date.now() - startTime).toFixed(2);
          this.logger.error(
            `<-- 에러 after ${elapsed}ms [${route}] | ${error instanceof Error ? error.message : String(error)}`,
          );
        },
      }),
    );
  }
}
