import { Body, Controller, HttpCode, Logger, Post, Res } from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { abortOnDisconnect } from '@/common/http/client-abort';
import { ZodValidationPipe } from '@/common/pipes/zod-validation.pipe';
import {
  NaverBatchBody,
  naverBatchBodySchema,
  NaverDiscussionBody,
  naverDiscussionBodySchema,
} from './dto/naver-request.schema';
import { NaverService } from './naver.service';

/**
 * 네이버 종목토론실 수집 API
 *
 * 결과 상태는 응답 본문의 code 로 전달한다 (HTTP 상태는 항상 200)
 *
 * 사용 예:
 * - POST /api/naver/discussions/manual  { "stock_code": "005930", "start_date": "2025-11-01" }
 * - POST /api/naver/discussions/batch   { "start_date": "2025-11-01", "end_date": "2025-11-07" }
 */
@Controller('api/naver')
export class NaverController {
  private readonly logger = new Logger(NaverController.name);

  constructor(private readonly naverService: NaverService) {}

  /**
   * 수동 토론 게시물 수집 (단일 종목)
   */
  @Post('discussions/manual')
  @HttpCode(200)
  async collectManual(
    @Body(new ZodValidationPipe(naverDiscussionBodySchema)) body: NaverDiscussionBody,
    @Res({ passthrough: true }) reply: FastifyReply,
  ) {
    this.logger.log(`[${body.stock_code}] 수동 수집 요청 수신`);
    return this.naverService.collectDiscussions(body, abortOnDisconnect(reply.raw));
  }

  /**
   * 배치 토론 게시물 수집 (전체 대상 종목)
   */
  @Post('discussions/batch')
  @HttpCode(200)
  async collectBatch(
    @Body(new ZodValidationPipe(naverBatchBodySchema)) body: NaverBatchBody,
    @Res({ passthrough: true }) reply: FastifyReply,
  ) {
    this.logger.log('배치 수집 요청 수신');
    return this.naverService.collectBatch(body, abortOnDisconnect(reply.raw));
  }
}
