import { Body, Controller, HttpCode, Logger, Post, Res } from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { abortOnDisconnect } from '@/common/http/client-abort';
import { ZodValidationPipe } from '@/common/pipes/zod-validation.pipe';
import { TossCommentBody, tossCommentBodySchema } from './dto/toss-request.schema';
import { TossService } from './toss.service';

/**
 * 토스증권 댓글 수집 API
 *
 * - POST /api/toss/post-comments/manual     (기본 1년치)
 * - POST /api/toss/post-comments/scheduled  (기본 하루치, 배치 호출용)
 */
@Controller('api/toss')
export class TossController {
  private readonly logger = new Logger(TossController.name);

  constructor(private readonly tossService: TossService) {}

  @Post('post-comments/manual')
  @HttpCode(200)
  async collectManual(
    @Body(new ZodValidationPipe(tossCommentBodySchema)) body: TossCommentBody,
    @Res({ passthrough: true }) reply: FastifyReply,
  ) {
    this.logger.log(`[${body.stock_code}] 수동 댓글 수집 요청 수신`);
    return this.tossService.collectManual(body, abortOnDisconnect(reply.raw));
  }

  @Post('post-comments/scheduled')
  @HttpCode(200)
  async collectScheduled(
    @Body(new ZodValidationPipe(tossCommentBodySchema)) body: TossCommentBody,
    @Res({ passthrough: true }) reply: FastifyReply,
  ) {
    this.logger.log(`[${body.stock_code}] 정기 댓글 수집 요청 수신`);
    return this.tossService.collectScheduled(body, abortOnDisconnect(reply.raw));
  }
}
