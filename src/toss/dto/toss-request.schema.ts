import { z } from 'zod';
import { optionalDateKeySchema } from '@/scraping/date-range';

export const tossCommentBodySchema = z
  .object({
    stock_code: z.string().trim().regex(/^\d{6}$/, '종목 코드는 6자리 숫자여야 합니다 (예: 005930)'),
    start: optionalDateKeySchema,
    end: optionalDateKeySchema,
    max_items: z.coerce.number().int().positive().optional(),
  })
  .refine((body) => !body.start || !body.end || body.start <= body.end, {
    message: 'start 는 end 보다 늦을 수 없습니다',
    path: ['start'],
  });

export type TossCommentBody = z.infer<typeof tossCommentBodySchema>;
