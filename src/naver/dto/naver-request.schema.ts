import { z } from 'zod';
import { optionalDateKeySchema } from '@/scraping/date-range';

const dateOrder = (body: { start_date?: string; end_date?: string }) =>
  !body.start_date || !body.end_date || body.start_date <= body.end_date;

const DATE_ORDER_ISSUE = { message: 'start_date 는 end_date 보다 늦을 수 없습니다', path: ['start_date'] };

export const naverDiscussionBodySchema = z
  .object({
    stock_code: z
      .string()
      .trim()
      .regex(/^[0-9A-Z]{6}$/, '종목 코드는 6자리여야 합니다 (예: 005930)')
      .default('005930'),
    stock_name: z
      .string()
      .trim()
      .nullish()
      .transform((value) => (value && value !== 'string' ? value : undefined)),
    start_date: optionalDateKeySchema,
    end_date: optionalDateKeySchema,
  })
  .refine(dateOrder, DATE_ORDER_ISSUE);

export type NaverDiscussionBody = z.infer<typeof naverDiscussionBodySchema>;

export const naverBatchBodySchema = z
  .object({
    start_date: optionalDateKeySchema,
    end_date: optionalDateKeySchema,
  })
  .refine(dateOrder, DATE_ORDER_ISSUE);

export type NaverBatchBody = z.infer<typeof naverBatchBodySchema>;
