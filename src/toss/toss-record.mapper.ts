import { parseSourceTimestamp } from '@/common/utils/date.util';
import { ScrapedRecord } from '@/export/record.types';
import { TossComment } from './parsers/toss-comment.parser';

export interface TossStockContext {
  stockCode: string;
  stockName: string;
  isinCode: string;
}

export function toTossRecord(stock: TossStockContext, comment: TossComment, timeZone: string): ScrapedRecord {
  return {
    entityCode: stock.stockCode,
    entitySecondaryId: stock.isinCode,
    entityName: stock.stockName,
    recordId: comment.id,
    author: comment.author,
    timestamp: parseSourceTimestamp(comment.createdAt, timeZone),
    content: comment.text,
    likes: comment.likes,
    dislikes: comment.dislikes,
    extra: JSON.stringify({ reply_count: comment.replyCount }),
    source: 'toss',
  };
}
