import { parseSourceTimestamp } from '@/common/utils/date.util';
import { ScrapedRecord } from '@/export/record.types';
import { NaverComment } from './parsers/comment.parser';
import { DiscussionDetail } from './parsers/discussion-detail.parser';

export interface NaverStockContext {
  stockCode: string;
  stockName: string;
  isinCode: string | null;
}

/**
 * 토론 게시물 + 댓글 -> ScrapedRecord (댓글은 JSON 문자열로 extra 에 보관)
 */
export function toNaverRecord(
  stock: NaverStockContext,
  nid: string,
  detail: DiscussionDetail,
  comments: readonly NaverComment[],
  timeZone: string,
): ScrapedRecord {
  return {
    entityCode: stock.stockCode,
    entitySecondaryId: stock.isinCode,
    entityName: stock.stockName,
    recordId: Number(nid),
    author: detail.author,
    timestamp: parseSourceTimestamp(detail.writtenAt, timeZone),
    content: detail.content,
    likes: detail.likes,
    dislikes: detail.dislikes,
    extra: JSON.stringify(comments),
    source: 'naver',
  };
}
