import { z } from 'zod';
import { normalizeSourceTimestamp } from '@/common/utils/date.util';

export interface NaverComment {
  index: number;
  author: string;
  text: string;
  /** "YYYY-MM-DD HH:mm:ss" (실행 타임존), 해석 실패 시 null */
  date: string | null;
  likes: number;
  dislikes: number;
}

const commentSchema = z.object({
  userName: z.string().nullish(),
  contents: z.string().nullish(),
  regTime: z.string().nullish(),
  sympathyCount: z.number().int().nonnegative().nullish(),
  antipathyCount: z.number().int().nonnegative().nullish(),
});

const commentResponseSchema = z.object({
  success: z.boolean(),
  result: z
    .object({
      commentList: z.array(commentSchema).nullish(),
    })
    .nullish(),
});

/**
 * JSONP 래퍼 제거: jQuery({...}); -> {...}
 */
export function unwrapJsonp(text: string): string {
  return text.replace(/^[^(]*\(/, '').replace(/\);?\s*$/, '');
}

/**
 * 네이버 댓글 API(cbox) 응답 파싱
 *
 * success=false 이거나 형식이 다르면 빈 배열
 */
export function parseCommentResponse(jsonpText: string, timeZone: string): NaverComment[] {
  let json: unknown;
  try {
    json = JSON.parse(unwrapJsonp(jsonpText));
  } catch {
    return [];
  }

  const parsed = commentResponseSchema.safeParse(json);
  if (!parsed.success || !parsed.data.success) {
    return [];
  }

  return (parsed.data.result?.commentList ?? []).map((comment, position) => ({
    index: position + 1,
    author: comment.userName ?? '',
    text: comment.contents ?? '',
    date: normalizeSourceTimestamp(comment.regTime, timeZone),
    likes: comment.sympathyCount ?? 0,
    dislikes: comment.antipathyCount ?? 0,
  }));
}
