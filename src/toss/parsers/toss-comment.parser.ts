import { z } from 'zod';
import { formatDateKey, parseSourceTimestamp } from '@/common/utils/date.util';
import { DateKey } from '@/export/date-key';

export interface TossComment {
  id: number;
  author: string;
  text: string;
  createdAt: string | null;
  likes: number;
  dislikes: number;
  replyCount: number;
}

export interface TossCommentPage {
  comments: TossComment[];
  /** 응답에 hasNext 가 없으면 null (빈 페이지가 나올 때까지 진행) */
  hasNext: boolean | null;
}

const countSchema = z.number().int().nonnegative().nullish();

const commentSchema = z.object({
  id: z.coerce.number().int().positive(),
  message: z.string().nullish(),
  author: z.object({ nickname: z.string().nullish() }).nullish(),
  createdAt: z.string().nullish(),
  likeCount: countSchema,
  dislikeCount: countSchema,
  replyCount: countSchema,
});

const responseSchema = z.object({
  result: z.object({
    comments: z.object({
      body: z.array(z.unknown()).nullish(),
      hasNext: z.boolean().nullish(),
    }),
  }),
});

/**
 * 토스 댓글 API(v3/comments) 응답 파싱
 *
 * 응답 구조가 다르면 null, 형식이 맞지 않는 개별 댓글은 건너뛴다
 */
export function parseTossCommentPage(json: unknown): TossCommentPage | null {
  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) return null;

  const comments: TossComment[] = [];
  for (const entry of parsed.data.result.comments.body ?? []) {
    const comment = commentSchema.safeParse(entry);
    if (!comment.success) continue;

    const data = comment.data;
    comments.push({
      id: data.id,
      author: data.author?.nickname ?? '',
      text: data.message ?? '',
      createdAt: data.createdAt ?? null,
      likes: data.likeCount ?? 0,
      dislikes: data.dislikeCount ?? 0,
      replyCount: data.replyCount ?? 0,
    });
  }

  return { comments, hasNext: parsed.data.result.comments.hasNext ?? null };
}

export interface TossPageSelection {
  comments: TossComment[];
  reachedStart: boolean;
}

export interface TossSelectionWindow {
  startDate: DateKey;
  endDate: DateKey;
  timeZone: string;
  /** 이번 페이지에서 더 받을 수 있는 개수 */
  remaining: number;
}

/**
 * 한 페이지의 댓글을 기간/개수 조건으로 선별 (응답은 최신순)
 *
 * - seen 에 있는 id 는 제외하고, 처음 본 id 는 seen 에 추가
 * - end 이후 댓글은 건너뜀
 * - start 이전 댓글을 만나면 그 자리에서 종료
 * - 작성 시각을 알 수 없는 댓글은 포함
 * - remaining 개를 채우면 종료
 */
export function selectTossComments(
  comments: readonly TossComment[],
  window: TossSelectionWindow,
  seen: Set<number>,
): TossPageSelection {
  const selected: TossComment[] = [];
  let reachedStart = false;

  for (const comment of comments) {
    if (selected.length >= window.remaining) break;
    if (seen.has(comment.id)) continue;
    seen.add(comment.id);

    const writtenAt = parseSourceTimestamp(comment.createdAt, window.timeZone);
    const dateKey = writtenAt ? formatDateKey(writtenAt, window.timeZone) : null;
    if (dateKey && dateKey > window.endDate) continue;
    if (dateKey && dateKey < window.startDate) {
      reachedStart = true;
      break;
    }

    selected.push(comment);
  }

  return { comments: selected, reachedStart };
}

/**
 * 다음 요청 cursor (마지막 댓글 id). 더 읽을 게 없으면 null
 *
 * 빈 페이지, hasNext=false, 같은 cursor 반복이면 종료
 */
export function nextTossCursor(page: TossCommentPage, cursor: number | null): number | null {
  if (page.comments.length === 0) return null;
  if (page.hasNext === false) return null;

  const lastId = page.comments[page.comments.length - 1].id;
  return lastId === cursor ? null : lastId;
}
