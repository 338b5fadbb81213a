import * as cheerio from 'cheerio';
import { z } from 'zod';

export interface DiscussionDetail {
  title: string;
  author: string;
  /** 제목 + 빈 줄 + 본문 텍스트 */
  content: string;
  likes: number;
  dislikes: number;
  writtenAt: string | null;
}

const countSchema = z.number().int().nonnegative().nullish().transform((value) => value ?? 0);

const discussionSchema = z.object({
  title: z.string().nullish(),
  subject: z.string().nullish(),
  writer: z.object({ nickname: z.string().nullish() }).nullish(),
  contentHtml: z.string().nullish(),
  contentJsonSwReplaced: z.string().nullish(),
  recommendCount: countSchema,
  notRecommendCount: countSchema,
  writtenAt: z.string().nullish(),
});

const nextDataSchema = z.object({
  props: z.object({
    pageProps: z.object({
      dehydratedState: z.object({
        queries: z.array(
          z.object({
            queryKey: z.array(z.unknown()).default([]),
            state: z.object({ data: z.object({ result: z.unknown() }).partial().nullish() }).partial(),
          }),
        ),
      }),
    }),
  }),
});

const DETAIL_QUERY_URL = '/discussion/detail';

const BLOCK_SELECTOR = 'p, div, li, h1, h2, h3, h4, blockquote, tr';

/**
 * HTML -> 줄 단위 텍스트 (빈 줄 제거, 줄마다 trim)
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $('br').replaceWith('\n');
  $(BLOCK_SELECTOR).each((_, element) => {
    $(element).append('\n');
  });

  return $.root()
    .text()
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

function isDetailQueryKey(queryKey: unknown[]): boolean {
  const first = queryKey[0];
  return typeof first === 'object' && first !== null && 'url' in first && first.url === DETAIL_QUERY_URL;
}

function extractContentText(contentHtml?: string | null, contentJson?: string | null): string {
  if (contentHtml) {
    return htmlToText(contentHtml);
  }
  if (!contentJson) {
    return '';
  }

  try {
    const parsed: unknown = JSON.parse(contentJson);
    const summary =
      typeof parsed === 'object' && parsed !== null && 'contentSummary' in parsed
        ? parsed.contentSummary
        : null;
    return typeof summary === 'string' ? htmlToText(summary) : '';
  } catch {
    // JSON 이 아니면 원문 그대로
    return contentJson;
  }
}

/**
 * 모바일 토론 상세 페이지의 __NEXT_DATA__ 에서 게시물 정보 추출
 *
 * 구조가 다르거나 데이터가 없으면 null
 */
export function parseDiscussionDetail(html: string): DiscussionDetail | null {
  const $ = cheerio.load(html);
  const raw = $('script#__NEXT_DATA__').first().text();
  if (!raw) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const nextData = nextDataSchema.safeParse(json);
  if (!nextData.success) return null;

  const query = nextData.data.props.pageProps.dehydratedState.queries.find((candidate) =>
    isDetailQueryKey(candidate.queryKey),
  );
  const discussion = discussionSchema.safeParse(query?.state.data?.result);
  if (!discussion.success) return null;

  const data = discussion.data;
  const title = data.title || data.subject || '';
  const text = extractContentText(data.contentHtml, data.contentJsonSwReplaced);

  return {
    title,
    author: data.writer?.nickname ?? '',
    content: title ? `${title}\n\n${text}` : text,
    likes: data.recommendCount,
    dislikes: data.notRecommendCount,
    writtenAt: data.writtenAt ?? null,
  };
}
