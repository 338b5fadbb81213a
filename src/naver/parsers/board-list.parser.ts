import * as cheerio from 'cheerio';
import { DateKey, isDateKey } from '@/export/date-key';

export interface BoardRow {
  nid: string;
  /** 목록에 표시된 작성일. 시각만 있으면 오늘, 해석 실패 시 null */
  postedDate: DateKey | null;
}

export interface BoardPage {
  stockName: string | null;
  hasTable: boolean;
  rows: BoardRow[];
}

export interface BoardPageEvaluation {
  nids: string[];
  /** start_date 이전 게시물에 도달 (탐색 종료) */
  reachedStart: boolean;
  /** 게시물 행이 하나라도 있었는지 (연속 빈 페이지 판단용) */
  hasValidRows: boolean;
  skippedFuture: number;
}

const BLOCK_MARKERS = ['error_content', '페이지를 찾을 수 없습니다'];

export function isBlockedPage(html: string): boolean {
  return BLOCK_MARKERS.some((marker) => html.includes(marker));
}

/**
 * 목록 날짜 셀 파싱
 *
 * - "2025.11.15 23:59" -> 2025-11-15
 * - "23:59" (오늘 글) -> today
 */
export function parseBoardDate(text: string, today: DateKey): DateKey | null {
  const trimmed = text.trim();
  if (trimmed.includes(':') && !trimmed.includes('.')) {
    return today;
  }

  const datePart = trimmed.split(/\s+/)[0] ?? '';
  const candidate = datePart.replace(/\./g, '-');
  return isDateKey(candidate) ? candidate : null;
}

/**
 * 종목 토론실 목록 페이지 (finance.naver.com/item/board.naver) 파싱
 */
export function parseBoardList(html: string, today: DateKey): BoardPage {
  const $ = cheerio.load(html);
  const stockName = $('.wrap_company h2 a').first().text().trim() || null;
  const table = $('table.type2').first();

  if (table.length === 0) {
    return { stockName, hasTable: false, rows: [] };
  }

  const rows: BoardRow[] = [];

  table.find('tbody tr').each((_, element) => {
    const row = $(element);
    if (row.hasClass('blank_row')) return;
    if ((row.html() ?? '').includes('u_cbox_cleanbot')) return;

    const cells = row.find('td');
    if (cells.length < 6) return;

    const href = cells.eq(1).find('a').first().attr('href');
    const nidMatch = href ? /nid=(\d+)/.exec(href) : null;
    if (!nidMatch) return;

    rows.push({
      nid: nidMatch[1],
      postedDate: parseBoardDate(cells.eq(0).text(), today),
    });
  });

  return { stockName, hasTable: true, rows };
}

/**
 * 기간 조건으로 목록 행 선별
 *
 * - end_date 이후 글은 건너뜀 (빈 페이지로 세지 않음)
 * - start_date 이전 글을 만나면 그 자리에서 종료
 * - 날짜를 알 수 없는 글은 포함
 * - seen 에 있는 nid 는 제외하고, 새로 고른 nid 는 seen 에 추가
 */
export function evaluateBoardRows(
  rows: readonly BoardRow[],
  range: { startDate: DateKey; endDate: DateKey },
  seen: Set<string>,
): BoardPageEvaluation {
  const nids: string[] = [];
  let reachedStart = false;
  let skippedFuture = 0;

  for (const row of rows) {
    if (row.postedDate) {
      if (row.postedDate > range.endDate) {
        skippedFuture += 1;
        continue;
      }
      if (row.postedDate < range.startDate) {
        reachedStart = true;
        break;
      }
    }

    if (seen.has(row.nid)) continue;
    seen.add(row.nid);
    nids.push(row.nid);
  }

  return { nids, reachedStart, hasValidRows: rows.length > 0, skippedFuture };
}
