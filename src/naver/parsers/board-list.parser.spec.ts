import { toDateKey } from '@/export/date-key';
import { BoardRow, evaluateBoardRows, isBlockedPage, parseBoardDate, parseBoardList } from './board-list.parser';

const today = toDateKey('2025-11-16');

function row(date: string, nid: string, title = '글'): string {
  return `
    <tr onmouseover="mouseOver(this)">
      <td><span class="tah p10 gray03">${date}</span></td>
      <td class="title"><a href="/item/board_read.naver?code=005930&nid=${nid}&st=&sw=&page=1" title="${title}">${title}</a></td>
      <td class="p11"><span class="gray03">작성자</span></td>
      <td><span class="tah p10 gray03">120</span></td>
      <td><strong class="tah p10 red01">3</strong></td>
      <td><strong class="tah p10 blue01">1</strong></td>
    </tr>`;
}

const BOARD_HTML = `
<html><body>
  <div class="wrap_company"><h2><a href="#">삼성전자</a></h2></div>
  <table class="type2" summary="토론실 목록">
    <tbody>
      <tr><th>날짜</th><th>제목</th><th>글쓴이</th><th>조회</th><th>공감</th><th>비공감</th></tr>
      <tr class="blank_row"><td colspan="6"></td></tr>
      ${row('10:21', '303')}
      ${row('2025.11.15 23:59', '302')}
      <tr>
        <td>2025.11.15 20:00</td>
        <td class="title"><div class="u_cbox_cleanbot">클린봇이 숨긴 게시물</div><a href="?nid=999">x</a></td>
        <td></td><td></td><td></td><td></td>
      </tr>
      <tr><td>2025.11.15 19:00</td><td class="title"><a href="/item/board.naver?code=005930">공지</a></td><td></td><td></td><td></td><td></td></tr>
      ${row('날짜 없음', '301')}
    </tbody>
  </table>
</body></html>`;

describe('board-list.parser', () => {
  it('isBlockedPage', () => {
    expect(isBlockedPage('<div class="error_content">접근 제한</div>')).toBe(true);
    expect(isBlockedPage('<p>페이지를 찾을 수 없습니다</p>')).toBe(true);
    expect(isBlockedPage(BOARD_HTML)).toBe(false);
  });

  it('parseBoardDate', () => {
    expect(parseBoardDate('2025.11.15 23:59', today)).toBe('2025-11-15');
    expect(parseBoardDate(' 10:21 ', today)).toBe('2025-11-16');
    expect(parseBoardDate('2025.02.30 10:00', today)).toBeNull();
    expect(parseBoardDate('', today)).toBeNull();
  });

  it('parseBoardList 는 빈 행/클린봇 행/nid 없는 행을 건너뛴다', () => {
    const page = parseBoardList(BOARD_HTML, today);

    expect(page.stockName).toBe('삼성전자');
    expect(page.hasTable).toBe(true);
    expect(page.rows).toEqual([
      { nid: '303', postedDate: '2025-11-16' },
      { nid: '302', postedDate: '2025-11-15' },
      { nid: '301', postedDate: null },
    ]);
  });

  it('테이블이 없으면 hasTable=false', () => {
    expect(parseBoardList('<html><body><p>점검 중</p></body></html>', today)).toEqual({
      stockName: null,
      hasTable: false,
      rows: [],
    });
  });

  describe('evaluateBoardRows', () => {
    const range = { startDate: toDateKey('2025-11-14'), endDate: toDateKey('2025-11-15') };
    const rows: BoardRow[] = [
      { nid: '16', postedDate: toDateKey('2025-11-16') },
      { nid: '15', postedDate: toDateKey('2025-11-15') },
      { nid: '14', postedDate: toDateKey('2025-11-14') },
      { nid: '99', postedDate: null },
      { nid: '13', postedDate: toDateKey('2025-11-13') },
      { nid: '12', postedDate: toDateKey('2025-11-12') },
    ];

    it('end 이후는 건너뛰고 start 이전에서 멈춘다', () => {
      const seen = new Set<string>();

      const result = evaluateBoardRows(rows, range, seen);

      expect(result).toEqual({ nids: ['15', '14', '99'], reachedStart: true, hasValidRows: true, skippedFuture: 1 });
      expect([...seen]).toEqual(['15', '14', '99']);
    });

    it('이미 본 nid 는 제외', () => {
      const result = evaluateBoardRows(rows, range, new Set(['14']));
      expect(result.nids).toEqual(['15', '99']);
    });

    it('모두 미래 글이면 nid 는 없지만 빈 페이지는 아니다', () => {
      const result = evaluateBoardRows([rows[0]], range, new Set());
      expect(result).toEqual({ nids: [], reachedStart: false, hasValidRows: true, skippedFuture: 1 });
    });

    it('행이 없으면 빈 페이지', () => {
      expect(evaluateBoardRows([], range, new Set()).hasValidRows).toBe(false);
    });
  });
});
