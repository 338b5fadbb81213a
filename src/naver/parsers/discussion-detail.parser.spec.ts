import { htmlToText, parseDiscussionDetail } from './discussion-detail.parser';

function detailPage(result: unknown, url = '/discussion/detail'): string {
  const nextData = {
    props: {
      pageProps: {
        dehydratedState: {
          queries: [
            { queryKey: [{ url: '/stock/basic' }], state: { data: { result: { stockName: '삼성전자' } } } },
            { queryKey: [{ url }], state: { data: { result } } },
          ],
        },
      },
    },
  };
  return `<html><body><div id="__next"></div><script id="__NEXT_DATA__" type="application/json">${JSON.stringify(
    nextData,
  )}</script></body></html>`;
}

describe('discussion-detail.parser', () => {
  it('htmlToText 는 줄 단위로 정리', () => {
    expect(htmlToText('<p>첫 줄<br>둘째 줄</p><div>  셋째  </div><p></p>')).toBe('첫 줄\n둘째 줄\n셋째');
  });

  it('제목 + 본문, 작성자, 공감 수, 작성 시각', () => {
    const html = detailPage({
      title: '오늘 상한가?',
      writer: { nickname: '개미왕' },
      contentHtml: '<p>첫 줄<br>둘째 줄</p><div>  셋째  </div>',
      recommendCount: 5,
      notRecommendCount: 2,
      writtenAt: '2025-11-15T09:41:07',
    });

    expect(parseDiscussionDetail(html)).toEqual({
      title: '오늘 상한가?',
      author: '개미왕',
      content: '오늘 상한가?\n\n첫 줄\n둘째 줄\n셋째',
      likes: 5,
      dislikes: 2,
      writtenAt: '2025-11-15T09:41:07',
    });
  });

  it('contentHtml 이 없으면 contentJsonSwReplaced 요약 사용', () => {
    const html = detailPage({
      subject: '제목 대체',
      contentJsonSwReplaced: JSON.stringify({ contentSummary: '요약 <b>굵게</b>' }),
    });

    expect(parseDiscussionDetail(html)).toEqual({
      title: '제목 대체',
      author: '',
      content: '제목 대체\n\n요약 굵게',
      likes: 0,
      dislikes: 0,
      writtenAt: null,
    });
  });

  it('contentJsonSwReplaced 가 JSON 이 아니면 원문', () => {
    const detail = parseDiscussionDetail(detailPage({ contentJsonSwReplaced: '그냥 텍스트' }));
    expect(detail?.content).toBe('그냥 텍스트');
  });

  it('상세 쿼리가 없거나 __NEXT_DATA__ 가 없으면 null', () => {
    expect(parseDiscussionDetail(detailPage({ title: 'x' }, '/discussion/list'))).toBeNull();
    expect(parseDiscussionDetail('<html><body>삭제된 게시물입니다</body></html>')).toBeNull();
    expect(
      parseDiscussionDetail('<script id="__NEXT_DATA__" type="application/json">{not json</script>'),
    ).toBeNull();
  });
});
