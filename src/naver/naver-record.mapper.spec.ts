import { toNaverRecord } from './naver-record.mapper';

describe('toNaverRecord', () => {
  it('네이버 게시물 + 댓글 -> ScrapedRecord', () => {
    const record = toNaverRecord(
      { stockCode: '005930', stockName: '삼성전자', isinCode: 'KR7005930003' },
      '412345678',
      {
        title: '제목',
        author: '개미왕',
        content: '제목\n\n본문',
        likes: 5,
        dislikes: 2,
        writtenAt: '2025-11-15T09:41:07',
      },
      [{ index: 1, author: 'a', text: '댓글', date: '2025-11-15 10:00:00', likes: 0, dislikes: 0 }],
      'Asia/Seoul',
    );

    expect(record).toEqual({
      entityCode: '005930',
      entitySecondaryId: 'KR7005930003',
      entityName: '삼성전자',
      recordId: 412345678,
      author: '개미왕',
      timestamp: new Date('2025-11-15T00:41:07Z'),
      content: '제목\n\n본문',
      likes: 5,
      dislikes: 2,
      extra: '[{"index":1,"author":"a","text":"댓글","date":"2025-11-15 10:00:00","likes":0,"dislikes":0}]',
      source: 'naver',
    });
  });

  it('작성 시각을 해석할 수 없으면 timestamp=null', () => {
    const record = toNaverRecord(
      { stockCode: '005930', stockName: '', isinCode: null },
      '1',
      { title: '', author: '', content: '', likes: 0, dislikes: 0, writtenAt: null },
      [],
      'Asia/Seoul',
    );

    expect(record.timestamp).toBeNull();
    expect(record.extra).toBe('[]');
  });

  it('존재하지 않는 날짜(11월 31일)는 12월로 넘기지 않고 timestamp=null', () => {
    const record = toNaverRecord(
      { stockCode: '005930', stockName: '삼성전자', isinCode: null },
      '2',
      { title: '', author: '', content: '', likes: 0, dislikes: 0, writtenAt: '2025-11-31T10:00:00' },
      [],
      'Asia/Seoul',
    );

    expect(record.timestamp).toBeNull();
  });
});
