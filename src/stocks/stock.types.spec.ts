import { toKrxIsin } from './stock.types';

describe('toKrxIsin', () => {
  it('보통주 ISIN 을 검증 숫자까지 계산', () => {
    expect(toKrxIsin('005930')).toBe('KR7005930003');
    expect(toKrxIsin('000660')).toBe('KR7000660001');
  });

  it('6자리 숫자가 아니면 null', () => {
    expect(toKrxIsin('5930')).toBeNull();
    expect(toKrxIsin('0059300')).toBeNull();
    expect(toKrxIsin('A05930')).toBeNull();
  });
});
