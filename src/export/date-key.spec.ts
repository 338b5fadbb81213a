import { isDateKey, shiftDateKey, toDateKey } from './date-key';

describe('date-key', () => {
  describe('isDateKey', () => {
    it('실제 달력 날짜만 허용한다', () => {
      expect(isDateKey('2025-11-15')).toBe(true);
      expect(isDateKey('2024-02-29')).toBe(true);
      expect(isDateKey('2025-02-29')).toBe(false);
      expect(isDateKey('2025-13-01')).toBe(false);
    });

    it('YYYY-MM-DD 형식이 아니면 false', () => {
      expect(isDateKey('2025-1-05')).toBe(false);
      expect(isDateKey('2025.11.15')).toBe(false);
      expect(isDateKey('2025-11-15 10:00')).toBe(false);
      expect(isDateKey('')).toBe(false);
    });
  });

  it('toDateKey 는 잘못된 값에 RangeError', () => {
    expect(toDateKey('2025-11-15')).toBe('2025-11-15');
    expect(() => toDateKey('2025-11-31')).toThrow(RangeError);
  });

  it('shiftDateKey 는 월/연 경계를 넘는다', () => {
    expect(shiftDateKey(toDateKey('2025-03-01'), -1)).toBe('2025-02-28');
    expect(shiftDateKey(toDateKey('2024-12-31'), 1)).toBe('2025-01-01');
    expect(shiftDateKey(toDateKey('2025-11-15'), -7)).toBe('2025-11-08');
    expect(shiftDateKey(toDateKey('2025-11-15'), -365)).toBe('2024-11-15');
  });
});
