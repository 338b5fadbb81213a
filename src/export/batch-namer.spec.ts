import { batchName, partitionPath } from './batch-namer';
import { toDateKey } from './date-key';

describe('batch-namer', () => {
  const dateKey = toDateKey('2025-11-15');

  it('batchName = {식별자}_{날짜}', () => {
    expect(batchName('005930', dateKey)).toBe('005930_2025-11-15');
    expect(batchName('KR7005930003', dateKey)).toBe('KR7005930003_2025-11-15');
  });

  it('partitionPath 는 dt= 디렉토리 아래에 둔다', () => {
    expect(partitionPath('marketing/stock_discussion', dateKey, '005930_2025-11-15', 'parquet')).toBe(
      'marketing/stock_discussion/dt=2025-11-15/005930_2025-11-15.parquet',
    );
  });

  it('basePath 끝의 슬래시는 하나로 합친다', () => {
    expect(partitionPath('raw/', dateKey, 'a', 'parquet')).toBe('raw/dt=2025-11-15/a.parquet');
    expect(partitionPath('raw//', dateKey, 'a', 'parquet')).toBe('raw/dt=2025-11-15/a.parquet');
  });
});
