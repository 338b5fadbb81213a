import { delay, executeWithRetry } from './retry.util';

describe('executeWithRetry', () => {
  it('성공하면 결과를 돌려주고 시도 번호를 넘긴다', async () => {
    const attempts: number[] = [];

    const result = await executeWithRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error(`fail ${attempt}`);
        return 'ok';
      },
      { maxRetries: 3, baseDelayMs: 0 },
    );

    expect(result).toBe('ok');
    expect(attempts).toEqual([1, 2, 3]);
  });

  it('모두 실패하면 마지막 에러', async () => {
    await expect(
      executeWithRetry(
        async (attempt) => {
          throw new Error(`fail ${attempt}`);
        },
        { maxRetries: 2, baseDelayMs: 0 },
      ),
    ).rejects.toThrow('fail 2');
  });

  it('shouldRetry 가 false 면 즉시 포기', async () => {
    let calls = 0;

    await expect(
      executeWithRetry(
        async () => {
          calls += 1;
          throw new Error('404');
        },
        { maxRetries: 5, baseDelayMs: 0, shouldRetry: () => false },
      ),
    ).rejects.toThrow('404');
    expect(calls).toBe(1);
  });

  it('지수 백오프로 대기', async () => {
    vi.useFakeTimers();
    try {
      const attemptTimes: number[] = [];
      const start = Date.now();

      const pending = executeWithRetry(
        async () => {
          attemptTimes.push(Date.now() - start);
          if (attemptTimes.length < 3) throw new Error('retry');
          return 'done';
        },
        { maxRetries: 3, baseDelayMs: 100 },
      );

      await vi.runAllTimersAsync();

      await expect(pending).resolves.toBe('done');
      expect(attemptTimes).toEqual([0, 100, 300]);
    } finally {
      vi.useRealTimers();
    }
  });

  it('delay(0) 은 타이머 없이 끝난다', async () => {
    await expect(delay(0)).resolves.toBeUndefined();
  });
});
