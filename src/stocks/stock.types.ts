export interface StockInfo {
  stockCode: string;
  stockName: string;
  isinCode: string | null;
}

/**
 * 종목 정보 조회 (BigQuery stocks 테이블)
 */
export interface StockDirectory {
  findByCode(stockCode: string): Promise<StockInfo | null>;
  /** 수집 대상(target_stock = 1) 전체 */
  listTargetStocks(): Promise<StockInfo[]>;
}

export const STOCK_DIRECTORY = Symbol('STOCK_DIRECTORY');

const ALPHABET_OFFSET = 'A'.charCodeAt(0) - 10;

/**
 * 6자리 국내 종목 코드 -> KRX 보통주 ISIN (KR7 + 코드 + 00 + 검증 숫자)
 *
 * 예: 005930 -> KR7005930003
 */
export function toKrxIsin(stockCode: string): string | null {
  if (!/^\d{6}$/.test(stockCode)) return null;

  const body = `KR7${stockCode}00`;
  const digits = [...body]
    .map((char) => (/\d/.test(char) ? char : String(char.charCodeAt(0) - ALPHABET_OFFSET)))
    .join('');

  // Luhn: 오른쪽 끝 숫자부터 하나 걸러 2배
  let sum = 0;
  for (let i = digits.length - 1, double = true; i >= 0; i--, double = !double) {
    let value = Number(digits[i]);
    if (double) {
      value *= 2;
      if (value > 9) value -= 9;
    }
    sum += value;
  }

  return `${body}${(10 - (sum % 10)) % 10}`;
}
