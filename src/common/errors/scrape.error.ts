export interface ErrorResponse {
  code: number;
  message: string;
}

/**
 * 수집 중 발생하는 주요 에러 (응답 본문에 code 를 실어 보낸다)
 */
export class ScrapeError extends Error {
  constructor(
    message: string,
    readonly code: number = 500,
  ) {
    super(message);
    this.name = 'ScrapeError';
  }

  toString(): string {
    return `[Code ${this.code}] ${this.message}`;
  }

  toResponse(): ErrorResponse {
    return { code: this.code, message: this.message };
  }
}

export class NaverError extends ScrapeError {
  constructor(message: string, code = 500) {
    super(message, code);
    this.name = 'NaverError';
  }
}

export class TossError extends ScrapeError {
  constructor(message: string, code = 500) {
    super(message, code);
    this.name = 'TossError';
  }
}
