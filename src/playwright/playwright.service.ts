import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { chromium, Browser, BrowserContext, BrowserContextOptions, Cookie } from 'playwright-core';
import { AppEnv } from '@/config/app.config';
import { delay } from '@/common/utils/retry.util';

export interface ContextOptions {
  viewport?: { width: number; height: number };
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Playwright 공통 서비스: 브라우저 인스턴스 및 컨텍스트 관리
 *
 * - 네이버/토스 수집기가 공통으로 사용하는 브라우저 로직 중앙화
 * - 브라우저 인스턴스 재사용, 컨텍스트는 수집 요청마다 새로 만들고 반드시 닫는다
 * - 한국어 로케일 + 실행 타임존으로 사이트가 보여주는 날짜를 고정
 */
@Injectable()
export class PlaywrightService implements OnModuleDestroy {
  private readonly logger = new Logger(PlaywrightService.name);
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;

  constructor(private readonly configService: ConfigService<AppEnv, true>) {}

  /**
   * Docker 환경에 맞춘 실행 옵션
   */
  private getLaunchOptions() {
    return {
      headless: this.configService.get('PLAYWRIGHT_HEADLESS', { infer: true }),
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu',
        '--disable-blink-features=AutomationControlled',
      ],
    };
  }

  /**
   * 브라우저 인스턴스 가져오기
   *
   * - 연결된 브라우저가 있으면 재사용
   * - 동시에 여러 요청이 들어와도 한 번만 실행
   */
  async getBrowser(): Promise<Browser> {
    if (this.browser?.isConnected()) {
      return this.browser;
    }

    if (!this.launching) {
      this.logger.log('새 Playwright 브라우저 인스턴스 실행 중...');
      this.launching = chromium
        .launch(this.getLaunchOptions())
        .then((browser) => {
          this.browser = browser;
          return browser;
        })
        .finally(() => {
          this.launching = null;
        });
    }

    return this.launching;
  }

  /**
   * 브라우저 컨텍스트 생성 (쿠키/세션 격리)
   */
  async createContext(options?: ContextOptions): Promise<BrowserContext> {
    const browser = await this.getBrowser();

    const contextOptions: BrowserContextOptions = {
      viewport: options?.viewport ?? { width: 1920, height: 1080 },
      userAgent: options?.userAgent ?? DEFAULT_USER_AGENT,
      locale: 'ko-KR',
      timezoneId: this.configService.get('TIMEZONE', { infer: true }),
    };

    const context = await browser.newContext(contextOptions);

    // 자동화 감지 우회: navigator.webdriver를 false로 설정
    await context.addInitScript(() => {
      Object.defineProperty(navigator, 'webdriver', {
        get: () => false,
      });
    });

    return context;
  }

  /**
   * 컨텍스트를 열고 작업 후 항상 닫는다
   */
  async withContext<T>(
    work: (context: BrowserContext) => Promise<T>,
    options?: ContextOptions,
  ): Promise<T> {
    const context = await this.createContext(options);
    try {
      return await work(context);
    } finally {
      await context.close();
    }
  }

  /**
   * 특정 쿠키가 생길 때까지 대기 (없으면 null)
   */
  async waitForCookie(
    context: BrowserContext,
    name: string,
    timeoutMs = 15000,
    pollIntervalMs = 500,
  ): Promise<Cookie | null> {
    const deadline = Date.now() + timeoutMs;

    while (Date.now() < deadline) {
      const cookie = (await context.cookies()).find((candidate) => candidate.name === name);
      if (cookie) {
        return cookie;
      }
      await delay(pollIntervalMs);
    }

    this.logger.warn(`쿠키 대기 시간 초과: ${name} (${timeoutMs}ms)`);
    return null;
  }

  /**
   * 브라우저 인스턴스 종료
   */
  async closeBrowser(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      this.logger.log('브라우저 종료');
    }
  }

  /**
   * 애플리케이션 종료 시 자동으로 브라우저 종료
   */
  async onModuleDestroy() {
    await this.closeBrowser();
  }
}
