import { defineConfig } from 'vitest/config';
import swc from 'unplugin-swc';
import { resolve } from 'path';

/**
 * Vitest 설정 파일
 *
 * - SWC 로 데코레이터 메타데이터까지 변환 (NestJS DI)
 * - tsconfig.json 의 @/* 경로 매핑과 동일한 alias
 */
export default defineConfig({
  test: {
    // 전역 테스트 API 활성화 (describe, it, expect 등)
    globals: true,

    environment: 'node',

    // src 디렉토리 내의 모든 .spec.ts 파일을 테스트로 인식
    include: ['src/**/*.spec.ts'],
    exclude: ['node_modules', 'dist', 'coverage'],

    testTimeout: 30000,
    hookTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.spec.ts', 'src/main.ts', 'src/**/*.module.ts', 'node_modules', 'dist'],
    },

    isolate: true,

    // 각 테스트 후 mock 초기화 및 원본 함수 복원
    mockReset: true,
    restoreMocks: true,

    watch: false,
  },

  plugins: [
    swc.vite({
      module: { type: 'es6' },
    }),
  ],

  resolve: {
    alias: {
      '@': resolve(__dirname, './src'),
    },
  },
});
