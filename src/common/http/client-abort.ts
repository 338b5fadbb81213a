export interface DisconnectSource {
  once(event: 'close', listener: () => void): unknown;
  readonly writableFinished: boolean;
}

/**
 * 응답이 끝나기 전에 연결이 닫히면 abort 되는 signal
 *
 * 내보내기는 파티션 경계에서만 signal 을 확인하므로 업로드 중간에 끊기지는 않는다.
 */
export function abortOnDisconnect(response: DisconnectSource): AbortSignal {
  const controller = new AbortController();

  response.once('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });

  return controller.signal;
}
