export const DEFAULT_BRIDGE_POOL_SIZE = 5;

export class BridgeTimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`[BRIDGE_TIMEOUT] call=${label} timeout=${timeoutMs}ms`);
    this.name = 'BridgeTimeoutError';
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export type BridgeStats = {
  poolSize: number;
  active: number;
  queued: number;
};

type PendingCall = {
  start: () => void;
};

/**
 * 드라이버 호출처럼 오래 걸리는 작업을 고정 크기 슬롯 풀에서 실행하고 결과를 await 가능하게 돌려준다.
 * - 동시에 실행되는 호출은 최대 poolSize 개, 나머지는 FIFO 대기
 * - 자체 timeout/취소 없음: 끝나지 않는 호출은 슬롯을 영구 점유한다 (await 지점에서 withTimeout 사용)
 * - fn 은 값 또는 Promise 를 반환한다. CPU 를 붙잡는 동기 작업은 이벤트 루프를 막으므로 넣지 않는다.
 */
export class BlockingBridge {
  private readonly poolSize: number;
  private readonly queue: PendingCall[] = [];
  private active = 0;

  constructor(poolSize: number = DEFAULT_BRIDGE_POOL_SIZE) {
    this.poolSize = Math.max(1, Math.floor(poolSize));
  }

  runBlocking<A extends unknown[], R>(fn: (...args: A) => R | Promise<R>, args: A): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const start = (): void => {
        this.active += 1;
        Promise.resolve()
          .then(() => fn(...args))
          .then(resolve, reject)
          .finally(() => {
            this.active -= 1;
            this.drain();
          });
      };
      if (this.active < this.poolSize) {
        start();
      } else {
        this.queue.push({ start });
      }
    });
  }

  stats(): BridgeStats {
    return {
      poolSize: this.poolSize,
      active: this.active,
      queued: this.queue.length,
    };
  }

  private drain(): void {
    while (this.active < this.poolSize && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next) next.start();
    }
  }
}

/** pending 결과와 타이머를 경쟁시킨다. 원래 호출은 취소되지 않고 계속 실행된다. */
export async function withTimeout<T>(pending: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeoutHandle: ReturnType<typeof setTimeout> | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new BridgeTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([pending, timeoutPromise]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  }
}
