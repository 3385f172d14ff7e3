import * as log from '../utils/logger';

export type RetryDecision =
  | { kind: 'retry'; delayMs: number }
  | { kind: 'fail' };

/**
 * 재시도 여부 판정. 지연은 고정값(baseDelayMs)이며 지수 증가는 하지 않는다.
 * attempt 는 방금 실패한 시도 번호(1부터).
 */
export function decideRetry(
  attempt: number,
  maxAttempts: number,
  failureIsRetryable: boolean,
  baseDelayMs: number,
): RetryDecision {
  if (!failureIsRetryable || attempt >= maxAttempts) {
    return { kind: 'fail' };
  }
  return { kind: 'retry', delayMs: Math.max(0, baseDelayMs) };
}

export class OperationExhaustedError extends Error {
  readonly operation: string;
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(operation: string, attempts: number, lastError: unknown) {
    super(
      `[OPERATION_EXHAUSTED] operation=${operation} attempts=${attempts} lastError=${log.describeError(lastError)}`,
    );
    this.name = 'OperationExhaustedError';
    this.operation = operation;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export type RetryOptions = {
  name: string;
  maxAttempts: number;
  delayMs: number;
  /** false 를 반환한 에러는 시도 횟수를 소비하지 않고 그대로 전파된다. 기본: 모든 에러 재시도 */
  retryOn?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
  logger?: log.ModuleLogger;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function withRetry<A extends unknown[], R>(
  op: (...args: A) => Promise<R>,
  opts: RetryOptions,
): (...args: A) => Promise<R> {
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  const retryOn = opts.retryOn ?? (() => true);
  const wait = opts.sleep ?? sleep;
  const logger = opts.logger ?? log.forModule('app');

  return async (...args: A): Promise<R> => {
    let attempt = 0;
    while (true) {
      try {
        return await op(...args);
      } catch (error) {
        if (!retryOn(error)) throw error;
        attempt += 1;
        logger.warn(`[retry] ${opts.name} attempt=${attempt}/${maxAttempts} failed: ${log.describeError(error)}`);
        const decision = decideRetry(attempt, maxAttempts, true, opts.delayMs);
        if (decision.kind === 'fail') {
          logger.error(`[retry] ${opts.name} 모든 시도 실패 (${maxAttempts}회)`);
          throw new OperationExhaustedError(opts.name, attempt, error);
        }
        opts.onRetry?.(attempt, error);
        await wait(decision.delayMs);
      }
    }
  };
}
