import * as log from '../utils/logger';
import { sleep } from '../common/retry';
import { SyncThreadHandle, SyncThreadResult } from '../sync/sync_thread_host';
import { SyncJob } from '../sync/types';

export type JoinStrategy = 'poll' | 'event';

export const JOIN_STRATEGIES: readonly JoinStrategy[] = ['poll', 'event'];

export function isJoinStrategy(value: string): value is JoinStrategy {
  return value === 'poll' || value === 'event';
}

export type OrchestratorConfig = {
  /** resourcePaths 는 runAll 인자로 덮어쓴다 */
  job: SyncJob;
  joinStrategy: JoinStrategy;
  pollIntervalMs: number;
};

type OrchestratorDependencies = {
  createSyncThread: (job: SyncJob) => SyncThreadHandle;
  sleep: (ms: number) => Promise<void>;
  logger: log.ModuleLogger;
};

export type RunAllResult<T> = {
  workflow: T;
  sync: SyncThreadResult;
};

type WorkflowSettlement<T> = { ok: true; value: T } | { ok: false; error: unknown };

/** 동기화할 리소스가 없을 때 스레드 대신 돌려주는 빈 결과 */
export function emptySyncResult(now: Date = new Date()): SyncThreadResult {
  const at = now.toISOString();
  return {
    exitCode: 0,
    summary: {
      startedAt: at,
      finishedAt: at,
      stopped: false,
      applicationLaunches: 0,
      applicationTeardowns: 0,
      outcomes: [],
    },
  };
}

/**
 * 동기화 스레드와 리포트 워크플로를 동시에 돌리고, 스레드 종료까지 기다린 뒤 결과를 모은다.
 * 워크플로가 reject 되어도 스레드 join 이 끝난 다음에 다시 던진다.
 */
export class Orchestrator {
  private readonly config: OrchestratorConfig;
  private readonly deps: OrchestratorDependencies;
  private thread: SyncThreadHandle | null = null;
  private started = false;
  private stopPromise: Promise<void> | null = null;

  constructor(config: OrchestratorConfig, deps: Partial<OrchestratorDependencies> & Pick<OrchestratorDependencies, 'createSyncThread'>) {
    this.config = { ...config, pollIntervalMs: Math.max(1, config.pollIntervalMs) };
    this.deps = {
      createSyncThread: deps.createSyncThread,
      sleep: deps.sleep ?? sleep,
      logger: deps.logger ?? log.forModule('orchestrator'),
    };
  }

  async runAll<T>(resourcePaths: string[], sessionWorkflow: () => Promise<T>): Promise<RunAllResult<T>> {
    if (this.started) {
      throw new Error('[orchestrator] runAll 은 한 번만 호출할 수 있습니다.');
    }
    if (this.stopPromise) {
      throw new Error('[orchestrator] 이미 정지 요청된 상태입니다.');
    }
    this.started = true;

    // 리소스가 없으면 애플리케이션을 띄울 이유가 없으므로 스레드를 만들지 않는다
    let thread: SyncThreadHandle | null = null;
    if (resourcePaths.length > 0) {
      thread = this.deps.createSyncThread({ ...this.config.job, resourcePaths: [...resourcePaths] });
      this.thread = thread;
      thread.start();
      this.deps.logger.info(`[orchestrator] 시작 resources=${resourcePaths.length} join=${this.config.joinStrategy}`);
    } else {
      this.deps.logger.info('[orchestrator] 동기화할 리소스 없음 → 동기화 스레드 생략');
    }

    let settlement: WorkflowSettlement<T>;
    try {
      settlement = { ok: true, value: await sessionWorkflow() };
    } catch (error) {
      this.deps.logger.error(`[orchestrator] 리포트 워크플로 실패: ${log.describeError(error)}`);
      settlement = { ok: false, error };
    }

    let sync: SyncThreadResult;
    if (thread) {
      sync = await this.join(thread);
      this.deps.logger.info(`[orchestrator] 동기화 스레드 종료 exitCode=${sync.exitCode}`);
    } else {
      sync = emptySyncResult();
    }

    if (!settlement.ok) throw settlement.error;
    return { workflow: settlement.value, sync };
  }

  /** 정지 신호를 보내고 스레드 종료를 기다린다. 두 번째 호출부터는 같은 promise 를 돌려준다. */
  stop(): Promise<void> {
    if (this.stopPromise) return this.stopPromise;
    this.deps.logger.warn('[orchestrator] 정지 요청');
    this.stopPromise = this.thread ? this.thread.stop() : Promise.resolve();
    return this.stopPromise;
  }

  private async join(thread: SyncThreadHandle): Promise<SyncThreadResult> {
    if (this.config.joinStrategy === 'event') {
      return thread.done;
    }
    while (thread.isAlive()) {
      this.deps.logger.info('[orchestrator] 동기화 스레드 종료 대기 중...');
      await this.deps.sleep(this.config.pollIntervalMs);
    }
    return thread.done;
  }
}
