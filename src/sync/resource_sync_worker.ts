import * as fs from 'fs';

import * as log from '../utils/logger';
import { decideRetry } from '../common/retry';
import { sleepSync, StopSignal } from './stop_signal';
import { ApplicationDriver, ResourceOutcome, SyncRunSummary } from './types';

export type ResourceSyncOptions = {
  maxRetries: number;
  retryDelayMs: number;
  /** refresh 후 save 전 고정 대기. 실제 완료 여부는 조회하지 않는다. */
  refreshIntervalMs: number;
  hidden: boolean;
};

export type ResourceSyncDependencies = {
  stopSignal: StopSignal;
  exists: (resourcePath: string) => boolean;
  sleep: (ms: number) => void;
  logger: log.ModuleLogger;
};

type AttemptResult =
  | { ok: true }
  | { ok: false; error: unknown };

/**
 * 애플리케이션 핸들 하나를 소유하고 리소스 목록을 순서대로 refresh → save → close 한다.
 * 동기 코드이며 전용 worker thread 에서 실행된다.
 *
 * - 리소스별 최대 maxRetries 회 시도, 소진 시 애플리케이션을 teardown 후 새로 만들고 다음 리소스로 넘어간다
 * - StopSignal 은 리소스 사이에서만 확인한다 (진행 중인 refresh 는 끊지 않음)
 * - 살아있는 애플리케이션 핸들은 항상 최대 1개
 */
export class ResourceSyncWorker<App, Res> {
  private readonly driver: ApplicationDriver<App, Res>;
  private readonly options: ResourceSyncOptions;
  private readonly deps: ResourceSyncDependencies;
  private readonly log: log.ModuleLogger;
  private app: App | null = null;
  private launches = 0;
  private teardowns = 0;

  constructor(
    driver: ApplicationDriver<App, Res>,
    options: ResourceSyncOptions,
    deps: Partial<ResourceSyncDependencies> = {},
  ) {
    this.driver = driver;
    this.options = {
      ...options,
      maxRetries: Math.max(1, Math.floor(options.maxRetries)),
      retryDelayMs: Math.max(0, options.retryDelayMs),
      refreshIntervalMs: Math.max(0, options.refreshIntervalMs),
    };
    this.deps = {
      stopSignal: deps.stopSignal ?? new StopSignal(),
      exists: deps.exists ?? ((resourcePath: string) => fs.existsSync(resourcePath)),
      sleep: deps.sleep ?? sleepSync,
      logger: deps.logger ?? log.forModule('sync'),
    };
    this.log = this.deps.logger;
  }

  run(resourcePaths: string[]): SyncRunSummary {
    const startedAt = new Date().toISOString();
    const outcomes: ResourceOutcome[] = [];
    let stopped = false;

    this.log.info(`[sync] run start resources=${resourcePaths.length} maxRetries=${this.options.maxRetries}`);
    if (resourcePaths.length > 0) {
      this.launchApplication();
    }
    try {
      for (let index = 0; index < resourcePaths.length; index++) {
        const resourcePath = resourcePaths[index];
        if (this.deps.stopSignal.isSet()) {
          stopped = true;
          this.log.info(`[sync] 정지 요청 감지: 남은 ${resourcePaths.length - index}건은 처리하지 않습니다.`);
          for (const rest of resourcePaths.slice(index)) {
            outcomes.push({ path: rest, status: 'not_started', attempts: 0 });
          }
          break;
        }

        if (!this.deps.exists(resourcePath)) {
          this.log.warn(`[sync] 파일 없음 → skip path=${resourcePath}`);
          outcomes.push({ path: resourcePath, status: 'skipped_missing', attempts: 0 });
          continue;
        }

        outcomes.push(this.syncResource(resourcePath));
      }
    } finally {
      this.shutdownApplication('run_end');
    }

    const summary: SyncRunSummary = {
      startedAt,
      finishedAt: new Date().toISOString(),
      stopped,
      applicationLaunches: this.launches,
      applicationTeardowns: this.teardowns,
      outcomes,
    };
    const synced = outcomes.filter((o) => o.status === 'synced').length;
    const abandoned = outcomes.filter((o) => o.status === 'abandoned').length;
    this.log.info(`[sync] run complete synced=${synced} abandoned=${abandoned} stopped=${stopped}`);
    return summary;
  }

  private syncResource(resourcePath: string): ResourceOutcome {
    const maxRetries = this.options.maxRetries;
    this.log.info(`[sync] ${resourcePath} 동기화 시작`);

    let attempt = 0;
    while (true) {
      attempt += 1;
      const result = this.attemptOnce(resourcePath, attempt);
      if (result.ok) {
        this.log.success(`[sync] ${resourcePath} 동기화 완료 attempt=${attempt}/${maxRetries}`);
        return { path: resourcePath, status: 'synced', attempts: attempt };
      }

      const detail = log.describeError(result.error);
      this.log.error(`[sync] ${resourcePath} 동기화 실패 attempt=${attempt}/${maxRetries}: ${detail}`);
      const decision = decideRetry(attempt, maxRetries, true, this.options.retryDelayMs);
      if (decision.kind === 'fail') {
        this.log.error(`[sync] ${resourcePath} ${maxRetries}회 실패 → 애플리케이션 재생성 후 다음 리소스로 진행`);
        this.shutdownApplication('resource_exhausted');
        this.launchApplication();
        return { path: resourcePath, status: 'abandoned', attempts: attempt, lastError: detail };
      }

      this.log.info(`[sync] ${resourcePath} 재시도 대기 ${decision.delayMs}ms`);
      this.deps.sleep(decision.delayMs);
    }
  }

  private attemptOnce(resourcePath: string, attempt: number): AttemptResult {
    let app: App;
    try {
      app = this.requireApplication();
    } catch (error) {
      return { ok: false, error };
    }

    let handle: Res;
    try {
      this.log.info(`[sync] open path=${resourcePath} attempt=${attempt}`);
      handle = this.driver.open(app, resourcePath);
    } catch (error) {
      return { ok: false, error };
    }

    let stepFailure: { error: unknown } | null = null;
    try {
      this.log.debug(`[sync] refresh path=${resourcePath}`);
      this.driver.refresh(handle);
      this.log.debug(`[sync] refresh 완료 대기 ${this.options.refreshIntervalMs}ms`);
      this.deps.sleep(this.options.refreshIntervalMs);
      this.driver.save(handle);
      this.log.debug(`[sync] save path=${resourcePath}`);
    } catch (error) {
      stepFailure = { error };
    }

    try {
      this.driver.close(handle);
      this.log.debug(`[sync] close path=${resourcePath}`);
    } catch (closeError) {
      // 닫히지 않은 핸들을 남긴 채 애플리케이션을 계속 쓰지 않는다
      this.log.warn(`[sync] close 실패 path=${resourcePath}: ${log.describeError(closeError)} → 애플리케이션 재시작`);
      this.shutdownApplication('close_failed');
      if (!stepFailure) stepFailure = { error: closeError };
    }

    return stepFailure ? { ok: false, error: stepFailure.error } : { ok: true };
  }

  private requireApplication(): App {
    if (this.app !== null) return this.app;
    return this.constructApplication();
  }

  private constructApplication(): App {
    this.log.info(`[sync] 애플리케이션 기동 hidden=${this.options.hidden}`);
    const app = this.driver.construct(this.options.hidden);
    this.launches += 1;
    this.app = app;
    return app;
  }

  /** 실패해도 슬롯은 비워둔 채 진행한다. 다음 시도에서 다시 기동한다. */
  private launchApplication(): void {
    try {
      this.constructApplication();
    } catch (error) {
      this.log.error(`[sync] 애플리케이션 기동 실패: ${log.describeError(error)}`);
    }
  }

  private shutdownApplication(reason: string): void {
    const app = this.app;
    if (app === null) return;
    this.app = null;
    this.teardowns += 1;
    try {
      this.driver.teardown(app);
      this.log.info(`[sync] 애플리케이션 종료 reason=${reason}`);
    } catch (error) {
      this.log.warn(`[sync] 애플리케이션 종료 중 오류 reason=${reason}: ${log.describeError(error)}`);
    }
  }
}
