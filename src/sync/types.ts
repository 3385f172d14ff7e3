/**
 * 외부 스프레드시트 애플리케이션 드라이버. 모든 호출은 동기(blocking)이며 실패 시 throw 한다.
 * App/Res 는 드라이버마다 다른 불투명 핸들 타입.
 */
export interface ApplicationDriver<App, Res> {
  construct(hidden: boolean): App;
  open(app: App, resourcePath: string): Res;
  refresh(resource: Res): void;
  save(resource: Res): void;
  close(resource: Res): void;
  teardown(app: App): void;
}

export type ResourceOutcomeStatus = 'synced' | 'skipped_missing' | 'abandoned' | 'not_started';

export interface ResourceOutcome {
  path: string;
  status: ResourceOutcomeStatus;
  attempts: number;
  lastError?: string;
}

export interface SyncRunSummary {
  startedAt: string;
  finishedAt: string;
  stopped: boolean;
  applicationLaunches: number;
  applicationTeardowns: number;
  outcomes: ResourceOutcome[];
}

export interface SyncJob {
  resourcePaths: string[];
  maxRetries: number;
  retryDelayMs: number;
  refreshIntervalMs: number;
  hidden: boolean;
  driver: ExcelHostDriverOptions;
}

export interface ExcelHostDriverOptions {
  powershellPath: string;
  callTimeoutMs: number;
  /** 미지정 시 scripts/excel_host.ps1 */
  hostScriptPath?: string;
}

/** worker thread → main 메시지 */
export type SyncThreadMessage =
  | { type: 'summary'; summary: SyncRunSummary }
  | { type: 'failed'; error: string };
