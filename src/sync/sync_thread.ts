import { isMainThread, parentPort, workerData } from 'worker_threads';

import * as log from '../utils/logger';
import { ExcelHostDriver } from './excel_host_driver';
import { ResourceSyncWorker } from './resource_sync_worker';
import { StopSignal } from './stop_signal';
import { ApplicationDriver, ExcelHostDriverOptions, SyncJob, SyncThreadMessage } from './types';

export type SyncThreadData = {
  job: SyncJob;
  stopBuffer: SharedArrayBuffer;
};

type SyncThreadDependencies = {
  createDriver: (options: ExcelHostDriverOptions) => ApplicationDriver<unknown, unknown>;
  post: (message: SyncThreadMessage) => void;
  logger: log.ModuleLogger;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isSyncThreadData(value: unknown): value is SyncThreadData {
  if (!isRecord(value) || !(value.stopBuffer instanceof SharedArrayBuffer)) return false;
  const job = value.job;
  if (!isRecord(job) || !isRecord(job.driver)) return false;
  return (
    Array.isArray(job.resourcePaths) &&
    job.resourcePaths.every((item) => typeof item === 'string') &&
    typeof job.maxRetries === 'number' &&
    typeof job.retryDelayMs === 'number' &&
    typeof job.refreshIntervalMs === 'number' &&
    typeof job.hidden === 'boolean' &&
    typeof job.driver.powershellPath === 'string' &&
    typeof job.driver.callTimeoutMs === 'number' &&
    (job.driver.hostScriptPath === undefined || typeof job.driver.hostScriptPath === 'string')
  );
}

/**
 * worker thread 진입점. 빌드 산출물(dist/sync/sync_thread.js)로 로드된다.
 * 결과는 parentPort 로 보내고 같은 메시지를 돌려준다. 예외는 'failed' 메시지가 된다.
 */
export function runSyncThread(data: unknown, deps: Partial<SyncThreadDependencies> = {}): SyncThreadMessage {
  const syncLog = deps.logger ?? log.forModule('sync');
  const post = deps.post ?? ((message: SyncThreadMessage) => parentPort?.postMessage(message));
  const createDriver = deps.createDriver ?? ((options: ExcelHostDriverOptions) => new ExcelHostDriver(options));

  let message: SyncThreadMessage;
  try {
    if (!isSyncThreadData(data)) {
      throw new Error('sync thread started without job data');
    }
    const worker = new ResourceSyncWorker(
      createDriver(data.job.driver),
      {
        maxRetries: data.job.maxRetries,
        retryDelayMs: data.job.retryDelayMs,
        refreshIntervalMs: data.job.refreshIntervalMs,
        hidden: data.job.hidden,
      },
      { stopSignal: StopSignal.fromBuffer(data.stopBuffer), logger: syncLog },
    );
    message = { type: 'summary', summary: worker.run(data.job.resourcePaths) };
  } catch (error) {
    syncLog.error(`[sync] 예상치 못한 오류로 동기화 스레드 종료: ${log.describeError(error)}`);
    message = { type: 'failed', error: log.describeError(error) };
  }
  post(message);
  return message;
}

if (!isMainThread) {
  runSyncThread(workerData);
}
