import * as fs from 'fs';
import * as path from 'path';
import { Worker } from 'worker_threads';

import * as log from '../utils/logger';
import { StopSignal } from './stop_signal';
import type { SyncThreadData } from './sync_thread';
import { SyncJob, SyncRunSummary, SyncThreadMessage } from './types';

export type SyncThreadResult = {
  summary: SyncRunSummary | null;
  exitCode: number;
  error?: string;
};

/** Orchestrator 가 보는 동기화 스레드. done 은 reject 되지 않는다. */
export interface SyncThreadHandle {
  start(): void;
  isAlive(): boolean;
  readonly done: Promise<SyncThreadResult>;
  stop(): Promise<void>;
}

export type SyncThreadOptions = {
  job: SyncJob;
  /** 기본: 빌드된 dist/sync/sync_thread.js */
  scriptPath?: string;
  stopSignal?: StopSignal;
};

export function defaultSyncThreadScript(): string {
  return path.resolve(__dirname, 'sync_thread.js');
}

function isSyncThreadMessage(value: unknown): value is SyncThreadMessage {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  return value.type === 'summary' || value.type === 'failed';
}

export class SyncThread implements SyncThreadHandle {
  readonly done: Promise<SyncThreadResult>;
  private readonly options: SyncThreadOptions;
  private readonly stopSignal: StopSignal;
  private readonly log = log.forModule('sync');
  private resolveDone: (result: SyncThreadResult) => void = () => undefined;
  private worker: Worker | null = null;
  private exited = false;
  private joinPromise: Promise<void> | null = null;

  constructor(options: SyncThreadOptions) {
    this.options = options;
    this.stopSignal = options.stopSignal ?? new StopSignal();
    this.done = new Promise<SyncThreadResult>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  start(): void {
    if (this.worker) return;
    const scriptPath = this.options.scriptPath ?? defaultSyncThreadScript();
    if (!fs.existsSync(scriptPath)) {
      throw new Error(`[sync] thread script not found: ${scriptPath} (npm run build 후 실행하세요)`);
    }

    const data: SyncThreadData = { job: this.options.job, stopBuffer: this.stopSignal.buffer };
    const worker = new Worker(scriptPath, { workerData: data });
    this.worker = worker;

    let summary: SyncRunSummary | null = null;
    let failure: string | undefined;
    worker.on('message', (message: unknown) => {
      if (!isSyncThreadMessage(message)) return;
      if (message.type === 'summary') {
        summary = message.summary;
      } else {
        failure = message.error;
      }
    });
    worker.on('error', (error) => {
      failure = log.describeError(error);
      this.log.error(`[sync] thread error: ${failure}`);
    });
    worker.on('exit', (exitCode) => {
      this.exited = true;
      this.resolveDone({ summary, exitCode, ...(failure ? { error: failure } : {}) });
    });
    this.log.info(`[sync] 동기화 스레드 시작 resources=${this.options.job.resourcePaths.length}`);
  }

  isAlive(): boolean {
    return this.worker !== null && !this.exited;
  }

  /** 정지 신호를 보내고 스레드 종료까지 기다린다. 여러 번 호출해도 같은 join 을 돌려준다. */
  stop(): Promise<void> {
    this.stopSignal.set();
    if (this.joinPromise) return this.joinPromise;
    if (!this.isAlive()) {
      this.joinPromise = Promise.resolve();
      return this.joinPromise;
    }
    this.joinPromise = this.done.then(() => {
      this.log.info('[sync] 동기화 스레드를 정지했습니다.');
    });
    return this.joinPromise;
  }
}
