import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { StopSignal } from '../../src/sync/stop_signal';
import { SyncThread } from '../../src/sync/sync_thread_host';
import { SyncJob } from '../../src/sync/types';
import { setLogActivityHook } from '../../src/utils/logger';

// 실제 Excel 대신 모드별로 동작하는 worker 스크립트 (컴파일된 sync_thread.js 와 같은 메시지 규약)
const WORKER_SOURCE = `
const { parentPort, workerData } = require('worker_threads');
const cell = new Int32Array(workerData.stopBuffer);
const mode = workerData.job.resourcePaths[0];
const summary = (stopped) => ({
  startedAt: '2026-01-05T00:00:00.000Z',
  finishedAt: '2026-01-05T00:00:01.000Z',
  stopped,
  applicationLaunches: 1,
  applicationTeardowns: 1,
  outcomes: [{ path: mode, status: stopped ? 'not_started' : 'synced', attempts: stopped ? 0 : 1 }],
});
if (mode === 'crash') {
  throw new Error('thread exploded');
}
if (mode === 'wait-stop') {
  while (Atomics.load(cell, 0) === 0) {
    Atomics.wait(cell, 0, 0, 10);
  }
}
parentPort.postMessage({ type: 'summary', summary: summary(mode === 'wait-stop') });
`;

function writeWorkerScript(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sync-thread-test-'));
  const scriptPath = path.join(dir, 'fake_sync_thread.js');
  fs.writeFileSync(scriptPath, WORKER_SOURCE, 'utf-8');
  return scriptPath;
}

function jobFor(mode: string): SyncJob {
  return {
    resourcePaths: [mode],
    maxRetries: 1,
    retryDelayMs: 0,
    refreshIntervalMs: 0,
    hidden: true,
    driver: { powershellPath: 'powershell.exe', callTimeoutMs: 1000 },
  };
}

const STOPPED_MESSAGE = '[sync] 동기화 스레드를 정지했습니다.';

describe('SyncThread', () => {
  let scriptPath: string;
  let messages: string[];

  beforeAll(() => {
    scriptPath = writeWorkerScript();
  });

  beforeEach(() => {
    messages = [];
    setLogActivityHook((msg) => messages.push(msg));
  });

  afterEach(() => {
    setLogActivityHook(null);
  });

  test('start 후 살아 있다가 종료되면 summary 를 전달한다', async () => {
    const thread = new SyncThread({ job: jobFor('A.xlsx'), scriptPath });
    expect(thread.isAlive()).toBe(false);

    thread.start();
    expect(thread.isAlive()).toBe(true);

    const result = await thread.done;
    expect(result.exitCode).toBe(0);
    expect(result.error).toBeUndefined();
    expect(result.summary?.outcomes).toEqual([{ path: 'A.xlsx', status: 'synced', attempts: 1 }]);
    expect(thread.isAlive()).toBe(false);
  });

  test('stop 은 정지 신호를 보내고 여러 번 호출해도 같은 join 을 돌려준다', async () => {
    const stopSignal = new StopSignal();
    const thread = new SyncThread({ job: jobFor('wait-stop'), scriptPath, stopSignal });
    thread.start();

    const first = thread.stop();
    const second = thread.stop();
    expect(second).toBe(first);
    expect(stopSignal.isSet()).toBe(true);

    await first;
    const result = await thread.done;
    expect(result.summary?.stopped).toBe(true);
    expect(thread.isAlive()).toBe(false);

    await thread.stop();
    expect(messages.filter((msg) => msg === STOPPED_MESSAGE)).toHaveLength(1);
  });

  test('시작하지 않은 스레드의 stop 은 바로 끝나고 로그를 남기지 않는다', async () => {
    const thread = new SyncThread({ job: jobFor('A.xlsx'), scriptPath });

    await thread.stop();

    expect(messages).not.toContain(STOPPED_MESSAGE);
  });

  test('스레드 안의 예외는 done 의 error 로 전달된다', async () => {
    const thread = new SyncThread({ job: jobFor('crash'), scriptPath });
    thread.start();

    const result = await thread.done;
    expect(result.summary).toBeNull();
    expect(result.exitCode).toBe(1);
    expect(result.error).toBe('thread exploded');
  });

  test('스크립트가 없으면 start 가 실패한다', () => {
    const thread = new SyncThread({ job: jobFor('A.xlsx'), scriptPath: path.join(os.tmpdir(), 'missing-thread.js') });

    expect(() => thread.start()).toThrow('[sync] thread script not found');
  });
});
