import { emptySyncResult, Orchestrator, OrchestratorConfig } from '../../src/worker/orchestrator';
import { SyncThreadHandle, SyncThreadResult } from '../../src/sync/sync_thread_host';
import { SyncJob } from '../../src/sync/types';
import { createMemoryLogger } from '../helpers/memory_logger';

class FakeSyncThread implements SyncThreadHandle {
  readonly done: Promise<SyncThreadResult>;
  stopCalls = 0;
  private alive = false;
  private resolveDone: (result: SyncThreadResult) => void = () => undefined;

  constructor(
    readonly job: SyncJob,
    private readonly result: SyncThreadResult,
  ) {
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  start(): void {
    this.alive = true;
  }

  isAlive(): boolean {
    return this.alive;
  }

  exit(): void {
    this.alive = false;
    this.resolveDone(this.result);
  }

  stop(): Promise<void> {
    this.stopCalls += 1;
    this.exit();
    return this.done.then(() => undefined);
  }
}

const job: SyncJob = {
  resourcePaths: [],
  maxRetries: 5,
  retryDelayMs: 2000,
  refreshIntervalMs: 5000,
  hidden: true,
  driver: { powershellPath: 'powershell.exe', callTimeoutMs: 120000 },
};

const syncResult: SyncThreadResult = {
  exitCode: 0,
  summary: {
    startedAt: '2026-01-05T00:00:00.000Z',
    finishedAt: '2026-01-05T00:01:00.000Z',
    stopped: false,
    applicationLaunches: 1,
    applicationTeardowns: 1,
    outcomes: [{ path: 'A.xlsx', status: 'synced', attempts: 1 }],
  },
};

function setup(config: Partial<OrchestratorConfig>, sleep: (ms: number) => Promise<void> = async () => undefined) {
  const threads: FakeSyncThread[] = [];
  const logger = createMemoryLogger();
  const orchestrator = new Orchestrator(
    { job, joinStrategy: 'poll', pollIntervalMs: 250, ...config },
    {
      createSyncThread: (threadJob) => {
        const thread = new FakeSyncThread(threadJob, syncResult);
        threads.push(thread);
        return thread;
      },
      sleep,
      logger,
    },
  );
  return { orchestrator, threads, logger };
}

const WAITING = 'INFO [orchestrator] 동기화 스레드 종료 대기 중...';

describe('Orchestrator', () => {
  test('poll: 스레드가 끝날 때까지 주기적으로 확인하고 결과를 모은다', async () => {
    let polls = 0;
    let started: FakeSyncThread[] = [];
    const sleep = jest.fn(async () => {
      polls += 1;
      if (polls === 2) started[0].exit();
    });
    const { orchestrator, threads, logger } = setup({ joinStrategy: 'poll' }, sleep);
    started = threads;

    const result = await orchestrator.runAll(['A.xlsx'], async () => 'report-ok');

    expect(result).toEqual({ workflow: 'report-ok', sync: syncResult });
    expect(sleep.mock.calls).toEqual([[250], [250]]);
    expect(logger.lines.filter((line) => line === WAITING)).toHaveLength(2);
    expect(threads[0].job.resourcePaths).toEqual(['A.xlsx']);
    expect(threads[0].job.maxRetries).toBe(5);
  });

  test('event: 종료 이벤트를 기다리고 polling 하지 않는다', async () => {
    const sleep = jest.fn(async () => undefined);
    const { orchestrator, threads, logger } = setup({ joinStrategy: 'event' }, sleep);

    const pending = orchestrator.runAll(['A.xlsx'], async () => 42);
    setTimeout(() => threads[0].exit(), 10);
    const result = await pending;

    expect(result.workflow).toBe(42);
    expect(result.sync).toBe(syncResult);
    expect(sleep).not.toHaveBeenCalled();
    expect(logger.lines).not.toContain(WAITING);
  });

  test.each(['poll', 'event'] as const)('%s: 워크플로 실패는 스레드 join 이후에 다시 던진다', async (joinStrategy) => {
    const { orchestrator, threads } = setup({ joinStrategy, pollIntervalMs: 5 }, (ms) => new Promise((r) => setTimeout(r, ms)));

    const pending = orchestrator.runAll(['A.xlsx'], async () => {
      throw new Error('portal down');
    });
    let exited = false;
    setTimeout(() => {
      exited = true;
      threads[0].exit();
    }, 30);

    await expect(pending).rejects.toThrow('portal down');
    expect(exited).toBe(true);
    expect(threads[0].isAlive()).toBe(false);
  });

  test('stop 은 스레드를 한 번만 정지시키고 같은 promise 를 돌려준다', async () => {
    const { orchestrator, threads, logger } = setup({ joinStrategy: 'event' });

    const pending = orchestrator.runAll(['A.xlsx', 'B.xlsx'], async () => 'report-ok');
    const first = orchestrator.stop();
    const second = orchestrator.stop();

    expect(second).toBe(first);
    await first;
    await expect(pending).resolves.toEqual({ workflow: 'report-ok', sync: syncResult });
    expect(threads[0].stopCalls).toBe(1);
    expect(logger.lines.filter((line) => line === 'WARN [orchestrator] 정지 요청')).toHaveLength(1);
  });

  test('runAll 전에 stop 하면 바로 끝나고 이후 runAll 은 거부된다', async () => {
    const { orchestrator, threads } = setup({});

    await orchestrator.stop();

    await expect(orchestrator.runAll([], async () => null)).rejects.toThrow('[orchestrator] 이미 정지 요청된 상태입니다.');
    expect(threads).toHaveLength(0);
  });

  test('runAll 은 한 번만 호출할 수 있다', async () => {
    const { orchestrator, threads } = setup({ joinStrategy: 'event' });

    const pending = orchestrator.runAll(['A.xlsx'], async () => null);
    await expect(orchestrator.runAll(['A.xlsx'], async () => null)).rejects.toThrow('[orchestrator] runAll 은 한 번만 호출할 수 있습니다.');
    threads[0].exit();
    await pending;
    expect(threads).toHaveLength(1);
  });

  test('리소스가 없으면 동기화 스레드를 만들지 않고 빈 결과를 돌려준다', async () => {
    const sleep = jest.fn(async () => undefined);
    const { orchestrator, threads, logger } = setup({ joinStrategy: 'poll' }, sleep);

    const result = await orchestrator.runAll([], async () => 'report-ok');

    expect(threads).toHaveLength(0);
    expect(sleep).not.toHaveBeenCalled();
    expect(result.workflow).toBe('report-ok');
    expect(result.sync.exitCode).toBe(0);
    expect(result.sync.summary?.outcomes).toEqual([]);
    expect(result.sync.summary?.applicationLaunches).toBe(0);
    expect(logger.lines).toContain('INFO [orchestrator] 동기화할 리소스 없음 → 동기화 스레드 생략');
    await expect(orchestrator.stop()).resolves.toBeUndefined();
    await expect(orchestrator.runAll([], async () => 'again')).rejects.toThrow('[orchestrator] runAll 은 한 번만 호출할 수 있습니다.');
  });

  test('emptySyncResult 는 시작/종료 시각이 같은 빈 요약', () => {
    const result = emptySyncResult(new Date('2026-01-05T09:00:00.000Z'));

    expect(result).toEqual({
      exitCode: 0,
      summary: {
        startedAt: '2026-01-05T09:00:00.000Z',
        finishedAt: '2026-01-05T09:00:00.000Z',
        stopped: false,
        applicationLaunches: 0,
        applicationTeardowns: 0,
        outcomes: [],
      },
    });
  });
});
