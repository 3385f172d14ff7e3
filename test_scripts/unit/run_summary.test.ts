import { exitCodeFor, formatRunSummary, RunAllOutcome } from '../../src/worker/run_summary';

function outcome(overrides: Partial<RunAllOutcome> = {}): RunAllOutcome {
  return {
    workflow: { ok: true, state: 'DateFiltered' },
    sync: {
      exitCode: 0,
      summary: {
        startedAt: '2026-01-05T00:00:00.000Z',
        finishedAt: '2026-01-05T00:01:00.000Z',
        stopped: false,
        applicationLaunches: 1,
        applicationTeardowns: 1,
        outcomes: [
          { path: 'A.xlsx', status: 'synced', attempts: 1 },
          { path: 'B.xlsx', status: 'skipped_missing', attempts: 0 },
        ],
      },
    },
    ...overrides,
  };
}

describe('run summary', () => {
  test('양쪽 모두 끝나면 0', () => {
    expect(exitCodeFor(outcome())).toBe(0);
    expect(formatRunSummary(outcome())).toBe('report=ok sync: synced=1 missing=1 abandoned=0 not_started=0');
  });

  test('리포트를 건너뛴 실행도 0', () => {
    expect(exitCodeFor(outcome({ workflow: null }))).toBe(0);
    expect(formatRunSummary(outcome({ workflow: null }))).toBe(
      'report=skipped sync: synced=1 missing=1 abandoned=0 not_started=0',
    );
  });

  test('리포트 실패나 abandoned 리소스가 있으면 2', () => {
    const failedReport = outcome({ workflow: { ok: false, state: 'Failed', failedOperation: 'login' } });
    expect(exitCodeFor(failedReport)).toBe(2);
    expect(formatRunSummary(failedReport)).toBe('report=failed(login) sync: synced=1 missing=1 abandoned=0 not_started=0');

    const abandoned = outcome({
      sync: {
        exitCode: 0,
        summary: {
          startedAt: '2026-01-05T00:00:00.000Z',
          finishedAt: '2026-01-05T00:01:00.000Z',
          stopped: false,
          applicationLaunches: 2,
          applicationTeardowns: 2,
          outcomes: [{ path: 'C.xlsx', status: 'abandoned', attempts: 5, lastError: 'refresh failed' }],
        },
      },
    });
    expect(exitCodeFor(abandoned)).toBe(2);
  });

  test('스레드가 summary 없이 끝나면 2', () => {
    const crashed = outcome({ sync: { exitCode: 1, summary: null, error: 'thread exploded' } });
    expect(exitCodeFor(crashed)).toBe(2);
    expect(formatRunSummary(crashed)).toBe('report=ok sync: failed(thread exploded)');
  });
});
