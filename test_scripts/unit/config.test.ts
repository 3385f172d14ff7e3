import { ConfigError, loadConfig, parseJoinStrategy, resolveReportTarget, splitFileList } from '../../src/common/config';

describe('loadConfig', () => {
  test('값이 없으면 기본값', () => {
    const config = loadConfig({});

    expect(config.sync).toEqual({
      files: [],
      maxRetries: 5,
      retryDelayMs: 2000,
      refreshIntervalMs: 5000,
      hidden: true,
      callTimeoutMs: 120000,
      powershellPath: 'powershell.exe',
    });
    expect(config.report).toEqual({
      url: undefined,
      operatorId: undefined,
      templateRange: undefined,
      templateValue: undefined,
      headless: false,
      retryCount: 3,
      retryDelayMs: 2000,
      elementTimeoutMs: 10000,
      settleMs: 2000,
      panelSettleMs: 5000,
      callTimeoutMs: 60000,
    });
    expect(config.bridgePoolSize).toBe(5);
    expect(config.join).toEqual({ strategy: 'poll', pollMs: 1000 });
  });

  test('환경 변수를 읽고 하한으로 보정한다', () => {
    const config = loadConfig({
      SYNC_FILES: ' C:/data/a.xlsx, ,C:/data/b.xlsx ',
      SYNC_MAX_RETRIES: '0',
      SYNC_RETRY_DELAY_MS: '-5',
      SYNC_HIDDEN: 'false',
      HEADLESS: 'true',
      REPORT_RETRY_COUNT: 'abc',
      BRIDGE_POOL_SIZE: '0',
      JOIN_STRATEGY: 'EVENT',
      JOIN_POLL_MS: '250',
    });

    expect(config.sync.files).toEqual(['C:/data/a.xlsx', 'C:/data/b.xlsx']);
    expect(config.sync.maxRetries).toBe(1);
    expect(config.sync.retryDelayMs).toBe(0);
    expect(config.sync.hidden).toBe(false);
    expect(config.report.headless).toBe(true);
    expect(config.report.retryCount).toBe(3);
    expect(config.bridgePoolSize).toBe(1);
    expect(config.join).toEqual({ strategy: 'event', pollMs: 250 });
  });

  test('알 수 없는 join 방식은 ConfigError', () => {
    expect(() => loadConfig({ JOIN_STRATEGY: 'spin' })).toThrow(ConfigError);
    expect(() => parseJoinStrategy('spin', '--join')).toThrow("[CONFIG_INVALID] --join: 'spin' (허용: poll, event)");
  });
});

describe('splitFileList', () => {
  test('쉼표로 나누고 빈 항목은 버린다', () => {
    expect(splitFileList(undefined)).toEqual([]);
    expect(splitFileList('a.xlsx,b.xlsx,')).toEqual(['a.xlsx', 'b.xlsx']);
  });
});

describe('resolveReportTarget', () => {
  test('필수 값이 모두 있으면 반환한다', () => {
    const { report } = loadConfig({
      REPORTER_URL: 'https://portal.example.test/logon',
      REPORTER_ID: 'test-operator',
      REPORTER_TEMPLATE_RANGE: '전체',
      REPORTER_TEMPLATE_VALUE: 'daily',
    });

    expect(resolveReportTarget(report)).toEqual({
      url: 'https://portal.example.test/logon',
      operatorId: 'test-operator',
      templateRange: '전체',
      templateValue: 'daily',
    });
  });

  test('빠진 값을 모두 알려준다', () => {
    const { report } = loadConfig({ REPORTER_URL: 'https://portal.example.test/logon' });

    expect(() => resolveReportTarget(report)).toThrow(
      '[CONFIG_INVALID] REPORTER_ID,REPORTER_TEMPLATE_RANGE,REPORTER_TEMPLATE_VALUE: 필수 환경 변수가 설정되지 않았습니다.',
    );
  });
});
