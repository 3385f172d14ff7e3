import { forModule, logStructured, sanitizeLogPayload, setLogActivityHook } from '../../src/utils/logger';

// ────────────────────────────────────────────────────────────────────
// 헬퍼: process.stdout.write 캡처
// ────────────────────────────────────────────────────────────────────
function captureStdout(fn: () => void): string[] {
  const captured: string[] = [];
  const spy = jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    captured.push(String(chunk));
    return true;
  });
  try {
    fn();
  } finally {
    spy.mockRestore();
  }
  return captured;
}

function extractJsonFromLines(lines: string[], eventName: string): unknown {
  const line = lines.find((l) => l.includes(`${eventName}: {`));
  if (!line) throw new Error(`'${eventName}:' 포함 로그 라인을 찾지 못했습니다. 캡처된 라인:\n${lines.join('\n')}`);
  const idx = line.indexOf(`${eventName}: `);
  return JSON.parse(line.slice(idx + eventName.length + 2).trim());
}

describe('logStructured', () => {
  afterEach(() => {
    delete process.env.REPORTER_ID;
  });

  test('이벤트 이름 뒤에 JSON payload 를 남긴다', () => {
    const lines = captureStdout(() => {
      logStructured('run_all_result', { exitCode: 2, workflow: { ok: false, failedOperation: 'login' } });
    });

    expect(extractJsonFromLines(lines, 'run_all_result')).toEqual({
      exitCode: 2,
      workflow: { ok: false, failedOperation: 'login' },
    });
  });

  test('operator id 는 payload 에서 가려진다', () => {
    process.env.REPORTER_ID = 'test-operator';
    const lines = captureStdout(() => {
      logStructured('report_login', { url: 'https://portal.example.test/logon', user: 'test-operator' });
    });

    expect(extractJsonFromLines(lines, 'report_login')).toEqual({
      url: 'https://portal.example.test/logon',
      user: '[REDACTED_ID]',
    });
  });
});

// ────────────────────────────────────────────────────────────────────
// 민감정보 필터링
// ────────────────────────────────────────────────────────────────────
describe('sanitizeLogPayload', () => {
  afterEach(() => {
    delete process.env.REPORTER_ID;
  });

  test('민감한 키의 값은 [REDACTED] 로 치환된다', () => {
    expect(sanitizeLogPayload({ password: 'test-secret', token: 'test-token', other: 'ok' })).toEqual({
      password: '[REDACTED]',
      token: '[REDACTED]',
      other: 'ok',
    });
  });

  test('REPORTER_ID 미설정 시 값을 그대로 둔다', () => {
    expect(sanitizeLogPayload({ foo: 'bar', count: 42 })).toEqual({ foo: 'bar', count: 42 });
  });
});

describe('forModule', () => {
  afterEach(() => {
    setLogActivityHook(null);
  });

  test('모듈 이름과 레벨을 activity hook 으로 전달한다', () => {
    const seen: string[] = [];
    setLogActivityHook((msg, level, moduleName) => seen.push(`${moduleName}:${level}:${msg}`));

    captureStdout(() => {
      const logger = forModule('report');
      logger.info('로그인 버튼 클릭');
      logger.step(2, 5, '로그인');
    });

    expect(seen).toEqual(['report:INFO:로그인 버튼 클릭', 'report:STEP:[2/5] 로그인']);
  });
});
