import { writeLog, type LogLevel } from '../common/logger';

type ActivityHook = (msg: string, level: LogLevel, moduleName: string) => void;
let activityHook: ActivityHook | null = null;

export function setLogActivityHook(hook: ActivityHook | null): void {
  activityHook = hook;
}

function notifyActivity(msg: string, level: LogLevel, moduleName: string): void {
  if (!activityHook) return;
  try {
    activityHook(msg, level, moduleName);
  } catch {
    // activity hook failure must not break main flow
  }
}

export type ModuleLogger = {
  debug(msg: string): void;
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  step(current: number, total: number, msg: string): void;
};

/** 모듈명을 고정한 로거. sync → sync.log, report → report.log 로도 분기된다. */
export function forModule(moduleName: string): ModuleLogger {
  const emit = (level: LogLevel, msg: string): void => {
    notifyActivity(msg, level, moduleName);
    writeLog(level, moduleName, msg);
  };
  return {
    debug: (msg) => emit('DEBUG', msg),
    info: (msg) => emit('INFO', msg),
    success: (msg) => emit('SUCCESS', msg),
    warn: (msg) => emit('WARN', msg),
    error: (msg) => emit('ERROR', msg),
    step: (current, total, msg) => emit('STEP', `[${current}/${total}] ${msg}`),
  };
}

const appLogger = forModule('app');

export function debug(msg: string): void {
  appLogger.debug(msg);
}

export function info(msg: string): void {
  appLogger.info(msg);
}

export function success(msg: string): void {
  appLogger.success(msg);
}

export function warn(msg: string): void {
  appLogger.warn(msg);
}

export function error(msg: string): void {
  appLogger.error(msg);
}

export function step(current: number, total: number, msg: string): void {
  appLogger.step(current, total, msg);
}

// ── 구조화 JSON 로그 헬퍼 ─────────────────────────────────────────

export type StructuredLogPayload = Record<string, unknown>;

export function sanitizeLogPayload(data: StructuredLogPayload): StructuredLogPayload {
  const operatorId = (process.env.REPORTER_ID ?? '').trim();
  return JSON.parse(
    JSON.stringify(data, (key, val) => {
      if (typeof val === 'string') {
        if (operatorId && val.includes(operatorId)) return '[REDACTED_ID]';
        if (/^(operator_id|password|token)$/.test(key)) return '[REDACTED]';
      }
      return val;
    }),
  );
}

export function logStructured(event: string, data: StructuredLogPayload): void {
  info(`${event}: ${JSON.stringify(sanitizeLogPayload(data))}`);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
