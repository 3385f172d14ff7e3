import { DEFAULT_BRIDGE_POOL_SIZE } from './blocking_bridge';
import { JOIN_STRATEGIES, JoinStrategy, isJoinStrategy } from '../worker/orchestrator';

type Env = Record<string, string | undefined>;

/** 실행을 시작할 수 없는 설정 오류 (CLI exit code 1) */
export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`[CONFIG_INVALID] ${key}: ${message}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}

export type SyncSettings = {
  files: string[];
  maxRetries: number;
  retryDelayMs: number;
  refreshIntervalMs: number;
  hidden: boolean;
  callTimeoutMs: number;
  powershellPath: string;
};

export type ReportSettings = {
  url?: string;
  operatorId?: string;
  templateRange?: string;
  templateValue?: string;
  headless: boolean;
  retryCount: number;
  retryDelayMs: number;
  elementTimeoutMs: number;
  settleMs: number;
  panelSettleMs: number;
  callTimeoutMs: number;
};

export type AppConfig = {
  sync: SyncSettings;
  report: ReportSettings;
  bridgePoolSize: number;
  join: { strategy: JoinStrategy; pollMs: number };
};

export type ReportTarget = {
  url: string;
  operatorId: string;
  templateRange: string;
  templateValue: string;
};

function readString(env: Env, key: string): string | undefined {
  const value = (env[key] ?? '').trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) return fallback;
  return Math.max(min, parsed);
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  return fallback;
}

export function splitFileList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseJoinStrategy(raw: string | undefined, key = 'JOIN_STRATEGY'): JoinStrategy {
  const value = (raw ?? 'poll').trim().toLowerCase();
  if (!isJoinStrategy(value)) {
    throw new ConfigError(key, `'${raw}' (허용: ${JOIN_STRATEGIES.join(', ')})`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    sync: {
      files: splitFileList(env.SYNC_FILES),
      maxRetries: readInt(env, 'SYNC_MAX_RETRIES', 5, 1),
      retryDelayMs: readInt(env, 'SYNC_RETRY_DELAY_MS', 2000, 0),
      refreshIntervalMs: readInt(env, 'SYNC_REFRESH_INTERVAL_MS', 5000, 0),
      hidden: readBool(env, 'SYNC_HIDDEN', true),
      callTimeoutMs: readInt(env, 'SYNC_CALL_TIMEOUT_MS', 120_000, 1000),
      powershellPath: readString(env, 'POWERSHELL_PATH') ?? 'powershell.exe',
    },
    report: {
      url: readString(env, 'REPORTER_URL'),
      operatorId: readString(env, 'REPORTER_ID'),
      templateRange: readString(env, 'REPORTER_TEMPLATE_RANGE'),
      templateValue: readString(env, 'REPORTER_TEMPLATE_VALUE'),
      headless: readBool(env, 'HEADLESS', false),
      retryCount: readInt(env, 'REPORT_RETRY_COUNT', 3, 1),
      retryDelayMs: readInt(env, 'REPORT_RETRY_DELAY_MS', 2000, 0),
      elementTimeoutMs: readInt(env, 'REPORT_ELEMENT_TIMEOUT_MS', 10_000, 0),
      settleMs: readInt(env, 'REPORT_SETTLE_MS', 2000, 0),
      panelSettleMs: readInt(env, 'REPORT_PANEL_SETTLE_MS', 5000, 0),
      callTimeoutMs: readInt(env, 'REPORT_CALL_TIMEOUT_MS', 60_000, 1000),
    },
    bridgePoolSize: readInt(env, 'BRIDGE_POOL_SIZE', DEFAULT_BRIDGE_POOL_SIZE, 1),
    join: {
      strategy: parseJoinStrategy(env.JOIN_STRATEGY),
      pollMs: readInt(env, 'JOIN_POLL_MS', 1000, 1),
    },
  };
}

/** 리포트 워크플로에 필요한 필수 값. 하나라도 없으면 ConfigError */
export function resolveReportTarget(report: ReportSettings): ReportTarget {
  const missing: string[] = [];
  if (!report.url) missing.push('REPORTER_URL');
  if (!report.operatorId) missing.push('REPORTER_ID');
  if (!report.templateRange) missing.push('REPORTER_TEMPLATE_RANGE');
  if (!report.templateValue) missing.push('REPORTER_TEMPLATE_VALUE');
  if (!report.url || !report.operatorId || !report.templateRange || !report.templateValue) {
    throw new ConfigError(missing.join(','), '필수 환경 변수가 설정되지 않았습니다.');
  }
  return {
    url: report.url,
    operatorId: report.operatorId,
    templateRange: report.templateRange,
    templateValue: report.templateValue,
  };
}
