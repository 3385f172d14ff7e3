import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SUCCESS' | 'STEP';

const LOG_FILES = ['app.log', 'error.log', 'sync.log', 'report.log'] as const;
type LogFile = typeof LOG_FILES[number];

let lastUsedDate = '';
let currentLogDir = '';
let fileDescriptors: Record<LogFile, number> | null = null;
let shutdownHookRegistered = false;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

export function getDateKey(now: Date = new Date()): string {
  return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
}

function getTimestamp(now: Date): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
}

function closeStreams(): void {
  if (!fileDescriptors) return;
  for (const fd of Object.values(fileDescriptors)) {
    fs.closeSync(fd);
  }
  fileDescriptors = null;
}

function registerShutdownHook(): void {
  if (shutdownHookRegistered) return;
  shutdownHookRegistered = true;
  process.once('exit', closeStreams);
}

export function getLogBaseDir(): string {
  const override = (process.env.LOG_DIR ?? '').trim();
  if (override) return path.resolve(override);
  return path.resolve(process.cwd(), 'logs');
}

export function getCurrentLogDir(now: Date = new Date()): string {
  return path.join(getLogBaseDir(), getDateKey(now));
}

function ensureTodayDir(now: Date): string {
  registerShutdownHook();
  const dateKey = getDateKey(now);
  const nextLogDir = getCurrentLogDir(now);

  if (dateKey !== lastUsedDate || !fileDescriptors || currentLogDir !== nextLogDir) {
    closeStreams();
    fs.mkdirSync(nextLogDir, { recursive: true });
    fileDescriptors = {
      'app.log': fs.openSync(path.join(nextLogDir, 'app.log'), 'a'),
      'error.log': fs.openSync(path.join(nextLogDir, 'error.log'), 'a'),
      'sync.log': fs.openSync(path.join(nextLogDir, 'sync.log'), 'a'),
      'report.log': fs.openSync(path.join(nextLogDir, 'report.log'), 'a'),
    };
    currentLogDir = nextLogDir;
    lastUsedDate = dateKey;
  } else if (!fs.existsSync(nextLogDir)) {
    fs.mkdirSync(nextLogDir, { recursive: true });
  }

  return currentLogDir;
}

function filesFor(level: LogLevel, moduleName: string): LogFile[] {
  const files = new Set<LogFile>(['app.log']);
  const lowered = moduleName.toLowerCase();
  if (lowered.startsWith('sync')) {
    files.add('sync.log');
  }
  if (lowered.startsWith('report')) {
    files.add('report.log');
  }
  if (level === 'ERROR') {
    files.add('error.log');
  }
  return [...files];
}

function stringifyMessage(message: unknown): string {
  if (typeof message === 'string') return message;
  try {
    return JSON.stringify(message);
  } catch {
    return String(message);
  }
}

function shouldEcho(level: LogLevel): boolean {
  if (level !== 'DEBUG') return true;
  return String(process.env.LOG_DEBUG ?? '').toLowerCase() === 'true';
}

/**
 * 로그 한 줄을 당일 디렉토리(logs/yyyyMMdd)의 파일들에 append 하고 콘솔에도 출력한다.
 * worker thread 에서도 동일하게 동작한다(스레드마다 fd를 따로 연다).
 */
export function writeLog(level: LogLevel, moduleName: string, message: unknown): void {
  const now = new Date();
  ensureTodayDir(now);
  const line = `[${getTimestamp(now)}] [${level}] [${moduleName}] ${stringifyMessage(message)}`;
  if (!fileDescriptors) {
    throw new Error('logger stream is not initialized');
  }
  for (const file of filesFor(level, moduleName)) {
    fs.writeSync(fileDescriptors[file], `${line}\n`);
  }
  if (!shouldEcho(level)) return;
  if (level === 'ERROR') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}
