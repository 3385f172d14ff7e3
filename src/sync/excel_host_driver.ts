import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import * as log from '../utils/logger';
import { MailboxChannel } from './mailbox';
import { ApplicationDriver, ExcelHostDriverOptions } from './types';

export type ExcelApplication = {
  id: string;
  pid: number;
  mailboxDir: string;
  channel: MailboxChannel;
};

export type ExcelWorkbook = {
  app: ExcelApplication;
  workbookId: string;
  path: string;
};

/** 호스트 pid 를 돌려준다. 프로세스를 띄우지 못하면 throw */
type HostLauncher = (args: { scriptPath: string; mailboxDir: string; hidden: boolean }) => number;

type ExcelHostDependencies = {
  launchHost: HostLauncher;
  killProcess: (pid: number) => void;
  createMailboxDir: () => string;
  pollMs: number;
  sleep?: (ms: number) => void;
};

const HOST_STARTUP_TIMEOUT_MS = 60_000;
const HOST_QUIT_TIMEOUT_MS = 30_000;

export class HostLaunchError extends Error {
  readonly command: string;

  constructor(command: string) {
    super(`[HOST_LAUNCH_FAILED] command=${command}`);
    this.name = 'HostLaunchError';
    this.command = command;
  }
}

export function defaultHostScriptPath(): string {
  return path.resolve(__dirname, '../../scripts/excel_host.ps1');
}

function spawnPowerShellHost(powershellPath: string): HostLauncher {
  const hostLog = log.forModule('sync');
  return ({ scriptPath, mailboxDir, hidden }) => {
    const child = spawn(
      powershellPath,
      [
        '-NoProfile',
        '-NonInteractive',
        '-ExecutionPolicy', 'Bypass',
        '-File', scriptPath,
        '-Mailbox', mailboxDir,
        '-Hidden', hidden ? '1' : '0',
      ],
      { detached: true, stdio: 'ignore', windowsHide: true },
    );
    // spawn 실패(ENOENT 등)는 pid 없이 다음 tick 의 'error' 이벤트로 온다
    child.on('error', (error) => {
      hostLog.error(`[sync] excel host 프로세스 오류: ${log.describeError(error)}`);
    });
    if (child.pid === undefined) {
      throw new HostLaunchError(powershellPath);
    }
    child.unref();
    return child.pid;
  };
}

function killQuietly(pid: number): void {
  try {
    process.kill(pid);
  } catch {
    // already exited
  }
}

function asWorkbookId(value: unknown): string {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  throw new Error(`excel host returned invalid workbook id: ${JSON.stringify(value)}`);
}

/**
 * Excel COM 을 소유하는 PowerShell 호스트 프로세스(scripts/excel_host.ps1)를 띄우고
 * 파일 mailbox 로 동기 호출한다. 애플리케이션 핸들 1개 = 호스트 프로세스 1개.
 */
export class ExcelHostDriver implements ApplicationDriver<ExcelApplication, ExcelWorkbook> {
  private readonly options: ExcelHostDriverOptions;
  private readonly deps: ExcelHostDependencies;
  private launchCount = 0;

  constructor(options: ExcelHostDriverOptions, deps: Partial<ExcelHostDependencies> = {}) {
    this.options = options;
    this.deps = {
      launchHost: deps.launchHost ?? spawnPowerShellHost(options.powershellPath),
      killProcess: deps.killProcess ?? killQuietly,
      createMailboxDir: deps.createMailboxDir ?? (() => fs.mkdtempSync(path.join(os.tmpdir(), 'excel-host-'))),
      pollMs: deps.pollMs ?? 100,
      sleep: deps.sleep,
    };
  }

  construct(hidden: boolean): ExcelApplication {
    this.launchCount += 1;
    const mailboxDir = this.deps.createMailboxDir();
    const channel = new MailboxChannel(mailboxDir, { pollMs: this.deps.pollMs, sleep: this.deps.sleep });
    let pid: number;
    try {
      pid = this.deps.launchHost({
        scriptPath: this.options.hostScriptPath ?? defaultHostScriptPath(),
        mailboxDir,
        hidden,
      });
    } catch (error) {
      fs.rmSync(mailboxDir, { recursive: true, force: true });
      throw error;
    }
    const app: ExcelApplication = { id: `excel-${this.launchCount}`, pid, mailboxDir, channel };
    try {
      channel.call('hello', { hidden }, Math.max(this.options.callTimeoutMs, HOST_STARTUP_TIMEOUT_MS));
    } catch (error) {
      this.disposeHost(app);
      throw error;
    }
    return app;
  }

  open(app: ExcelApplication, resourcePath: string): ExcelWorkbook {
    const absolute = path.resolve(resourcePath);
    const value = app.channel.call('open', { path: absolute }, this.options.callTimeoutMs);
    return { app, workbookId: asWorkbookId(value), path: absolute };
  }

  refresh(resource: ExcelWorkbook): void {
    resource.app.channel.call('refresh', { workbook: resource.workbookId }, this.options.callTimeoutMs);
  }

  save(resource: ExcelWorkbook): void {
    resource.app.channel.call('save', { workbook: resource.workbookId }, this.options.callTimeoutMs);
  }

  close(resource: ExcelWorkbook): void {
    resource.app.channel.call('close', { workbook: resource.workbookId }, this.options.callTimeoutMs);
  }

  /** quit 요청이 실패해도 프로세스 정리는 끝까지 하고, 원래 에러를 다시 던진다. */
  teardown(app: ExcelApplication): void {
    let quitFailure: { error: unknown } | null = null;
    try {
      app.channel.call('quit', {}, Math.min(this.options.callTimeoutMs, HOST_QUIT_TIMEOUT_MS));
    } catch (error) {
      quitFailure = { error };
    }
    this.disposeHost(app, quitFailure !== null);
    if (quitFailure) throw quitFailure.error;
  }

  private disposeHost(app: ExcelApplication, kill: boolean = true): void {
    if (kill) {
      this.deps.killProcess(app.pid);
    }
    fs.rmSync(app.mailboxDir, { recursive: true, force: true });
  }
}
