import * as fs from 'fs';
import * as path from 'path';

import { sleepSync } from './stop_signal';

export type MailboxArgs = Record<string, string | number | boolean>;

type MailboxRequest = {
  id: number;
  op: string;
  args: MailboxArgs;
};

type MailboxReply = {
  id: number;
  ok: boolean;
  value?: unknown;
  error?: string;
};

export class ApplicationCallError extends Error {
  readonly op: string;

  constructor(op: string, detail: string) {
    super(`[APPLICATION_CALL_FAILED] op=${op} error=${detail}`);
    this.name = 'ApplicationCallError';
    this.op = op;
  }
}

export class MailboxTimeoutError extends Error {
  readonly op: string;
  readonly timeoutMs: number;

  constructor(op: string, timeoutMs: number) {
    super(`[MAILBOX_TIMEOUT] op=${op} timeout=${timeoutMs}ms`);
    this.name = 'MailboxTimeoutError';
    this.op = op;
    this.timeoutMs = timeoutMs;
  }
}

export function requestFileName(id: number): string {
  return `req-${String(id).padStart(6, '0')}.json`;
}

export function replyFileName(id: number): string {
  return `res-${String(id).padStart(6, '0')}.json`;
}

function parseReply(raw: string, id: number): MailboxReply {
  // Windows PowerShell 5 는 UTF-8 BOM 을 붙여 쓴다
  const parsed: unknown = JSON.parse(raw.replace(/^\uFEFF/, ''));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`mailbox reply ${id} is not an object`);
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
  return {
    id: Number(record.id ?? id),
    ok: record.ok === true,
    value: record.value,
    error: typeof record.error === 'string' ? record.error : undefined,
  };
}

/**
 * 디렉토리 기반 동기 요청/응답 채널.
 * req-NNNNNN.json 을 원자적으로(tmp → rename) 쓰고 res-NNNNNN.json 이 생길 때까지 polling 한다.
 * 호출 스레드를 막으므로 worker thread 안에서만 사용한다.
 */
export class MailboxChannel {
  readonly dir: string;
  private readonly pollMs: number;
  private readonly sleep: (ms: number) => void;
  private seq = 0;

  constructor(dir: string, opts: { pollMs?: number; sleep?: (ms: number) => void } = {}) {
    this.dir = path.resolve(dir);
    this.pollMs = Math.max(1, opts.pollMs ?? 50);
    this.sleep = opts.sleep ?? sleepSync;
    fs.mkdirSync(this.dir, { recursive: true });
  }

  call(op: string, args: MailboxArgs, timeoutMs: number): unknown {
    this.seq += 1;
    const id = this.seq;
    const request: MailboxRequest = { id, op, args };
    const requestPath = path.join(this.dir, requestFileName(id));
    const tmpPath = `${requestPath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(request), 'utf-8');
    fs.renameSync(tmpPath, requestPath);

    const replyPath = path.join(this.dir, replyFileName(id));
    const deadline = Date.now() + timeoutMs;
    while (!fs.existsSync(replyPath)) {
      if (Date.now() >= deadline) {
        throw new MailboxTimeoutError(op, timeoutMs);
      }
      this.sleep(this.pollMs);
    }

    const reply = parseReply(fs.readFileSync(replyPath, 'utf-8'), id);
    fs.rmSync(replyPath, { force: true });
    if (!reply.ok) {
      throw new ApplicationCallError(op, reply.error ?? 'unknown');
    }
    return reply.value;
  }
}
