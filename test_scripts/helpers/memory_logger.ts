import type { ModuleLogger } from '../../src/utils/logger';

export type MemoryLogger = ModuleLogger & {
  lines: string[];
};

/** 파일 대신 메모리에 `LEVEL message` 형태로 쌓는 로거 */
export function createMemoryLogger(): MemoryLogger {
  const lines: string[] = [];
  const push = (level: string) => (msg: string): void => {
    lines.push(`${level} ${msg}`);
  };
  return {
    lines,
    debug: push('DEBUG'),
    info: push('INFO'),
    success: push('SUCCESS'),
    warn: push('WARN'),
    error: push('ERROR'),
    step: (current, total, msg) => lines.push(`STEP [${current}/${total}] ${msg}`),
  };
}
