import * as fs from 'fs';
import * as path from 'path';
import { getCurrentLogDir } from './logger';

/**
 * 리포트 실패 artifact 폴더를 만든다.
 * REPORT_DEBUG_DIR 가 있으면 그 아래, 없으면 당일 로그 폴더의 reportdebug/ 아래 `<ISO 시각>_<stage>`.
 */
export function createReportDebugDir(stage: string, now: Date = new Date()): string {
  const override = (process.env.REPORT_DEBUG_DIR ?? '').trim();
  const root = override ? path.resolve(override) : path.join(getCurrentLogDir(now), 'reportdebug');
  const dir = path.join(root, `${now.toISOString().replace(/[:.]/g, '-')}_${stage}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}
