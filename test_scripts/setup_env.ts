import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

// 테스트 로그는 작업 디렉토리의 logs/ 대신 임시 디렉토리로
process.env.LOG_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-report-sync-logs-'));
process.env.REPORT_DEBUG_DIR = path.join(process.env.LOG_DIR, 'reportdebug');
delete process.env.LOG_DEBUG;
