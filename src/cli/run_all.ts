#!/usr/bin/env node

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';

import * as log from '../utils/logger';
import { BlockingBridge } from '../common/blocking_bridge';
import { ConfigError, loadConfig, parseJoinStrategy, resolveReportTarget } from '../common/config';
import { PlaywrightSessionDriver } from '../report/playwright_driver';
import { ReportSession } from '../report/report_session';
import { buildDefaultPlan, ReportWorkflowResult, runReportWorkflow } from '../report/report_workflow';
import { loadPortalSelectors } from '../report/selectors';
import { SyncThread } from '../sync/sync_thread_host';
import { SyncJob } from '../sync/types';
import { Orchestrator } from '../worker/orchestrator';
import { EXIT_CONFIG_ERROR, EXIT_RUN_FAILED, exitCodeFor, formatRunSummary } from '../worker/run_summary';

const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

type RunAllCliOptions = {
  file?: string[];
  join?: string;
  headless?: boolean;
  skipReport?: boolean;
  skipSync?: boolean;
};

const program = new Command();
program
  .name('run-all')
  .description('통합 문서 새로고침/저장과 리포트 포털 작업을 동시에 실행')
  .option('--file <path...>', '동기화할 통합 문서 경로 (기본: SYNC_FILES)')
  .option('--join <strategy>', '동기화 스레드 join 방식 poll | event (기본: JOIN_STRATEGY)')
  .option('--headless', 'headless 브라우저로 실행 (기본: HEADLESS)')
  .option('--skip-report', '리포트 포털 작업을 건너뜀', false)
  .option('--skip-sync', '통합 문서 동기화를 건너뜀', false)
  .action(async (opts: RunAllCliOptions) => {
    // runAll 이전의 실패는 모두 설정 오류로 본다
    let started = false;
    try {
      const config = loadConfig(process.env);
      const joinStrategy = opts.join ? parseJoinStrategy(opts.join, '--join') : config.join.strategy;
      const headless = opts.headless ?? config.report.headless;
      const files = opts.skipSync ? [] : (opts.file ?? config.sync.files).map((file) => path.resolve(file));
      const target = opts.skipReport ? null : resolveReportTarget(config.report);
      const selectors = target ? loadPortalSelectors() : null;

      if (!opts.skipSync && files.length === 0) {
        log.warn('[run-all] 동기화할 파일이 없습니다. SYNC_FILES 또는 --file 을 지정하세요.');
      }

      const job: SyncJob = {
        resourcePaths: files,
        maxRetries: config.sync.maxRetries,
        retryDelayMs: config.sync.retryDelayMs,
        refreshIntervalMs: config.sync.refreshIntervalMs,
        hidden: config.sync.hidden,
        driver: {
          powershellPath: config.sync.powershellPath,
          callTimeoutMs: config.sync.callTimeoutMs,
        },
      };
      const orchestrator = new Orchestrator(
        { job, joinStrategy, pollIntervalMs: config.join.pollMs },
        { createSyncThread: (threadJob) => new SyncThread({ job: threadJob }) },
      );

      const onSignal = (signal: NodeJS.Signals): void => {
        log.warn(`[run-all] ${signal} 수신: 동기화 스레드를 정지합니다.`);
        orchestrator
          .stop()
          .then(() => process.exit(130))
          .catch((error: unknown) => {
            log.error(`[run-all] 정지 실패: ${log.describeError(error)}`);
            process.exit(130);
          });
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      const workflow = async (): Promise<ReportWorkflowResult | null> => {
        if (!target || !selectors) {
          log.info('[run-all] 리포트 작업 생략 (--skip-report)');
          return null;
        }
        const session = new ReportSession(
          {
            url: target.url,
            operatorId: target.operatorId,
            retry: { maxAttempts: config.report.retryCount, delayMs: config.report.retryDelayMs },
            elementTimeoutMs: config.report.elementTimeoutMs,
            settleMs: config.report.settleMs,
            callTimeoutMs: config.report.callTimeoutMs,
          },
          {
            createDriver: () => PlaywrightSessionDriver.launch({ headless }),
            bridge: new BlockingBridge(config.bridgePoolSize),
            selectors,
          },
        );
        const plan = buildDefaultPlan(
          { range: target.templateRange, value: target.templateValue },
          config.report.panelSettleMs,
        );
        return runReportWorkflow(session, plan);
      };

      started = true;
      const result = await orchestrator.runAll(files, workflow);
      const summary = formatRunSummary(result);
      const exitCode = exitCodeFor(result);
      if (exitCode === 0) {
        log.success(`[run-all] 완료 ${summary}`);
      } else {
        log.error(`[run-all] 일부 작업 실패 ${summary}`);
      }
      log.logStructured('run_all_result', {
        exitCode,
        workflow: result.workflow,
        sync: result.sync,
      });
      process.exit(exitCode);
    } catch (error) {
      log.error(`[run-all] 실행 실패: ${log.describeError(error)}`);
      process.exit(error instanceof ConfigError || !started ? EXIT_CONFIG_ERROR : EXIT_RUN_FAILED);
    }
  });

program.parse(process.argv);
