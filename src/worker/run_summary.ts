import { ReportWorkflowResult } from '../report/report_workflow';
import { ResourceOutcomeStatus } from '../sync/types';
import { RunAllResult } from './orchestrator';

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_RUN_FAILED = 2;

/** 리포트를 건너뛴 실행은 workflow 가 null */
export type RunAllOutcome = RunAllResult<ReportWorkflowResult | null>;

export function countOutcomes(result: RunAllOutcome): Record<ResourceOutcomeStatus, number> {
  const counts: Record<ResourceOutcomeStatus, number> = {
    synced: 0,
    skipped_missing: 0,
    abandoned: 0,
    not_started: 0,
  };
  for (const outcome of result.sync.summary?.outcomes ?? []) {
    counts[outcome.status] += 1;
  }
  return counts;
}

export function exitCodeFor(result: RunAllOutcome): number {
  if (result.workflow && !result.workflow.ok) return EXIT_RUN_FAILED;
  if (!result.sync.summary || result.sync.error) return EXIT_RUN_FAILED;
  if (countOutcomes(result).abandoned > 0) return EXIT_RUN_FAILED;
  return EXIT_OK;
}

export function formatRunSummary(result: RunAllOutcome): string {
  const counts = countOutcomes(result);
  const report = result.workflow
    ? result.workflow.ok
      ? 'ok'
      : `failed(${result.workflow.failedOperation ?? 'workflow'})`
    : 'skipped';
  const sync = result.sync.summary
    ? `synced=${counts.synced} missing=${counts.skipped_missing} abandoned=${counts.abandoned} not_started=${counts.not_started}`
    : `failed(${result.sync.error ?? `exitCode=${result.sync.exitCode}`})`;
  return `report=${report} sync: ${sync}`;
}
