import * as log from '../utils/logger';
import { OperationExhaustedError, sleep } from '../common/retry';
import { ReportSession, SessionState, SessionStateError, TemplateChoice } from './report_session';

export type PanelStep = {
  panel: string;
  /** 패널 전에 선택할 탭 (없으면 현재 탭) */
  tab?: string;
};

export type ReportPlan = {
  template: TemplateChoice;
  start: Date;
  end: Date;
  panels: PanelStep[];
  panelSettleMs: number;
};

export type ReportWorkflowResult = {
  ok: boolean;
  state: SessionState;
  failedOperation?: string;
  error?: string;
  debugDir?: string;
};

export function buildDefaultPlan(template: TemplateChoice, panelSettleMs: number, today: Date = new Date()): ReportPlan {
  return {
    template,
    start: today,
    end: today,
    panels: [{ panel: '0' }, { tab: '2', panel: '1' }],
    panelSettleMs,
  };
}

function failedOperationOf(error: unknown): string | undefined {
  if (error instanceof OperationExhaustedError || error instanceof SessionStateError) {
    return error.operation;
  }
  return undefined;
}

export async function runReportWorkflow<E>(
  session: ReportSession<E>,
  plan: ReportPlan,
  deps: Partial<{ sleep: (ms: number) => Promise<void>; logger: log.ModuleLogger }> = {},
): Promise<ReportWorkflowResult> {
  const wait = deps.sleep ?? sleep;
  const logger = deps.logger ?? log.forModule('report');
  const total = 3 + plan.panels.length;
  let current = 0;

  try {
    logger.step(++current, total, '브라우저 세션 시작');
    await session.open();
    logger.step(++current, total, '로그인');
    await session.login();
    logger.step(++current, total, `템플릿 선택 range=${plan.template.range}`);
    await session.selectTemplate(plan.template);

    for (const step of plan.panels) {
      logger.step(++current, total, `패널 ${step.panel} 리포트 작성`);
      if (step.tab !== undefined) {
        await session.selectTab(step.tab);
      }
      await session.filterByDate(plan.start, plan.end, step.panel);
      await wait(plan.panelSettleMs);
    }

    logger.success('[report] 리포트 작업 완료');
    const state = session.getState();
    await session.close();
    return { ok: true, state };
  } catch (error) {
    const message = log.describeError(error);
    const failedOperation = failedOperationOf(error);
    logger.error(`[report] 리포트 작업 실패${failedOperation ? ` operation=${failedOperation}` : ''}: ${message}`);
    const debugDir = await session.captureDebug(failedOperation ?? 'workflow');
    const state = session.getState();
    await session.close();
    return {
      ok: false,
      state,
      error: message,
      ...(failedOperation ? { failedOperation } : {}),
      ...(debugDir ? { debugDir } : {}),
    };
  }
}
