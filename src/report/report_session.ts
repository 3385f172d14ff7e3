import * as log from '../utils/logger';
import { BlockingBridge, BridgeTimeoutError, withTimeout } from '../common/blocking_bridge';
import { createReportDebugDir } from '../common/debug_paths';
import { OperationExhaustedError, sleep, withRetry } from '../common/retry';
import { PortalSelectors, RemoteSessionDriver } from './driver';
import { fillSelector } from './selectors';

export type SessionState =
  | 'NotStarted'
  | 'Ready'
  | 'LoggedIn'
  | 'TemplateSelected'
  | 'DateFiltered'
  | 'Closed'
  | 'Failed';

export class SessionStepError extends Error {
  readonly operation: string;
  readonly detail: unknown;

  constructor(operation: string, message: string, detail?: unknown) {
    super(`[SESSION_STEP_FAILED] operation=${operation} ${message}`);
    this.name = 'SessionStepError';
    this.operation = operation;
    this.detail = detail;
  }
}

export class ElementNotFoundError extends SessionStepError {
  readonly selector: string;

  constructor(operation: string, selector: string) {
    super(operation, `element not found: ${selector}`);
    this.name = 'ElementNotFoundError';
    this.selector = selector;
  }
}

export class DriverLaunchError extends Error {
  readonly detail: unknown;

  constructor(detail: unknown) {
    super(`[DRIVER_LAUNCH_FAILED] ${log.describeError(detail)}`);
    this.name = 'DriverLaunchError';
    this.detail = detail;
  }
}

/** 현재 상태에서 허용되지 않는 조작. 재시도하지 않고 그대로 전파된다. */
export class SessionStateError extends Error {
  readonly operation: string;
  readonly state: SessionState;

  constructor(operation: string, state: SessionState) {
    super(`[SESSION_STATE_INVALID] operation=${operation} state=${state}`);
    this.name = 'SessionStateError';
    this.operation = operation;
    this.state = state;
  }
}

export type TemplateChoice = {
  /** 다운로드 범위 select 의 표시 텍스트 */
  range: string;
  /** 템플릿 select 의 value */
  value: string;
};

export type ReportSessionConfig = {
  url: string;
  operatorId: string;
  retry: { maxAttempts: number; delayMs: number };
  elementTimeoutMs: number;
  settleMs: number;
  callTimeoutMs: number;
};

export type ReportSessionDependencies<E> = {
  createDriver: () => Promise<RemoteSessionDriver<E>>;
  bridge: BlockingBridge;
  selectors: PortalSelectors;
  sleep: (ms: number) => Promise<void>;
  logger: log.ModuleLogger;
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatPortalDate(date: Date): string {
  return `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())}`;
}

function isStepError(error: unknown): boolean {
  return error instanceof SessionStepError;
}

function isLaunchError(error: unknown): boolean {
  return error instanceof DriverLaunchError;
}

/**
 * 리포트 포털 세션. 공개 조작은 모두 withRetry 로 감싼 함수이며, 드라이버 호출은 BlockingBridge 를 거친다.
 *
 * NotStarted → Ready(open) → LoggedIn(login) → TemplateSelected(selectTemplate) → DateFiltered(filterByDate)
 * 어느 조작이든 최종 실패하면 Failed 로 가고, Failed 에서는 close() 만 허용된다.
 */
export class ReportSession<E> {
  readonly open: () => Promise<void>;
  readonly login: () => Promise<void>;
  readonly selectTemplate: (template: TemplateChoice) => Promise<void>;
  readonly filterByDate: (start: Date, end: Date, panel: string) => Promise<void>;
  readonly selectTab: (tab: string) => Promise<void>;

  private readonly config: ReportSessionConfig;
  private readonly deps: ReportSessionDependencies<E>;
  private readonly log: log.ModuleLogger;
  private state: SessionState = 'NotStarted';
  private driver: RemoteSessionDriver<E> | null = null;

  constructor(config: ReportSessionConfig, deps: Partial<ReportSessionDependencies<E>> & Pick<ReportSessionDependencies<E>, 'createDriver' | 'selectors'>) {
    this.config = {
      ...config,
      // locate 의 polling 이 끝나기 전에 bridge timeout 이 먼저 터지지 않도록
      callTimeoutMs: Math.max(config.callTimeoutMs, config.elementTimeoutMs + 1_000),
    };
    this.deps = {
      bridge: deps.bridge ?? new BlockingBridge(),
      sleep: deps.sleep ?? sleep,
      logger: deps.logger ?? log.forModule('report'),
      createDriver: deps.createDriver,
      selectors: deps.selectors,
    };
    this.log = this.deps.logger;

    const live: SessionState[] = ['LoggedIn', 'TemplateSelected', 'DateFiltered'];
    this.open = this.compose('open', ['NotStarted'], 'Ready', isLaunchError, () => this.openOnce());
    this.login = this.compose('login', ['Ready'], 'LoggedIn', isStepError, () => this.loginOnce());
    this.selectTemplate = this.compose(
      'selectTemplate',
      live,
      'TemplateSelected',
      isStepError,
      (template: TemplateChoice) => this.selectTemplateOnce(template),
    );
    this.filterByDate = this.compose(
      'filterByDate',
      ['TemplateSelected', 'DateFiltered'],
      'DateFiltered',
      isStepError,
      (start: Date, end: Date, panel: string) => this.filterByDateOnce(start, end, panel),
    );
    this.selectTab = this.compose(
      'selectTab',
      ['TemplateSelected', 'DateFiltered'],
      null,
      isStepError,
      (tab: string) => this.selectTabOnce(tab),
    );
  }

  getState(): SessionState {
    return this.state;
  }

  /** 실패 분석용 스크린샷/HTML. 실패해도 throw 하지 않는다. */
  async captureDebug(stage: string): Promise<string | null> {
    const driver = this.driver;
    if (!driver) return null;
    try {
      const dir = createReportDebugDir(stage);
      const saved = await this.call('captureDebug', () => driver.captureDebug(dir));
      this.log.info(`[report] debug artifacts saved dir=${dir} files=${saved.length}`);
      return dir;
    } catch (error) {
      this.log.warn(`[report] debug artifact 저장 실패: ${log.describeError(error)}`);
      return null;
    }
  }

  /** 어떤 상태에서든 호출 가능하며 여러 번 호출해도 안전하다. */
  async close(): Promise<void> {
    if (this.state === 'Closed') return;
    const driver = this.driver;
    this.driver = null;
    this.state = 'Closed';
    if (!driver) return;
    try {
      await this.call('dispose', () => driver.dispose());
      this.log.info('[report] 드라이버를 정상적으로 닫았습니다.');
    } catch (error) {
      this.log.error(`[report] 드라이버 종료 실패: ${log.describeError(error)}`);
    }
  }

  private compose<A extends unknown[]>(
    name: string,
    allowed: SessionState[],
    next: SessionState | null,
    retryOn: (error: unknown) => boolean,
    body: (...args: A) => Promise<void>,
  ): (...args: A) => Promise<void> {
    const retried = withRetry(body, {
      name,
      maxAttempts: this.config.retry.maxAttempts,
      delayMs: this.config.retry.delayMs,
      retryOn,
      sleep: this.deps.sleep,
      logger: this.log,
    });
    return async (...args: A): Promise<void> => {
      if (!allowed.includes(this.state)) {
        throw new SessionStateError(name, this.state);
      }
      try {
        await retried(...args);
      } catch (error) {
        this.state = 'Failed';
        if (error instanceof OperationExhaustedError) {
          this.log.error(`[report] ${name} 최종 실패 → state=Failed`);
        }
        throw error;
      }
      if (next) this.state = next;
    };
  }

  private call<R>(label: string, fn: () => Promise<R>): Promise<R> {
    return withTimeout(this.deps.bridge.runBlocking(fn, []), this.config.callTimeoutMs, label);
  }

  private requireDriver(operation: string): RemoteSessionDriver<E> {
    if (!this.driver) {
      throw new SessionStepError(operation, 'driver is not open');
    }
    return this.driver;
  }

  /** 드라이버 실패를 모두 재시도 대상(SessionStepError)으로 감싼다 */
  private async step(operation: string, fn: (driver: RemoteSessionDriver<E>) => Promise<void>): Promise<void> {
    const driver = this.requireDriver(operation);
    try {
      await fn(driver);
    } catch (error) {
      if (error instanceof SessionStepError) throw error;
      throw new SessionStepError(operation, log.describeError(error), error);
    }
  }

  private async find(operation: string, driver: RemoteSessionDriver<E>, selector: string): Promise<E> {
    const element = await this.call(`locate ${selector}`, () => driver.locateElement(selector, this.config.elementTimeoutMs));
    if (element === null) {
      this.log.error(`[report] 요소를 찾을 수 없음 selector=${selector}`);
      throw new ElementNotFoundError(operation, selector);
    }
    return element;
  }

  private async clearAndType(driver: RemoteSessionDriver<E>, element: E, text: string): Promise<void> {
    await this.call('press Control+A', () => driver.press(element, 'Control+A'));
    await this.call('press Delete', () => driver.press(element, 'Delete'));
    await this.call('sendKeys', () => driver.sendKeys(element, text));
  }

  private async openOnce(): Promise<void> {
    const previous = this.driver;
    if (previous) {
      this.driver = null;
      await this.call('dispose', () => previous.dispose()).catch((error: unknown) => {
        this.log.warn(`[report] 이전 드라이버 종료 실패: ${log.describeError(error)}`);
      });
    }
    const launching = this.deps.bridge.runBlocking(() => this.deps.createDriver(), []);
    try {
      this.driver = await withTimeout(launching, this.config.callTimeoutMs, 'createDriver');
    } catch (error) {
      if (error instanceof BridgeTimeoutError) {
        this.disposeLateDriver(launching);
      }
      this.log.error(`[report] 드라이버 생성 실패: ${log.describeError(error)}`);
      throw new DriverLaunchError(error);
    }
    this.log.info('[report] 드라이버를 생성했습니다.');
  }

  /** 시간 초과로 버린 createDriver 가 나중에 끝나면 그 드라이버를 닫는다 */
  private disposeLateDriver(launching: Promise<RemoteSessionDriver<E>>): void {
    launching
      .then((late) => this.call('dispose', () => late.dispose()))
      .then(() => {
        this.log.info('[report] 시간 초과 후 생성된 드라이버를 종료했습니다.');
      })
      .catch((error: unknown) => {
        this.log.warn(`[report] 시간 초과된 드라이버 생성/종료 실패: ${log.describeError(error)}`);
      });
  }

  private async loginOnce(): Promise<void> {
    const selectors = this.deps.selectors.logon;
    await this.step('login', async (driver) => {
      await this.call('navigate', () => driver.navigate(this.config.url));
      this.log.info(`[report] URL 접속 url=${this.config.url}`);

      const idInput = await this.find('login', driver, selectors.operatorIdInput);
      await this.call('sendKeys', () => driver.sendKeys(idInput, this.config.operatorId));
      this.log.info('[report] operator id 입력 완료');

      const submit = await this.find('login', driver, selectors.submitButton);
      await this.call('click', () => driver.click(submit));
      this.log.info('[report] 로그인 버튼 클릭');
      await this.deps.sleep(this.config.settleMs);
    });
  }

  private async selectTemplateOnce(template: TemplateChoice): Promise<void> {
    const selectors = this.deps.selectors.template;
    await this.step('selectTemplate', async (driver) => {
      const title = await this.find('selectTemplate', driver, selectors.titleSpan);
      await this.call('click', () => driver.click(title));

      const range = await this.find('selectTemplate', driver, selectors.rangeSelect);
      await this.call('selectOption', () => driver.selectOption(range, template.range, 'label'));
      this.log.info(`[report] 다운로드 범위 '${template.range}' 선택`);

      const templateSelect = await this.find('selectTemplate', driver, selectors.templateSelect);
      await this.call('selectOption', () => driver.selectOption(templateSelect, template.value, 'value'));
      this.log.info(`[report] 템플릿 '${template.value}' 선택`);

      const create = await this.find('selectTemplate', driver, selectors.createButton);
      await this.call('click', () => driver.click(create));
      this.log.info('[report] 템플릿 작성 버튼 클릭');
      await this.deps.sleep(this.config.settleMs);
    });
  }

  private async filterByDateOnce(start: Date, end: Date, panel: string): Promise<void> {
    const selectors = this.deps.selectors.panel;
    await this.step('filterByDate', async (driver) => {
      const from = await this.find('filterByDate', driver, fillSelector(selectors.fromDateInput, { panel }));
      await this.clearAndType(driver, from, formatPortalDate(start));
      this.log.info(`[report] panel=${panel} 시작일 ${formatPortalDate(start)}`);

      const to = await this.find('filterByDate', driver, fillSelector(selectors.toDateInput, { panel }));
      await this.clearAndType(driver, to, formatPortalDate(end));
      this.log.info(`[report] panel=${panel} 종료일 ${formatPortalDate(end)}`);

      const create = await this.find('filterByDate', driver, fillSelector(selectors.createReportButton, { panel }));
      await this.call('click', () => driver.click(create));
      this.log.info(`[report] panel=${panel} 리포트 작성 버튼 클릭`);
      await this.deps.sleep(this.config.settleMs);
    });
  }

  private async selectTabOnce(tab: string): Promise<void> {
    await this.step('selectTab', async (driver) => {
      const selector = fillSelector(this.deps.selectors.tab, { tab });
      const element = await this.find('selectTab', driver, selector);
      await this.call('click', () => driver.click(element));
      this.log.info(`[report] 탭 선택 ${selector}`);
      await this.deps.sleep(this.config.settleMs);
    });
  }
}
