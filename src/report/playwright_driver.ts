import * as fs from 'fs';
import * as path from 'path';
import { chromium } from 'playwright';

import { RemoteSessionDriver, SelectBy } from './driver';

/** PlaywrightSessionDriver 가 쓰는 Page 의 부분집합 (테스트에서 fake 로 대체 가능) */
export interface PortalPage {
  goto(url: string, options?: { waitUntil?: 'load' | 'domcontentloaded'; timeout?: number }): Promise<unknown>;
  $(selector: string): Promise<PortalElement | null>;
  screenshot(options: { path: string; fullPage?: boolean }): Promise<unknown>;
  content(): Promise<string>;
}

export interface PortalElement {
  type(text: string): Promise<void>;
  press(key: string): Promise<void>;
  click(): Promise<void>;
  selectOption(values: { value?: string; label?: string }): Promise<string[]>;
}

export type PlaywrightLaunchOptions = {
  headless: boolean;
  slowMo?: number;
  launchTimeoutMs?: number;
  navigationTimeoutMs?: number;
};

const DEFAULT_POLL_MS = 1000;
const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class PlaywrightSessionDriver implements RemoteSessionDriver<PortalElement> {
  private readonly page: PortalPage;
  private readonly closeBrowser: () => Promise<void>;
  private readonly pollMs: number;
  private readonly navigationTimeoutMs: number;
  private disposed = false;

  constructor(
    page: PortalPage,
    closeBrowser: () => Promise<void>,
    opts: { pollMs?: number; navigationTimeoutMs?: number } = {},
  ) {
    this.page = page;
    this.closeBrowser = closeBrowser;
    this.pollMs = Math.max(1, opts.pollMs ?? DEFAULT_POLL_MS);
    this.navigationTimeoutMs = opts.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
  }

  static async launch(opts: PlaywrightLaunchOptions): Promise<PlaywrightSessionDriver> {
    const browser = await chromium.launch({
      headless: opts.headless,
      slowMo: opts.slowMo ?? 0,
      timeout: opts.launchTimeoutMs ?? 20_000,
      args: [
        '--disable-blink-features=AutomationControlled',
        '--disable-extensions',
        '--disable-gpu',
        '--disable-dev-shm-usage',
        '--no-sandbox',
      ],
    });
    try {
      const context = await browser.newContext({ viewport: { width: 1400, height: 900 } });
      const page = await context.newPage();
      return new PlaywrightSessionDriver(page, () => browser.close(), {
        navigationTimeoutMs: opts.navigationTimeoutMs,
      });
    } catch (error) {
      await browser.close().catch(() => undefined);
      throw error;
    }
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
  }

  async locateElement(selector: string, timeoutMs: number): Promise<PortalElement | null> {
    const deadline = Date.now() + Math.max(0, timeoutMs);
    while (true) {
      const element = await this.page.$(selector);
      if (element) return element;
      const remaining = deadline - Date.now();
      if (remaining <= 0) return null;
      await wait(Math.min(this.pollMs, remaining));
    }
  }

  async sendKeys(element: PortalElement, text: string): Promise<void> {
    await element.type(text);
  }

  async press(element: PortalElement, key: string): Promise<void> {
    await element.press(key);
  }

  async click(element: PortalElement): Promise<void> {
    await element.click();
  }

  async selectOption(element: PortalElement, value: string, by: SelectBy): Promise<void> {
    const selected = await element.selectOption(by === 'label' ? { label: value } : { value });
    if (selected.length === 0) {
      throw new Error(`option not selected: ${by}=${value}`);
    }
  }

  async captureDebug(dir: string): Promise<string[]> {
    fs.mkdirSync(dir, { recursive: true });
    const saved: string[] = [];
    const screenshotPath = path.join(dir, '01_page.png');
    try {
      await this.page.screenshot({ path: screenshotPath, fullPage: true });
      saved.push(screenshotPath);
    } catch {
      // page may already be gone
    }
    try {
      const htmlPath = path.join(dir, '02_page.html');
      fs.writeFileSync(htmlPath, await this.page.content(), 'utf-8');
      saved.push(htmlPath);
    } catch {
      // page may already be gone
    }
    return saved;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.closeBrowser();
  }
}
