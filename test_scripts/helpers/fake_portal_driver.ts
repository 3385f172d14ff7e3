import * as path from 'path';

import { RemoteSessionDriver, SelectBy } from '../../src/report/driver';

/** 요소 핸들을 selector 문자열로 대신하는 드라이버 */
export class FakePortalDriver implements RemoteSessionDriver<string> {
  readonly calls: string[] = [];
  readonly missing = new Set<string>();
  disposeCount = 0;
  failClick: (selector: string) => boolean = () => false;
  failDispose = false;
  hangNavigation = false;

  async navigate(url: string): Promise<void> {
    if (this.hangNavigation) {
      await new Promise<void>(() => undefined);
    }
    this.calls.push(`navigate:${url}`);
  }

  async locateElement(selector: string): Promise<string | null> {
    return this.missing.has(selector) ? null : selector;
  }

  async sendKeys(element: string, text: string): Promise<void> {
    this.calls.push(`type:${element}=${text}`);
  }

  async press(element: string, key: string): Promise<void> {
    this.calls.push(`press:${element}=${key}`);
  }

  async click(element: string): Promise<void> {
    if (this.failClick(element)) {
      throw new Error(`element is not clickable: ${element}`);
    }
    this.calls.push(`click:${element}`);
  }

  async selectOption(element: string, value: string, by: SelectBy): Promise<void> {
    this.calls.push(`select:${element}=${by}:${value}`);
  }

  async captureDebug(dir: string): Promise<string[]> {
    this.calls.push('captureDebug');
    return [path.join(dir, '01_page.png')];
  }

  async dispose(): Promise<void> {
    this.disposeCount += 1;
    if (this.failDispose) throw new Error('browser already closed');
  }
}
