import * as fs from 'fs';
import * as path from 'path';

import { PortalSelectors } from './driver';

export function defaultSelectorsPath(): string {
  return path.resolve(__dirname, '../../config/portal_selectors.json');
}

function readString(source: Record<string, unknown>, key: string, where: string): string {
  const value = source[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`[selectors] ${where}.${key} 누락 또는 빈 값`);
  }
  return value;
}

function readSection(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`[selectors] ${key} 섹션이 없습니다`);
  }
  return Object.fromEntries(Object.entries(value));
}

export function parsePortalSelectors(raw: unknown): PortalSelectors {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('[selectors] root must be an object');
  }
  const root: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const logon = readSection(root, 'logon');
  const template = readSection(root, 'template');
  const panel = readSection(root, 'panel');
  return {
    logon: {
      operatorIdInput: readString(logon, 'operatorIdInput', 'logon'),
      submitButton: readString(logon, 'submitButton', 'logon'),
    },
    template: {
      titleSpan: readString(template, 'titleSpan', 'template'),
      rangeSelect: readString(template, 'rangeSelect', 'template'),
      templateSelect: readString(template, 'templateSelect', 'template'),
      createButton: readString(template, 'createButton', 'template'),
    },
    panel: {
      fromDateInput: readString(panel, 'fromDateInput', 'panel'),
      toDateInput: readString(panel, 'toDateInput', 'panel'),
      createReportButton: readString(panel, 'createReportButton', 'panel'),
    },
    tab: readString(root, 'tab', 'root'),
  };
}

export function loadPortalSelectors(filePath: string = defaultSelectorsPath()): PortalSelectors {
  return parsePortalSelectors(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}

/** "#panel-td-input-from-date-{panel}" 같은 패턴의 {name} 을 치환한다 */
export function fillSelector(pattern: string, values: Record<string, string>): string {
  return pattern.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match);
}
