export type SelectBy = 'value' | 'label';

/**
 * 원격 세션(브라우저) 드라이버. 각 호출은 완료까지 기다리는 blocking 호출이며
 * ReportSession 은 항상 BlockingBridge 를 거쳐 호출한다.
 */
export interface RemoteSessionDriver<E> {
  navigate(url: string): Promise<void>;
  /** timeoutMs 까지 polling 하며 찾고, 끝내 없으면 null */
  locateElement(selector: string, timeoutMs: number): Promise<E | null>;
  sendKeys(element: E, text: string): Promise<void>;
  press(element: E, key: string): Promise<void>;
  click(element: E): Promise<void>;
  selectOption(element: E, value: string, by: SelectBy): Promise<void>;
  /** 스크린샷/HTML 을 dir 에 저장하고 저장된 경로 목록을 돌려준다 */
  captureDebug(dir: string): Promise<string[]>;
  dispose(): Promise<void>;
}

export type PortalSelectors = {
  logon: {
    operatorIdInput: string;
    submitButton: string;
  };
  template: {
    titleSpan: string;
    rangeSelect: string;
    templateSelect: string;
    createButton: string;
  };
  panel: {
    fromDateInput: string;
    toDateInput: string;
    createReportButton: string;
  };
  tab: string;
};
