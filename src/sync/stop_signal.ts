const STOP_INDEX = 0;

/**
 * 스레드 경계를 넘는 유일한 공유 상태. SharedArrayBuffer 위의 Int32 한 칸이며 한번 set 되면 해제되지 않는다.
 * worker 는 리소스 사이(안전 지점)에서만 isSet() 을 확인한다.
 */
export class StopSignal {
  readonly buffer: SharedArrayBuffer;
  private readonly cell: Int32Array;

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.buffer = buffer;
    this.cell = new Int32Array(buffer);
  }

  static fromBuffer(buffer: SharedArrayBuffer): StopSignal {
    return new StopSignal(buffer);
  }

  /** 이미 set 상태였으면 false */
  set(): boolean {
    return Atomics.compareExchange(this.cell, STOP_INDEX, 0, 1) === 0;
  }

  isSet(): boolean {
    return Atomics.load(this.cell, STOP_INDEX) === 1;
  }
}

const sleepCell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

/** 현재 스레드를 ms 동안 막는다. worker thread 의 동기 루프 전용. */
export function sleepSync(ms: number): void {
  if (ms <= 0) return;
  Atomics.wait(sleepCell, 0, 0, ms);
}
