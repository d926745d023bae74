// packages/gateway/src/async-queue.ts

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (err: Error) => void;
}

/**
 * 단일 소비자 비동기 큐
 *
 * push 순서대로 next()에 전달된다. fail() 이후에도 이미 쌓인 항목은 먼저 소비되고,
 * 그다음 next()가 에러로 끝난다. end()는 정상 종료({ done: true }).
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private failure: Error | undefined;
  private ended = false;

  get size(): number {
    return this.items.length;
  }

  get finished(): boolean {
    return this.ended || this.failure !== undefined;
  }

  push(item: T): void {
    if (this.finished) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
      return;
    }
    this.items.push(item);
  }

  fail(error: Error): void {
    if (this.finished) {
      return;
    }
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  end(): void {
    if (this.finished) {
      return;
    }
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const value = this.items.shift();
      if (value !== undefined) {
        return Promise.resolve({ done: false, value });
      }
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
