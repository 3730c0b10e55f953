// unbounded fifo with a single consumer
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: ((item: T) => void)[] = [];

  get size() {
    return this.items.length;
  }

  push(item: T) {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  shift(): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    return new Promise<T>((resolve) => this.waiters.push(resolve));
  }

  // take everything that is already queued without waiting
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }
}

// first post wins, later posts are ignored
export class CompletionSlot<T> {
  private posted = false;
  private resolveValue: (value: T) => void = () => {};
  readonly value: Promise<T> = new Promise<T>((resolve) => {
    this.resolveValue = resolve;
  });

  get isPosted() {
    return this.posted;
  }

  post(value: T): boolean {
    if (this.posted) {
      return false;
    }
    this.posted = true;
    this.resolveValue(value);
    return true;
  }
}
