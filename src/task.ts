export type Direction = "c2k" | "k2c";

export type TaskKind = "accept" | Direction;

export interface Task {
  readonly id: number;
  readonly kind: TaskKind;
  // name of the relay port the task belongs to
  readonly relay: string;
  cancel(): void;
  // resolves once the task has fully stopped
  readonly settled: Promise<void>;
}

export type SessionEvent =
  | { type: "task_start"; task: Task }
  | { type: "task_end"; task: Task }
  | { type: "exit"; status: number };

export interface EventSink {
  push(event: SessionEvent): void;
}

// auto increment id
let lastTaskId = 0;
const nextTaskId = () => ++lastTaskId;

export class TaskHandle implements Task {
  readonly id = nextTaskId();
  private readonly controller = new AbortController();
  private resolveSettled: () => void = () => {};
  readonly settled = new Promise<void>((resolve) => {
    this.resolveSettled = resolve;
  });

  constructor(readonly kind: TaskKind, readonly relay: string) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled() {
    return this.controller.signal.aborted;
  }

  cancel() {
    this.controller.abort();
  }

  finish() {
    this.resolveSettled();
  }

  toString() {
    return `${this.relay}/${this.kind}#${this.id}`;
  }
}

export function whenCancelled(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) =>
    signal.addEventListener("abort", () => resolve(), { once: true })
  );
}

export class CancelledError extends Error {
  constructor(message = "task cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function throwIfCancelled(signal: AbortSignal) {
  if (signal.aborted) {
    throw new CancelledError();
  }
}
