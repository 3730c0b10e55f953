import { AsyncQueue } from "./channel";
import type { Logger } from "./logger";
import type { EventSink, SessionEvent, Task } from "./task";

/**
 * Auto-exit only happens once at least this many tasks were live at the same
 * time. A relayed connection holds three tasks (accept, c2k, k2c), so this takes
 * a client with several channels open. Before that an empty task set means the
 * client has not really connected yet.
 */
export const TRAFFIC_THRESHOLD = 10;

export interface RelayEndpoint {
  readonly name: string;
  start(events: EventSink): Promise<void>;
  stop(): void;
}

export type SessionState = "init" | "running" | "draining" | "done";

export class SessionCoordinator {
  private readonly events = new AsyncQueue<SessionEvent>();
  private readonly tasks = new Map<number, Task>();
  private highWater = 0;
  private _state: SessionState = "init";

  constructor(
    private readonly relayPorts: RelayEndpoint[],
    private readonly logger: Logger
  ) {}

  get state() {
    return this._state;
  }

  get liveTasks() {
    return this.tasks.size;
  }

  get highWaterMark() {
    return this.highWater;
  }

  // the shared channel every relay port reports to
  get sink(): EventSink {
    return this.events;
  }

  requestExit(status: number) {
    this.events.push({ type: "exit", status });
  }

  // resolves with the process exit status
  async run(): Promise<number> {
    try {
      for (const port of this.relayPorts) {
        await port.start(this.events);
      }
    } catch (err) {
      this._state = "draining";
      await this.shutdown();
      throw err;
    }
    this._state = "running";

    let exitStatus: number | undefined;
    while (exitStatus === undefined) {
      exitStatus = this.handle(await this.events.shift());
    }

    this._state = "draining";
    this.logger.log(
      1,
      `shutting down with exit_status=${exitStatus}, ${this.tasks.size} tasks still running`
    );
    await this.shutdown();
    return exitStatus;
  }

  // returns an exit status when the session should end
  handle(event: SessionEvent): number | undefined {
    switch (event.type) {
      case "task_start":
        this.tasks.set(event.task.id, event.task);
        this.highWater = Math.max(this.highWater, this.tasks.size);
        return undefined;
      case "task_end":
        this.tasks.delete(event.task.id);
        // all connections are closed after real traffic: the client is done
        if (this.tasks.size === 0 && this.highWater >= TRAFFIC_THRESHOLD) {
          return 0;
        }
        return undefined;
      case "exit":
        return event.status;
    }
  }

  private async shutdown() {
    for (const port of this.relayPorts) {
      port.stop();
    }

    // tasks whose start is still queued must be cancelled too
    this.absorb(this.events.drain());
    const live = [...this.tasks.values()];
    for (const task of live) {
      task.cancel();
    }
    await Promise.all(live.map((task) => task.settled));
    this.absorb(this.events.drain());
    this._state = "done";
  }

  // fold queued events into the task set; exit requests are moot by now
  private absorb(events: SessionEvent[]) {
    for (const event of events) {
      if (event.type === "task_start") {
        this.tasks.set(event.task.id, event.task);
      } else if (event.type === "task_end") {
        this.tasks.delete(event.task.id);
      }
    }
  }
}
