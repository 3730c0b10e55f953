import net from "net";
import { CompletionSlot } from "./channel";
import { dial } from "./dialer";
import type { Dialer } from "./dialer";
import { forwardData } from "./forward";
import type { Logger } from "./logger";
import { describeError, stackOf } from "./logger";
import { CancelledError, TaskHandle, whenCancelled } from "./task";
import type { Direction, EventSink } from "./task";

// flush whatever is still queued, then close
function closeSocket(socket: net.Socket) {
  if (!socket.destroyed) {
    socket.end(() => socket.destroy());
  }
}

export interface RelayPortOptions {
  name: string;
  // where the jupyter client connects to
  clientHost: string;
  clientPort: number;
  // where the remote kernel listens
  kernelHost: string;
  kernelPort: number;
  dialer: Dialer;
  logger: Logger;
}

export class RelayPort {
  readonly name: string;
  readonly clientHost: string;
  readonly clientPort: number;
  readonly kernelHost: string;
  readonly kernelPort: number;
  private readonly dialer: Dialer;
  private readonly logger: Logger;
  private server: net.Server | undefined;

  constructor(options: RelayPortOptions) {
    this.name = options.name;
    this.clientHost = options.clientHost;
    this.clientPort = options.clientPort;
    this.kernelHost = options.kernelHost;
    this.kernelPort = options.kernelPort;
    this.dialer = options.dialer;
    this.logger = options.logger;
  }

  get listening() {
    return this.server !== undefined;
  }

  // bound address, useful when listening on port 0
  get address(): net.AddressInfo | undefined {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : undefined;
  }

  async start(events: EventSink): Promise<void> {
    if (this.server) {
      return;
    }
    const server = net.createServer({ keepAlive: true });
    server.on("connection", (socket) => {
      this.handleConnection(socket, events).catch((err: unknown) => {
        this.logger.error(
          `${this.name} client_connected got exception ${stackOf(err)}`
        );
      });
    });

    this.logger.log(
      3,
      `${this.name} listening for jupyter client at ${this.clientHost}:${this.clientPort}`
    );
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.clientPort, this.clientHost, () => {
        server.off("error", reject);
        resolve();
      });
    });
    server.on("error", (err) => {
      this.logger.error(`${this.name} server error: ${err.message}`);
    });
    this.server = server;
  }

  // established connections drain on their own
  stop() {
    if (this.server) {
      this.server.close();
      this.server = undefined;
    }
  }

  private async handleConnection(client: net.Socket, events: EventSink) {
    const session = new TaskHandle("accept", this.name);
    events.push({ type: "task_start", task: session });
    client.setNoDelay(true);
    client.on("error", (err) => {
      this.logger.log(3, `${this.name} client socket error: ${err.message}`);
    });

    let kernel: net.Socket | undefined;
    let forwarders: TaskHandle[] = [];
    let exitStatus: number | undefined;
    try {
      this.logger.log(
        3,
        `${this.name} connected to jupyter client; now trying pyscript kernel ${this.dialer.description} at ${this.kernelHost}:${this.kernelPort}`
      );
      kernel = await dial(
        this.dialer,
        this.kernelHost,
        this.kernelPort,
        session.signal
      );
      kernel.on("error", (err) => {
        this.logger.log(3, `${this.name} kernel socket error: ${err.message}`);
      });
      this.logger.log(
        3,
        `${this.name} pyscript kernel connected at ${this.kernelHost}:${this.kernelPort}`
      );

      // whichever direction finishes first decides the exit status
      const completion = new CompletionSlot<number>();
      const c2k = new TaskHandle("c2k", this.name);
      const k2c = new TaskHandle("k2c", this.name);
      forwarders = [c2k, k2c];
      const running = [
        this.runForwarder(c2k, "c2k", client, kernel, completion, 0),
        this.runForwarder(k2c, "k2c", kernel, client, completion, 1),
      ];
      for (const task of forwarders) {
        events.push({ type: "task_start", task });
      }

      exitStatus = await Promise.race([
        completion.value,
        whenCancelled(session.signal).then(() => undefined),
      ]);
      this.logger.log(
        3,
        `${this.name} shutting down connections (exit_status=${exitStatus ?? "cancelled"})`
      );
      for (const task of forwarders) {
        task.cancel();
      }
      await Promise.all(running);
    } catch (err) {
      if (!(err instanceof CancelledError)) {
        this.logger.error(
          `${this.name} client_connected got exception ${describeError(err)}`
        );
      }
    } finally {
      closeSocket(client);
      if (kernel) {
        closeSocket(kernel);
      }
      for (const task of [session, ...forwarders]) {
        events.push({ type: "task_end", task });
      }
      session.finish();
      if (exitStatus) {
        events.push({ type: "exit", status: exitStatus });
      }
    }
  }

  private runForwarder(
    task: TaskHandle,
    direction: Direction,
    source: net.Socket,
    sink: net.Socket,
    completion: CompletionSlot<number>,
    exitStatus: number
  ): Promise<void> {
    return forwardData({
      name: this.name,
      direction,
      source,
      sink,
      completion,
      exitStatus,
      signal: task.signal,
      logger: this.logger,
    })
      .catch((err: unknown) => {
        if (!(err instanceof CancelledError)) {
          this.logger.error(`${this.name} ${task} failed: ${describeError(err)}`);
        }
      })
      .finally(() => task.finish());
  }
}
