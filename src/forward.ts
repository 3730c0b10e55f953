import type { CompletionSlot } from "./channel";
import type { Logger } from "./logger";
import { describeError } from "./logger";
import { CancelledError, throwIfCancelled } from "./task";
import type { Direction } from "./task";

// max bytes taken from the source per iteration
export const CHUNK_SIZE = 8192;

// pulls at most CHUNK_SIZE bytes at a time; the source stays paused while data waits
export class ChunkReader {
  private readonly chunks: Buffer[] = [];
  private ended = false;
  private error: Error | undefined;
  private wake: (() => void) | undefined;

  constructor(private readonly source: NodeJS.ReadableStream) {
    source.on("data", this.onData);
    source.on("end", this.onEnd);
    source.on("close", this.onEnd);
    source.on("error", this.onError);
  }

  private readonly onData = (data: Buffer | string) => {
    this.chunks.push(Buffer.isBuffer(data) ? data : Buffer.from(data));
    this.source.pause();
    this.notify();
  };

  private readonly onEnd = () => {
    this.ended = true;
    this.notify();
  };

  private readonly onError = (err: Error) => {
    this.error = err;
    this.notify();
  };

  private notify() {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  private take(): Buffer | undefined {
    const head = this.chunks[0];
    if (head === undefined) {
      return undefined;
    }
    if (head.length <= CHUNK_SIZE) {
      this.chunks.shift();
      return head;
    }
    this.chunks[0] = head.subarray(CHUNK_SIZE);
    return head.subarray(0, CHUNK_SIZE);
  }

  // next chunk, or null on end-of-stream
  async read(signal: AbortSignal): Promise<Buffer | null> {
    for (;;) {
      throwIfCancelled(signal);
      const chunk = this.take();
      if (chunk) {
        return chunk;
      }
      if (this.error) {
        throw this.error;
      }
      if (this.ended) {
        return null;
      }
      this.source.resume();
      await this.waitForEvent(signal);
    }
  }

  private waitForEvent(signal: AbortSignal) {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.wake = undefined;
        reject(new CancelledError());
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.wake = () => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      };
    });
  }

  close() {
    this.source.removeListener("data", this.onData);
    this.source.removeListener("end", this.onEnd);
    this.source.removeListener("close", this.onEnd);
    this.source.removeListener("error", this.onError);
  }
}

// resolves once the sink has taken the chunk, i.e. from the write callback
export function writeChunk(
  sink: NodeJS.WritableStream,
  data: Buffer,
  signal: AbortSignal
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    throwIfCancelled(signal);
    let settled = false;
    const settle = (err?: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      sink.removeListener("error", settle);
      sink.removeListener("close", onClose);
      signal.removeEventListener("abort", onAbort);
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    };
    const onClose = () => settle(new Error("sink closed"));
    const onAbort = () => settle(new CancelledError());

    sink.on("error", settle);
    sink.on("close", onClose);
    signal.addEventListener("abort", onAbort, { once: true });
    sink.write(data, (err) => settle(err ?? undefined));
  });
}

function dumpChunk(data: Buffer) {
  return `${JSON.stringify(data.toString("latin1"))} ## ${data.toString("hex")}`;
}

export interface ForwardOptions {
  // relay port name, used in log lines
  name: string;
  direction: Direction;
  source: NodeJS.ReadableStream;
  sink: NodeJS.WritableStream;
  completion: CompletionSlot<number>;
  // code posted when the source reaches end-of-stream
  exitStatus: number;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Copy bytes from source to sink until end-of-stream, an I/O error or cancellation.
 *
 * End-of-stream posts `exitStatus`, an I/O error posts 1. Cancellation rejects
 * with CancelledError and posts nothing.
 */
export async function forwardData({
  name,
  direction,
  source,
  sink,
  completion,
  exitStatus,
  signal,
  logger,
}: ForwardOptions): Promise<void> {
  const reader = new ChunkReader(source);
  try {
    for (;;) {
      const data = await reader.read(signal);
      if (data === null) {
        logger.log(
          3,
          `${name} ${direction}: read EOF; shutdown with exit_status=${exitStatus}`
        );
        completion.post(exitStatus);
        return;
      }
      if (logger.enabled(4)) {
        logger.log(4, `${name} ${direction}: ${dumpChunk(data)}`);
      }
      await writeChunk(sink, data, signal);
    }
  } catch (err) {
    if (err instanceof CancelledError) {
      throw err;
    }
    logger.error(`${name} ${direction} got exception ${describeError(err)}`);
    completion.post(1);
  } finally {
    reader.close();
  }
}
