import net from "net";
import http from "http";
import { once } from "events";
import type { AsyncQueue } from "../src/channel";
import { Logger } from "../src/logger";
import type { SessionEvent } from "../src/task";

export const LOCALHOST = "127.0.0.1";

export function captureLogger(verbose = 0) {
  const lines: string[] = [];
  const logger = new Logger(verbose, (line) => lines.push(line));
  return { logger, lines };
}

export function portOf(server: net.Server | http.Server): number {
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("server is not listening on a tcp port");
  }
  return address.port;
}

export async function listen<T extends net.Server | http.Server>(server: T) {
  server.listen(0, LOCALHOST);
  await once(server, "listening");
  return server;
}

export async function closeServer(server: net.Server | http.Server) {
  if (server instanceof http.Server) {
    server.closeAllConnections();
  }
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

/**
 * Stand-in kernel that echoes what it receives.
 * With closeAfterEcho the kernel closes the connection after the first echo.
 */
export async function startEchoKernel({ closeAfterEcho = false } = {}) {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", () => socket.destroy());
    if (closeAfterEcho) {
      socket.once("data", (data) => socket.end(data));
    } else {
      socket.on("data", (data) => socket.write(data));
    }
  });
  await listen(server);
  return {
    server,
    port: portOf(server),
    sockets,
    async stop() {
      for (const socket of sockets) {
        socket.destroy();
      }
      await closeServer(server);
    },
  };
}

// a port with nothing listening on it
export async function unusedPort() {
  const server = await listen(net.createServer());
  const port = portOf(server);
  await closeServer(server);
  return port;
}

// several distinct free ports, all held open until every one is picked
export async function unusedPorts(count: number) {
  const servers = await Promise.all(
    Array.from({ length: count }, () => listen(net.createServer()))
  );
  const ports = servers.map(portOf);
  await Promise.all(servers.map(closeServer));
  return ports;
}

export async function connectClient(port: number) {
  const socket = net.connect(port, LOCALHOST);
  await once(socket, "connect");
  const received: Buffer[] = [];
  socket.on("data", (data: Buffer) => received.push(data));
  const closed = new Promise<void>((resolve) =>
    socket.once("close", () => resolve())
  );
  socket.on("error", () => socket.destroy());
  return {
    socket,
    closed,
    text: () => Buffer.concat(received).toString(),
  };
}

export async function waitFor(
  predicate: () => boolean,
  timeout = 2000,
  interval = 10
) {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeout) {
      throw new Error(`condition not met within ${timeout}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, interval));
  }
}

export async function takeEvents(queue: AsyncQueue<SessionEvent>, count: number) {
  const events: SessionEvent[] = [];
  while (events.length < count) {
    events.push(await queue.shift());
  }
  return events;
}

export function describeEvent(event: SessionEvent) {
  return event.type === "exit"
    ? `exit:${event.status}`
    : `${event.type}:${event.task.kind}`;
}

// parses a SOCKS5 CONNECT request; undefined until it has fully arrived
function parseConnectRequest(data: Buffer) {
  if (data.length < 5) {
    return undefined;
  }
  let host: string;
  let offset: number;
  if (data[3] === 1) {
    offset = 8;
    host = Array.from(data.subarray(4, 8)).join(".");
  } else if (data[3] === 3) {
    offset = 5 + data[4];
    host = data.toString("latin1", 5, offset);
  } else {
    throw new Error(`unsupported address type ${data[3]}`);
  }
  if (data.length < offset + 2) {
    return undefined;
  }
  return { host, port: data.readUInt16BE(offset), rest: data.subarray(offset + 2) };
}

/**
 * In-process SOCKS5 proxy: no authentication, CONNECT only.
 * Records every target it connected to as host:port.
 */
export async function startSocksProxy() {
  const targets: string[] = [];
  const sockets = new Set<net.Socket>();
  const track = (socket: net.Socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", () => socket.destroy());
  };

  const server = net.createServer((client) => {
    track(client);
    let buffered = Buffer.alloc(0);
    let greeted = false;
    const onData = (data: Buffer) => {
      buffered = Buffer.concat([buffered, data]);
      if (!greeted) {
        if (buffered.length < 2 || buffered.length < 2 + buffered[1]) {
          return;
        }
        buffered = buffered.subarray(2 + buffered[1]);
        greeted = true;
        client.write(Buffer.from([5, 0]));
      }
      const request = parseConnectRequest(buffered);
      if (!request) {
        return;
      }
      client.off("data", onData);
      client.pause();
      const upstream = net.connect(request.port, request.host, () => {
        targets.push(`${request.host}:${request.port}`);
        client.write(Buffer.from([5, 0, 0, 1, 0, 0, 0, 0, 0, 0]));
        if (request.rest.length > 0) {
          upstream.write(request.rest);
        }
        client.pipe(upstream);
        upstream.pipe(client);
      });
      track(upstream);
      upstream.on("error", () => client.destroy());
    };
    client.on("data", onData);
  });
  await listen(server);

  return {
    port: portOf(server),
    targets,
    async stop() {
      for (const socket of sockets) {
        socket.destroy();
      }
      await closeServer(server);
    },
  };
}
