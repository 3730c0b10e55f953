import http from "http";
import https from "https";
import net from "net";
import tls from "tls";
import type { Dialer } from "./dialer";

type ConnectionCallback = (err: Error | null, socket?: net.Socket) => void;

// http agent whose sockets are opened through a Dialer
export class DialerHttpAgent extends http.Agent {
  constructor(private readonly dialer: Dialer, options?: http.AgentOptions) {
    super(options);
  }

  createConnection(options: http.ClientRequestArgs, callback?: ConnectionCallback) {
    this.dialer
      .connect(options.host ?? "localhost", Number(options.port ?? 80))
      .then(
        (socket) => callback?.(null, socket),
        (err: Error) => callback?.(err)
      );
    return undefined;
  }
}

// tls is negotiated on top of the dialed socket
export class DialerHttpsAgent extends https.Agent {
  constructor(
    private readonly dialer: Dialer,
    private readonly verifySsl: boolean,
    options?: https.AgentOptions
  ) {
    super(options);
  }

  createConnection(options: http.ClientRequestArgs, callback?: ConnectionCallback) {
    const host = options.host ?? "localhost";
    this.dialer.connect(host, Number(options.port ?? 443)).then(
      (socket) =>
        callback?.(
          null,
          tls.connect({
            socket,
            servername: net.isIP(host) ? undefined : host,
            rejectUnauthorized: this.verifySsl,
          })
        ),
      (err: Error) => callback?.(err)
    );
    return undefined;
  }
}

export interface DialerAgents {
  httpAgent: DialerHttpAgent;
  httpsAgent: DialerHttpsAgent;
  destroy(): void;
}

export function createHttpAgents(dialer: Dialer, verifySsl: boolean): DialerAgents {
  const httpAgent = new DialerHttpAgent(dialer);
  const httpsAgent = new DialerHttpsAgent(dialer, verifySsl);
  return {
    httpAgent,
    httpsAgent,
    destroy() {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
