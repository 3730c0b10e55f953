import axios, { isAxiosError } from "axios";
import type { AxiosInstance, AxiosResponse } from "axios";
import type { ShimConfig } from "./config";
import { PORT_NAMES, portNumbersOf } from "./connection";
import type { ConnectionParameters, PortNumbers } from "./connection";
import type { Dialer } from "./dialer";
import { createDiscoveryKey, isRecord, sleep, stateVarName } from "./helper";
import { createHttpAgents } from "./http-agent";
import type { DialerAgents } from "./http-agent";
import type { Logger } from "./logger";
import { describeError } from "./logger";

// delay between two polls of the state variable
export const POLL_INTERVAL = 500;

export class DiscoveryError extends Error {
  constructor(message: string, readonly url: string) {
    super(message);
    this.name = "DiscoveryError";
  }
}

export type DiscoveryResult =
  | { ok: true; ports: PortNumbers; stateVar: string }
  | { ok: false; error: DiscoveryError };

export interface DiscoveryOptions {
  config: ShimConfig;
  dialer: Dialer;
  logger: Logger;
  pollInterval?: number;
  sleep?: (ms: number) => Promise<void>;
}

const TLS_ERROR = /CERT|TLS|SSL|EPROTO/;

function hostAndPort(url: string) {
  const parsed = new URL(url);
  const port = parsed.port || (parsed.protocol === "https:" ? "443" : "80");
  return `${parsed.hostname}:${port}`;
}

// one line diagnostic shown to the user
export function toDiscoveryError(err: unknown, url: string): DiscoveryError {
  if (err instanceof DiscoveryError) {
    return err;
  }
  if (isAxiosError(err)) {
    if (err.response) {
      return new DiscoveryError(
        `request failed with ${err.response.status}: ${err.response.statusText} (url=${url})`,
        url
      );
    }
    const code = err.code ?? "";
    if (TLS_ERROR.test(code)) {
      return new DiscoveryError(`got SSL error ${code}: ${err.message} (url=${url})`, url);
    }
    if (code) {
      return new DiscoveryError(
        `unable to connect to host ${hostAndPort(url)} (${code})`,
        url
      );
    }
  }
  return new DiscoveryError(`got error ${describeError(err)} (url=${url})`, url);
}

export function parsePortState(state: unknown, url: string): PortNumbers {
  let decoded: unknown = state;
  if (typeof state === "string") {
    try {
      decoded = JSON.parse(state);
    } catch (err) {
      throw new DiscoveryError(
        `state variable ${url} is not valid JSON (${describeError(err)})`,
        url
      );
    }
  }
  if (!isRecord(decoded)) {
    throw new DiscoveryError(`state variable ${url} is not a JSON object`, url);
  }
  try {
    return portNumbersOf(decoded);
  } catch (err) {
    throw new DiscoveryError(
      `state variable ${url} has bad port numbers (${describeError(err)})`,
      url
    );
  }
}

export class PortDiscoveryClient {
  private readonly config: ShimConfig;
  private readonly logger: Logger;
  private readonly agents: DialerAgents;
  private readonly http: AxiosInstance;
  private readonly pollInterval: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: DiscoveryOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.pollInterval = options.pollInterval ?? POLL_INTERVAL;
    this.sleep = options.sleep ?? sleep;
    this.agents = createHttpAgents(options.dialer, options.config.verifySsl);
    this.http = axios.create({
      httpAgent: this.agents.httpAgent,
      httpsAgent: this.agents.httpsAgent,
      // proxying is done by the dialer
      proxy: false,
      headers: {
        Authorization: `Bearer ${options.config.token}`,
      },
    });
  }

  // the kernel picks its own ports and publishes them under stateVar
  buildStartRequest(
    params: ConnectionParameters,
    stateVar: string
  ): Record<string, unknown> {
    const body: Record<string, unknown> = { ...params };
    for (const name of PORT_NAMES) {
      delete body[name];
    }
    body.state_var = stateVar;
    body.ip = this.config.host;
    return body;
  }

  startUrl() {
    return `${this.config.url}/api/services/${this.config.namespace}/jupyter_kernel_start`;
  }

  stateUrl(stateVar: string) {
    return `${this.config.url}/api/states/${stateVar}`;
  }

  async discover(
    params: ConnectionParameters,
    key: string = createDiscoveryKey()
  ): Promise<DiscoveryResult> {
    const stateVar = stateVarName(key);
    try {
      await this.startKernel(params, stateVar);
      const ports = await this.pollPorts(stateVar);
      return { ok: true, ports, stateVar };
    } catch (err) {
      return { ok: false, error: toDiscoveryError(err, this.config.url) };
    } finally {
      // not needed any further
      this.agents.destroy();
    }
  }

  private async startKernel(params: ConnectionParameters, stateVar: string) {
    const url = this.startUrl();
    this.logger.log(2, `about to do service call post ${url}`);
    const body = this.buildStartRequest(params, stateVar);
    const result = await this.request(() => this.http.post(url, body), url);
    this.logger.log(1, `service call post ${url} returned ${result.status}`);
  }

  private async pollPorts(stateVar: string): Promise<PortNumbers> {
    const url = this.stateUrl(stateVar);
    for (;;) {
      this.logger.log(2, `about to do state get ${url}`);
      const result = await this.request(
        () => this.http.get(url, { validateStatus: () => true }),
        url
      );
      if (result.status === 200) {
        const body: unknown = result.data;
        if (isRecord(body) && "state" in body) {
          const ports = parsePortState(body.state, url);
          this.logger.log(
            1,
            `state variable get ${url} returned ${JSON.stringify(ports)}`
          );
          return ports;
        }
        this.logger.log(
          2,
          `state get ${url} got result ${JSON.stringify(body)}; retrying`
        );
      } else {
        this.logger.log(
          2,
          `state get ${url} got result.status ${result.status}; retrying`
        );
      }
      await this.sleep(this.pollInterval);
    }
  }

  private async request(
    send: () => Promise<AxiosResponse<unknown>>,
    url: string
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await send();
    } catch (err) {
      throw toDiscoveryError(err, url);
    }
  }
}
