import http from "http";
import { afterEach, describe, expect, it } from "vitest";
import type { ShimConfig } from "../src/config";
import type { ConnectionParameters } from "../src/connection";
import { DirectDialer } from "../src/dialer";
import {
  DiscoveryError,
  POLL_INTERVAL,
  PortDiscoveryClient,
  parsePortState,
} from "../src/discovery";
import { LOCALHOST, captureLogger, closeServer, listen, portOf, unusedPort } from "./common";

interface RecordedRequest {
  method?: string;
  url?: string;
  authorization?: string;
  body: string;
}

type Route = (req: http.IncomingMessage, res: http.ServerResponse) => void;

const KEY = "0123456789";
const STATE_VAR = `pyscript.jupyter_ports_${KEY}`;

const kernelPorts = {
  hb_port: 41001,
  stdin_port: 41002,
  shell_port: 41003,
  iopub_port: 41004,
  control_port: 41005,
};

const params: ConnectionParameters = {
  ip: "127.0.0.1",
  transport: "tcp",
  signature_scheme: "hmac-sha256",
  key: "test-secret",
  hb_port: 9001,
  stdin_port: 9002,
  shell_port: 9003,
  iopub_port: 9004,
  control_port: 9005,
  kernel_name: "pyscript",
};

const servers: http.Server[] = [];

afterEach(async () => {
  for (const server of servers.splice(0)) {
    await closeServer(server);
  }
});

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

// stand-in for the remote API: answers POSTs with startKernel, GETs with the next poll route
async function startApi(startKernel: Route, polls: Route[] = []) {
  const requests: RecordedRequest[] = [];
  const server = http.createServer((req, res) => {
    let body = "";
    req.on("data", (chunk: Buffer) => (body += chunk.toString()));
    req.on("end", () => {
      requests.push({
        method: req.method,
        url: req.url,
        authorization: req.headers.authorization,
        body,
      });
      if (req.method === "POST") {
        startKernel(req, res);
        return;
      }
      const poll = polls.shift();
      if (poll) {
        poll(req, res);
      } else {
        sendJson(res, 404, { message: "Entity not found." });
      }
    });
  });
  await listen(server);
  servers.push(server);
  return { requests, baseUrl: `http://${LOCALHOST}:${portOf(server)}` };
}

function configFor(url: string): ShimConfig {
  return {
    host: "kernel.local",
    url,
    token: "test-token",
    verifySsl: true,
    namespace: "pyscript",
  };
}

function discoveryClient(url: string, verbose = 0) {
  const { logger, lines } = captureLogger(verbose);
  const naps: number[] = [];
  const client = new PortDiscoveryClient({
    config: configFor(url),
    dialer: new DirectDialer(),
    logger,
    sleep: async (ms) => {
      naps.push(ms);
    },
  });
  return { client, lines, naps };
}

const started: Route = (_req, res) => sendJson(res, 200, []);

describe("PortDiscoveryClient", () => {
  it("starts the kernel and polls until the ports are published", async () => {
    const { requests, baseUrl } = await startApi(started, [
      (_req, res) => sendJson(res, 404, { message: "Entity not found." }),
      (_req, res) => sendJson(res, 200, { entity_id: STATE_VAR }),
      (_req, res) =>
        sendJson(res, 200, {
          entity_id: STATE_VAR,
          state: JSON.stringify(kernelPorts),
        }),
    ]);
    const { client, lines, naps } = discoveryClient(baseUrl, 1);

    const result = await client.discover(params, KEY);

    expect(result).toEqual({ ok: true, ports: kernelPorts, stateVar: STATE_VAR });
    expect(naps).toEqual([POLL_INTERVAL, POLL_INTERVAL]);
    expect(POLL_INTERVAL).toBe(500);

    expect(requests.map((req) => `${req.method} ${req.url}`)).toEqual([
      "POST /api/services/pyscript/jupyter_kernel_start",
      `GET /api/states/${STATE_VAR}`,
      `GET /api/states/${STATE_VAR}`,
      `GET /api/states/${STATE_VAR}`,
    ]);
    expect(requests.every((req) => req.authorization === "Bearer test-token")).toBe(
      true
    );
    expect(JSON.parse(requests[0].body)).toEqual({
      ip: "kernel.local",
      transport: "tcp",
      signature_scheme: "hmac-sha256",
      key: "test-secret",
      kernel_name: "pyscript",
      state_var: STATE_VAR,
    });

    expect(lines).toEqual([
      `pyscript-kernel-shim: service call post ${baseUrl}/api/services/pyscript/jupyter_kernel_start returned 200`,
      `pyscript-kernel-shim: state variable get ${baseUrl}/api/states/${STATE_VAR} returned ${JSON.stringify(kernelPorts)}`,
    ]);
  });

  it("fails when the start call is rejected", async () => {
    const { requests, baseUrl } = await startApi((_req, res) =>
      sendJson(res, 500, { message: "boom" })
    );
    const { client } = discoveryClient(baseUrl);

    const result = await client.discover(params, KEY);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DiscoveryError);
      expect(result.error.message).toBe(
        `request failed with 500: Internal Server Error (url=${baseUrl}/api/services/pyscript/jupyter_kernel_start)`
      );
    }
    expect(requests).toHaveLength(1);
  });

  it("fails when nothing listens at the url", async () => {
    const port = await unusedPort();
    const { client } = discoveryClient(`http://${LOCALHOST}:${port}`);

    const result = await client.discover(params, KEY);

    expect(result).toEqual({
      ok: false,
      error: expect.objectContaining({
        message: `unable to connect to host ${LOCALHOST}:${port} (ECONNREFUSED)`,
      }),
    });
  });

  it("fails on a state that is not JSON", async () => {
    const { baseUrl } = await startApi(started, [
      (_req, res) => sendJson(res, 200, { state: "unknown" }),
    ]);
    const { client } = discoveryClient(baseUrl);

    const result = await client.discover(params, KEY);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toMatch(
        new RegExp(`^state variable ${baseUrl}/api/states/${STATE_VAR} is not valid JSON \\(`)
      );
    }
  });

  it("builds the start request without the client ports", () => {
    const { client } = discoveryClient("http://kernel.local:8123");

    expect(client.startUrl()).toBe(
      "http://kernel.local:8123/api/services/pyscript/jupyter_kernel_start"
    );
    expect(client.stateUrl(STATE_VAR)).toBe(
      `http://kernel.local:8123/api/states/${STATE_VAR}`
    );
    expect(Object.keys(client.buildStartRequest(params, STATE_VAR)).sort()).toEqual([
      "ip",
      "kernel_name",
      "key",
      "signature_scheme",
      "state_var",
      "transport",
    ]);
  });
});

describe("parsePortState", () => {
  const url = "http://kernel.local/api/states/x";

  it("accepts a JSON string or an object", () => {
    expect(parsePortState(JSON.stringify(kernelPorts), url)).toEqual(kernelPorts);
    expect(parsePortState({ ...kernelPorts, extra: 1 }, url)).toEqual(kernelPorts);
  });

  it("rejects missing or out of range ports", () => {
    expect(() => parsePortState('{"hb_port": 1}', url)).toThrow(
      `state variable ${url} has bad port numbers (invalid port number undefined for stdin_port)`
    );
    expect(() => parsePortState({ ...kernelPorts, iopub_port: 70000 }, url)).toThrow(
      `state variable ${url} has bad port numbers (invalid port number 70000 for iopub_port)`
    );
    expect(() => parsePortState("[1, 2]", url)).toThrow(
      `state variable ${url} is not a JSON object`
    );
  });
});
