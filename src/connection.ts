import fs from "fs";
import { ConfigError } from "./config";
import { isRecord } from "./helper";

export const PORT_NAMES = [
  "hb_port",
  "stdin_port",
  "shell_port",
  "iopub_port",
  "control_port",
] as const;

export type PortName = (typeof PORT_NAMES)[number];

export type PortNumbers = Record<PortName, number>;

// fields other than the listed ones pass through untouched
export interface ConnectionParameters extends PortNumbers {
  ip: string;
  transport: string;
  signature_scheme: string;
  key: string;
  [field: string]: unknown;
}

export interface ConnectionFlags {
  ip?: string;
  hb?: number;
  stdin?: number;
  shell?: number;
  iopub?: number;
  control?: number;
  transport?: string;
  signatureScheme?: string;
  key?: string;
}

export function isPort(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 65535
  );
}

// some frontends quote values, e.g. 'tcp' or b'secret'
export function removeQuotes(value: string) {
  if (
    value.length > 1 &&
    value[0] === value[value.length - 1] &&
    (value[0] === '"' || value[0] === "'")
  ) {
    return value.slice(1, -1);
  }
  if (
    value.length > 2 &&
    value[0] === "b" &&
    value[1] === value[value.length - 1] &&
    (value[1] === '"' || value[1] === "'")
  ) {
    return value.slice(2, -1);
  }
  return value;
}

const STRING_FIELDS = ["ip", "transport", "signature_scheme", "key"] as const;

export function toConnectionParameters(value: unknown): ConnectionParameters {
  if (!isRecord(value)) {
    throw new ConfigError("connection parameters must be a JSON object");
  }
  const invalid = [
    ...PORT_NAMES.filter((name) => !isPort(value[name])),
    ...STRING_FIELDS.filter((name) => typeof value[name] !== "string"),
  ].sort();
  if (invalid.length > 0) {
    throw new ConfigError(
      `connection parameters missing or invalid: ${invalid.join(", ")}`
    );
  }
  return {
    ...value,
    ...portNumbersOf(value),
    ip: String(value.ip),
    transport: String(value.transport),
    signature_scheme: String(value.signature_scheme),
    key: String(value.key),
  };
}

export function portNumbersOf(value: Record<string, unknown>): PortNumbers {
  const port = (name: PortName) => {
    const number = value[name];
    if (!isPort(number)) {
      throw new ConfigError(`invalid port number ${String(number)} for ${name}`);
    }
    return number;
  };
  return {
    hb_port: port("hb_port"),
    stdin_port: port("stdin_port"),
    shell_port: port("shell_port"),
    iopub_port: port("iopub_port"),
    control_port: port("control_port"),
  };
}

export function readConnectionFile(filename: string): ConnectionParameters {
  let decoded: unknown;
  try {
    decoded = JSON.parse(fs.readFileSync(filename, "utf8"));
  } catch (err) {
    throw new ConfigError(
      `unable to read connection file ${filename}, err=${
        err instanceof Error ? err.message : String(err)
      }`
    );
  }
  return toConnectionParameters(decoded);
}

export function connectionFromFlags(flags: ConnectionFlags): ConnectionParameters {
  const fields = {
    ip: flags.ip,
    hb: flags.hb,
    stdin: flags.stdin,
    shell: flags.shell,
    iopub: flags.iopub,
    control: flags.control,
    transport: flags.transport,
    "Session.signature_scheme": flags.signatureScheme,
    "Session.key": flags.key,
  };
  const missing = Object.entries(fields)
    .filter(([, value]) => value === undefined)
    .map(([name]) => name)
    .sort();
  if (missing.length > 0) {
    throw new ConfigError(
      `missing arguments: --${missing.join(", --")}, (or specify --f config_file instead)`
    );
  }
  return toConnectionParameters({
    ip: flags.ip,
    hb_port: flags.hb,
    stdin_port: flags.stdin,
    shell_port: flags.shell,
    iopub_port: flags.iopub,
    control_port: flags.control,
    transport: removeQuotes(flags.transport ?? ""),
    signature_scheme: removeQuotes(flags.signatureScheme ?? ""),
    key: removeQuotes(flags.key ?? ""),
  });
}
