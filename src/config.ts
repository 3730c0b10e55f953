import fs from "fs";
import { parse } from "ini";
import { isRecord } from "./helper";

export const CONFIG_NAME = "pyscript.conf";
export const CONFIG_SECTION = "homeassistant";

export const CONFIG_DEFAULTS = {
  hass_host: "localhost",
  hass_url: "http://${hass_host}:8123",
  hass_token: "",
  hass_proxy: "",
  verify_ssl: "True",
};

export type ConfigKey = keyof typeof CONFIG_DEFAULTS;

export interface ShimConfig {
  // host running the kernel; also where the relays connect to
  host: string;
  // base url of the HTTP API, without trailing slash
  url: string;
  token: string;
  // socks5 proxy url, if any
  proxy?: string;
  verifySsl: boolean;
  // service namespace of jupyter_kernel_start
  namespace: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function stripQuotes(value: string) {
  return value.trim().replace(/^['"]+|['"]+$/g, "");
}

// ${key} refers to another value of the same section
export function interpolate(
  value: string,
  section: Record<string, string>,
  seen: string[] = []
): string {
  return value.replace(/\$\{([^}]+)\}/g, (_match, key: string) => {
    if (seen.includes(key)) {
      throw new ConfigError(`recursive reference to \${${key}} in config`);
    }
    const referenced = section[key];
    if (referenced === undefined) {
      throw new ConfigError(`unknown reference \${${key}} in config`);
    }
    return interpolate(referenced, section, [...seen, key]);
  });
}

export function parseConfig(text: string): ShimConfig {
  const parsed: Record<string, unknown> = parse(text);
  const raw = parsed[CONFIG_SECTION];
  if (!isRecord(raw)) {
    throw new ConfigError(`missing section '${CONFIG_SECTION}' in config file`);
  }

  const section: Record<string, string> = { ...CONFIG_DEFAULTS };
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      section[key] = stripQuotes(value);
    } else if (typeof value === "boolean" || typeof value === "number") {
      section[key] = String(value);
    }
  }

  const setting = (key: ConfigKey) => interpolate(section[key], section);
  const proxy = setting("hass_proxy");
  return {
    host: setting("hass_host"),
    url: setting("hass_url").replace(/\/+$/, ""),
    token: setting("hass_token"),
    proxy: proxy ? proxy : undefined,
    verifySsl: setting("verify_ssl").toLowerCase() === "true",
    namespace: "pyscript",
  };
}

export function loadConfig(configPath: string): ShimConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(
      `unable to load config file ${configPath}, err=${
        err instanceof Error ? err.message : String(err)
      }`
    );
  }
  return parseConfig(text);
}
