import crypto from "crypto";

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

// single-use token that keeps the state variable of every run distinct
export const createDiscoveryKey = () => crypto.randomBytes(5).toString("hex");

export const stateVarName = (key: string) => `pyscript.jupyter_ports_${key}`;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
