import os from "os";
import path from "path";
import process from "process";
import { CONFIG_NAME } from "./config";

export function jupyterDataDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string {
  if (env.JUPYTER_DATA_DIR) {
    return env.JUPYTER_DATA_DIR;
  }
  if (platform === "darwin") {
    return path.join(home, "Library", "Jupyter");
  }
  if (platform === "win32") {
    return path.join(env.APPDATA ?? path.join(home, "AppData", "Roaming"), "jupyter");
  }
  return path.join(
    env.XDG_DATA_HOME ?? path.join(home, ".local", "share"),
    "jupyter"
  );
}

export function kernelDir(kernelName: string, dataDir = jupyterDataDir()) {
  return path.join(dataDir, "kernels", kernelName);
}

export function kernelConfigPath(kernelName: string, dataDir = jupyterDataDir()) {
  return path.join(kernelDir(kernelName, dataDir), CONFIG_NAME);
}
