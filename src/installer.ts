import fs from "fs";
import path from "path";
import { CONFIG_NAME, loadConfig } from "./config";
import { PKG_NAME } from "./logger";
import { jupyterDataDir, kernelDir } from "./paths";

export const DEFAULT_KERNEL_NAME = "pyscript";

// kernel_files/ sits next to both src/ and dist/
export const TEMPLATE_DIR = path.join(__dirname, "..", "kernel_files");

export interface KernelSpec {
  argv: string[];
  display_name: string;
  language: string;
}

export interface InstallResult {
  targetDir: string;
  newInstall: boolean;
}

export function kernelSpec(kernelName: string, command = PKG_NAME): KernelSpec {
  const argv = [command];
  if (kernelName !== DEFAULT_KERNEL_NAME) {
    argv.push("-k", kernelName);
  }
  argv.push("-f", "{connection_file}");
  return {
    argv,
    display_name: `hass ${kernelName}`,
    language: "python",
  };
}

// an existing pyscript.conf is never overwritten
export function installKernel(
  kernelName: string,
  targetDir: string = kernelDir(kernelName),
  templateDir: string = TEMPLATE_DIR
): InstallResult {
  fs.mkdirSync(targetDir, { recursive: true });

  const configPath = path.join(targetDir, CONFIG_NAME);
  const newInstall = !fs.existsSync(configPath);
  if (newInstall) {
    fs.copyFileSync(path.join(templateDir, CONFIG_NAME), configPath);
  }

  fs.writeFileSync(
    path.join(targetDir, "kernel.json"),
    JSON.stringify(kernelSpec(kernelName), null, 2) + "\n"
  );
  return { targetDir, newInstall };
}

export function kernelInfo(
  kernelName: string,
  dataDir: string = jupyterDataDir()
): string[] {
  const dir = kernelDir(kernelName, dataDir);
  if (!fs.existsSync(path.join(dir, "kernel.json"))) {
    return [`No installed kernel named ${kernelName} found`];
  }
  const config = loadConfig(path.join(dir, CONFIG_NAME));
  const settings = {
    hass_host: config.host,
    hass_url: config.url,
    hass_token: config.token,
    hass_proxy: config.proxy ?? "",
  };
  return [
    `Kernel ${kernelName} installed in ${dir}`,
    `Config settings from ${path.join(dir, CONFIG_NAME)}:`,
    ...Object.entries(settings).map(([key, value]) => `    ${key} = ${value}`),
  ];
}
