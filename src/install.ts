#!/usr/bin/env node

import process from "process";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ConfigError } from "./config";
import { DEFAULT_KERNEL_NAME, installKernel, kernelInfo } from "./installer";
import { stackOf } from "./logger";

yargs(hideBin(process.argv))
  .scriptName("pyscript-kernel-install")
  .option("kernel-name", {
    alias: "k",
    string: true,
    default: DEFAULT_KERNEL_NAME,
    description: "kernel name",
  })
  .command(
    "install",
    "install or update a Jupyter pyscript kernel",
    (argv) =>
      argv.option("target-dir", {
        string: true,
        description: "kernel directory, defaults to the Jupyter data directory",
      }),
    (args) => {
      const { targetDir, newInstall } = installKernel(
        args.kernelName,
        args.targetDir
      );
      if (newInstall) {
        console.log(`installed new ${args.kernelName} kernel in ${targetDir}`);
        console.log(
          `you will need to update the settings in ${targetDir}/pyscript.conf`
        );
      } else {
        console.log(`updated ${args.kernelName} kernel in ${targetDir}`);
      }
    }
  )
  .command(
    "info",
    "list information about an installed pyscript kernel",
    () => {},
    (args) => {
      for (const line of kernelInfo(args.kernelName)) {
        console.log(line);
      }
    }
  )
  .demandCommand(1)
  .strict()
  .fail((message, err, argv) => {
    if (err) {
      console.log(err instanceof ConfigError ? err.message : stackOf(err));
    } else {
      console.log(message);
      argv.showHelp();
    }
    process.exit(1);
  })
  .parseSync();
