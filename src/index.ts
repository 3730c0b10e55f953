#!/usr/bin/env node

import process from "process";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ConfigError, loadConfig } from "./config";
import { connectionFromFlags, readConnectionFile } from "./connection";
import { createDialer } from "./dialer";
import { runKernel } from "./kernel";
import { Logger, PKG_NAME, stackOf } from "./logger";
import { kernelConfigPath } from "./paths";

// how long a SIGTERM waits for the relays to drain
const CLOSE_TIMEOUT = 5000;

(async function () {
  // parse args
  const args = await yargs(hideBin(process.argv))
    .scriptName(PKG_NAME)
    .usage("$0 [connection_file]")
    .parserConfiguration({ "dot-notation": false })
    .option("verbose", {
      alias: "v",
      count: true,
      description: "increase verbosity (repeat up to 4x)",
    })
    .option("kernel-name", {
      alias: "k",
      string: true,
      default: "pyscript",
      description: "kernel name",
    })
    .option("f", {
      string: true,
      description: "json connection file",
    })
    .option("config", {
      string: true,
      description: "pyscript.conf path, defaults to the one in the kernel directory",
    })
    .option("ip", {
      string: true,
      description: "ip address",
    })
    .option("stdin", {
      number: true,
      description: "stdin port",
    })
    .option("control", {
      number: true,
      description: "control port",
    })
    .option("hb", {
      number: true,
      description: "hb port",
    })
    .option("shell", {
      number: true,
      description: "shell port",
    })
    .option("iopub", {
      number: true,
      description: "iopub port",
    })
    .option("Session.signature_scheme", {
      string: true,
      description: "signature scheme",
    })
    .option("Session.key", {
      string: true,
      description: "session key",
    })
    .option("transport", {
      string: true,
      description: "transport",
    })
    .parse();

  const logger = new Logger(args.verbose);
  const config = loadConfig(args.config ?? kernelConfigPath(args.kernelName));

  const positional = args._[0];
  const connectionFile =
    args.f ?? (positional !== undefined ? String(positional) : undefined);
  const params =
    connectionFile !== undefined &&
    args.ip === undefined &&
    args.stdin === undefined
      ? readConnectionFile(connectionFile)
      : connectionFromFlags({
          ip: args.ip,
          hb: args.hb,
          stdin: args.stdin,
          shell: args.shell,
          iopub: args.iopub,
          control: args.control,
          transport: args.transport,
          signatureScheme: args["Session.signature_scheme"],
          key: args["Session.key"],
        });
  logger.log(1, `got jupyter client config=${JSON.stringify(params)}`);

  const status = await runKernel({
    params,
    config,
    dialer: createDialer(config.proxy),
    logger,
    onRunning: (session) => {
      // handle signal
      let closing = false;
      process.on("SIGTERM", () => {
        if (!closing) {
          closing = true;
          logger.log(1, "kernel shim is closing...");
          setTimeout(() => {
            logger.error("kernel shim close timeout");
            process.exit(1);
          }, CLOSE_TIMEOUT).unref();
          session.requestExit(0);
        }
      });
      // interrupts are delivered to the remote kernel over the control port
      process.on("SIGINT", () => {
        logger.log(1, "ignoring SIGINT");
      });
    },
  });
  process.exit(status);
})().catch((err: unknown) => {
  console.log(
    `${PKG_NAME}: ${err instanceof ConfigError ? err.message : stackOf(err)}`
  );
  process.exit(1);
});
