import type { ShimConfig } from "./config";
import { PORT_NAMES } from "./connection";
import type { ConnectionParameters, PortNumbers } from "./connection";
import type { Dialer } from "./dialer";
import { PortDiscoveryClient } from "./discovery";
import type { Logger } from "./logger";
import { RelayPort } from "./relay-port";
import { SessionCoordinator } from "./session";

export interface KernelRunOptions {
  params: ConnectionParameters;
  config: ShimConfig;
  dialer: Dialer;
  logger: Logger;
  // called once the relays are up; used to hook up signal handlers
  onRunning?: (session: SessionCoordinator) => void;
}

export function createRelayPorts(
  params: ConnectionParameters,
  kernelPorts: PortNumbers,
  config: ShimConfig,
  dialer: Dialer,
  logger: Logger
): RelayPort[] {
  return PORT_NAMES.map(
    (name) =>
      new RelayPort({
        name,
        clientHost: params.ip,
        clientPort: params[name],
        kernelHost: config.host,
        kernelPort: kernelPorts[name],
        dialer,
        logger,
      })
  );
}

// resolves with the process exit status
export async function runKernel({
  params,
  config,
  dialer,
  logger,
  onRunning,
}: KernelRunOptions): Promise<number> {
  const discovery = new PortDiscoveryClient({ config, dialer, logger });
  const result = await discovery.discover(params);
  if (!result.ok) {
    logger.error(result.error.message);
    return 1;
  }

  const session = new SessionCoordinator(
    createRelayPorts(params, result.ports, config, dialer, logger),
    logger
  );
  const running = session.run();
  onRunning?.(session);
  return running;
}
