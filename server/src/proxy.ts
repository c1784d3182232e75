import type { Readable, Writable } from "node:stream";

import { runBridge } from "./bridge.js";
import { ConfigError, endpointProblem, endpointUrl, type BridgeConfig, type Endpoint } from "./config.js";
import { discoverEndpoint, DiscoveryError, type BrowseFn } from "./discovery.js";
import { RequestForwarder } from "./forwarder.js";
import type { Logger } from "./log.js";

export interface ProxyDeps {
  input: Readable;
  output: Writable;
  logger: Logger;
  browse?: BrowseFn;
  discoveryTimeoutMs?: number;
  requestTimeoutMs?: number;
}

/** Fixed for the life of the process; discovery runs at most once, here. */
export async function resolveEndpoint(
  config: BridgeConfig,
  deps: Pick<ProxyDeps, "logger" | "browse" | "discoveryTimeoutMs">
): Promise<Endpoint> {
  const { scheme, path } = config;

  if (config.discover) {
    const found = await discoverEndpoint({
      serviceType: config.serviceType,
      logger: deps.logger,
      browse: deps.browse,
      timeoutMs: deps.discoveryTimeoutMs,
    });
    const endpoint: Endpoint = Object.freeze({ scheme, host: found.host, port: found.port, path });
    const problem = endpointProblem(endpoint);
    if (problem) throw new DiscoveryError(`${found.name} advertised an unusable address: ${problem}`);
    return endpoint;
  }

  if (!config.host) throw new ConfigError("host is required unless discover is set");
  const endpoint: Endpoint = Object.freeze({ scheme, host: config.host, port: config.port, path });
  const problem = endpointProblem(endpoint);
  if (problem) throw new ConfigError(problem);
  return endpoint;
}

export async function startProxy(config: BridgeConfig, deps: ProxyDeps): Promise<void> {
  const endpoint = await resolveEndpoint(config, deps);
  const forwarder = new RequestForwarder({
    endpoint,
    logger: deps.logger,
    timeoutMs: deps.requestTimeoutMs,
  });

  deps.logger.info(`Bridge started → ${endpointUrl(endpoint)}`);
  await runBridge({ input: deps.input, output: deps.output, forwarder, logger: deps.logger });
}
