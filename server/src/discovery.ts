import { setTimeout as sleep } from "node:timers/promises";
import { Bonjour, type Service } from "bonjour-service";

import type { Logger } from "./log.js";

export const DISCOVERY_TIMEOUT_MS = 5_000;
export const DISCOVERY_POLL_MS = 100;

export interface DiscoveredService {
  name: string;
  host: string;
  port: number;
}

export interface DiscoveryListener {
  addService(service: DiscoveredService): void;
  removeService(name: string): void;
  updateService(service: DiscoveredService): void;
}

export interface ServiceBrowser {
  close(): void;
}

export type BrowseFn = (
  serviceType: string,
  listener: DiscoveryListener,
  onError: (err: Error) => void
) => ServiceBrowser;

export class DiscoveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DiscoveryError";
  }
}

/** Keeps the first responder; everything after it is ignored. */
class FirstResponder implements DiscoveryListener {
  found: DiscoveredService | null = null;
  failure: Error | null = null;

  addService(service: DiscoveredService) {
    if (!this.found) this.found = service;
  }

  removeService() {}

  updateService() {}

  fail(err: Error) {
    this.failure ??= err;
  }
}

type AdvertisedService = Pick<Service, "name" | "host" | "port" | "addresses">;

/** First IPv4 address, then any address, then the advertised host name. */
export function pickAddress(s: Pick<Service, "host" | "addresses">) {
  const addrs = s.addresses ?? [];
  return addrs.find((a) => !a.includes(":")) ?? addrs[0] ?? s.host;
}

export interface MdnsBrowser {
  on(event: "up" | "down" | "srv-update", fn: (s: AdvertisedService) => void): unknown;
  stop(): void;
}

export interface MdnsResponder {
  find(opts: { type: string; protocol: "tcp" }): MdnsBrowser;
  destroy(): void;
}

const newBonjour = (onError: (err: Error) => void): MdnsResponder =>
  new Bonjour({}, (err: Error) => onError(err));

export function createBonjourBrowse(
  createResponder: (onError: (err: Error) => void) => MdnsResponder = newBonjour
): BrowseFn {
  return (serviceType, listener, onError) => {
    const responder = createResponder(onError);
    const browser = responder.find({ type: serviceType, protocol: "tcp" });

    const toDiscovered = (s: AdvertisedService): DiscoveredService => ({
      name: s.name,
      host: pickAddress(s),
      port: s.port,
    });

    browser.on("up", (s) => listener.addService(toDiscovered(s)));
    browser.on("down", (s) => listener.removeService(s.name));
    browser.on("srv-update", (s) => listener.updateService(toDiscovered(s)));

    return {
      close() {
        browser.stop();
        responder.destroy();
      },
    };
  };
}

export const bonjourBrowse: BrowseFn = createBonjourBrowse();

export interface DiscoverOptions {
  serviceType: string;
  logger: Logger;
  browse?: BrowseFn;
  timeoutMs?: number;
  pollMs?: number;
}

/**
 * Browses for `_<serviceType>._tcp` and resolves with the first responder.
 * Rejects with DiscoveryError when nothing answers in time or the browser
 * cannot run. The browser is closed before this returns either way.
 */
export async function discoverEndpoint(opts: DiscoverOptions): Promise<DiscoveredService> {
  const { serviceType, logger } = opts;
  const browse = opts.browse ?? bonjourBrowse;
  const timeoutMs = opts.timeoutMs ?? DISCOVERY_TIMEOUT_MS;
  const pollMs = opts.pollMs ?? DISCOVERY_POLL_MS;

  const listener = new FirstResponder();

  let browser: ServiceBrowser;
  try {
    browser = browse(serviceType, listener, (err) => listener.fail(err));
  } catch (e) {
    throw new DiscoveryError(`mDNS unavailable: ${e instanceof Error ? e.message : String(e)}`);
  }

  try {
    for (let waited = 0; waited < timeoutMs; waited += pollMs) {
      if (listener.found || listener.failure) break;
      await sleep(pollMs);
    }
  } finally {
    browser.close();
  }

  if (listener.found) {
    const { name, host, port } = listener.found;
    logger.info(`Discovered: ${name} at ${host}:${port}`);
    return listener.found;
  }
  if (listener.failure) throw new DiscoveryError(`mDNS unavailable: ${listener.failure.message}`);
  throw new DiscoveryError(`no _${serviceType}._tcp service answered within ${timeoutMs}ms`);
}
