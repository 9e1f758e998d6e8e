import {
  ProxyAgent,
  getGlobalDispatcher,
  setGlobalDispatcher,
  type Dispatcher,
} from "undici";
import { logger } from "./logger";

let originalDispatcher: Dispatcher | undefined;
let proxyDispatcher: Dispatcher | undefined;

export interface ProxyConfigOptions {
  enable?: boolean;
  proxyUrl?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseEnableFlag(value: string | undefined): boolean {
  if (!value) {
    return false;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function resolveProxyUrl(options: ProxyConfigOptions = {}): string | undefined {
  if (options.proxyUrl) {
    return options.proxyUrl;
  }

  const env = options.env ?? process.env;
  return env.FETCH_PROXY_URL ?? env.HTTPS_PROXY ?? env.https_proxy ?? env.HTTP_PROXY ?? env.http_proxy;
}

/**
 * Routes every outbound `fetch` (and so every Data API call) through the
 * proxy named by FETCH_PROXY_URL / HTTPS_PROXY / HTTP_PROXY when
 * ENABLE_FETCH_PROXY is set.
 */
export function configureProxyFromEnv(options: ProxyConfigOptions = {}): boolean {
  const env = options.env ?? process.env;
  const enable = options.enable ?? parseEnableFlag(env.ENABLE_FETCH_PROXY);

  if (!enable) {
    disableProxy();
    return false;
  }

  const proxyUrl = resolveProxyUrl(options);
  if (!proxyUrl) {
    logger.warn(
      "[proxy] ENABLE_FETCH_PROXY is true but no proxy URL was provided via FETCH_PROXY_URL/HTTPS_PROXY/HTTP_PROXY",
    );
    disableProxy();
    return false;
  }

  if (!originalDispatcher) {
    originalDispatcher = getGlobalDispatcher();
  }

  proxyDispatcher = new ProxyAgent(proxyUrl);
  setGlobalDispatcher(proxyDispatcher);
  return true;
}

export function disableProxy(): void {
  if (!proxyDispatcher) {
    return;
  }

  setGlobalDispatcher(originalDispatcher ?? getGlobalDispatcher());
  proxyDispatcher = undefined;
}
