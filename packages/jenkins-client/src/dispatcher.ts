import { Agent, EnvHttpProxyAgent, ProxyAgent, type Dispatcher } from "undici";
import type { ProxyConfig } from "@ci-probes/shared";

/**
 * `explicit` routes every request through the given proxy, `none` connects
 * directly and `env` follows HTTP_PROXY, HTTPS_PROXY and NO_PROXY.
 */
export function createDispatcher(proxy: ProxyConfig): Dispatcher {
  switch (proxy.mode) {
    case "explicit":
      return new ProxyAgent(proxy.url);
    case "none":
      return new Agent();
    case "env":
      return new EnvHttpProxyAgent();
  }
}
