import { connect } from "net";
import { CONFIG, type Precheck } from "./config";

export interface ReachabilityOptions {
  host?: string;
  port?: number;
  timeoutMs?: number;
}

/**
 * Opens (and immediately closes) a TCP connection to a well-known host.
 */
export function isNetworkReachable(options: ReachabilityOptions = {}): Promise<boolean> {
  const host = options.host ?? CONFIG.REACHABILITY_HOST;
  const port = options.port ?? CONFIG.REACHABILITY_PORT;
  const timeoutMs = options.timeoutMs ?? CONFIG.REACHABILITY_TIMEOUT_MS;

  return new Promise((resolve) => {
    const socket = connect({ host, port });
    const finish = (reachable: boolean): void => {
      socket.destroy();
      resolve(reachable);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(true));
    socket.once("timeout", () => finish(false));
    socket.once("error", () => finish(false));
  });
}

export function networkPrecheck(options: ReachabilityOptions = {}): Precheck {
  return { check: () => isNetworkReachable(options) };
}
