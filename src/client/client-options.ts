import type { ClientOptions } from "./types";

export const DEFAULT_INSTANCE_NAME = "DEFAULT";
export const DEFAULT_RETRY_TIMES = 3;

/** Fresh base client options. Group name and name servers are left empty. */
export function defaultClientOptions(): ClientOptions {
  return {
    groupName: "",
    nameServerAddrs: [],
    instanceName: DEFAULT_INSTANCE_NAME,
    namespace: "",
    vipChannelEnabled: false,
    aclEnabled: false,
    retryTimes: DEFAULT_RETRY_TIMES,
  };
}

const NAME_SERVER_PATTERN = /^[A-Za-z0-9.-]+:\d{1,5}$/;

/** `true` when `addr` has the `host:port` shape with a port in 1–65535. */
export function isValidNameServerAddr(addr: string): boolean {
  if (!NAME_SERVER_PATTERN.test(addr)) return false;
  const port = Number(addr.slice(addr.lastIndexOf(":") + 1));
  return port >= 1 && port <= 65535;
}
