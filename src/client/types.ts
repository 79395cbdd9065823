export type GroupName = string;

/** Access key pair used when ACL is enabled on the broker side. */
export interface Credentials {
  accessKey: string;
  secretKey: string;
  /** Optional security token for temporary credentials. */
  securityToken?: string;
}

/**
 * Identity and connection settings shared by producers and consumers.
 * Consumer options embed these fields directly.
 */
export interface ClientOptions {
  /** Consumer group this client joins. */
  groupName: GroupName;
  /** Name-server addresses, each in `host:port` form. */
  nameServerAddrs: readonly string[];
  /** Distinguishes several clients running in one process. Default: `"DEFAULT"`. */
  instanceName: string;
  /** Logical namespace prefixed to group and topic names. Default: `""`. */
  namespace: string;
  /** Route traffic through the broker's VIP channel. Default: `false`. */
  vipChannelEnabled: boolean;
  /** Sign requests with `credentials`. Default: `false`. */
  aclEnabled: boolean;
  credentials?: Credentials;
  /** Retry count for client-level RPCs. Default: `3`. */
  retryTimes: number;
}

/**
 * Logger interface used across the library.
 * Compatible with NestJS Logger, console, winston, pino, or any custom logger.
 *
 * `debug` is optional — omit it to suppress debug output in production.
 */
export interface ConsumerLogger {
  log(message: string): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug?(message: string, ...args: unknown[]): void;
}
