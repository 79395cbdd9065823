/**
 * Machine-readable reason a configuration was rejected.
 * - `'missing-group-name'` — no group name after all options were applied.
 * - `'missing-name-server'` — no name-server address configured.
 * - `'invalid-name-server'` — an address is not in `host:port` form.
 * - `'missing-consumer-model'` — consumer model left unset.
 * - `'orderly-broadcasting'` — orderly consumption requested under the broadcasting model.
 * - `'missing-credentials'` — ACL enabled without an access key pair.
 * - `'invalid-consume-timestamp'` — timestamp start position without a valid `YYYYMMDDHHmmss` value.
 * - `'out-of-range'` — a numeric field lies outside its accepted range.
 */
export type ConfigIssueCode =
  | "missing-group-name"
  | "missing-name-server"
  | "invalid-name-server"
  | "missing-consumer-model"
  | "orderly-broadcasting"
  | "missing-credentials"
  | "invalid-consume-timestamp"
  | "out-of-range";

export interface ConfigIssue {
  code: ConfigIssueCode;
  /** Option field the issue refers to. */
  field: string;
  message: string;
}

/** Error thrown when a consumer configuration fails construction-time validation. */
export class ConsumerConfigError extends Error {
  declare readonly cause?: Error;

  constructor(
    public readonly issues: readonly ConfigIssue[],
    options?: { cause?: Error },
  ) {
    super(
      `Invalid consumer configuration: ${issues.map((i) => i.message).join("; ")}`,
      options,
    );
    this.name = "ConsumerConfigError";
    if (options?.cause) this.cause = options.cause;
  }

  /** `true` when at least one issue carries `code`. */
  has(code: ConfigIssueCode): boolean {
    return this.issues.some((i) => i.code === code);
  }
}
