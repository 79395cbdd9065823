/** Default DI token for the built consumer options. */
export const CONSUMER_OPTIONS = "CONSUMER_OPTIONS";

/** Returns the DI token for a named (or default) consumer configuration. */
export const getConsumerOptionsToken = (name?: string): string =>
  name ? `CONSUMER_OPTIONS_${name}` : CONSUMER_OPTIONS;
