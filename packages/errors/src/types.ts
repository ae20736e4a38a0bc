/**
 * Error types and base classes for broker transport error handling
 */

/**
 * Retry treatment bucket a fault is sorted into
 */
export enum FaultCategory {
  /** Broker is throttling or saturated; back off hard */
  OVERLOADED = 'overloaded',
  /** Transient network trouble between client and broker */
  NETWORK_FAULT = 'network_fault',
  /** Broker-side transient error, e.g. an entity still being provisioned */
  BROKER_FAULT = 'broker_fault',
  /** Not recognized by any retry policy */
  UNCLASSIFIED = 'unclassified',
}

export interface BrokerLinkErrorOptions {
  cause?: unknown;
  data?: Record<string, unknown>;
}

/**
 * Base error class for every error this project raises
 */
export abstract class BrokerLinkError extends Error {
  public readonly code: string;
  public readonly data: Readonly<Record<string, unknown>> | undefined;

  constructor(message: string, code: string, options: BrokerLinkErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.data = options.data;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.data && { data: this.data }),
      ...(this.cause instanceof Error && { cause: this.cause.message }),
    };
  }
}
