/**
 * Thrown by HTTP-based sinks when the backend answers with a non-2xx
 * status or reports a failed write. The pipeline treats it as transient.
 */
export class SinkDeliveryError extends Error {
  constructor(
    message: string,
    readonly status?: number | undefined,
    readonly body?: string | undefined,
  ) {
    super(message);
    this.name = 'SinkDeliveryError';
  }
}

/** A sink could not be built from an otherwise well-formed configuration. */
export class SinkConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SinkConfigError';
  }
}
