/**
 * Error taxonomy for the bridge pipeline.
 *
 * None of these terminate the process: decode errors are returned,
 * aggregation and sink errors are logged and counted, transport errors
 * trigger a reconnect. Only the launch precondition is fatal, and it
 * fires before anything is opened.
 */

export type DecodeErrorKind = 'unknown_topic' | 'malformed_payload';

export class DecodeError extends Error {
  override readonly name = 'DecodeError';

  constructor(
    readonly kind: DecodeErrorKind,
    readonly topic: string,
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}

export class AggregationError extends Error {
  override readonly name = 'AggregationError';

  constructor(
    readonly key: string,
    message: string,
  ) {
    super(message);
  }
}

export type SinkName = 'document' | 'timeseries';
export type SinkErrorKind = 'transient' | 'permanent';

export class SinkWriteError extends Error {
  override readonly name = 'SinkWriteError';

  constructor(
    readonly sink: SinkName,
    readonly kind: SinkErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class TransportError extends Error {
  override readonly name = 'TransportError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class LaunchPreconditionError extends Error {
  override readonly name = 'LaunchPreconditionError';
}
