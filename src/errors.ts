/**
 * Error taxonomy. ConfigError and BindError reach the entrypoint and end the run;
 * MalformedPacketError and ReceiveError stay inside a receiver and are only logged.
 */

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class BindError extends Error {
  constructor(
    public readonly stream: string,
    public readonly port: number,
    cause: unknown
  ) {
    super(`[${stream}] failed to bind port ${port}: ${describeError(cause)}`, { cause });
    this.name = 'BindError';
    Object.setPrototypeOf(this, BindError.prototype);
  }
}

export class ReceiveError extends Error {
  constructor(
    public readonly stream: string,
    cause: unknown
  ) {
    super(`[${stream}] receive error: ${describeError(cause)}`, { cause });
    this.name = 'ReceiveError';
    Object.setPrototypeOf(this, ReceiveError.prototype);
  }
}

export class MalformedPacketError extends Error {
  constructor(
    message: string,
    public readonly size: number
  ) {
    super(message);
    this.name = 'MalformedPacketError';
    Object.setPrototypeOf(this, MalformedPacketError.prototype);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
