export type FailureStage =
  | 'config'
  | 'provisioning'
  | 'directory'
  | 'connection'
  | 'publish'
  | 'diagnostics';

/** Base for every failure the simulator reports to the operator. */
export class SimulatorError extends Error {
  constructor(
    message: string,
    readonly stage: FailureStage,
    readonly hint?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SimulatorError {
  constructor(message: string, hint?: string) {
    super(message, 'config', hint);
  }
}

/** Key/cert generation, credential cache or trust-anchor failure. Fatal. */
export class ProvisioningError extends SimulatorError {
  constructor(message: string, hint?: string, options?: { cause?: unknown }) {
    super(message, 'provisioning', hint, options);
  }
}

/** REST failure. `statusCode` is null when no HTTP response was received. */
export class DirectoryError extends SimulatorError {
  constructor(
    message: string,
    readonly statusCode: number | null,
    readonly body: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'directory', undefined, options);
  }
}

export class ConnectionError extends SimulatorError {
  constructor(message: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(message, 'connection', 'Check the device certificate and that the device is onboarded.', options);
  }
}

/** Transient; the scheduler logs it and keeps going. */
export class PublishError extends SimulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'publish', undefined, options);
  }
}

export class DiagnosticStepError extends SimulatorError {
  constructor(readonly step: string, message: string, options?: { cause?: unknown }) {
    super(message, 'diagnostics', undefined, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `code` of a Node system error (`ENOENT`, `ECONNREFUSED`, ...), if any. */
export function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}
