// ---------------------------------------------------------------------------
// Integration error hierarchy
// ---------------------------------------------------------------------------

export enum IntegrationErrorCode {
  CONFIG_INVALID = "CONFIG_INVALID",
  SETUP_NOT_READY = "SETUP_NOT_READY",
  UPDATE_FAILED = "UPDATE_FAILED",
}

export class IntegrationError extends Error {
  readonly code: IntegrationErrorCode;

  constructor(message: string, code: IntegrationErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IntegrationError";
    this.code = code;
  }
}

export class ConfigError extends IntegrationError {
  constructor(message: string) {
    super(message, IntegrationErrorCode.CONFIG_INVALID);
    this.name = "ConfigError";
  }
}

/** Setup could not complete; the host should retry the whole setup later. */
export class SetupNotReadyError extends IntegrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, IntegrationErrorCode.SETUP_NOT_READY, options);
    this.name = "SetupNotReadyError";
  }
}

/** A poll failed; the previous data is kept and the next interval retries. */
export class UpdateFailedError extends IntegrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, IntegrationErrorCode.UPDATE_FAILED, options);
    this.name = "UpdateFailedError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
