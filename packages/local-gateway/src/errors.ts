// ---------------------------------------------------------------------------
// Gateway error hierarchy
// ---------------------------------------------------------------------------

import { GatewayErrorCode } from "./protocol";

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(message: string, code: GatewayErrorCode) {
    super(message);
    this.name = "GatewayError";
    this.code = code;
  }
}

/** The socket could not be opened, or was used before `connect()`. */
export class GatewayConnectionError extends GatewayError {
  constructor(message: string, code: GatewayErrorCode = GatewayErrorCode.CONNECTION_FAILED) {
    super(message, code);
    this.name = "GatewayConnectionError";
  }
}

export class GatewayAuthError extends GatewayError {
  constructor(message: string, code: GatewayErrorCode = GatewayErrorCode.AUTH_FAILED) {
    super(message, code);
    this.name = "GatewayAuthError";
  }
}

/** A response arrived but its payload was empty or did not match the expected shape. */
export class GatewayProtocolError extends GatewayError {
  constructor(message: string, code: GatewayErrorCode = GatewayErrorCode.PROTOCOL) {
    super(message, code);
    this.name = "GatewayProtocolError";
  }
}

export class GatewayTimeoutError extends GatewayError {
  constructor(message: string, code: GatewayErrorCode = GatewayErrorCode.TIMEOUT) {
    super(message, code);
    this.name = "GatewayTimeoutError";
  }
}

/** The socket closed (or the client disconnected) while the call was pending. */
export class GatewayConnectionLostError extends GatewayError {
  constructor(message: string, code: GatewayErrorCode = GatewayErrorCode.CONNECTION_LOST) {
    super(message, code);
    this.name = "GatewayConnectionLostError";
  }
}

/** The gateway acknowledged a command with a non-zero status code. */
export class GatewayCommandRejectedError extends GatewayError {
  readonly statusCode: number;
  readonly statusMessage: string;

  constructor(message: string, statusCode: number, statusMessage: string) {
    super(message, GatewayErrorCode.COMMAND_REJECTED);
    this.name = "GatewayCommandRejectedError";
    this.statusCode = statusCode;
    this.statusMessage = statusMessage;
  }
}
