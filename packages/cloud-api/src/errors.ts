// ---------------------------------------------------------------------------
// Cloud API error hierarchy
// ---------------------------------------------------------------------------

import { CloudErrorCode } from "./protocol";

export class CloudError extends Error {
  readonly code: CloudErrorCode;

  constructor(message: string, code: CloudErrorCode) {
    super(message);
    this.name = "CloudError";
    this.code = code;
  }
}

/** The token request failed, was rejected, or returned no token. */
export class CloudAuthError extends CloudError {
  constructor(message: string) {
    super(message, CloudErrorCode.AUTH_FAILED);
    this.name = "CloudAuthError";
  }
}

/**
 * A data request failed. When the server answered with a non-zero code it is
 * kept in `statusCode` / `statusMessage`; transport failures leave it null.
 */
export class CloudApiError extends CloudError {
  readonly statusCode: number | null;
  readonly statusMessage: string;

  constructor(message: string, statusCode: number | null = null, statusMessage = "") {
    super(message, CloudErrorCode.API_ERROR);
    this.name = "CloudApiError";
    this.statusCode = statusCode;
    this.statusMessage = statusMessage;
  }
}
