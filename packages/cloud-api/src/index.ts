// ---------------------------------------------------------------------------
// @sigenbridge/cloud-api — Public API
// ---------------------------------------------------------------------------

export { CloudClient } from "./client";

export { CloudError, CloudAuthError, CloudApiError } from "./errors";

export {
  AUTH_FAILURE_CODES,
  CloudErrorCode,
  DEFAULT_REGION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  TOKEN_REFRESH_MARGIN_MS,
  EnergyFlowSchema,
  StatisticsSchema,
  buildBaseUrl,
} from "./protocol";

export type {
  CloudClientOptions,
  CloudCredentials,
  CloudEnvelope,
  CloudSnapshot,
  EnergyFlow,
  Statistics,
} from "./protocol";
