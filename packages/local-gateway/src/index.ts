// ---------------------------------------------------------------------------
// @sigenbridge/local-gateway — Public API
// ---------------------------------------------------------------------------

// Client
export { GatewayClient } from "./client";

// Interceptors
export * from "./interceptors";

// Errors
export {
  GatewayError,
  GatewayConnectionError,
  GatewayAuthError,
  GatewayProtocolError,
  GatewayTimeoutError,
  GatewayConnectionLostError,
  GatewayCommandRejectedError,
} from "./errors";

// Protocol types & constants
export {
  DEFAULT_GATEWAY_PORT,
  DEFAULT_MODBUS_PORT,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  DEFAULT_OPEN_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_MS,
  MODBUS_TCP_SERVICE,
  MIN_MODBUS_PORT,
  MAX_MODBUS_PORT,
  MessageType,
  GatewayErrorCode,
  GatewayFrameSchema,
  ModbusTcpStatusSchema,
  buildGatewayUrl,
  toModbusFlag,
} from "./protocol";

export type {
  GatewayEnvelope,
  GatewayFrame,
  AuthRequestData,
  AuthResult,
  ModbusFlag,
  ModbusTcpStatus,
  ModbusTcpSetData,
  GatewayCredentials,
  GatewayConnectionOptions,
  RequestOptions,
} from "./protocol";
