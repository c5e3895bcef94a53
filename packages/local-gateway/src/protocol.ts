// ---------------------------------------------------------------------------
// Sigenergy Gateway local protocol — envelope, message kinds, payload shapes
// ---------------------------------------------------------------------------

import { z } from "zod";

// ---- Constants --------------------------------------------------------------

export const DEFAULT_GATEWAY_PORT = 8080;
export const DEFAULT_MODBUS_PORT = 502;
export const DEFAULT_RESPONSE_TIMEOUT_MS = 10_000;
export const DEFAULT_OPEN_TIMEOUT_MS = 15_000;
export const DEFAULT_HEARTBEAT_MS = 20_000;

/** Service identifier used when querying or changing the Modbus TCP server. */
export const MODBUS_TCP_SERVICE = "modbusTcpServer";

export const MIN_MODBUS_PORT = 1;
export const MAX_MODBUS_PORT = 65_535;

/**
 * Integer `msgType` values carried by every frame. Requests and responses use
 * distinct kinds; a request names the response kind it waits for.
 */
export const MessageType = {
  AUTH: 0,
  AUTH_RESP: 1,
  GET: 2,
  SET: 3,
  RESPONSE: 4,
  PUSH: 5,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

export enum GatewayErrorCode {
  CONNECTION_FAILED = "CONNECTION_FAILED",
  AUTH_FAILED = "AUTH_FAILED",
  PROTOCOL = "PROTOCOL",
  TIMEOUT = "TIMEOUT",
  CONNECTION_LOST = "CONNECTION_LOST",
  COMMAND_REJECTED = "COMMAND_REJECTED",
}

// ---- Envelope -----------------------------------------------------------------

/** Frame written by the client. `token` is omitted on the auth request. */
export interface GatewayEnvelope {
  msgType: number;
  sn: string;
  token?: string;
  data: Record<string, unknown>;
}

export const GatewayFrameSchema = z.object({
  msgType: z.number().int(),
  code: z.number().int().optional(),
  msg: z.string().default(""),
  data: z.record(z.unknown()).nullish().transform((value) => value ?? {}),
});

/**
 * Frame read from the gateway after validation. `code` 0 means success; it is
 * left undefined when the gateway omits it.
 */
export type GatewayFrame = z.infer<typeof GatewayFrameSchema>;

// ---- Auth ---------------------------------------------------------------------

export interface AuthRequestData {
  username: string;
  password: string;
}

export const AuthResultSchema = z.object({
  token: z.string().default(""),
  sn: z.string().default(""),
});

export type AuthResult = z.infer<typeof AuthResultSchema>;

// ---- Modbus TCP service -------------------------------------------------------

export const ModbusFlagSchema = z.union([z.literal(0), z.literal(1)]);
export type ModbusFlag = z.infer<typeof ModbusFlagSchema>;

export const ModbusPortSchema = z
  .number()
  .int()
  .min(MIN_MODBUS_PORT)
  .max(MAX_MODBUS_PORT);

/**
 * Modbus TCP server settings as reported by the gateway. Unknown keys the
 * firmware adds are kept.
 */
export const ModbusTcpStatusSchema = z
  .object({
    modbusEnable: ModbusFlagSchema,
    modbusPort: ModbusPortSchema,
    modbusIp: z.string().optional(),
  })
  .passthrough();

export type ModbusTcpStatus = z.infer<typeof ModbusTcpStatusSchema>;

export interface ModbusTcpSetData {
  service: typeof MODBUS_TCP_SERVICE;
  modbusEnable: ModbusFlag;
  modbusPort: number;
}

// ---- Connection options -------------------------------------------------------

export interface GatewayCredentials {
  username: string;
  password: string;
}

export interface GatewayConnectionOptions {
  /** Gateway hostname or IP address. */
  host: string;
  /** WebSocket port. Default: 8080. */
  port?: number;
  credentials: GatewayCredentials;
  /** Gateway serial number; learned from the auth response when empty. */
  serial?: string;
  /** Per-request response timeout. Default: 10 000 ms. */
  timeoutMs?: number;
  /** Time allowed for the socket to open. Default: 15 000 ms. */
  openTimeoutMs?: number;
  /** Ping interval; 0 disables keepalive. Default: 20 000 ms. */
  heartbeatMs?: number;
}

export interface RequestOptions {
  /** Overrides the client's response timeout for this call. */
  timeoutMs?: number;
}

export function buildGatewayUrl(host: string, port: number = DEFAULT_GATEWAY_PORT): string {
  return `ws://${host}:${port}/ws`;
}

export function toModbusFlag(enabled: boolean): ModbusFlag {
  return enabled ? 1 : 0;
}
