// ---------------------------------------------------------------------------
// Interceptors — Barrel exports
// ---------------------------------------------------------------------------

export type {
  GatewayInterceptor,
  OutboundMessage,
  InboundMessage,
  GatewayInterceptorEvent,
  ErrorContext,
} from "./interface";

export { InterceptorChain } from "./chain";

export { LoggerInterceptor } from "./logger";
export type { LoggerInterceptorOptions } from "./logger";
