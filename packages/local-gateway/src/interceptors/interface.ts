// ---------------------------------------------------------------------------
// Gateway Interceptor Interface — Middleware for outbound/inbound frames
// ---------------------------------------------------------------------------

/**
 * Outbound request sent from client to gateway. `id` is local to the client
 * and never goes on the wire; it ties the request to its response in logs.
 */
export interface OutboundMessage {
  id: string;
  msgType: number;
  /** Response kind the caller is waiting for. */
  expect: number;
  sn: string;
  token?: string;
  data: Record<string, unknown>;
}

/**
 * Inbound frame matched to a pending request.
 */
export interface InboundMessage {
  id: string;
  msgType: number;
  /** Absent when the gateway left it out. */
  code?: number;
  msg: string;
  data: Record<string, unknown>;
}

/**
 * Frame that no caller was waiting for (PUSH notifications and strays).
 */
export interface GatewayInterceptorEvent {
  msgType: number;
  data: Record<string, unknown>;
}

/**
 * Context provided to the error handler.
 */
export interface ErrorContext {
  phase: "outbound" | "inbound" | "event" | "decode" | "transport";
  message?: OutboundMessage | InboundMessage | GatewayInterceptorEvent;
  /** Raw frame text, for decode failures. */
  raw?: string;
  /** Name of the interceptor whose hook threw. */
  interceptor?: string;
}

/**
 * Interceptor interface for the gateway client middleware chain.
 *
 * Each hook is optional. Interceptors run in the order the client was given them.
 *
 * - `onOutbound`: Called before a request is written. May transform it.
 * - `onInbound`: Called when a matching response arrives. May transform it.
 * - `onEvent`: Called for frames no caller was waiting for.
 * - `onError`: Called when a frame cannot be decoded, the socket errors, or
 *   another hook throws.
 */
export interface GatewayInterceptor {
  /** Reported as `interceptor` in the error context when one of its hooks throws. */
  name: string;

  onOutbound?(message: OutboundMessage): Promise<OutboundMessage>;

  onInbound?(message: InboundMessage): Promise<InboundMessage>;

  onEvent?(event: GatewayInterceptorEvent): Promise<void>;

  onError?(error: Error, context: ErrorContext): Promise<void>;
}
