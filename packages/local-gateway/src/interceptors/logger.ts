// ---------------------------------------------------------------------------
// LoggerInterceptor — Line logging for gateway frame traffic
// ---------------------------------------------------------------------------

import type {
  GatewayInterceptor,
  OutboundMessage,
  InboundMessage,
  GatewayInterceptorEvent,
  ErrorContext,
} from "./interface";

const MASKED_KEYS = new Set(["password", "token"]);

export interface LoggerInterceptorOptions {
  /** Include frame payloads. Default: false. */
  verbose?: boolean;
  /** Maximum payload length before truncation. Default: 500. */
  maxBodyLength?: number;
  /** Custom log function. Default: console.log. */
  logFn?: (message: string) => void;
}

export class LoggerInterceptor implements GatewayInterceptor {
  readonly name = "logger";

  private readonly verbose: boolean;
  private readonly maxBodyLength: number;
  private readonly logFn: (message: string) => void;

  constructor(options?: LoggerInterceptorOptions) {
    this.verbose = options?.verbose ?? false;
    this.maxBodyLength = options?.maxBodyLength ?? 500;
    this.logFn = options?.logFn ?? console.log;
  }

  async onOutbound(message: OutboundMessage): Promise<OutboundMessage> {
    let line = `[GW:OUT] msgType=${message.msgType} expect=${message.expect} id=${message.id}`;
    if (this.verbose) {
      line += ` data=${this.format(message.data)}`;
    }
    this.logFn(line);
    return message;
  }

  async onInbound(message: InboundMessage): Promise<InboundMessage> {
    let line = `[GW:IN] msgType=${message.msgType} id=${message.id} code=${message.code ?? "none"}`;
    if (message.code !== 0 && message.msg) {
      line += ` msg=${message.msg}`;
    }
    if (this.verbose) {
      line += ` data=${this.format(message.data)}`;
    }
    this.logFn(line);
    return message;
  }

  async onEvent(event: GatewayInterceptorEvent): Promise<void> {
    let line = `[GW:EVT] msgType=${event.msgType}`;
    if (this.verbose) {
      line += ` data=${this.format(event.data)}`;
    }
    this.logFn(line);
  }

  async onError(error: Error, context: ErrorContext): Promise<void> {
    let line = `[GW:ERR] phase=${context.phase} error=${error.message}`;
    if (context.interceptor) {
      line += ` interceptor=${context.interceptor}`;
    }
    if (this.verbose && context.raw !== undefined) {
      line += ` raw=${this.truncate(context.raw)}`;
    }
    this.logFn(line);
  }

  private format(data: Record<string, unknown>): string {
    return this.truncate(JSON.stringify(data, (key, value: unknown) =>
      MASKED_KEYS.has(key) ? "***" : value,
    ));
  }

  private truncate(value: string): string {
    if (value.length <= this.maxBodyLength) {
      return value;
    }
    return value.slice(0, this.maxBodyLength) + "...(truncated)";
  }
}
