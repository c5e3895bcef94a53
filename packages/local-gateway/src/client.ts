// ---------------------------------------------------------------------------
// GatewayClient — WebSocket client for the Sigenergy gateway control channel
// ---------------------------------------------------------------------------

import { EventEmitter } from "events";
import WebSocket from "ws";
import { v4 as uuidv4 } from "uuid";

import { InterceptorChain } from "./interceptors/chain";
import type { GatewayInterceptor, OutboundMessage, GatewayInterceptorEvent } from "./interceptors/interface";

import type {
  AuthRequestData,
  GatewayConnectionOptions,
  GatewayEnvelope,
  GatewayFrame,
  ModbusFlag,
  ModbusTcpSetData,
  ModbusTcpStatus,
  RequestOptions,
} from "./protocol";
import {
  AuthResultSchema,
  DEFAULT_HEARTBEAT_MS,
  DEFAULT_MODBUS_PORT,
  DEFAULT_OPEN_TIMEOUT_MS,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  GatewayFrameSchema,
  MAX_MODBUS_PORT,
  MIN_MODBUS_PORT,
  MODBUS_TCP_SERVICE,
  MessageType,
  ModbusPortSchema,
  ModbusTcpStatusSchema,
  buildGatewayUrl,
  toModbusFlag,
} from "./protocol";
import {
  GatewayError,
  GatewayAuthError,
  GatewayCommandRejectedError,
  GatewayConnectionError,
  GatewayConnectionLostError,
  GatewayProtocolError,
  GatewayTimeoutError,
} from "./errors";

const CLOSE_TIMEOUT_MS = 3_000;

// ---- Pending call tracker ---------------------------------------------------

interface PendingCall {
  /** Correlation id of the outbound message, for interceptors. */
  id: string;
  resolve: (frame: GatewayFrame) => void;
  reject: (reason: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ---- Client -------------------------------------------------------------------

/**
 * Owns one WebSocket to the gateway. Requests are correlated with responses
 * by message kind: each call registers the response kind it expects and the
 * reader settles it with the first inbound frame of that kind. Calls that
 * expect the same kind are queued so only one of them is ever pending.
 *
 * Events:
 * - `push` ({@link GatewayInterceptorEvent}) for unsolicited PUSH frames
 * - `disconnect` (close code) whenever the socket closes
 */
export class GatewayClient extends EventEmitter {
  private readonly url: string;
  private readonly options: GatewayConnectionOptions;
  private readonly timeoutMs: number;
  private readonly openTimeoutMs: number;
  private readonly heartbeatMs: number;

  private ws: WebSocket | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private token = "";
  private serialNumber: string;

  private readonly pending = new Map<number, PendingCall>();
  private readonly lanes = new Map<number, Promise<void>>();
  /** Bumped whenever the connection is lost or dropped; queued calls compare against it. */
  private generation = 0;
  private connecting: Promise<void> | null = null;

  private readonly interceptorChain: InterceptorChain;

  constructor(options: GatewayConnectionOptions, interceptors?: GatewayInterceptor[]) {
    super();
    this.options = options;
    this.url = buildGatewayUrl(options.host, options.port);
    this.serialNumber = options.serial ?? "";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;
    this.openTimeoutMs = options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.interceptorChain = new InterceptorChain(interceptors);
  }

  /** Gateway serial number, possibly learned during authentication. */
  get serial(): string {
    return this.serialNumber;
  }

  /** Number of calls currently waiting for a response. */
  get pendingCount(): number {
    return this.pending.size;
  }

  hasPending(responseKind: number): boolean {
    return this.pending.has(responseKind);
  }

  /** `true` once the socket is open and the gateway has issued a token. */
  isConnected(): boolean {
    return this.isOpen() && this.token !== "";
  }

  // ------------------------------------------------------------------
  // Connection lifecycle
  // ------------------------------------------------------------------

  /**
   * Open the WebSocket, start the reader and authenticate. If authentication
   * fails the socket is closed again before the error is rethrown. Returns at
   * once when already connected; concurrent calls share one attempt.
   */
  connect(): Promise<void> {
    if (this.isConnected()) {
      return Promise.resolve();
    }
    if (!this.connecting) {
      this.connecting = this.establish().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * Stop the reader and close the socket. Every pending call is rejected with
   * {@link GatewayConnectionLostError} before this returns control.
   */
  async disconnect(): Promise<void> {
    const ws = this.ws;
    this.ws = null;
    this.token = "";
    this.stopHeartbeat();
    this.rejectAllPending("Client disconnected");

    if (!ws) {
      return;
    }

    ws.removeAllListeners("message");
    await this.closeSocket(ws);
  }

  // ------------------------------------------------------------------
  // Modbus TCP service
  // ------------------------------------------------------------------

  /** Query the Modbus TCP server settings. */
  async getStatus(): Promise<ModbusTcpStatus> {
    const response = await this.request(MessageType.GET, MessageType.RESPONSE, {
      service: MODBUS_TCP_SERVICE,
    });

    if (Object.keys(response.data).length === 0) {
      throw new GatewayProtocolError(
        `Empty data in Modbus TCP status response (code=${response.code ?? "none"})`,
      );
    }

    const parsed = ModbusTcpStatusSchema.safeParse(response.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new GatewayProtocolError(
        `Malformed Modbus TCP status: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid payload"}`,
      );
    }
    return parsed.data;
  }

  /**
   * Turn the gateway's Modbus TCP server on or off. The configured port is
   * read first and written back unchanged; if it cannot be read, 502 is used.
   */
  async setEnabled(enabled: boolean): Promise<void> {
    let port = DEFAULT_MODBUS_PORT;
    try {
      port = (await this.getStatus()).modbusPort;
    } catch (err) {
      await this.reportFallback(err, `port ${DEFAULT_MODBUS_PORT}`);
    }

    await this.writeModbusSettings(toModbusFlag(enabled), port);
  }

  /**
   * Change the Modbus TCP listening port, keeping the current enable flag
   * (disabled if it cannot be read).
   */
  async setPort(port: number): Promise<void> {
    if (!ModbusPortSchema.safeParse(port).success) {
      throw new RangeError(
        `Modbus TCP port must be an integer between ${MIN_MODBUS_PORT} and ${MAX_MODBUS_PORT}, got ${port}`,
      );
    }

    let flag: ModbusFlag = 0;
    try {
      flag = (await this.getStatus()).modbusEnable;
    } catch (err) {
      await this.reportFallback(err, "disabled");
    }

    await this.writeModbusSettings(flag, port);
  }

  // ------------------------------------------------------------------
  // Request/response correlation
  // ------------------------------------------------------------------

  /**
   * Send a frame of kind `msgType` and resolve with the next inbound frame of
   * kind `expect`. A call expecting a kind that is already pending waits for
   * the earlier call to settle before its frame is written; if the connection
   * it was queued on is lost meanwhile, it fails without being written.
   */
  request(
    msgType: number,
    expect: number,
    data: Record<string, unknown>,
    options?: RequestOptions,
  ): Promise<GatewayFrame> {
    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;
    const previous = this.lanes.get(expect) ?? Promise.resolve();
    const generation = this.generation;

    const turn = previous
      .then(() => {
        if (this.generation !== generation) {
          throw new GatewayConnectionLostError("WebSocket connection lost");
        }
        return this.exchange(msgType, expect, data, timeoutMs);
      })
      .finally(() => {
        if (this.lanes.get(expect) === tail) {
          this.lanes.delete(expect);
        }
      });
    const tail = turn.then(
      () => undefined,
      () => undefined,
    );
    this.lanes.set(expect, tail);

    return turn;
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async establish(): Promise<void> {
    await this.open();

    try {
      await this.authenticate();
    } catch (err) {
      await this.disconnect();
      throw err;
    }
  }

  private isOpen(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  private async authenticate(): Promise<void> {
    const { username, password } = this.options.credentials;
    const data: AuthRequestData = { username, password };
    const response = await this.request(MessageType.AUTH, MessageType.AUTH_RESP, { ...data });

    const parsed = AuthResultSchema.safeParse(response.data);
    const token = parsed.success ? parsed.data.token : "";
    if (!token) {
      throw new GatewayAuthError(
        `Authentication failed: no token in response (code=${response.code ?? "none"}, msg=${response.msg || "unknown"})`,
      );
    }

    this.token = token;
    if (parsed.success && parsed.data.sn && !this.serialNumber) {
      this.serialNumber = parsed.data.sn;
    }
  }

  private async writeModbusSettings(flag: ModbusFlag, port: number): Promise<void> {
    const data: ModbusTcpSetData = {
      service: MODBUS_TCP_SERVICE,
      modbusEnable: flag,
      modbusPort: port,
    };
    const response = await this.request(MessageType.SET, MessageType.RESPONSE, { ...data });

    // An ack without a code is not an acceptance.
    const code = response.code ?? -1;
    if (code !== 0) {
      const statusMessage = response.msg || "unknown";
      throw new GatewayCommandRejectedError(
        `Gateway rejected Modbus TCP settings (code=${code}, msg=${statusMessage})`,
        code,
        statusMessage,
      );
    }
  }

  /** Only gateway errors fall back to a default; anything else is a bug. */
  private async reportFallback(err: unknown, fallback: string): Promise<void> {
    if (!(err instanceof GatewayError)) {
      throw err;
    }
    await this.interceptorChain.report(
      new GatewayError(`Could not read Modbus TCP status, using ${fallback}: ${err.message}`, err.code),
      { phase: "inbound" },
    );
  }

  private async exchange(
    msgType: number,
    expect: number,
    data: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<GatewayFrame> {
    if (!this.isOpen()) {
      throw new GatewayConnectionError("WebSocket is not connected");
    }

    const outbound: OutboundMessage = {
      id: uuidv4(),
      msgType,
      expect,
      sn: this.serialNumber,
      data,
    };
    if (msgType !== MessageType.AUTH) {
      outbound.token = this.token;
    }

    const processed = await this.interceptorChain.outbound(outbound);

    const envelope: GatewayEnvelope = { msgType: processed.msgType, sn: processed.sn, data: processed.data };
    if (processed.token !== undefined) {
      envelope.token = processed.token;
    }

    return new Promise<GatewayFrame>((resolve, reject) => {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) {
        reject(new GatewayConnectionError("WebSocket is not connected"));
        return;
      }

      const timer = setTimeout(() => {
        if (this.pending.get(expect)?.id === processed.id) {
          this.pending.delete(expect);
        }
        reject(new GatewayTimeoutError(`Timeout waiting for msgType=${expect} from gateway`));
      }, timeoutMs);

      this.pending.set(expect, { id: processed.id, resolve, reject, timer });

      ws.send(JSON.stringify(envelope), (err) => {
        if (!err) return;
        const entry = this.pending.get(expect);
        if (entry?.id === processed.id) {
          clearTimeout(entry.timer);
          this.pending.delete(expect);
          entry.reject(new GatewayConnectionLostError(`Failed to send msgType=${msgType}: ${err.message}`));
        }
      });
    });
  }

  private open(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(this.url, { handshakeTimeout: this.openTimeoutMs });
      } catch (err) {
        reject(new GatewayConnectionError(`Failed to create WebSocket: ${toError(err).message}`));
        return;
      }

      const cleanup = () => {
        ws.removeListener("open", onOpen);
        ws.removeListener("error", onError);
        ws.removeListener("close", onClose);
      };

      const onOpen = () => {
        cleanup();
        this.ws = ws;
        this.attachListeners(ws);
        this.startHeartbeat(ws);
        resolve();
      };

      // ws closes the socket on its own after a handshake error.
      const onError = (err: Error) => {
        cleanup();
        reject(new GatewayConnectionError(`WebSocket connect failed: ${err.message}`));
      };

      const onClose = () => {
        cleanup();
        reject(new GatewayConnectionError("Connection closed before it was opened"));
      };

      ws.once("open", onOpen);
      ws.once("error", onError);
      ws.once("close", onClose);
    });
  }

  /**
   * The reader: decodes each frame and settles the call waiting for its kind.
   */
  private attachListeners(ws: WebSocket): void {
    ws.on("message", (raw: WebSocket.RawData, isBinary: boolean) => {
      this.handleMessage(raw, isBinary);
    });

    ws.on("close", (code: number) => {
      // A socket dropped by disconnect() has already been detached.
      if (this.ws === ws) {
        this.ws = null;
        this.token = "";
        this.stopHeartbeat();
        this.rejectAllPending("WebSocket connection lost");
      }
      this.emit("disconnect", code);
    });

    ws.on("error", (err: Error) => {
      void this.interceptorChain.report(
        new GatewayConnectionError(err.message),
        { phase: "transport" },
      );
    });
  }

  private handleMessage(raw: WebSocket.RawData, isBinary: boolean): void {
    const text = raw.toString();
    if (isBinary) {
      this.reportDecodeError("binary frames are not part of the protocol", text);
      return;
    }

    let frame: GatewayFrame;
    try {
      frame = GatewayFrameSchema.parse(JSON.parse(text));
    } catch (err) {
      this.reportDecodeError(toError(err).message, text);
      return;
    }

    const pending = this.pending.get(frame.msgType);
    if (!pending) {
      this.handleUnsolicited({ msgType: frame.msgType, data: frame.data });
      return;
    }

    clearTimeout(pending.timer);
    this.pending.delete(frame.msgType);

    this.interceptorChain
      .inbound({ id: pending.id, ...frame })
      .then((processed) => {
        pending.resolve({
          msgType: processed.msgType,
          code: processed.code,
          msg: processed.msg,
          data: processed.data,
        });
      })
      .catch((err: unknown) => {
        pending.reject(toError(err));
      });
  }

  private handleUnsolicited(event: GatewayInterceptorEvent): void {
    void this.interceptorChain.event(event);
    if (event.msgType === MessageType.PUSH) {
      this.emit("push", event);
    }
  }

  private reportDecodeError(reason: string, raw: string): void {
    void this.interceptorChain.report(
      new GatewayProtocolError(`Discarded undecodable frame: ${reason}`),
      { phase: "decode", raw },
    );
  }

  // ------------------------------------------------------------------
  // Keepalive
  // ------------------------------------------------------------------

  private startHeartbeat(ws: WebSocket): void {
    if (this.heartbeatMs <= 0) {
      return;
    }

    let alive = true;
    ws.on("pong", () => {
      alive = true;
    });

    this.heartbeatTimer = setInterval(() => {
      if (!alive) {
        void this.interceptorChain.report(
          new GatewayConnectionLostError("No pong received from gateway"),
          { phase: "transport" },
        );
        ws.terminate();
        return;
      }
      alive = false;
      ws.ping();
    }, this.heartbeatMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  // ------------------------------------------------------------------
  // Cleanup helpers
  // ------------------------------------------------------------------

  private rejectAllPending(reason: string): void {
    this.generation += 1;
    for (const [kind, pending] of this.pending) {
      clearTimeout(pending.timer);
      this.pending.delete(kind);
      pending.reject(new GatewayConnectionLostError(reason));
    }
  }

  private closeSocket(ws: WebSocket): Promise<void> {
    return new Promise((resolve) => {
      if (ws.readyState === WebSocket.CLOSED) {
        resolve();
        return;
      }

      // Force-terminate if the closing handshake does not complete.
      const timer = setTimeout(() => {
        ws.terminate();
        resolve();
      }, CLOSE_TIMEOUT_MS);

      ws.once("close", () => {
        clearTimeout(timer);
        resolve();
      });

      if (ws.readyState !== WebSocket.CLOSING) {
        ws.close();
      }
    });
  }
}
