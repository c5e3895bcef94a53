// ---------------------------------------------------------------------------
// CloudClient — REST client for the Sigenergy cloud telemetry API
// ---------------------------------------------------------------------------

import type { CloudClientOptions, CloudCredentials, CloudSnapshot, EnergyFlow, Statistics } from "./protocol";
import {
  AUTH_FAILURE_CODES,
  CloudEnvelopeSchema,
  DEFAULT_REGION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  ENERGY_FLOW_PATH,
  EnergyFlowSchema,
  STATION_PATH,
  STATISTICS_PATH,
  StationDataSchema,
  StatisticsSchema,
  TOKEN_PATH,
  TOKEN_REFRESH_MARGIN_MS,
  TokenDataSchema,
  buildBaseUrl,
  buildBearerHeaders,
  buildCommonHeaders,
  buildTokenHeaders,
} from "./protocol";
import { CloudApiError, CloudAuthError } from "./errors";

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Holds one session against the cloud API: an OAuth2 password-grant token
 * that is replaced shortly before it expires, and the account's station id,
 * looked up once and kept for the lifetime of the client.
 *
 * There is no background work. Concurrent calls share the token; two of them
 * may both decide to re-authenticate, which costs a redundant token request
 * and nothing else.
 */
export class CloudClient {
  private readonly credentials: CloudCredentials;
  private readonly region: string;
  private readonly baseUrl: string;
  private readonly commonHeaders: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;
  private readonly logFn: (message: string) => void;

  private accessToken = "";
  private expiresAt = 0;
  private stationId = "";
  private readonly inflight = new Set<AbortController>();

  constructor(options: CloudClientOptions) {
    this.credentials = options.credentials;
    this.region = options.region ?? DEFAULT_REGION;
    this.baseUrl = buildBaseUrl(this.region);
    this.commonHeaders = buildCommonHeaders(this.region);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.logFn = options.logFn ?? console.log;
  }

  /** `true` while a token is held that is not yet due for refresh. */
  hasValidToken(): boolean {
    return this.accessToken !== "" && !this.isNearExpiry();
  }

  // ------------------------------------------------------------------
  // Authentication
  // ------------------------------------------------------------------

  /** Exchange the account credentials for an access token. */
  async authenticate(): Promise<void> {
    const { username, password } = this.credentials;
    const body = new URLSearchParams({
      scope: "server",
      grant_type: "password",
      userDeviceId: String(this.now()),
      username,
      password,
    });

    this.logFn(`[CLOUD] Authenticating as ${username} (region=${this.region})`);

    let raw: unknown;
    try {
      raw = await this.call(`${this.baseUrl}${TOKEN_PATH}`, {
        method: "POST",
        headers: { ...this.commonHeaders, ...buildTokenHeaders(this.now()) },
        body: body.toString(),
      });
    } catch (err) {
      throw new CloudAuthError(`Auth request failed: ${toError(err).message}`);
    }

    const envelope = CloudEnvelopeSchema.safeParse(raw);
    if (!envelope.success || envelope.data.code !== 0) {
      const code = envelope.success ? envelope.data.code : "none";
      const msg = envelope.success ? envelope.data.msg ?? "unknown" : "unrecognised response";
      throw new CloudAuthError(`Auth rejected by server (code=${code}, msg=${msg})`);
    }

    const token = TokenDataSchema.safeParse(envelope.data.data ?? {});
    if (!token.success || !token.data.access_token) {
      throw new CloudAuthError("No access_token in auth response");
    }

    this.accessToken = token.data.access_token;
    this.expiresAt = this.now() + token.data.expires_in * 1000;
    this.logFn("[CLOUD] Authenticated");
  }

  // ------------------------------------------------------------------
  // Station
  // ------------------------------------------------------------------

  /** Resolve the account's station id; every telemetry query is keyed by it. */
  async getStationId(): Promise<string> {
    if (this.stationId) {
      return this.stationId;
    }

    await this.ensureAuthenticated();
    const data = await this.getData("Station lookup", STATION_PATH);

    const parsed = StationDataSchema.safeParse(data);
    const stationId = parsed.success ? parsed.data.stationId ?? "" : "";
    if (!stationId) {
      throw new CloudApiError("No stationId in response");
    }

    this.stationId = stationId;
    this.logFn(`[CLOUD] Station id ${stationId}`);
    return stationId;
  }

  /** Alias of {@link getStationId} under the account-resource name. */
  getResourceId(): Promise<string> {
    return this.getStationId();
  }

  // ------------------------------------------------------------------
  // Telemetry
  // ------------------------------------------------------------------

  /** Live power flows (W) and battery state of charge (%). */
  async getEnergyFlow(): Promise<EnergyFlow> {
    await this.ensureAuthenticated();
    const stationId = await this.getStationId();
    const data = await this.getData("Energy flow", ENERGY_FLOW_PATH, {
      id: stationId,
      refreshFlag: "true",
    });

    const parsed = EnergyFlowSchema.safeParse(data);
    if (!parsed.success) {
      throw new CloudApiError(`Energy flow payload malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  /** Generation totals (kWh) for the day, month, year and lifetime. */
  async getStatistics(): Promise<Statistics> {
    await this.ensureAuthenticated();
    const stationId = await this.getStationId();
    const data = await this.getData("Statistics", STATISTICS_PATH, { stationId });

    const parsed = StatisticsSchema.safeParse(data);
    if (!parsed.success) {
      throw new CloudApiError(`Statistics payload malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  /** Energy flow then statistics; the first failure is rethrown as is. */
  async fetchAll(): Promise<CloudSnapshot> {
    const energyFlow = await this.getEnergyFlow();
    const statistics = await this.getStatistics();
    return { energyFlow, statistics };
  }

  /** Abort in-flight requests and forget the session. */
  async close(): Promise<void> {
    for (const controller of this.inflight) {
      controller.abort(new Error("Client closed"));
    }
    this.inflight.clear();
    this.invalidateToken();
    this.stationId = "";
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private isNearExpiry(): boolean {
    return this.now() > this.expiresAt - TOKEN_REFRESH_MARGIN_MS;
  }

  private async ensureAuthenticated(): Promise<void> {
    if (!this.accessToken || this.isNearExpiry()) {
      await this.authenticate();
    }
  }

  private invalidateToken(): void {
    this.accessToken = "";
    this.expiresAt = 0;
  }

  /**
   * Authenticated GET returning the envelope's `data`. Auth-class codes drop
   * the token so that the next call starts with a fresh one.
   */
  private async getData(label: string, path: string, params?: Record<string, string>): Promise<unknown> {
    const query = params ? `?${new URLSearchParams(params).toString()}` : "";

    let raw: unknown;
    try {
      raw = await this.call(`${this.baseUrl}${path}${query}`, {
        method: "GET",
        headers: { ...this.commonHeaders, ...buildBearerHeaders(this.accessToken, this.now()) },
      });
    } catch (err) {
      throw new CloudApiError(`${label} request failed: ${toError(err).message}`);
    }

    const envelope = CloudEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new CloudApiError(`${label} returned an unrecognised response`);
    }

    const { code, msg, data } = envelope.data;
    if (code !== 0) {
      if (AUTH_FAILURE_CODES.has(code)) {
        this.logFn(`[CLOUD] Token rejected (code=${code}), re-authenticating on next call`);
        this.invalidateToken();
      }
      const statusMessage = msg ?? "unknown";
      throw new CloudApiError(`${label} error (code=${code}, msg=${statusMessage})`, code, statusMessage);
    }

    return data ?? {};
  }

  /**
   * One request with the per-call timeout. The body is parsed as JSON
   * whatever the HTTP status; the API reports failures in the envelope.
   */
  private async call(url: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new Error(`timed out after ${this.timeoutMs} ms`));
    }, this.timeoutMs);
    this.inflight.add(controller);

    try {
      const response = await this.fetchFn(url, { ...init, signal: controller.signal });
      const body: unknown = await response.json();
      return body;
    } finally {
      clearTimeout(timer);
      this.inflight.delete(controller);
    }
  }
}
