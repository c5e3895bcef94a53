// ---------------------------------------------------------------------------
// Sigenergy cloud API — endpoints, fixed headers and response shapes
// ---------------------------------------------------------------------------

import { z } from "zod";

// ---- Constants --------------------------------------------------------------

export const DEFAULT_REGION = "aus";
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
/** A token is replaced once it is this close to expiry. */
export const TOKEN_REFRESH_MARGIN_MS = 300_000;
export const DEFAULT_TOKEN_LIFETIME_S = 3_600;

export const TOKEN_PATH = "/auth/oauth/token";
export const STATION_PATH = "/device/owner/station/home";
export const ENERGY_FLOW_PATH = "/device/sigen/station/energyflow/async";
export const STATISTICS_PATH = "/data-process/sigen/station/statistics/gains";

/** base64("sigen:sigen"), the app's fixed OAuth client credential. */
export const CLIENT_BASIC_CREDENTIAL = "c2lnZW46c2lnZW4=";
export const CLIENT_ID = "sigen";
export const CLIENT_VERSION = "3.4.0";

/** Response codes that mean the bearer token is no longer accepted. */
export const AUTH_FAILURE_CODES: ReadonlySet<number> = new Set([401, 40100, 40101]);

export enum CloudErrorCode {
  AUTH_FAILED = "AUTH_FAILED",
  API_ERROR = "API_ERROR",
}

export function buildBaseUrl(region: string = DEFAULT_REGION): string {
  return `https://api-${region}.sigencloud.com`;
}

// ---- Headers ------------------------------------------------------------------

/** Client-identification headers sent on every request. */
export function buildCommonHeaders(region: string = DEFAULT_REGION): Record<string, string> {
  const appOrigin = `https://app-${region}.sigencloud.com`;
  return {
    "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36",
    Accept: "*/*",
    Origin: appOrigin,
    Referer: `${appOrigin}/`,
    Lang: "en_US",
    "Sg-Bui": "1",
    "Sg-Env": "1",
    "Sg-Pkg": "sigen_app",
    Version: "RELEASE",
    "Client-Server": region,
  };
}

export function buildTokenHeaders(nowMs: number): Record<string, string> {
  return {
    "Content-Type": "application/x-www-form-urlencoded",
    Authorization: `Basic ${CLIENT_BASIC_CREDENTIAL}`,
    "Auth-Client-Id": CLIENT_ID,
    "Sg-V": CLIENT_VERSION,
    "Sg-Ts": String(nowMs),
  };
}

export function buildBearerHeaders(token: string, nowMs: number): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    "TENANT-ID": "1",
    "Auth-Client-Id": CLIENT_ID,
    "Sg-V": CLIENT_VERSION,
    "Sg-Ts": String(nowMs),
  };
}

// ---- Responses ----------------------------------------------------------------

/** Every endpoint wraps its payload as `{ code, msg, data }`; code 0 is success. */
export const CloudEnvelopeSchema = z.object({
  code: z.number().int(),
  msg: z.string().nullish(),
  data: z.unknown().optional(),
});

export type CloudEnvelope = z.infer<typeof CloudEnvelopeSchema>;

export const TokenDataSchema = z.object({
  access_token: z.string().default(""),
  expires_in: z.number().positive().default(DEFAULT_TOKEN_LIFETIME_S),
});

export const StationDataSchema = z.object({
  stationId: z.union([z.string(), z.number()]).transform(String).nullish(),
});

const reading = z.number().nullish();

/** Instantaneous power (W) and state of charge (%). Unknown fields are kept. */
export const EnergyFlowSchema = z
  .object({
    batterySoc: reading,
    batteryPower: reading,
    pvPower: reading,
    buySellPower: reading,
    loadPower: reading,
  })
  .passthrough();

export type EnergyFlow = z.infer<typeof EnergyFlowSchema>;

/** Cumulative generation totals (kWh). Unknown fields are kept. */
export const StatisticsSchema = z
  .object({
    dayGeneration: reading,
    monthGeneration: reading,
    yearGeneration: reading,
    lifetimeGeneration: reading,
  })
  .passthrough();

export type Statistics = z.infer<typeof StatisticsSchema>;

export interface CloudSnapshot {
  energyFlow: EnergyFlow;
  statistics: Statistics;
}

// ---- Options --------------------------------------------------------------------

export interface CloudCredentials {
  username: string;
  password: string;
}

export interface CloudClientOptions {
  credentials: CloudCredentials;
  /** Server region, e.g. `aus` or `eu`. Default: `aus`. */
  region?: string;
  /** Per-request timeout. Default: 15 000 ms. */
  timeoutMs?: number;
  /** Fetch implementation. Default: global `fetch`. */
  fetch?: typeof fetch;
  /** Clock in epoch milliseconds. Default: `Date.now`. */
  now?: () => number;
  /** Custom log function. Default: console.log. */
  logFn?: (message: string) => void;
}
