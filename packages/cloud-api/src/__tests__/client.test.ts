import { CloudClient } from "../client";
import { CloudApiError, CloudAuthError } from "../errors";
import type { CloudClientOptions } from "../protocol";

// ---------------------------------------------------------------------------
// In-process fake of the cloud API: routes by path, records every request
// ---------------------------------------------------------------------------

interface RecordedRequest {
  url: URL;
  method: string;
  headers: Headers;
  body: string;
}

type Responder = (req: RecordedRequest) => unknown;

const T0 = 1_700_000_000_000;

const TOKEN = "/auth/oauth/token";
const STATION = "/device/owner/station/home";
const ENERGY_FLOW = "/device/sigen/station/energyflow/async";
const STATISTICS = "/data-process/sigen/station/statistics/gains";

function ok(data: unknown): unknown {
  return { code: 0, msg: "success", data };
}

const defaultRoutes: Record<string, Responder> = {
  [TOKEN]: () => ok({ access_token: "tok-1", expires_in: 3600 }),
  [STATION]: () => ok({ stationId: 12345 }),
  [ENERGY_FLOW]: () => ok({ pvPower: 5200, batteryPower: -1200, buySellPower: 300, loadPower: 4300, batterySoc: 80.5 }),
  [STATISTICS]: () => ok({ dayGeneration: 12.3, monthGeneration: 250, yearGeneration: 3100, lifetimeGeneration: 9800.5 }),
};

function createFakeCloud(overrides: Record<string, Responder> = {}) {
  const routes: Record<string, Responder> = { ...defaultRoutes, ...overrides };
  const requests: RecordedRequest[] = [];

  const fetchFn = jest.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const req: RecordedRequest = {
      url: new URL(String(input)),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : "",
    };
    requests.push(req);
    const responder = routes[req.url.pathname];
    const payload = responder ? responder(req) : { code: 404, msg: "no route" };
    return new Response(JSON.stringify(payload));
  });

  const paths = () => requests.map((r) => r.url.pathname);
  const count = (path: string) => paths().filter((p) => p === path).length;

  return { fetchFn, requests, paths, count };
}

/** A fetch that only settles when its signal aborts. */
function hangingFetch(input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (signal) {
      signal.addEventListener("abort", () => reject(signal.reason));
    }
  });
}

describe("CloudClient", () => {
  let clock: number;
  let logs: string[];

  function makeClient(fetchFn: CloudClientOptions["fetch"], extra: Partial<CloudClientOptions> = {}) {
    return new CloudClient({
      credentials: { username: "owner@example.com", password: "test-secret" },
      fetch: fetchFn,
      now: () => clock,
      logFn: (m) => logs.push(m),
      ...extra,
    });
  }

  beforeEach(() => {
    clock = T0;
    logs = [];
  });

  // ---- authentication ------------------------------------------------------

  describe("authenticate", () => {
    it("posts a password grant with the client credential headers", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      await client.authenticate();

      expect(client.hasValidToken()).toBe(true);
      const [req] = cloud.requests;
      expect(req.method).toBe("POST");
      expect(req.url.toString()).toBe("https://api-aus.sigencloud.com/auth/oauth/token");
      expect(req.headers.get("authorization")).toBe("Basic c2lnZW46c2lnZW4=");
      expect(req.headers.get("content-type")).toBe("application/x-www-form-urlencoded");
      expect(req.headers.get("client-server")).toBe("aus");
      expect(req.headers.get("sg-ts")).toBe(String(T0));

      const form = new URLSearchParams(req.body);
      expect(form.get("grant_type")).toBe("password");
      expect(form.get("scope")).toBe("server");
      expect(form.get("username")).toBe("owner@example.com");
      expect(form.get("password")).toBe("test-secret");
    });

    it("rejects a non-zero response code", async () => {
      const cloud = createFakeCloud({ [TOKEN]: () => ({ code: 1, msg: "bad credentials" }) });
      const client = makeClient(cloud.fetchFn);

      const err = await client.authenticate().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CloudAuthError);
      expect(err).toHaveProperty("message", "Auth rejected by server (code=1, msg=bad credentials)");
      expect(client.hasValidToken()).toBe(false);
    });

    it("rejects a success envelope without an access token", async () => {
      const cloud = createFakeCloud({ [TOKEN]: () => ok({ expires_in: 3600 }) });
      const client = makeClient(cloud.fetchFn);

      await expect(client.authenticate()).rejects.toThrow("No access_token in auth response");
    });

    it("wraps transport failures", async () => {
      const fetchFn = jest.fn(async (): Promise<Response> => {
        throw new Error("ECONNREFUSED");
      });
      const client = makeClient(fetchFn);

      const err = await client.authenticate().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CloudAuthError);
      expect(err).toHaveProperty("message", "Auth request failed: ECONNREFUSED");
    });

    it("uses the configured region for the host and headers", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn, { region: "eu" });

      await client.authenticate();

      const [req] = cloud.requests;
      expect(req.url.host).toBe("api-eu.sigencloud.com");
      expect(req.headers.get("origin")).toBe("https://app-eu.sigencloud.com");
      expect(req.headers.get("client-server")).toBe("eu");
    });
  });

  // ---- token lifetime -------------------------------------------------------

  describe("token refresh", () => {
    it("reuses the token until it is within five minutes of expiry", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      await client.getEnergyFlow();
      clock = T0 + 3_299_000;
      await client.getEnergyFlow();

      expect(cloud.count(TOKEN)).toBe(1);
    });

    it("re-authenticates once inside the refresh margin", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      await client.getEnergyFlow();
      clock = T0 + 3_301_000;
      await client.getEnergyFlow();

      expect(cloud.count(TOKEN)).toBe(2);
    });

    it("honours a short expires_in", async () => {
      const cloud = createFakeCloud({ [TOKEN]: () => ok({ access_token: "tok-short", expires_in: 400 }) });
      const client = makeClient(cloud.fetchFn);

      await client.authenticate();
      expect(client.hasValidToken()).toBe(true);

      clock = T0 + 100_001;
      expect(client.hasValidToken()).toBe(false);
    });

    it("drops the token on an auth-class code and re-authenticates on the next call", async () => {
      let energyCalls = 0;
      const cloud = createFakeCloud({
        [ENERGY_FLOW]: () => {
          energyCalls += 1;
          return energyCalls === 1 ? { code: 40100, msg: "token expired" } : ok({ pvPower: 1000 });
        },
      });
      const client = makeClient(cloud.fetchFn);

      const err = await client.getEnergyFlow().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CloudApiError);
      expect(err).toHaveProperty("statusCode", 40100);
      expect(err).toHaveProperty("message", "Energy flow error (code=40100, msg=token expired)");
      expect(client.hasValidToken()).toBe(false);
      expect(logs).toContain("[CLOUD] Token rejected (code=40100), re-authenticating on next call");

      const flow = await client.getEnergyFlow();
      expect(flow.pvPower).toBe(1000);
      expect(cloud.count(TOKEN)).toBe(2);
    });

    it("keeps the token for other error codes", async () => {
      const cloud = createFakeCloud({ [STATISTICS]: () => ({ code: 500, msg: "internal" }) });
      const client = makeClient(cloud.fetchFn);

      const err = await client.getStatistics().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CloudApiError);
      expect(err).toHaveProperty("statusCode", 500);
      expect(err).toHaveProperty("statusMessage", "internal");
      expect(client.hasValidToken()).toBe(true);
    });
  });

  // ---- station --------------------------------------------------------------

  describe("getStationId", () => {
    it("stringifies a numeric id and caches it", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      expect(await client.getStationId()).toBe("12345");
      expect(await client.getStationId()).toBe("12345");
      expect(cloud.count(STATION)).toBe(1);
    });

    it("answers getResourceId from the same cache", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      expect(await client.getResourceId()).toBe("12345");
      expect(await client.getStationId()).toBe("12345");
      expect(cloud.count(STATION)).toBe(1);
    });

    it("sends the bearer token", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      await client.getStationId();

      const req = cloud.requests[1];
      expect(req.url.pathname).toBe(STATION);
      expect(req.method).toBe("GET");
      expect(req.headers.get("authorization")).toBe("Bearer tok-1");
      expect(req.headers.get("tenant-id")).toBe("1");
    });

    it("fails when the response carries no station id", async () => {
      const cloud = createFakeCloud({ [STATION]: () => ok({ stationName: "Home" }) });
      const client = makeClient(cloud.fetchFn);

      await expect(client.getStationId()).rejects.toThrow("No stationId in response");
    });

    it("fails when the station lookup is rejected", async () => {
      const cloud = createFakeCloud({ [STATION]: () => ({ code: 40101, msg: "unauthorized" }) });
      const client = makeClient(cloud.fetchFn);

      await expect(client.getStationId()).rejects.toThrow("Station lookup error (code=40101, msg=unauthorized)");
      expect(client.hasValidToken()).toBe(false);
    });
  });

  // ---- telemetry --------------------------------------------------------------

  describe("telemetry", () => {
    it("queries energy flow by station id with a refresh flag", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      const flow = await client.getEnergyFlow();

      expect(cloud.paths()).toEqual([TOKEN, STATION, ENERGY_FLOW]);
      const req = cloud.requests[2];
      expect(req.url.searchParams.get("id")).toBe("12345");
      expect(req.url.searchParams.get("refreshFlag")).toBe("true");
      expect(flow).toEqual({ pvPower: 5200, batteryPower: -1200, buySellPower: 300, loadPower: 4300, batterySoc: 80.5 });
    });

    it("queries statistics by station id", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      const stats = await client.getStatistics();

      expect(cloud.requests[2].url.searchParams.get("stationId")).toBe("12345");
      expect(stats.dayGeneration).toBe(12.3);
      expect(stats.lifetimeGeneration).toBe(9800.5);
    });

    it("keeps fields it does not model", async () => {
      const cloud = createFakeCloud({ [ENERGY_FLOW]: () => ok({ pvPower: 10, evPower: 7000 }) });
      const client = makeClient(cloud.fetchFn);

      expect(await client.getEnergyFlow()).toEqual({ pvPower: 10, evPower: 7000 });
    });

    it("treats a missing data payload as empty", async () => {
      const cloud = createFakeCloud({ [STATISTICS]: () => ({ code: 0, msg: "success" }) });
      const client = makeClient(cloud.fetchFn);

      expect(await client.getStatistics()).toEqual({});
    });

    it("fetchAll returns both payloads in one snapshot", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);

      const snapshot = await client.fetchAll();

      expect(snapshot.energyFlow.batterySoc).toBe(80.5);
      expect(snapshot.statistics.monthGeneration).toBe(250);
      expect(cloud.paths()).toEqual([TOKEN, STATION, ENERGY_FLOW, STATISTICS]);
    });

    it("fetchAll rethrows the first failure", async () => {
      const cloud = createFakeCloud({ [STATISTICS]: () => ({ code: 1001, msg: "station offline" }) });
      const client = makeClient(cloud.fetchFn);

      await expect(client.fetchAll()).rejects.toThrow("Statistics error (code=1001, msg=station offline)");
    });
  });

  // ---- timeouts and shutdown ---------------------------------------------------

  describe("timeouts and close", () => {
    it("aborts a request that exceeds the timeout", async () => {
      const client = makeClient(hangingFetch, { timeoutMs: 20 });

      await expect(client.authenticate()).rejects.toThrow("Auth request failed: timed out after 20 ms");
    });

    it("close aborts in-flight requests and forgets the session", async () => {
      const cloud = createFakeCloud();
      const client = makeClient(cloud.fetchFn);
      await client.getStationId();

      const hanging = makeClient(hangingFetch);
      const pending = hanging.authenticate();
      await hanging.close();
      await expect(pending).rejects.toThrow("Auth request failed: Client closed");

      await client.close();
      expect(client.hasValidToken()).toBe(false);
      await client.getStationId();
      expect(cloud.count(STATION)).toBe(2);
    });
  });
});
