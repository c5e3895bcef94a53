// ---------------------------------------------------------------------------
// Integration setup and teardown
// ---------------------------------------------------------------------------

import { CloudClient } from "@sigenbridge/cloud-api";
import type { CloudClientOptions, CloudSnapshot } from "@sigenbridge/cloud-api";
import { GatewayClient, LoggerInterceptor } from "@sigenbridge/local-gateway";
import type { GatewayConnectionOptions, ModbusTcpStatus } from "@sigenbridge/local-gateway";
import { resolveCloudCapability } from "./config";
import type { CloudCapability, IntegrationConfig } from "./config";
import { PollingCoordinator } from "./coordinator";
import { SetupNotReadyError, toError } from "./errors";

/** The slice of the local client the integration drives. */
export type LocalGateway = Pick<GatewayClient, "connect" | "disconnect" | "getStatus" | "setEnabled" | "setPort">;

/** The slice of the cloud client the integration drives. */
export type CloudSource = Pick<CloudClient, "fetchAll" | "close">;

export interface IntegrationOptions {
  /** Custom log function. Default: console.log. */
  logFn?: (message: string) => void;
  /** Start the pollers once setup succeeds. Default: true. */
  autoStart?: boolean;
  /** Extra local client settings (timeouts, heartbeat). */
  gateway?: Pick<GatewayConnectionOptions, "timeoutMs" | "openTimeoutMs" | "heartbeatMs">;
  /** Extra cloud client settings. */
  cloud?: Pick<CloudClientOptions, "timeoutMs" | "fetch" | "now">;
  createGateway?: (options: GatewayConnectionOptions, logFn: (message: string) => void) => LocalGateway;
  createCloud?: (options: CloudClientOptions) => CloudSource;
}

export interface IntegrationHandle {
  readonly config: IntegrationConfig;
  readonly cloudCapability: CloudCapability;
  readonly gateway: LocalGateway;
  readonly local: PollingCoordinator<ModbusTcpStatus>;
  /** `null` when the cloud capability is not configured. */
  readonly cloud: PollingCoordinator<CloudSnapshot> | null;
  /** Toggle the on-device Modbus TCP server, then re-poll its status. */
  setModbusEnabled(enabled: boolean): Promise<void>;
  /** Change the Modbus TCP port, then re-poll its status. */
  setModbusPort(port: number): Promise<void>;
  /** Stop both pollers and release both clients. Safe to call twice. */
  teardown(): Promise<void>;
}

function defaultGateway(options: GatewayConnectionOptions, logFn: (message: string) => void): LocalGateway {
  return new GatewayClient(options, [new LoggerInterceptor({ logFn })]);
}

function defaultCloud(options: CloudClientOptions): CloudSource {
  return new CloudClient(options);
}

/**
 * Bring up the local gateway (required) and the cloud poller (optional).
 *
 * The local side must connect and complete one poll or setup fails with
 * {@link SetupNotReadyError}. The cloud side never fails setup: a failed first
 * poll is logged and the poller keeps retrying on its interval.
 */
export async function setupIntegration(
  config: IntegrationConfig,
  options: IntegrationOptions = {},
): Promise<IntegrationHandle> {
  const logFn = options.logFn ?? console.log;
  const createGateway = options.createGateway ?? defaultGateway;
  const createCloud = options.createCloud ?? defaultCloud;

  // ── Local gateway ─────────────────────────────────────────────────────────
  const gateway = createGateway(
    {
      host: config.host,
      port: config.port,
      credentials: { username: config.username, password: config.password },
      serial: config.serial,
      ...options.gateway,
    },
    logFn,
  );

  try {
    await gateway.connect();
  } catch (err) {
    throw new SetupNotReadyError(`Cannot connect to local gateway: ${toError(err).message}`, { cause: err });
  }

  const local = new PollingCoordinator<ModbusTcpStatus>({
    name: "local",
    // Reconnects first when the socket has dropped since the last poll.
    update: async () => {
      await gateway.connect();
      return gateway.getStatus();
    },
    intervalSeconds: config.scanIntervalSeconds,
    errorPrefix: "Local gateway error: ",
    logFn,
  });

  try {
    await local.firstRefresh();
  } catch (err) {
    await gateway.disconnect();
    throw new SetupNotReadyError(`Local gateway not ready: ${toError(err).message}`, { cause: err });
  }

  // ── Cloud API ───────────────────────────────────────────────────────────────
  const cloudCapability = resolveCloudCapability(config);
  let cloudClient: CloudSource | null = null;
  let cloud: PollingCoordinator<CloudSnapshot> | null = null;

  if (cloudCapability.state === "configured") {
    const client = createCloud({
      credentials: { username: cloudCapability.username, password: cloudCapability.password },
      region: cloudCapability.region,
      logFn,
      ...options.cloud,
    });
    cloudClient = client;
    cloud = new PollingCoordinator<CloudSnapshot>({
      name: "cloud",
      update: () => client.fetchAll(),
      intervalSeconds: config.scanIntervalSeconds,
      errorPrefix: "Cloud API error: ",
      logFn,
    });

    const first = await cloud.refresh();
    if (!first.ok) {
      logFn(`[SETUP] Cloud API unavailable at startup, will retry: ${first.error.message}`);
    }
  } else if (cloudCapability.state === "invalid") {
    logFn(`[SETUP] Cloud polling disabled: ${cloudCapability.reason}`);
  } else {
    logFn("[SETUP] No cloud credentials, running local-only");
  }

  if (options.autoStart ?? true) {
    local.start();
    cloud?.start();
  }

  let tornDown = false;

  return {
    config,
    cloudCapability,
    gateway,
    local,
    cloud,

    async setModbusEnabled(enabled: boolean): Promise<void> {
      await gateway.setEnabled(enabled);
      await local.refresh();
    },

    async setModbusPort(port: number): Promise<void> {
      await gateway.setPort(port);
      await local.refresh();
    },

    async teardown(): Promise<void> {
      if (tornDown) return;
      tornDown = true;
      local.stop();
      cloud?.stop();
      await gateway.disconnect();
      await cloudClient?.close();
    },
  };
}
