import {
  debugFlagsForLogLevel,
  isLogLevel,
  parseDebugEnv,
  type DebugFlag,
  type LogLevel,
} from "./debug";
import { DEFAULT_PEER_ADDRESS_BLOCK, DEFAULT_PEER_LISTEN_PORT } from "./peer/allocator";
import { DEFAULT_WIREGUARD_INTERFACE } from "./peer/wireguard";
import { DEFAULT_MAX_TUNNELS } from "./tunnel/registry";
import { parseIPv4Cidr } from "./utils/ip";

type Env = Record<string, string | undefined>;

export type AgentConfig = {
  api: {
    host: string;
    port: number;
    basePath: string;
  };
  public: {
    host: string;
    /** http listener port */
    httpPort: number;
    /** tcp listener port */
    tcpPort: number;
  };
  tls: {
    enabled: boolean;
    certPath?: string;
    keyPath?: string;
    selfSigned: boolean;
  };
  tunnels: {
    maxTunnels: number;
    /** backend address for tunnels without a peer */
    targetHost: string;
  };
  wireguard: {
    interfaceName: string;
    addressBlock: string;
    listenPort: number;
  };
  /** drain window for listeners in `ms` */
  shutdownTimeoutMs: number;
  logLevel: LogLevel;
  /** enabled debug components; `TUNNELGATE_DEBUG` or derived from `logLevel` */
  debug: Set<DebugFlag>;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function getEnvStr(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined ? fallback : value;
}

/** Integer env value; unparsable values fall back. */
export function getEnvInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  if (!/^-?[0-9]+$/.test(raw.trim())) return fallback;
  return Number.parseInt(raw, 10);
}

export function getEnvBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "1" || raw === "true" || raw === "yes" || raw === "on") return true;
  if (raw === "0" || raw === "false" || raw === "no" || raw === "off") return false;
  return fallback;
}

function assertPort(name: string, port: number) {
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`invalid ${name}: ${port}`);
  }
}

function normalizeBasePath(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, "");
  if (!trimmed) return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

/**
 * Load agent configuration from environment variables.
 */
export function loadConfig(env: Env = process.env): AgentConfig {
  const rawLevel = getEnvStr(env, "LOG_LEVEL", "info").trim().toLowerCase() || "info";
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError(`invalid log level: ${rawLevel}`);
  }
  const debugEnv = env.TUNNELGATE_DEBUG?.trim();
  const httpPort = getEnvInt(env, "PUBLIC_PORT", 443);
  const apiPort = getEnvInt(env, "API_PORT", 8080);
  const tcpPort = getEnvInt(env, "TCP_PORT", httpPort + 1);
  const certPath = getEnvStr(env, "TLS_CERT_PATH", "") || undefined;
  const keyPath = getEnvStr(env, "TLS_KEY_PATH", "") || undefined;

  const config: AgentConfig = {
    api: {
      host: getEnvStr(env, "API_HOST", "0.0.0.0"),
      port: apiPort,
      basePath: normalizeBasePath(getEnvStr(env, "API_BASE_PATH", "/api")),
    },
    public: {
      host: getEnvStr(env, "PUBLIC_HOST", "0.0.0.0"),
      httpPort,
      tcpPort,
    },
    tls: {
      enabled: getEnvBool(env, "TLS_ENABLED", Boolean(certPath || keyPath)),
      ...(certPath ? { certPath } : {}),
      ...(keyPath ? { keyPath } : {}),
      selfSigned: getEnvBool(env, "TLS_SELF_SIGNED", false),
    },
    tunnels: {
      maxTunnels: getEnvInt(env, "MAX_TUNNELS", DEFAULT_MAX_TUNNELS),
      targetHost: getEnvStr(env, "TUNNEL_TARGET_HOST", "127.0.0.1"),
    },
    wireguard: {
      interfaceName: getEnvStr(env, "WG_INTERFACE", DEFAULT_WIREGUARD_INTERFACE),
      addressBlock: getEnvStr(env, "WG_ADDRESS_BLOCK", DEFAULT_PEER_ADDRESS_BLOCK),
      listenPort: getEnvInt(env, "WG_LISTEN_PORT", DEFAULT_PEER_LISTEN_PORT),
    },
    shutdownTimeoutMs: getEnvInt(env, "SHUTDOWN_TIMEOUT_SECONDS", 30) * 1000,
    logLevel: rawLevel,
    debug: debugEnv ? parseDebugEnv(debugEnv) : debugFlagsForLogLevel(rawLevel),
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: AgentConfig) {
  assertPort("API port", config.api.port);
  assertPort("public port", config.public.httpPort);
  assertPort("TCP port", config.public.tcpPort);
  assertPort("WireGuard listen port", config.wireguard.listenPort);

  if (config.public.httpPort === config.api.port) {
    throw new ConfigError(`public port ${config.public.httpPort} must differ from the API port`);
  }
  if (config.public.tcpPort === config.public.httpPort) {
    throw new ConfigError(`TCP port ${config.public.tcpPort} must differ from the public port`);
  }
  if (config.public.tcpPort === config.api.port) {
    throw new ConfigError(`TCP port ${config.public.tcpPort} must differ from the API port`);
  }

  if (!Number.isInteger(config.tunnels.maxTunnels) || config.tunnels.maxTunnels <= 0) {
    throw new ConfigError(`invalid max tunnels: ${config.tunnels.maxTunnels}`);
  }

  if (Boolean(config.tls.certPath) !== Boolean(config.tls.keyPath)) {
    throw new ConfigError("both TLS certificate and key must be provided");
  }
  if (config.tls.enabled && !config.tls.certPath && !config.tls.selfSigned) {
    throw new ConfigError("TLS is enabled but neither certificate files nor TLS_SELF_SIGNED are set");
  }

  const block = parseIPv4Cidr(config.wireguard.addressBlock);
  if (!block || block.prefixLength > 30) {
    throw new ConfigError(`invalid WireGuard address block: ${config.wireguard.addressBlock}`);
  }

  if (config.shutdownTimeoutMs < 0) {
    throw new ConfigError(`invalid shutdown timeout: ${config.shutdownTimeoutMs / 1000}s`);
  }
}
