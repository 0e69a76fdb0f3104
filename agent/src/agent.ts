import { EventEmitter } from "node:events";

import { ManagementApi } from "./api/server";
import type { AgentConfig } from "./config";
import {
  createDebugLogger,
  stripTrailingNewline,
  type DebugComponent,
  type DebugLogFn,
} from "./debug";
import { formatError } from "./errors";
import { PeerAddressAllocator } from "./peer/allocator";
import type { PeerNetwork } from "./peer/types";
import { WireGuardNetwork } from "./peer/wireguard";
import { HttpDispatcher } from "./proxy/http";
import { TcpDispatcher } from "./proxy/tcp";
import { loadTlsMaterial } from "./proxy/tls";
import { RouteTable } from "./routing/table";
import { TunnelRegistry } from "./tunnel/registry";
import { TunnelService } from "./tunnel/service";
import type { ListenAddress } from "./utils/net";

export type EdgeAgentOptions = {
  config: AgentConfig;
  /** peer capability; defaults to the `wg` command line */
  peerNetwork?: PeerNetwork;
  version?: string;
};

export type EdgeAgentAddresses = {
  api: ListenAddress;
  http: ListenAddress;
  tcp: ListenAddress;
};

/**
 * Composes the routing table, tunnel registry, peer allocator, traffic
 * dispatchers and management api into one process-level object.
 *
 * Emits `("debug", component, message)` and `("log", line)` for every enabled
 * debug line.
 */
export class EdgeAgent extends EventEmitter {
  readonly config: AgentConfig;
  readonly routes: RouteTable;
  readonly allocator: PeerAddressAllocator;
  readonly registry: TunnelRegistry;
  readonly service: TunnelService;
  private readonly debugLog: DebugLogFn;
  private http: HttpDispatcher | null = null;
  private tcp: TcpDispatcher | null = null;
  private api: ManagementApi | null = null;

  constructor(options: EdgeAgentOptions) {
    super();
    this.config = options.config;
    this.debugLog = createDebugLogger(this.config.debug, (component, message) => {
      this.emitDebug(component, message);
    });

    const { config } = this;
    this.routes = new RouteTable({ debugLog: this.debugLog });
    this.allocator = new PeerAddressAllocator({
      network:
        options.peerNetwork ?? new WireGuardNetwork({ interfaceName: config.wireguard.interfaceName }),
      addressBlock: config.wireguard.addressBlock,
      listenPort: config.wireguard.listenPort,
      debugLog: this.debugLog,
    });
    this.registry = new TunnelRegistry({
      maxTunnels: config.tunnels.maxTunnels,
      allocator: this.allocator,
      debugLog: this.debugLog,
    });
    this.service = new TunnelService({
      registry: this.registry,
      routes: this.routes,
      allocator: this.allocator,
      targetHost: config.tunnels.targetHost,
      publicScheme: config.tls.enabled ? "https" : "http",
      publicPort: config.public.httpPort,
      version: options.version,
      debugLog: this.debugLog,
    });
  }

  private emitDebug(component: DebugComponent, message: string) {
    const normalized = stripTrailingNewline(message);
    this.emit("debug", component, normalized);
    this.emit("log", `[${component}] ${normalized}`);
  }

  get running() {
    return this.http !== null;
  }

  /**
   * Bind the public http and tcp listeners and the management api. Any bind
   * failure closes what was already opened and rejects.
   */
  async start(): Promise<EdgeAgentAddresses> {
    if (this.running) {
      throw new Error("agent is already running");
    }
    const { config } = this;

    const tls = await loadTlsMaterial({
      enabled: config.tls.enabled,
      certPath: config.tls.certPath,
      keyPath: config.tls.keyPath,
      selfSigned: config.tls.selfSigned,
      hostnames: ["localhost", "127.0.0.1"],
    });

    const onActivity = (id: string) => this.service.touch(id);
    const http = new HttpDispatcher({ routes: this.routes, tls, onActivity, debugLog: this.debugLog });
    const tcp = new TcpDispatcher({ routes: this.routes, onActivity, debugLog: this.debugLog });
    const api = new ManagementApi({
      service: this.service,
      basePath: config.api.basePath,
      debugLog: this.debugLog,
    });
    this.http = http;
    this.tcp = tcp;
    this.api = api;

    try {
      const httpAddress = await http.listen({ host: config.public.host, port: config.public.httpPort });
      const tcpAddress = await tcp.listen({ host: config.public.host, port: config.public.tcpPort });
      const apiAddress = await api.listen({ host: config.api.host, port: config.api.port });
      this.debugLog(
        "agent",
        `started http=${httpAddress.port} tcp=${tcpAddress.port} api=${apiAddress.host}:${apiAddress.port}`,
      );
      return { api: apiAddress, http: httpAddress, tcp: tcpAddress };
    } catch (err) {
      this.debugLog("error", `failed to start: ${formatError(err)}`);
      await this.stop(0);
      throw err;
    }
  }

  /**
   * Close the management api first, then the traffic listeners, each with
   * `graceMs` to drain.
   */
  async stop(graceMs = this.config.shutdownTimeoutMs): Promise<void> {
    const { api, http, tcp } = this;
    this.api = null;
    this.http = null;
    this.tcp = null;

    await api?.close(graceMs);
    await Promise.all([http?.close(graceMs), tcp?.close(graceMs)]);
    if (api || http || tcp) {
      this.debugLog("agent", "stopped");
    }
  }
}
