import { NotFoundError, formatError } from "../errors";
import { noopDebugLog, type DebugLogFn } from "../debug";
import type { PeerAddressAllocator } from "../peer/allocator";
import type { PeerConfig } from "../peer/types";
import type { RouteTable } from "../routing/table";
import type { TunnelMetadata, TunnelRegistry } from "./registry";

export type CreateTunnelRequest = {
  id: string;
  hostname: string;
  targetPort: number;
  peerPublicKey?: string;
  metadata?: TunnelMetadata;
  /** public tcp port for the port route (defaults to `targetPort`) */
  publicPort?: number;
};

export type CreateTunnelResult = {
  tunnelId: string;
  publicEndpoint: string;
  peer?: PeerConfig;
};

export type TunnelSummary = {
  id: string;
  hostname: string;
  targetPort: number;
  publicEndpoint: string;
  createdAt: number;
  lastActiveAt: number;
  peerAddress: string | null;
  metadata: TunnelMetadata;
};

export type AgentStatus = {
  status: "healthy";
  version: string;
  uptimeMs: number;
  numTunnels: number;
  capacity: number;
  /** null when no peer allocator is configured */
  peerAddressesRemaining: number | null;
  tunnels: TunnelSummary[];
};

export type TunnelServiceOptions = {
  registry: TunnelRegistry;
  routes: RouteTable;
  allocator?: PeerAddressAllocator;
  /** backend address for tunnels without a peer */
  targetHost?: string;
  /** public http scheme + port used to build endpoints */
  publicScheme?: "http" | "https";
  publicPort?: number;
  version?: string;
  debugLog?: DebugLogFn;
  now?: () => number;
};

/**
 * Management-facing tunnel operations.
 *
 * The route is installed in the same synchronous turn that commits the tunnel
 * and removed before the tunnel record goes away, so traffic never sees a
 * route without a tunnel or the reverse.
 */
export class TunnelService {
  private readonly registry: TunnelRegistry;
  private readonly routes: RouteTable;
  private readonly allocator: PeerAddressAllocator | null;
  private readonly targetHost: string;
  private readonly publicScheme: "http" | "https";
  private readonly publicPort: number | null;
  private readonly version: string;
  private readonly debugLog: DebugLogFn;
  private readonly now: () => number;
  private readonly startedAt: number;

  constructor(options: TunnelServiceOptions) {
    this.registry = options.registry;
    this.routes = options.routes;
    this.allocator = options.allocator ?? null;
    this.targetHost = options.targetHost ?? "127.0.0.1";
    this.publicScheme = options.publicScheme ?? "http";
    this.publicPort = options.publicPort ?? null;
    this.version = options.version ?? "dev";
    this.debugLog = options.debugLog ?? noopDebugLog;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  publicEndpointFor(hostname: string): string {
    const defaultPort = this.publicScheme === "https" ? 443 : 80;
    const port = this.publicPort === null || this.publicPort === defaultPort ? "" : `:${this.publicPort}`;
    return `${this.publicScheme}://${hostname}${port}`;
  }

  async create(request: CreateTunnelRequest): Promise<CreateTunnelResult> {
    const publicPort = request.publicPort ?? request.targetPort;

    // fail before provisioning a peer we would have to throw away
    this.routes.assertAvailable(request.hostname, request.targetPort, publicPort);

    const record = await this.registry.createTunnel({
      id: request.id,
      hostname: request.hostname,
      targetPort: request.targetPort,
      peerPublicKey: request.peerPublicKey,
      metadata: request.metadata,
    });

    const targetIp = record.peer ? record.peer.clientAddress : this.targetHost;
    try {
      this.routes.addRoute(record.id, record.hostname, targetIp, record.targetPort, publicPort);
    } catch (err) {
      this.debugLog("tunnel", `route install failed id=${record.id}: ${formatError(err)}`);
      await this.registry.removeTunnel(record.id);
      throw err;
    }

    return {
      tunnelId: record.id,
      publicEndpoint: this.publicEndpointFor(record.hostname),
      ...(record.peer ? { peer: record.peer } : {}),
    };
  }

  async remove(id: string): Promise<void> {
    if (!this.registry.has(id)) {
      throw new NotFoundError(`tunnel with ID ${id} not found`);
    }
    this.routes.removeRoute(id);
    await this.registry.removeTunnel(id);
  }

  /** Record traffic activity for a tunnel */
  touch(id: string) {
    this.registry.updateLastActivity(id, this.now());
  }

  listTunnels(): TunnelSummary[] {
    return this.registry.listTunnels().map((record) => ({
      id: record.id,
      hostname: record.hostname,
      targetPort: record.targetPort,
      publicEndpoint: this.publicEndpointFor(record.hostname),
      createdAt: record.createdAt,
      lastActiveAt: record.lastActiveAt,
      peerAddress: record.peer?.clientAddress ?? null,
      metadata: record.metadata,
    }));
  }

  status(): AgentStatus {
    const tunnels = this.listTunnels();
    return {
      status: "healthy",
      version: this.version,
      uptimeMs: Math.max(0, this.now() - this.startedAt),
      numTunnels: tunnels.length,
      capacity: this.registry.capacity,
      peerAddressesRemaining: this.allocator ? this.allocator.remaining() : null,
      tunnels,
    };
  }
}
