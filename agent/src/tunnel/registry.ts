import {
  CapacityExceededError,
  ConflictError,
  NotFoundError,
  ProvisioningError,
  formatError,
} from "../errors";
import { noopDebugLog, type DebugLogFn } from "../debug";
import { normalizeHost } from "../routing/host";
import type { PeerAddressAllocator } from "../peer/allocator";
import type { PeerConfig } from "../peer/types";

export const DEFAULT_MAX_TUNNELS = 100;

export type TunnelMetadata = Record<string, string>;

export type TunnelRecord = {
  /** caller-supplied unique identifier */
  id: string;
  /** public hostname */
  hostname: string;
  /** backend port */
  targetPort: number;
  /** creation time in `ms` since epoch */
  createdAt: number;
  /** last traffic activity in `ms` since epoch */
  lastActiveAt: number;
  /** encrypted peer configuration */
  peer?: PeerConfig;
  /** free-form key/value metadata */
  metadata: TunnelMetadata;
};

export type CreateTunnelInput = {
  id: string;
  hostname: string;
  targetPort: number;
  /** remote WireGuard public key; empty or absent means no peer */
  peerPublicKey?: string;
  metadata?: TunnelMetadata;
};

export type TunnelRegistryOptions = {
  /** maximum number of live tunnels */
  maxTunnels?: number;
  /** required to create tunnels with a peer public key */
  allocator?: PeerAddressAllocator;
  debugLog?: DebugLogFn;
  /** clock, `ms` since epoch */
  now?: () => number;
};

function copyRecord(record: TunnelRecord): TunnelRecord {
  return {
    ...record,
    metadata: { ...record.metadata },
  };
}

/**
 * Owns tunnel identity and lifecycle.
 *
 * Capacity and identity checks happen synchronously together with a slot
 * reservation, so concurrent creations racing over peer provisioning cannot
 * both pass the checks.
 */
export class TunnelRegistry {
  private readonly tunnels = new Map<string, TunnelRecord>();
  private readonly pending = new Set<string>();
  private readonly allocator: PeerAddressAllocator | null;
  private readonly debugLog: DebugLogFn;
  private readonly now: () => number;
  readonly capacity: number;

  constructor(options: TunnelRegistryOptions = {}) {
    const maxTunnels = options.maxTunnels ?? DEFAULT_MAX_TUNNELS;
    if (!Number.isInteger(maxTunnels) || maxTunnels <= 0) {
      throw new Error(`maxTunnels must be a positive integer (got ${maxTunnels})`);
    }
    this.capacity = maxTunnels;
    this.allocator = options.allocator ?? null;
    this.debugLog = options.debugLog ?? noopDebugLog;
    this.now = options.now ?? Date.now;
  }

  /** number of live tunnels */
  get size() {
    return this.tunnels.size;
  }

  async createTunnel(input: CreateTunnelInput): Promise<TunnelRecord> {
    const { id, targetPort } = input;
    const hostname = normalizeHost(input.hostname);

    if (this.tunnels.size + this.pending.size >= this.capacity) {
      throw new CapacityExceededError(this.capacity);
    }
    if (this.tunnels.has(id) || this.pending.has(id)) {
      throw new ConflictError(`tunnel with ID ${id} already exists`);
    }

    this.pending.add(id);
    try {
      let peer: PeerConfig | undefined;
      if (input.peerPublicKey) {
        if (!this.allocator) {
          throw new ProvisioningError("peer tunnels require a peer address allocator");
        }
        peer = await this.allocator.provisionPeer(id, input.peerPublicKey);
      }

      const createdAt = this.now();
      const record: TunnelRecord = {
        id,
        hostname,
        targetPort,
        createdAt,
        lastActiveAt: createdAt,
        metadata: { ...(input.metadata ?? {}) },
        ...(peer ? { peer } : {}),
      };
      this.tunnels.set(id, record);

      this.debugLog("tunnel", `created id=${id} host=${hostname} target_port=${targetPort}${peer ? ` peer=${peer.clientAddress}` : ""}`);
      return copyRecord(record);
    } finally {
      this.pending.delete(id);
    }
  }

  /**
   * Remove a tunnel. Peer release is best-effort: a failure is logged and the
   * record is deleted regardless.
   */
  async removeTunnel(id: string): Promise<TunnelRecord> {
    const record = this.tunnels.get(id);
    if (!record) {
      throw new NotFoundError(`tunnel with ID ${id} not found`);
    }
    this.tunnels.delete(id);

    if (record.peer && this.allocator) {
      try {
        await this.allocator.releasePeer(id);
      } catch (err) {
        this.debugLog("error", `failed to remove peer for tunnel ${id}: ${formatError(err)}`);
      }
    }

    this.debugLog("tunnel", `removed id=${id}`);
    return copyRecord(record);
  }

  getTunnel(id: string): TunnelRecord {
    const record = this.tunnels.get(id);
    if (!record) {
      throw new NotFoundError(`tunnel with ID ${id} not found`);
    }
    return copyRecord(record);
  }

  getTunnelByHostname(hostname: string): TunnelRecord {
    const host = normalizeHost(hostname);
    for (const record of this.tunnels.values()) {
      if (record.hostname === host) return copyRecord(record);
    }
    throw new NotFoundError(`no tunnel found for hostname ${host}`);
  }

  has(id: string) {
    return this.tunnels.has(id);
  }

  /** Bump last-active; unknown ids are ignored */
  updateLastActivity(id: string, now = this.now()) {
    const record = this.tunnels.get(id);
    if (!record) return;
    record.lastActiveAt = Math.max(record.lastActiveAt, now);
  }

  listTunnels(): TunnelRecord[] {
    return Array.from(this.tunnels.values(), copyRecord);
  }
}
