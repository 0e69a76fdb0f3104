import { isWireGuardKey } from "../peer/wireguard";
import type {
  AgentStatus,
  CreateTunnelRequest,
  CreateTunnelResult,
  TunnelSummary,
} from "../tunnel/service";

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}

export type CreateTunnelBody = {
  tunnel_id: string;
  hostname: string;
  target_port: number;
  wireguard_public_key?: string;
  metadata?: Record<string, string>;
  /** public tcp port; defaults to `target_port` */
  public_port?: number;
};

export type WireGuardConfigBody = {
  public_key: string;
  private_key: string;
  server_ip: string;
  client_ip: string;
  port: number;
};

export type CreateTunnelResponse = {
  tunnel_id: string;
  public_endpoint: string;
  wireguard_config?: WireGuardConfigBody;
};

export type StatusResponse = {
  status: string;
  version: string;
  /** uptime, e.g. `1h2m3s` */
  uptime: string;
  num_tunnels: number;
  max_tunnels: number;
  peer_addresses_remaining: number | null;
};

export type TunnelSummaryBody = {
  tunnel_id: string;
  hostname: string;
  target_port: number;
  public_endpoint: string;
  created_at: string;
  last_active_at: string;
  peer_ip?: string;
  metadata: Record<string, string>;
};

export type ErrorResponse = {
  error: string;
  code: number;
  details?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPort(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 && value <= 65535;
}

function readMetadata(value: unknown): Record<string, string> | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new RequestValidationError("metadata must be an object of strings");
  }
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new RequestValidationError(`metadata.${key} must be a string`);
    }
    out[key] = entry;
  }
  return out;
}

export function parseCreateTunnelRequest(body: unknown): CreateTunnelRequest {
  if (!isRecord(body)) {
    throw new RequestValidationError("Invalid request body");
  }

  const { tunnel_id: id, hostname, target_port: targetPort } = body;
  if (typeof id !== "string" || !id || typeof hostname !== "string" || !hostname.trim() || !isPort(targetPort)) {
    throw new RequestValidationError("Missing required fields");
  }

  const key = body.wireguard_public_key;
  if (key !== undefined && key !== null && typeof key !== "string") {
    throw new RequestValidationError("wireguard_public_key must be a string");
  }
  if (typeof key === "string" && key && !isWireGuardKey(key)) {
    throw new RequestValidationError("wireguard_public_key must be a base64 encoded 32-byte key");
  }

  const publicPort = body.public_port;
  if (publicPort !== undefined && publicPort !== null && !isPort(publicPort)) {
    throw new RequestValidationError("public_port must be in range 1..65535");
  }

  const metadata = readMetadata(body.metadata);

  return {
    id,
    hostname,
    targetPort,
    ...(typeof key === "string" && key ? { peerPublicKey: key } : {}),
    ...(metadata ? { metadata } : {}),
    ...(isPort(publicPort) ? { publicPort } : {}),
  };
}

export function parseRemoveTunnelRequest(body: unknown): { tunnelId: string } {
  if (!isRecord(body) || typeof body.tunnel_id !== "string" || !body.tunnel_id) {
    throw new RequestValidationError("Missing tunnel ID");
  }
  return { tunnelId: body.tunnel_id };
}

export function toCreateTunnelResponse(result: CreateTunnelResult): CreateTunnelResponse {
  const response: CreateTunnelResponse = {
    tunnel_id: result.tunnelId,
    public_endpoint: result.publicEndpoint,
  };
  if (result.peer) {
    response.wireguard_config = {
      public_key: result.peer.publicKey,
      private_key: result.peer.privateKey,
      server_ip: result.peer.serverAddress,
      client_ip: result.peer.clientAddress,
      port: result.peer.listenPort,
    };
  }
  return response;
}

export function formatUptime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

export function toStatusResponse(status: AgentStatus): StatusResponse {
  return {
    status: status.status,
    version: status.version,
    uptime: formatUptime(status.uptimeMs),
    num_tunnels: status.numTunnels,
    max_tunnels: status.capacity,
    peer_addresses_remaining: status.peerAddressesRemaining,
  };
}

export function toTunnelListResponse(tunnels: TunnelSummary[]): { tunnels: TunnelSummaryBody[] } {
  return {
    tunnels: tunnels.map((tunnel) => ({
      tunnel_id: tunnel.id,
      hostname: tunnel.hostname,
      target_port: tunnel.targetPort,
      public_endpoint: tunnel.publicEndpoint,
      created_at: new Date(tunnel.createdAt).toISOString(),
      last_active_at: new Date(tunnel.lastActiveAt).toISOString(),
      ...(tunnel.peerAddress ? { peer_ip: tunnel.peerAddress } : {}),
      metadata: tunnel.metadata,
    })),
  };
}
