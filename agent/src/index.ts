/**
 * tunnelgate
 *
 * Edge agent that routes public HTTP and TCP traffic to dynamically
 * registered tunnels.
 */

export { VERSION } from "./version";

export { EdgeAgent, type EdgeAgentOptions, type EdgeAgentAddresses } from "./agent";
export { loadConfig, validateConfig, ConfigError, type AgentConfig } from "./config";

// Routing
export { RouteTable, type Target, type RouteTableOptions } from "./routing/table";
export { normalizeHost, hostFromHeader } from "./routing/host";

// Tunnels
export {
  TunnelRegistry,
  type TunnelRecord,
  type TunnelMetadata,
  type CreateTunnelInput,
  type TunnelRegistryOptions,
} from "./tunnel/registry";
export {
  TunnelService,
  type CreateTunnelRequest,
  type CreateTunnelResult,
  type TunnelSummary,
  type AgentStatus,
} from "./tunnel/service";

// Peers
export { PeerAddressAllocator, type PeerAllocatorOptions } from "./peer/allocator";
export { WireGuardNetwork, generateWireGuardKeyPair, isWireGuardKey } from "./peer/wireguard";
export type { PeerConfig, PeerKeyPair, PeerNetwork } from "./peer/types";

// Traffic
export { HttpDispatcher, type HttpDispatcherOptions } from "./proxy/http";
export { TcpDispatcher, type TcpDispatcherOptions } from "./proxy/tcp";
export { loadTlsMaterial, generateSelfSignedCertificate, type TlsOptions, type TlsMaterial } from "./proxy/tls";

// Management
export { ManagementApi, type ManagementApiOptions } from "./api/server";

// Errors
export {
  TunnelError,
  ConflictError,
  NotFoundError,
  CapacityExceededError,
  AddressSpaceExhaustedError,
  ProvisioningError,
  BackendUnreachableError,
  isTunnelError,
  type TunnelErrorCode,
} from "./errors";

// Debug helpers
export {
  type DebugFlag,
  type DebugConfig,
  type DebugComponent,
  type DebugLogFn,
  type LogLevel,
} from "./debug";
