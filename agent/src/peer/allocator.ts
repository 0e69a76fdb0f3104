import {
  AddressSpaceExhaustedError,
  ConflictError,
  NotFoundError,
  ProvisioningError,
  formatError,
} from "../errors";
import { noopDebugLog, type DebugLogFn } from "../debug";
import { AsyncSemaphore } from "../utils/async";
import {
  blockBroadcast,
  blockContains,
  formatIPv4Bytes,
  incrementIPv4Bytes,
  parseIPv4Cidr,
  type IPv4Block,
} from "../utils/ip";
import type { PeerConfig, PeerKeyPair, PeerNetwork } from "./types";

export const DEFAULT_PEER_ADDRESS_BLOCK = "10.10.0.0/16";
export const DEFAULT_PEER_LISTEN_PORT = 51820;

export type PeerAllocatorOptions = {
  /** peer key and interface capability */
  network: PeerNetwork;
  /** ipv4 cidr addresses are issued from */
  addressBlock?: string;
  /** interface listening port reported in peer configs */
  listenPort?: number;
  debugLog?: DebugLogFn;
};

type PeerEntry = {
  /** remote peer public key registered on the interface */
  remotePublicKey: string;
  config: PeerConfig;
};

/**
 * Hands out sequential private addresses and local key pairs for encrypted
 * tunnel peers.
 *
 * Addresses are never handed out twice while the allocator lives; removed
 * peers do not give their address back.
 */
export class PeerAddressAllocator {
  private readonly network: PeerNetwork;
  private readonly block: IPv4Block;
  private readonly broadcast: Buffer;
  private readonly listenPort: number;
  private readonly debugLog: DebugLogFn;
  private readonly lock = new AsyncSemaphore(1);
  private readonly peers = new Map<string, PeerEntry>();
  /** last issued address; starts at the server address */
  private cursor: Buffer;
  private readonly server: Buffer;

  constructor(options: PeerAllocatorOptions) {
    const cidr = options.addressBlock ?? DEFAULT_PEER_ADDRESS_BLOCK;
    const block = parseIPv4Cidr(cidr);
    if (!block) {
      throw new Error(`invalid peer address block: ${cidr}`);
    }
    if (block.prefixLength > 30) {
      throw new Error(`peer address block ${block.cidr} is too small`);
    }

    const server = incrementIPv4Bytes(block.network);
    if (!server) {
      throw new Error(`invalid peer address block: ${cidr}`);
    }

    this.network = options.network;
    this.block = block;
    this.broadcast = blockBroadcast(block);
    this.server = server;
    this.cursor = server;
    this.listenPort = options.listenPort ?? DEFAULT_PEER_LISTEN_PORT;
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  get addressBlock() {
    return this.block.cidr;
  }

  get serverAddress() {
    return formatIPv4Bytes(this.server);
  }

  /** Number of client addresses that can still be issued */
  remaining(): number {
    return Math.max(0, this.broadcast.readUInt32BE(0) - this.cursor.readUInt32BE(0) - 1);
  }

  has(id: string) {
    return this.peers.has(id);
  }

  /**
   * Generate a local key pair, take the next address and register the remote
   * peer on the interface. The cursor only advances once registration
   * succeeded.
   */
  provisionPeer(id: string, peerPublicKey: string): Promise<PeerConfig> {
    return this.lock.run(async () => {
      if (this.peers.has(id)) {
        throw new ConflictError(`peer ${id} is already provisioned`);
      }

      const next = this.nextAddress();
      if (!next) {
        this.debugLog("peer", `address space exhausted id=${id} block=${this.block.cidr}`);
        throw new AddressSpaceExhaustedError(this.block.cidr);
      }
      const clientAddress = formatIPv4Bytes(next);

      let keys: PeerKeyPair;
      try {
        keys = await this.network.generateKeyPair();
      } catch (err) {
        this.debugLog("error", `peer key generation failed id=${id}: ${formatError(err)}`);
        throw new ProvisioningError(`failed to generate key pair: ${formatError(err)}`, err);
      }

      try {
        await this.network.registerPeer({
          publicKey: peerPublicKey,
          allowedIp: clientAddress,
        });
      } catch (err) {
        this.debugLog("error", `peer registration failed id=${id}: ${formatError(err)}`);
        throw new ProvisioningError(`failed to add peer: ${formatError(err)}`, err);
      }

      this.cursor = next;

      const config: PeerConfig = Object.freeze({
        publicKey: keys.publicKey,
        privateKey: keys.privateKey,
        serverAddress: this.serverAddress,
        clientAddress,
        listenPort: this.listenPort,
      });
      this.peers.set(id, { remotePublicKey: peerPublicKey, config });

      this.debugLog("peer", `added id=${id} ip=${clientAddress}`);
      return config;
    });
  }

  /**
   * Deregister a peer from the interface. The peer is forgotten even when the
   * interface call fails; that failure is rethrown as {@link ProvisioningError}.
   */
  releasePeer(id: string): Promise<void> {
    return this.lock.run(async () => {
      const entry = this.peers.get(id);
      if (!entry) {
        throw new NotFoundError(`peer ${id} not found`);
      }
      this.peers.delete(id);

      try {
        await this.network.deregisterPeer({ publicKey: entry.remotePublicKey });
      } catch (err) {
        throw new ProvisioningError(`failed to remove peer ${id}: ${formatError(err)}`, err);
      }

      this.debugLog("peer", `removed id=${id} ip=${entry.config.clientAddress}`);
    });
  }

  private nextAddress(): Buffer | null {
    const next = incrementIPv4Bytes(this.cursor);
    if (!next) return null;
    if (!blockContains(this.block, next)) return null;
    if (next.equals(this.broadcast)) return null;
    return next;
  }
}
