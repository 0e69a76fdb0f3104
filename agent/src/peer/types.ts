export type PeerKeyPair = {
  /** base64 encoded public key */
  publicKey: string;
  /** base64 encoded private key */
  privateKey: string;
};

export type PeerConfig = {
  /** local side public key */
  readonly publicKey: string;
  /** local side private key */
  readonly privateKey: string;
  /** allocator-side (interface) address */
  readonly serverAddress: string;
  /** address assigned to the remote peer */
  readonly clientAddress: string;
  /** interface listening port */
  readonly listenPort: number;
};

/**
 * Capability used by the allocator to create keys and touch the encrypted
 * interface. Production code talks to WireGuard; tests use a memory double.
 */
export interface PeerNetwork {
  generateKeyPair(): Promise<PeerKeyPair>;
  registerPeer(peer: { publicKey: string; allowedIp: string }): Promise<void>;
  deregisterPeer(peer: { publicKey: string }): Promise<void>;
}
