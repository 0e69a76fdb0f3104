import { execFile } from "node:child_process";
import crypto from "node:crypto";
import { promisify } from "node:util";

import type { PeerKeyPair, PeerNetwork } from "./types";

const execFileAsync = promisify(execFile);
const generateKeyPairAsync = promisify(crypto.generateKeyPair);

export const DEFAULT_WIREGUARD_INTERFACE = "wg0";

export type WireGuardNetworkOptions = {
  /** interface name passed to `wg set` */
  interfaceName?: string;
  /** `wg` binary */
  wgPath?: string;
};

/**
 * Encode a KeyObject as the base64 raw 32-byte key WireGuard uses.
 */
export function wireGuardKeyFromKeyObject(key: crypto.KeyObject, part: "public" | "private"): string {
  const jwk = key.export({ format: "jwk" });
  const value = part === "public" ? jwk.x : jwk.d;
  if (typeof value !== "string") {
    throw new Error(`x25519 key has no ${part} component`);
  }
  return Buffer.from(value, "base64url").toString("base64");
}

export async function generateWireGuardKeyPair(): Promise<PeerKeyPair> {
  const { publicKey, privateKey } = await generateKeyPairAsync("x25519");
  return {
    publicKey: wireGuardKeyFromKeyObject(publicKey, "public"),
    privateKey: wireGuardKeyFromKeyObject(privateKey, "private"),
  };
}

/** A base64 encoded 32-byte key */
export function isWireGuardKey(value: string): boolean {
  if (!/^[A-Za-z0-9+/]{43}=$/.test(value)) return false;
  return Buffer.from(value, "base64").length === 32;
}

/**
 * {@link PeerNetwork} backed by the `wg` command line tool.
 */
export class WireGuardNetwork implements PeerNetwork {
  readonly interfaceName: string;
  private readonly wgPath: string;

  constructor(options: WireGuardNetworkOptions = {}) {
    this.interfaceName = options.interfaceName ?? DEFAULT_WIREGUARD_INTERFACE;
    this.wgPath = options.wgPath ?? "wg";
  }

  generateKeyPair(): Promise<PeerKeyPair> {
    return generateWireGuardKeyPair();
  }

  async registerPeer(peer: { publicKey: string; allowedIp: string }): Promise<void> {
    await this.wg(["set", this.interfaceName, "peer", peer.publicKey, "allowed-ips", `${peer.allowedIp}/32`]);
  }

  async deregisterPeer(peer: { publicKey: string }): Promise<void> {
    await this.wg(["set", this.interfaceName, "peer", peer.publicKey, "remove"]);
  }

  private async wg(args: string[]) {
    try {
      await execFileAsync(this.wgPath, args);
    } catch (err) {
      const stderr =
        err && typeof err === "object" && "stderr" in err && typeof err.stderr === "string"
          ? err.stderr.trim()
          : "";
      const detail = stderr || (err instanceof Error ? err.message : String(err));
      throw new Error(`${this.wgPath} ${args.slice(0, 2).join(" ")} failed: ${detail}`, { cause: err });
    }
  }
}
