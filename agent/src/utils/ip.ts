/**
 * Parse an IPv4 address into bytes.
 *
 * Note: permissive (allows leading zeros).
 */
export function parseIPv4Bytes(ip: string): Buffer | null {
  const parts = ip.split(".");
  if (parts.length !== 4) return null;
  if (parts.some((p) => !/^[0-9]{1,3}$/.test(p))) return null;
  const bytes = parts.map((p) => Number(p));
  if (!bytes.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)) {
    return null;
  }
  return Buffer.from(bytes);
}

export function formatIPv4Bytes(bytes: Buffer): string {
  return Array.from(bytes.subarray(0, 4)).join(".");
}

/**
 * Increment an IPv4 address in network order, carrying into higher-order
 * bytes. Returns `null` on overflow past 255.255.255.255.
 */
export function incrementIPv4Bytes(bytes: Buffer): Buffer | null {
  const value = bytes.readUInt32BE(0);
  if (value === 0xffffffff) return null;
  const next = Buffer.alloc(4);
  next.writeUInt32BE(value + 1, 0);
  return next;
}

export type IPv4Block = {
  /** network address bytes */
  network: Buffer;
  /** prefix length */
  prefixLength: number;
  /** cidr notation with the network address masked */
  cidr: string;
};

export function parseIPv4Cidr(cidr: string): IPv4Block | null {
  const idx = cidr.indexOf("/");
  if (idx === -1) return null;

  const addr = parseIPv4Bytes(cidr.slice(0, idx).trim());
  const prefixRaw = cidr.slice(idx + 1).trim();
  if (!addr || !/^[0-9]{1,2}$/.test(prefixRaw)) return null;

  const prefixLength = Number.parseInt(prefixRaw, 10);
  if (prefixLength > 32) return null;

  const mask = prefixMask(prefixLength);
  const network = Buffer.alloc(4);
  network.writeUInt32BE((addr.readUInt32BE(0) & mask) >>> 0, 0);

  return {
    network,
    prefixLength,
    cidr: `${formatIPv4Bytes(network)}/${prefixLength}`,
  };
}

function prefixMask(prefixLength: number): number {
  if (prefixLength === 0) return 0;
  return (0xffffffff << (32 - prefixLength)) >>> 0;
}

export function blockContains(block: IPv4Block, bytes: Buffer): boolean {
  const mask = prefixMask(block.prefixLength);
  return ((bytes.readUInt32BE(0) & mask) >>> 0) === block.network.readUInt32BE(0);
}

export function blockBroadcast(block: IPv4Block): Buffer {
  const out = Buffer.alloc(4);
  const mask = prefixMask(block.prefixLength);
  out.writeUInt32BE((block.network.readUInt32BE(0) | ~mask) >>> 0, 0);
  return out;
}
