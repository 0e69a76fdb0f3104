import crypto from "node:crypto";
import fsp from "node:fs/promises";
import net from "node:net";

import forge from "node-forge";

export type TlsOptions = {
  /** wrap the public http listener in tls */
  enabled: boolean;
  /** pem certificate chain path */
  certPath?: string;
  /** pem private key path */
  keyPath?: string;
  /** generate a throwaway certificate when no files are configured */
  selfSigned?: boolean;
  /** subject / san names for the generated certificate */
  hostnames?: string[];
};

export type TlsMaterial = {
  /** certificate pem */
  cert: string;
  /** private key pem */
  key: string;
};

export function generatePositiveSerialNumber(byteLength = 16): string {
  const bytes = crypto.randomBytes(byteLength);
  bytes.writeUInt8(bytes.readUInt8(0) & 0x7f, 0);
  if (bytes.every((value) => value === 0)) {
    bytes[bytes.length - 1] = 1;
  }
  return bytes.toString("hex");
}

export function generateSelfSignedCertificate(hostnames: string[] = ["localhost"]): TlsMaterial {
  const names = hostnames.length > 0 ? hostnames : ["localhost"];
  const keys = forge.pki.rsa.generateKeyPair(2048);
  const cert = forge.pki.createCertificate();

  cert.publicKey = keys.publicKey;
  cert.serialNumber = generatePositiveSerialNumber();
  const now = new Date(Date.now() - 5 * 60 * 1000);
  cert.validity.notBefore = now;
  cert.validity.notAfter = new Date(now);
  cert.validity.notAfter.setDate(cert.validity.notBefore.getDate() + 365);

  const attrs = [{ name: "commonName", value: names[0] }];
  cert.setSubject(attrs);
  cert.setIssuer(attrs);

  cert.setExtensions([
    { name: "basicConstraints", cA: false },
    {
      name: "keyUsage",
      digitalSignature: true,
      keyEncipherment: true,
      critical: true,
    },
    { name: "extKeyUsage", serverAuth: true },
    {
      name: "subjectAltName",
      altNames: names.map((name) =>
        net.isIP(name) ? { type: 7, ip: name } : { type: 2, value: name },
      ),
    },
  ]);

  cert.sign(keys.privateKey, forge.md.sha256.create());

  return {
    cert: forge.pki.certificateToPem(cert),
    key: forge.pki.privateKeyToPem(keys.privateKey),
  };
}

/**
 * Resolve the certificate and key for the public listener, or `null` when tls
 * is disabled.
 */
export async function loadTlsMaterial(options: TlsOptions | undefined): Promise<TlsMaterial | null> {
  if (!options?.enabled) return null;

  if (options.certPath && options.keyPath) {
    const [cert, key] = await Promise.all([
      fsp.readFile(options.certPath, "utf8"),
      fsp.readFile(options.keyPath, "utf8"),
    ]);
    return { cert, key };
  }

  if (options.certPath || options.keyPath) {
    throw new Error("both TLS certificate and key must be provided");
  }

  if (!options.selfSigned) {
    throw new Error("TLS is enabled but no certificate is configured");
  }

  return generateSelfSignedCertificate(options.hostnames);
}
