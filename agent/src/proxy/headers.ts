import type { IncomingHttpHeaders, IncomingMessage } from "node:http";

export type HeaderValue = string | string[];
export type HeaderInput = Record<string, string | string[] | undefined> | IncomingHttpHeaders;

const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "proxy-authenticate",
  "proxy-authorization",
  "transfer-encoding",
  "te",
  "trailer",
  "upgrade",
]);

export function stripHopByHopHeaders(headers: HeaderInput): Record<string, HeaderValue> {
  const connectionValue = headers["connection"];
  const connection = Array.isArray(connectionValue)
    ? connectionValue.join(",")
    : typeof connectionValue === "string"
      ? connectionValue
      : "";

  const connectionTokens = new Set<string>();
  if (connection) {
    for (const token of connection.split(",")) {
      const normalized = token.trim().toLowerCase();
      if (normalized) connectionTokens.add(normalized);
    }
  }

  const output: Record<string, HeaderValue> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const normalizedName = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(normalizedName)) continue;
    if (connectionTokens.has(normalizedName)) continue;
    output[normalizedName] = value;
  }
  return output;
}

function appendHeader(existing: HeaderValue | undefined, value: string): string {
  if (existing === undefined) return value;
  const prior = Array.isArray(existing) ? existing.join(", ") : existing;
  return prior ? `${prior}, ${value}` : value;
}

/**
 * Headers sent upstream for a proxied request: hop-by-hop headers dropped,
 * `Host` kept as the client sent it, `x-forwarded-*` added.
 */
export function buildUpstreamHeaders(
  req: IncomingMessage,
  options: { protocol: "http" | "https" },
): Record<string, HeaderValue> {
  const headers = stripHopByHopHeaders(req.headers);
  // the upstream client does not implement 100-continue
  delete headers["expect"];

  const clientIp = req.socket.remoteAddress;
  if (clientIp) {
    headers["x-forwarded-for"] = appendHeader(headers["x-forwarded-for"], clientIp);
  }
  if (!headers["x-forwarded-proto"]) {
    headers["x-forwarded-proto"] = options.protocol;
  }
  const host = req.headers.host;
  if (host && !headers["x-forwarded-host"]) {
    headers["x-forwarded-host"] = host;
  }

  return headers;
}

/**
 * Serialize the head of an upgrade request for a raw upstream socket.
 */
/**
 * Origin-form path (`/path?query`) of a request target. Absolute-form and
 * scheme-relative targets lose their authority, so the upstream is always
 * the routed one. Returns null for targets that do not parse.
 */
export function requestPath(rawUrl: string | undefined): string | null {
  if (rawUrl === "*") return null;
  let parsed: URL;
  try {
    parsed = new URL(rawUrl ?? "/", "http://localhost");
  } catch {
    return null;
  }
  return `${parsed.pathname}${parsed.search}`;
}

export function serializeRequestHead(req: IncomingMessage, path = req.url ?? "/"): string {
  const lines = [`${req.method ?? "GET"} ${path} HTTP/${req.httpVersion || "1.1"}`];
  const raw = req.rawHeaders;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    lines.push(`${raw[i]}: ${raw[i + 1]}`);
  }
  return `${lines.join("\r\n")}\r\n\r\n`;
}
