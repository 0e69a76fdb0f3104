import net from "node:net";

export function normalizeHost(host: string): string {
  const trimmed = host.trim();
  if (!trimmed) return "";

  const family = net.isIP(trimmed);
  if (family === 4 || family === 6) {
    return trimmed.toLowerCase();
  }

  return trimmed.toLowerCase().replace(/\.+$/, "");
}

/**
 * Extract the hostname from a `Host` header value.
 *
 * Accepts `name`, `name:port`, `[v6]` and `[v6]:port`. Returns an empty
 * string when the value cannot be parsed.
 */
export function hostFromHeader(raw: string | undefined): string {
  const input = raw?.trim() ?? "";
  if (!input) return "";

  if (input.startsWith("[")) {
    const end = input.indexOf("]");
    if (end === -1) return "";
    const rest = input.slice(end + 1);
    if (rest.length > 0 && !/^:[0-9]+$/.test(rest)) return "";
    return normalizeHost(input.slice(1, end));
  }

  // bare ipv6 literal without brackets
  if (net.isIP(input) === 6) return normalizeHost(input);

  const idx = input.lastIndexOf(":");
  if (idx !== -1) {
    const maybePort = input.slice(idx + 1);
    if (!/^[0-9]*$/.test(maybePort)) return "";
    return normalizeHost(input.slice(0, idx));
  }

  return normalizeHost(input);
}
