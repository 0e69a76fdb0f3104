import { ConflictError, NotFoundError } from "../errors";
import { noopDebugLog, type DebugLogFn } from "../debug";
import { hostFromHeader, normalizeHost } from "./host";

export type Target = {
  /** owning tunnel identifier */
  readonly id: string;
  /** backend ip address */
  readonly ip: string;
  /** backend port */
  readonly port: number;
};

export type RouteTableOptions = {
  debugLog?: DebugLogFn;
};

function makeTarget(id: string, ip: string, port: number): Target {
  return Object.freeze({ id, ip, port });
}

/**
 * Hostname -> target and public port -> target mappings used by the traffic
 * path.
 *
 * Mutations are synchronous, so a lookup never observes a half-installed
 * route.
 */
export class RouteTable {
  private readonly hostMap = new Map<string, Target>();
  private readonly portMap = new Map<number, Target>();
  private readonly debugLog: DebugLogFn;

  constructor(options: RouteTableOptions = {}) {
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  get size() {
    return this.hostMap.size;
  }

  /**
   * Throw {@link ConflictError} if either key of a prospective route is
   * already bound. Does not mutate.
   */
  assertAvailable(hostname: string, port: number, publicPort = port) {
    const host = normalizeHost(hostname);
    if (!host) {
      throw new ConflictError("hostname must not be empty");
    }

    const existing = this.hostMap.get(host);
    if (existing) {
      throw new ConflictError(`hostname ${host} is already in use by tunnel ${existing.id}`);
    }

    if (port > 0) {
      const owner = this.portMap.get(publicPort);
      if (owner) {
        throw new ConflictError(`port ${publicPort} is already in use by tunnel ${owner.id}`);
      }
    }
  }

  /**
   * Install a route. Both keys are checked before either map changes, so a
   * conflict leaves the table exactly as it was.
   *
   * A `port` of 0 installs no port route. `publicPort` is the key of the port
   * route and defaults to the backend port.
   */
  addRoute(id: string, hostname: string, ip: string, port: number, publicPort = port) {
    try {
      this.assertAvailable(hostname, port, publicPort);
    } catch (err) {
      if (err instanceof ConflictError) {
        this.debugLog("route", `conflict id=${id} ${err.message}`);
      }
      throw err;
    }

    const host = normalizeHost(hostname);
    const target = makeTarget(id, ip, port);
    this.hostMap.set(host, target);
    if (port > 0) {
      this.portMap.set(publicPort, target);
    }

    this.debugLog(
      "route",
      `added id=${id} host=${host}${port > 0 ? ` port=${publicPort}` : ""} -> ${ip}:${port}`,
    );
  }

  /** Remove every entry owned by `id`. Returns the number of entries removed. */
  removeRoute(id: string): number {
    let removed = 0;

    for (const [hostname, target] of this.hostMap) {
      if (target.id === id) {
        this.hostMap.delete(hostname);
        removed += 1;
      }
    }

    for (const [port, target] of this.portMap) {
      if (target.id === id) {
        this.portMap.delete(port);
        removed += 1;
      }
    }

    if (removed > 0) {
      this.debugLog("route", `removed id=${id} entries=${removed}`);
    }
    return removed;
  }

  /** Look up by hostname; a `Host` header value (with `:port`) is accepted. */
  lookupByHost(hostname: string): Target {
    const host = hostFromHeader(hostname);
    const target = host ? this.hostMap.get(host) : undefined;
    if (!target) {
      throw new NotFoundError(`no tunnel found for hostname: ${host || hostname}`);
    }
    return target;
  }

  lookupByPort(port: number): Target {
    const target = this.portMap.get(port);
    if (!target) {
      throw new NotFoundError(`no tunnel found for port: ${port}`);
    }
    return target;
  }

  /** Snapshot of the hostname mapping */
  listRoutes(): Map<string, Target> {
    const out = new Map<string, Target>();
    for (const [hostname, target] of this.hostMap) {
      out.set(hostname, makeTarget(target.id, target.ip, target.port));
    }
    return out;
  }

  /** Snapshot of the port mapping */
  listPortRoutes(): Map<number, Target> {
    const out = new Map<number, Target>();
    for (const [port, target] of this.portMap) {
      out.set(port, makeTarget(target.id, target.ip, target.port));
    }
    return out;
  }
}
