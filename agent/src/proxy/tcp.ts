import net from "node:net";

import { BackendUnreachableError, NotFoundError, formatError } from "../errors";
import { noopDebugLog, type DebugLogFn } from "../debug";
import type { RouteTable, Target } from "../routing/table";
import { waitOrTimeout } from "../utils/async";
import { listenServer, type ListenAddress } from "../utils/net";
import { DEFAULT_SHUTDOWN_GRACE_MS } from "./http";

export type TcpDispatcherOptions = {
  routes: RouteTable;
  /** invoked with the tunnel id when a pair opens and on traffic */
  onActivity?: (tunnelId: string) => void;
  /** outbound connect, overridable for tests */
  connect?: (target: Target) => net.Socket;
  debugLog?: DebugLogFn;
};

type TcpPair = {
  tunnelId: string;
  client: net.Socket;
  backend: net.Socket | null;
};

/**
 * Public TCP listener(s): the local port a connection arrived on selects the
 * route, and bytes are pumped both ways until either side ends.
 */
export class TcpDispatcher {
  private readonly routes: RouteTable;
  private readonly onActivity?: (tunnelId: string) => void;
  private readonly connectFn: (target: Target) => net.Socket;
  private readonly debugLog: DebugLogFn;
  private readonly servers = new Set<net.Server>();
  private readonly pairs = new Set<TcpPair>();
  private readonly idle = new Set<() => void>();

  constructor(options: TcpDispatcherOptions) {
    this.routes = options.routes;
    this.onActivity = options.onActivity;
    this.connectFn =
      options.connect ??
      ((target) => net.connect({ host: target.ip, port: target.port }));
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  /** number of live connection pairs */
  get activeConnections() {
    return this.pairs.size;
  }

  /** Start a listener; may be called once per public port. */
  async listen(options: { host?: string; port: number }): Promise<ListenAddress> {
    const server = net.createServer((socket) => {
      this.handleConnection(socket);
    });

    const address = await listenServer(server, options.port, options.host);
    server.on("error", (err) => {
      this.debugLog("error", `tcp listener error: ${formatError(err)}`);
    });
    this.servers.add(server);

    this.debugLog("tcp", `listening on ${address.host}:${address.port}`);
    return address;
  }

  /**
   * Stop accepting on every listener, wait up to `graceMs` for open pairs to
   * finish, then destroy the rest.
   */
  async close(graceMs = DEFAULT_SHUTDOWN_GRACE_MS): Promise<void> {
    const servers = Array.from(this.servers);
    this.servers.clear();

    const closed = Promise.all(
      servers.map(
        (server) =>
          new Promise<void>((resolve) => {
            server.close(() => resolve());
          }),
      ),
    );

    const drained = this.pairs.size === 0 ? closed : Promise.all([closed, this.waitForIdle()]);
    const finished = await waitOrTimeout(drained, graceMs);
    if (!finished) {
      this.debugLog("tcp", `shutdown window elapsed, destroying ${this.pairs.size} connections`);
      for (const pair of this.pairs) {
        pair.client.destroy();
        pair.backend?.destroy();
      }
    }
    await closed;
  }

  private waitForIdle(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.idle.add(resolve);
    });
  }

  private releasePair(pair: TcpPair) {
    if (!this.pairs.delete(pair)) return;
    if (this.pairs.size > 0) return;
    const waiters = Array.from(this.idle);
    this.idle.clear();
    for (const resolve of waiters) resolve();
  }

  private lookup(port: number): Target | null {
    try {
      return this.routes.lookupByPort(port);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  private handleConnection(client: net.Socket) {
    client.on("error", (err) => {
      this.debugLog("tcp", `client error: ${formatError(err)}`);
    });

    const localPort = client.localPort;
    const target = localPort === undefined ? null : this.lookup(localPort);
    if (!target) {
      this.debugLog("tcp", `no tunnel found for port ${localPort ?? "?"}`);
      client.destroy();
      return;
    }

    const pair: TcpPair = { tunnelId: target.id, client, backend: null };
    this.pairs.add(pair);
    this.onActivity?.(target.id);

    // hold client bytes until the backend is up
    client.pause();

    const backend = this.connectFn(target);
    pair.backend = backend;
    let connected = false;
    let closed = false;

    const teardown = () => {
      if (closed) return;
      closed = true;
      client.destroy();
      backend.destroy();
      this.releasePair(pair);
      if (connected) {
        this.debugLog("tcp", `closed tunnel=${target.id} port=${localPort}`);
      }
    };

    backend.once("connect", () => {
      connected = true;
      this.debugLog("tcp", `opened tunnel=${target.id} port=${localPort} -> ${target.ip}:${target.port}`);

      client.on("data", () => this.onActivity?.(target.id));
      client.pipe(backend);
      backend.pipe(client);
      client.resume();
    });

    backend.on("error", (err) => {
      if (!connected) {
        const error = new BackendUnreachableError(target.id, `${target.ip}:${target.port}`, err);
        this.debugLog("error", `${error.message}: ${formatError(err)}`);
      } else {
        this.debugLog("tcp", `backend error tunnel=${target.id}: ${formatError(err)}`);
      }
      teardown();
    });

    // Either direction ending tears down the whole pair, once the bytes already
    // read from that side have been flushed to the other.
    const endFrom = (to: net.Socket) => () => {
      if (to.writableFinished) {
        teardown();
        return;
      }
      to.once("finish", teardown);
      to.end();
    };
    client.on("end", endFrom(backend));
    backend.on("end", endFrom(client));
    client.on("close", teardown);
    backend.on("close", teardown);
  }
}
