import http from "node:http";
import https from "node:https";
import net from "node:net";
import { performance } from "node:perf_hooks";
import type { Duplex } from "node:stream";
import { pipeline } from "node:stream/promises";

import { Agent, request as undiciRequest, type Dispatcher } from "undici";

import { BackendUnreachableError, NotFoundError, formatError } from "../errors";
import { noopDebugLog, type DebugLogFn } from "../debug";
import type { RouteTable, Target } from "../routing/table";
import { waitOrTimeout } from "../utils/async";
import { listenServer, type ListenAddress } from "../utils/net";
import { buildUpstreamHeaders, requestPath, serializeRequestHead, stripHopByHopHeaders } from "./headers";
import type { TlsMaterial } from "./tls";

export const DEFAULT_SHUTDOWN_GRACE_MS = 30_000;

const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
] as const;

type HttpMethod = (typeof HTTP_METHODS)[number];

function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as ReadonlyArray<string>).includes(value);
}

export type HttpDispatcherOptions = {
  routes: RouteTable;
  /** serve https with this certificate instead of plain http */
  tls?: TlsMaterial | null;
  /** upstream dispatcher (defaults to a keep-alive free undici agent) */
  upstream?: Dispatcher;
  /** invoked with the tunnel id of every routed request */
  onActivity?: (tunnelId: string) => void;
  debugLog?: DebugLogFn;
};

export function formatHostForUrl(ip: string) {
  return net.isIP(ip) === 6 ? `[${ip}]` : ip;
}

function writeTextResponse(res: http.ServerResponse, status: number, text: string) {
  if (res.headersSent) {
    res.destroy();
    return;
  }
  const body = `${text}\n`;
  res.writeHead(status, {
    "content-type": "text/plain; charset=utf-8",
    "content-length": Buffer.byteLength(body),
  });
  res.end(body);
}

function writeRawResponse(socket: Duplex, status: number, text: string) {
  const body = `${text}\n`;
  socket.end(
    `HTTP/1.1 ${status} ${text}\r\n` +
      "Connection: close\r\n" +
      "Content-Type: text/plain; charset=utf-8\r\n" +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      "\r\n" +
      body,
  );
}

/**
 * Public HTTP listener: resolves each request's `Host` against the route
 * table and reverse-proxies it to the tunnel backend.
 */
export class HttpDispatcher {
  private readonly routes: RouteTable;
  private readonly tls: TlsMaterial | null;
  private readonly upstream: Dispatcher;
  private readonly ownsUpstream: boolean;
  private upstreamClosed = false;
  private readonly onActivity?: (tunnelId: string) => void;
  private readonly debugLog: DebugLogFn;
  private readonly upgradedSockets = new Set<Duplex>();
  private server: http.Server | null = null;

  constructor(options: HttpDispatcherOptions) {
    this.routes = options.routes;
    this.tls = options.tls ?? null;
    this.ownsUpstream = !options.upstream;
    this.upstream = options.upstream ?? new Agent({ pipelining: 0 });
    this.onActivity = options.onActivity;
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  get protocol(): "http" | "https" {
    return this.tls ? "https" : "http";
  }

  async listen(options: { host?: string; port: number }): Promise<ListenAddress> {
    if (this.server) {
      throw new Error("http dispatcher is already listening");
    }

    const handler = (req: http.IncomingMessage, res: http.ServerResponse) => {
      this.handleRequest(req, res);
    };
    const server: http.Server = this.tls
      ? https.createServer({ cert: this.tls.cert, key: this.tls.key }, handler)
      : http.createServer(handler);

    server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });
    server.on("clientError", (err, socket) => {
      this.debugLog("http", `client error: ${formatError(err)}`);
      socket.destroy();
    });

    const address = await listenServer(server, options.port, options.host);
    server.on("error", (err) => {
      this.debugLog("error", `http listener error: ${formatError(err)}`);
    });
    this.server = server;

    this.debugLog("http", `listening on ${this.protocol}://${formatHostForUrl(address.host)}:${address.port}`);
    return address;
  }

  /**
   * Stop accepting, let in-flight requests finish for up to `graceMs`, then
   * force-close whatever is left.
   */
  async close(graceMs = DEFAULT_SHUTDOWN_GRACE_MS): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      await this.closeUpstream();
      return;
    }

    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    server.closeIdleConnections();

    const drained = await waitOrTimeout(closed, graceMs);
    if (!drained) {
      this.debugLog("http", "shutdown window elapsed, closing remaining connections");
      server.closeAllConnections();
      for (const socket of this.upgradedSockets) socket.destroy();
      await closed;
    }

    await this.closeUpstream();
  }

  private async closeUpstream() {
    if (!this.ownsUpstream || this.upstreamClosed) return;
    this.upstreamClosed = true;
    await this.upstream.close();
  }

  private resolveTarget(hostHeader: string | undefined): Target | null {
    try {
      return this.routes.lookupByHost(hostHeader ?? "");
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    const started = performance.now();
    const target = this.resolveTarget(req.headers.host);
    if (!target) {
      this.debugLog("http", `no tunnel found for host=${req.headers.host ?? ""}`);
      req.resume();
      writeTextResponse(res, 503, "Service Unavailable");
      return;
    }

    this.onActivity?.(target.id);
    this.forward(req, res, target)
      .then((status) => {
        const duration = (performance.now() - started).toFixed(1);
        this.debugLog(
          "http",
          `tunnel=${target.id} ${req.method ?? "GET"} ${req.url ?? "/"} status=${status} duration=${duration}ms`,
        );
      })
      .catch((err: unknown) => {
        this.debugLog("error", `http proxy failure tunnel=${target.id}: ${formatError(err)}`);
        res.destroy();
      });
  }

  /** Forward one request; resolves with the status sent to the client. */
  private async forward(req: http.IncomingMessage, res: http.ServerResponse, target: Target): Promise<number> {
    const method = req.method ?? "GET";
    if (!isHttpMethod(method) || method === "CONNECT") {
      req.resume();
      writeTextResponse(res, 501, "Not Implemented");
      return 501;
    }

    const path = requestPath(req.url);
    if (path === null) {
      req.resume();
      writeTextResponse(res, 400, "Bad Request");
      return 400;
    }

    // the path is appended, never resolved, so the request cannot pick its own host
    const url = new URL(`http://${formatHostForUrl(target.ip)}:${target.port}${path}`);
    const hasBody = method !== "GET" && method !== "HEAD";

    let upstream: Dispatcher.ResponseData;
    try {
      upstream = await undiciRequest(url, {
        method,
        headers: buildUpstreamHeaders(req, { protocol: this.protocol }),
        body: hasBody ? req : null,
        dispatcher: this.upstream,
      });
    } catch (err) {
      const error = new BackendUnreachableError(target.id, `${target.ip}:${target.port}`, err);
      this.debugLog("error", `${error.message}: ${formatError(err)}`);
      req.resume();
      writeTextResponse(res, 502, "Bad Gateway");
      return 502;
    }

    res.writeHead(upstream.statusCode, stripHopByHopHeaders(upstream.headers));
    try {
      await pipeline(upstream.body, res);
    } catch (err) {
      this.debugLog("http", `stream aborted tunnel=${target.id}: ${formatError(err)}`);
      upstream.body.destroy();
      res.destroy();
    }
    return upstream.statusCode;
  }

  private handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer) {
    socket.on("error", () => socket.destroy());

    const target = this.resolveTarget(req.headers.host);
    if (!target) {
      this.debugLog("http", `no tunnel found for upgrade host=${req.headers.host ?? ""}`);
      writeRawResponse(socket, 503, "Service Unavailable");
      return;
    }

    const path = requestPath(req.url);
    if (path === null) {
      writeRawResponse(socket, 400, "Bad Request");
      return;
    }

    this.onActivity?.(target.id);
    this.upgradedSockets.add(socket);

    const upstream = net.connect({ host: target.ip, port: target.port });
    let connected = false;

    const teardown = () => {
      this.upgradedSockets.delete(socket);
      socket.destroy();
      upstream.destroy();
    };

    upstream.once("connect", () => {
      connected = true;
      upstream.write(serializeRequestHead(req, path));
      if (head.length > 0) upstream.write(head);
      socket.pipe(upstream);
      upstream.pipe(socket);
      this.debugLog("http", `upgrade tunnel=${target.id} ${req.url ?? "/"}`);
    });

    upstream.on("error", (err) => {
      if (!connected) {
        const error = new BackendUnreachableError(target.id, `${target.ip}:${target.port}`, err);
        this.debugLog("error", `${error.message}: ${formatError(err)}`);
        this.upgradedSockets.delete(socket);
        writeRawResponse(socket, 502, "Bad Gateway");
        return;
      }
      teardown();
    });

    upstream.on("close", () => {
      if (connected) teardown();
    });
    socket.on("close", teardown);
  }
}
