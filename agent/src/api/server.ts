import http from "node:http";

import { isTunnelError, formatError } from "../errors";
import { noopDebugLog, type DebugLogFn } from "../debug";
import type { CreateTunnelRequest, TunnelService } from "../tunnel/service";
import { listenServer, type ListenAddress } from "../utils/net";
import { waitOrTimeout } from "../utils/async";
import {
  parseCreateTunnelRequest,
  parseRemoveTunnelRequest,
  toCreateTunnelResponse,
  toStatusResponse,
  toTunnelListResponse,
  RequestValidationError,
  type ErrorResponse,
} from "./models";

export const DEFAULT_MAX_JSON_BYTES = 64 * 1024;

export type ManagementApiOptions = {
  service: TunnelService;
  /** route prefix, e.g. `/api` */
  basePath?: string;
  maxJsonBytes?: number;
  debugLog?: DebugLogFn;
};

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

async function readJsonBody(req: http.IncomingMessage, maxBytes: number): Promise<unknown> {
  const declared = Number(req.headers["content-length"] ?? "0");
  if (Number.isFinite(declared) && declared > maxBytes) {
    req.resume();
    throw new PayloadTooLargeError(maxBytes);
  }

  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buf.length;
    if (total > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    chunks.push(buf);
  }

  const text = Buffer.concat(chunks).toString("utf8");
  try {
    return JSON.parse(text) as unknown;
  } catch {
    throw new RequestValidationError("Invalid request body");
  }
}

function sendJson(res: http.ServerResponse, body: unknown, status: number) {
  const payload = `${JSON.stringify(body)}\n`;
  res.writeHead(status, {
    "content-type": "application/json",
    "content-length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

function sendError(res: http.ServerResponse, message: string, status: number) {
  const body: ErrorResponse = {
    error: http.STATUS_CODES[status] ?? "Error",
    code: status,
    details: message,
  };
  sendJson(res, body, status);
}

/**
 * JSON management surface over {@link TunnelService}.
 */
export class ManagementApi {
  private readonly service: TunnelService;
  private readonly basePath: string;
  private readonly maxJsonBytes: number;
  private readonly debugLog: DebugLogFn;
  private server: http.Server | null = null;

  constructor(options: ManagementApiOptions) {
    this.service = options.service;
    this.basePath = options.basePath ?? "/api";
    this.maxJsonBytes = options.maxJsonBytes ?? DEFAULT_MAX_JSON_BYTES;
    this.debugLog = options.debugLog ?? noopDebugLog;
  }

  async listen(options: { host?: string; port: number }): Promise<ListenAddress> {
    if (this.server) {
      throw new Error("management api is already listening");
    }
    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        this.debugLog("error", `api handler failure: ${formatError(err)}`);
        if (!res.headersSent) {
          sendError(res, "internal error", 500);
        } else {
          res.destroy();
        }
      });
    });

    const address = await listenServer(server, options.port, options.host);
    server.on("error", (err) => {
      this.debugLog("error", `api listener error: ${formatError(err)}`);
    });
    this.server = server;
    this.debugLog("api", `listening on ${address.host}:${address.port}${this.basePath}`);
    return address;
  }

  async close(graceMs: number): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    server.closeIdleConnections();
    if (!(await waitOrTimeout(closed, graceMs))) {
      server.closeAllConnections();
      await closed;
    }
  }

  /** Route one management request */
  async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const route = url.pathname.startsWith(`${this.basePath}/`)
      ? url.pathname.slice(this.basePath.length)
      : null;

    this.debugLog("api", `${method} ${url.pathname}`);

    switch (route) {
      case "/new-tunnel":
        if (method !== "POST") return sendError(res, "Method not allowed", 405);
        return this.handleCreateTunnel(req, res);
      case "/remove-tunnel":
        if (method !== "POST") return sendError(res, "Method not allowed", 405);
        return this.handleRemoveTunnel(req, res);
      case "/status":
        if (method !== "GET") return sendError(res, "Method not allowed", 405);
        return sendJson(res, toStatusResponse(this.service.status()), 200);
      case "/tunnels":
        if (method !== "GET") return sendError(res, "Method not allowed", 405);
        return sendJson(res, toTunnelListResponse(this.service.listTunnels()), 200);
      default:
        req.resume();
        return sendError(res, `no route for ${url.pathname}`, 404);
    }
  }

  private async readBody(req: http.IncomingMessage, res: http.ServerResponse): Promise<unknown> {
    try {
      return await readJsonBody(req, this.maxJsonBytes);
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        sendError(res, err.message, 413);
        return undefined;
      }
      if (err instanceof RequestValidationError) {
        sendError(res, err.message, 400);
        return undefined;
      }
      throw err;
    }
  }

  private async handleCreateTunnel(req: http.IncomingMessage, res: http.ServerResponse) {
    const body = await this.readBody(req, res);
    if (body === undefined) return;

    let input: CreateTunnelRequest;
    try {
      input = parseCreateTunnelRequest(body);
    } catch (err) {
      if (err instanceof RequestValidationError) return sendError(res, err.message, 400);
      throw err;
    }

    try {
      const result = await this.service.create(input);
      sendJson(res, toCreateTunnelResponse(result), 201);
    } catch (err) {
      if (!isTunnelError(err)) throw err;
      this.debugLog("api", `create tunnel ${input.id} failed: ${err.message}`);
      sendError(res, err.message, err.status);
    }
  }

  private async handleRemoveTunnel(req: http.IncomingMessage, res: http.ServerResponse) {
    const body = await this.readBody(req, res);
    if (body === undefined) return;

    let tunnelId: string;
    try {
      tunnelId = parseRemoveTunnelRequest(body).tunnelId;
    } catch (err) {
      if (err instanceof RequestValidationError) return sendError(res, err.message, 400);
      throw err;
    }

    try {
      await this.service.remove(tunnelId);
    } catch (err) {
      if (!isTunnelError(err)) throw err;
      return sendError(res, err.message, err.status);
    }

    sendJson(res, { success: true, message: "Tunnel removed successfully" }, 200);
  }
}
