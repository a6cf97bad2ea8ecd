/**
 * Frameo HTTP API Server
 * REST endpoints for frame control plus a /events WebSocket feed
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { WebSocketServer, type WebSocket } from "ws";
import type { SessionManager } from "../session/manager";
import type { SessionStatus } from "../session/types";
import type { DeviceDiscovery } from "../discovery/interface";
import type { FrameoController } from "../device/controller";
import type { HealthChecker } from "../health/checker";
import { createLogger, errorMessage } from "../log";
import { VERSION } from "../version";
import { createHealthRoutes } from "./routes/health";
import { createSessionRoutes } from "./routes/session";
import { createControlRoutes } from "./routes/control";
import { createDeviceRoutes } from "./routes/device";
import { createFileRoutes } from "./routes/files";
import { BadRequestError, jsonResponse, sendError, setCorsHeaders } from "./helpers";

const log = createLogger("http");

export interface FrameoServerOptions {
  port?: number;
  host?: string;
  sessions: SessionManager;
  controller: FrameoController;
  discovery: DeviceDiscovery;
  checker: HealthChecker;
}

type RouteHandler = (req: IncomingMessage, res: ServerResponse, query: URLSearchParams) => Promise<void> | void;

/**
 * JSON shape of a session status (dates as ISO strings)
 */
export function serializeStatus(status: SessionStatus): Record<string, string> {
  if (status.state === "none") return { state: "none" };
  return {
    state: status.state,
    endpoint: status.endpoint,
    connectedAt: status.connectedAt.toISOString(),
  };
}

/**
 * Frameo HTTP/WebSocket Server
 */
export class FrameoServer {
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private port: number;
  private host: string;
  private eventClients: Set<WebSocket> = new Set();
  private routes: Map<string, RouteHandler>;

  constructor(options: FrameoServerOptions) {
    this.port = options.port ?? 5000;
    this.host = options.host ?? "0.0.0.0";

    // Initialize routes (Dependency Injection)
    const health = createHealthRoutes({
      status: () => options.sessions.status(),
      checker: options.checker,
      getClientCount: () => this.eventClients.size,
    });
    const session = createSessionRoutes({
      sessions: options.sessions,
      discovery: options.discovery,
    });
    const control = createControlRoutes({ controller: options.controller });
    const device = createDeviceRoutes({ controller: options.controller });
    const files = createFileRoutes({ controller: options.controller });

    // Route table: "METHOD path" (path relative to /api/)
    this.routes = new Map<string, RouteHandler>([
      ["GET health", (_req, res) => health.get(res)],
      ["GET health/report", (_req, res) => health.getReport(res)],
      ["GET devices/usb", (_req, res) => session.getUsbDevices(res)],
      ["POST connect", (req, res) => session.postConnect(req, res)],
      ["POST disconnect", (_req, res) => session.postDisconnect(res)],
      ["POST shell", (req, res) => session.postShell(req, res)],
      ["POST tcpip", (req, res) => session.postTcpip(req, res)],
      ["GET state", (_req, res) => device.getState(res)],
      ["GET info", (_req, res) => device.getInfo(res)],
      ["GET screenshot", (_req, res) => device.getScreenshot(res)],
      ["POST wake", (_req, res) => control.postWake(res)],
      ["POST sleep", (_req, res) => control.postSleep(res)],
      ["POST brightness", (req, res) => control.postBrightness(req, res)],
      ["POST tap", (req, res) => control.postTap(req, res)],
      ["POST swipe", (req, res) => control.postSwipe(req, res)],
      ["POST keyevent", (req, res) => control.postKeyevent(req, res)],
      ["POST app", (req, res) => control.postApp(req, res)],
      ["POST upload", (req, res, query) => files.postUpload(req, res, query)],
      ["POST download", (req, res) => files.postDownload(req, res)],
    ]);
  }

  /**
   * Register WebSocket client with standard error/close handlers (DRY)
   */
  private registerWSClient(ws: WebSocket, clients: Set<WebSocket>, clientType: string): void {
    clients.add(ws);
    log.info(`${clientType} client connected`);

    ws.on("error", (err) => {
      log.error(`${clientType} client error: ${err.message}`);
      clients.delete(ws);
    });

    ws.on("close", () => {
      log.info(`${clientType} client disconnected`);
      clients.delete(ws);
    });
  }

  /**
   * Start server; resolves once listening
   */
  start(): Promise<void> {
    const server = createServer((req, res) => {
      this.handle(req, res).catch((err) => {
        log.error(`Request handling failed: ${errorMessage(err)}`);
        res.destroy();
      });
    });
    this.server = server;

    this.wss = new WebSocketServer({ server, perMessageDeflate: false });

    // Global error handler to prevent server crash
    this.wss.on("error", (err) => {
      log.error(`WebSocket server error: ${err.message}`);
    });

    this.wss.on("connection", (ws, req) => {
      const path = (req.url || "/").split("?")[0];
      if (path === "/events") {
        this.registerWSClient(ws, this.eventClients, "Events");
        return;
      }
      ws.close(1008, "Unknown endpoint");
    });

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        server.off("error", reject);
        log.info(`Frameo Control running on http://${this.host}:${this.port}`);
        resolve();
      });
    });
  }

  /**
   * Handle one HTTP request; never rejects
   */
  async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method || "GET";

    // CORS headers (DRY - using helper)
    setCorsHeaders(res);

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      const url = this.parseUrl(req.url);
      const path = url.pathname;

      if (path === "/" && method === "GET") {
        jsonResponse(res, this.index());
        return;
      }

      if (path.startsWith("/api/")) {
        const handler = this.routes.get(`${method} ${path.slice("/api/".length)}`);
        if (handler) {
          await handler(req, res, url.searchParams);
          return;
        }
      }

      jsonResponse(res, { error: "Not found" }, 404);
    } catch (err) {
      log.debug(`${method} ${req.url ?? "/"} failed: ${errorMessage(err)}`);
      sendError(res, err);
    }
  }

  private parseUrl(target: string | undefined): URL {
    try {
      return new URL(target || "/", `http://localhost:${this.port}`);
    } catch {
      throw new BadRequestError("Invalid request URL");
    }
  }

  private index(): object {
    return {
      service: "Frameo Control API",
      version: VERSION,
      endpoints: [...this.routes.keys()].map((key) => {
        const [method, path] = key.split(" ");
        return `${method} /api/${path}`;
      }),
      events: "/events",
    };
  }

  /**
   * Broadcast to all /events clients
   */
  broadcast(data: object): void {
    const message = JSON.stringify(data);
    // Snapshot to avoid "Set modified during iteration"
    const clients = [...this.eventClients];
    for (const ws of clients) {
      if (ws.readyState !== ws.OPEN) continue;
      ws.send(message, (err) => {
        if (err) log.debug(`Event send failed: ${err.message}`);
      });
    }
  }

  /**
   * Push a session transition to /events clients
   */
  broadcastSession(status: SessionStatus): void {
    this.broadcast({ type: "session", status: serializeStatus(status) });
  }

  /**
   * Stop server
   */
  stop(): Promise<void> {
    for (const ws of this.eventClients) {
      ws.close(1001, "Server shutting down");
    }
    this.eventClients.clear();
    this.wss?.close();
    this.wss = null;

    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
