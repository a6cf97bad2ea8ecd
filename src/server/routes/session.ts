/**
 * Session Routes - Single Responsibility: connection lifecycle and raw shell
 */

import type { IncomingMessage, ServerResponse } from "http";
import { jsonResponse, parseBody } from "../helpers";
import type { SessionManager } from "../../session/manager";
import type { DeviceDiscovery } from "../../discovery/interface";
import { SessionError } from "../../session/errors";
import { connectRequestFromBody } from "../../session/request";

export interface SessionRouteDependencies {
  sessions: SessionManager;
  discovery: DeviceDiscovery;
}

/**
 * Create session route handlers
 * @param deps Dependencies injected (Dependency Inversion)
 */
export function createSessionRoutes(deps: SessionRouteDependencies) {
  return {
    /**
     * GET /api/devices/usb
     * ADB devices visible on USB
     */
    async getUsbDevices(res: ServerResponse): Promise<void> {
      const devices = await deps.discovery.listUsbDevices();
      jsonResponse(res, { devices });
    },

    /**
     * POST /api/connect
     * Body: { type: "usb", serial } | { type: "network", host, port? }
     */
    async postConnect(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const body = await parseBody(req);
      const status = await deps.sessions.connect(connectRequestFromBody(body));
      if (status.state === "none") {
        throw new SessionError("ConnectionFailed", "ADB connection failed: device went away");
      }
      jsonResponse(res, {
        status: "connected",
        type: status.state,
        endpoint: status.endpoint,
        connectedAt: status.connectedAt.toISOString(),
      });
    },

    /**
     * POST /api/disconnect
     */
    async postDisconnect(res: ServerResponse): Promise<void> {
      await deps.sessions.disconnect();
      jsonResponse(res, { status: "disconnected" });
    },

    /**
     * POST /api/shell
     * Body: { command }
     */
    async postShell(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const { command } = await parseBody(req);
      if (typeof command !== "string" || !command.trim()) {
        throw new SessionError("InvalidRequest", "Missing 'command'");
      }
      const output = await deps.sessions.execute(command);
      jsonResponse(res, { output });
    },

    /**
     * POST /api/tcpip
     * Body: { port? } - USB sessions only
     */
    async postTcpip(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const { port } = await parseBody(req);
      if (port !== undefined && typeof port !== "number") {
        throw new SessionError("InvalidRequest", `Invalid port: ${String(port)}`);
      }
      const result = await deps.sessions.enableWirelessDebug(port);
      jsonResponse(res, { status: "tcpip_enabled", port: result.port, output: result.output });
    },
  };
}
