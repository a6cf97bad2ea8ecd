/**
 * Connect request validation
 */

import { SessionError } from "./errors";
import type { ConnectRequest, ConnectTarget } from "./types";

export const DEFAULT_ADB_PORT = 5555;

export function isValidPort(port: unknown): port is number {
  return typeof port === "number" && Number.isInteger(port) && port >= 1 && port <= 65535;
}

function nonEmpty(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Turn a connect request into a target, or fail with InvalidRequest
 */
export function resolveConnectTarget(
  request: ConnectRequest,
  defaultPort = DEFAULT_ADB_PORT
): ConnectTarget {
  if (request.kind === "usb") {
    if (!nonEmpty(request.serial)) {
      throw new SessionError("InvalidRequest", "Missing 'serial' for USB connection");
    }
    return { kind: "usb", serial: request.serial.trim() };
  }

  if (request.kind === "network") {
    if (!nonEmpty(request.host)) {
      throw new SessionError("InvalidRequest", "Missing 'host' for network connection");
    }
    const port = request.port ?? defaultPort;
    if (!isValidPort(port)) {
      throw new SessionError("InvalidRequest", `Invalid port: ${String(port)}`);
    }
    return { kind: "network", host: request.host.trim(), port };
  }

  throw new SessionError("InvalidRequest", "Invalid connection type. Use 'usb' or 'network'");
}

/**
 * Build a connect request from an untyped HTTP body
 */
export function connectRequestFromBody(body: Record<string, unknown>): ConnectRequest {
  const type = body.type;
  if (type === "usb") {
    return { kind: "usb", serial: typeof body.serial === "string" ? body.serial : undefined };
  }
  if (type === "network") {
    const rawPort = body.port;
    let port: number | undefined;
    if (typeof rawPort === "number") {
      port = rawPort;
    } else if (typeof rawPort === "string" && rawPort.trim() !== "") {
      port = Number(rawPort);
    } else if (rawPort !== undefined && rawPort !== null) {
      throw new SessionError("InvalidRequest", `Invalid port: ${String(rawPort)}`);
    }
    return {
      kind: "network",
      host: typeof body.host === "string" ? body.host : undefined,
      port,
    };
  }
  throw new SessionError("InvalidRequest", "Invalid connection type. Use 'usb' or 'network'");
}

export function describeTarget(target: ConnectTarget): string {
  return target.kind === "usb" ? target.serial : `${target.host}:${target.port}`;
}
