/**
 * Common HTTP helpers (DRY principle)
 */

import type { IncomingMessage, ServerResponse } from "http";
import { SessionError, type SessionErrorKind } from "../session/errors";
import { createLogger, errorMessage } from "../log";

const log = createLogger("http");

export type JsonBody = Record<string, unknown>;

/**
 * Request could not be read (malformed JSON, body not an object)
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

/**
 * Send JSON response
 */
export function jsonResponse(res: ServerResponse, data: object, status = 200): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

/**
 * Send binary response
 */
export function binaryResponse(
  res: ServerResponse,
  data: Uint8Array,
  contentType: string,
  headers: Record<string, string> = {}
): void {
  res.writeHead(200, {
    "Content-Type": contentType,
    "Content-Length": data.byteLength,
    "Cache-Control": "no-cache",
    ...headers,
  });
  res.end(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
}

/**
 * Attachment header for a file name; non-ASCII names go in `filename*` (RFC 6266)
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
  if (fallback === filename) {
    return `attachment; filename="${filename}"`;
  }
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

/**
 * Read the whole request body
 */
export function readRawBody(req: IncomingMessage): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer | string) => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });
    req.on("end", () => resolve(new Uint8Array(Buffer.concat(chunks))));
    req.on("error", reject);
  });
}

function isJsonBody(value: unknown): value is JsonBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse request body as a JSON object; empty body parses as {}
 */
export async function parseBody(req: IncomingMessage): Promise<JsonBody> {
  const text = Buffer.from(await readRawBody(req)).toString("utf8");
  if (!text.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new BadRequestError("Invalid JSON");
  }
  if (!isJsonBody(parsed)) {
    throw new BadRequestError("Request body must be a JSON object");
  }
  return parsed;
}

/**
 * Set CORS headers
 */
export function setCorsHeaders(res: ServerResponse): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
}

const STATUS_BY_KIND: Record<SessionErrorKind, number> = {
  InvalidRequest: 400,
  NotConnected: 503,
  WrongTransport: 409,
  ConnectionFailed: 502,
  CommandFailed: 500,
  ParseError: 502,
};

export function statusForKind(kind: SessionErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/**
 * Map a thrown value to an error response
 */
export function sendError(res: ServerResponse, err: unknown): void {
  if (err instanceof SessionError) {
    const body: Record<string, string> = { error: err.message, kind: err.kind };
    if (err.kind === "ParseError" && err.output !== undefined) {
      body.output = err.output;
    }
    jsonResponse(res, body, statusForKind(err.kind));
    return;
  }
  if (err instanceof BadRequestError) {
    jsonResponse(res, { error: err.message }, 400);
    return;
  }
  log.error(`Unhandled error: ${errorMessage(err)}`);
  jsonResponse(res, { error: errorMessage(err) }, 500);
}
