/**
 * Test doubles shared by the unit tests
 */

import { vi } from "vitest";
import { Readable } from "stream";
import { validateHeaderName, validateHeaderValue, type IncomingMessage, type ServerResponse } from "http";
import type { AdbTransportLibrary, RawHandle } from "../src/adb/transport";
import type { Logger } from "../src/log";
import { SessionError } from "../src/session/errors";

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Scripted device: shell output per command, files for push/pull
 */
export interface DeviceScript {
  responses: Map<string, string>;
  binary: Map<string, Uint8Array>;
  files: Map<string, Uint8Array>;
  failing: Set<string>;
  /** Time each call stays "on the wire" */
  latencyMs: number;
}

export function createScript(): DeviceScript {
  return {
    responses: new Map(),
    binary: new Map(),
    files: new Map(),
    failing: new Set(),
    latencyMs: 0,
  };
}

/**
 * Handle that records calls and any overlap between them
 */
export class FakeHandle implements RawHandle {
  closed = false;
  inFlight = 0;
  overlaps = 0;
  private lose: () => void = () => {};
  readonly disconnected: Promise<void>;

  constructor(
    readonly id: string,
    private log: string[],
    private script: DeviceScript
  ) {
    this.disconnected = new Promise<void>((resolve) => {
      this.lose = resolve;
    });
  }

  /** Simulate the cable being pulled */
  loseDevice(): void {
    this.lose();
  }

  private async call<T>(entry: string, key: string, result: () => T): Promise<T> {
    this.log.push(entry);
    this.inFlight++;
    if (this.inFlight > 1) this.overlaps++;
    try {
      await pause(this.script.latencyMs);
      if (this.script.failing.has(key)) {
        throw new Error("shell failed");
      }
      return result();
    } finally {
      this.inFlight--;
    }
  }

  shell(command: string): Promise<string> {
    return this.call(`shell ${this.id} ${command}`, command, () => this.script.responses.get(command) ?? "");
  }

  shellBytes(command: string): Promise<Uint8Array> {
    return this.call(
      `shellBytes ${this.id} ${command}`,
      command,
      () => this.script.binary.get(command) ?? new Uint8Array()
    );
  }

  enableTcpListener(port: number): Promise<string> {
    return this.call(`tcpip ${this.id} ${port}`, "tcpip", () => `restarting in TCP mode port: ${port}\n`);
  }

  push(remotePath: string, data: Uint8Array): Promise<void> {
    return this.call(`push ${this.id} ${remotePath}`, `push ${remotePath}`, () => {
      this.script.files.set(remotePath, data);
    });
  }

  pull(remotePath: string): Promise<Uint8Array> {
    return this.call(`pull ${this.id} ${remotePath}`, `pull ${remotePath}`, () => {
      const data = this.script.files.get(remotePath);
      if (!data) throw new Error(`remote object '${remotePath}' does not exist`);
      return data;
    });
  }

  async close(): Promise<void> {
    this.log.push(`close ${this.id}`);
    this.closed = true;
  }
}

/**
 * Transport stub with a shared call log
 */
export class FakeTransport implements AdbTransportLibrary {
  readonly log: string[] = [];
  readonly handles: FakeHandle[] = [];
  readonly script = createScript();
  private nextFailure: Error | null = null;

  failNextOpen(error: Error): void {
    this.nextFailure = error;
  }

  /** Handles opened and not yet closed */
  openCount(): number {
    return this.handles.filter((h) => !h.closed).length;
  }

  last(): FakeHandle | undefined {
    return this.handles[this.handles.length - 1];
  }

  async openUsb(serial: string): Promise<FakeHandle> {
    return this.open(`openUsb ${serial}`, `usb:${serial}`);
  }

  async openNetwork(host: string, port: number): Promise<FakeHandle> {
    return this.open(`openNetwork ${host}:${port}`, `net:${host}:${port}`);
  }

  private open(entry: string, id: string): FakeHandle {
    this.log.push(entry);
    const failure = this.nextFailure;
    if (failure) {
      this.nextFailure = null;
      throw failure;
    }
    const handle = new FakeHandle(id, this.log, this.script);
    this.handles.push(handle);
    return handle;
  }
}

/**
 * Await a rejection and return it as a SessionError
 */
export async function catchSessionError(promise: Promise<unknown>): Promise<SessionError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof SessionError) return err;
    throw err;
  }
  throw new Error("Expected the promise to reject");
}

export function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// Same checks a real ServerResponse applies
function checkHeader(name: string, value: unknown): void {
  validateHeaderName(name);
  validateHeaderValue(name, String(value));
}

/**
 * Minimal ServerResponse recording status, headers and body
 */
export function fakeResponse() {
  let status: number | undefined;
  let headers: Record<string, unknown> = {};
  const chunks: Buffer[] = [];

  const fake = {
    writeHead: vi.fn((code: number, head?: Record<string, unknown>) => {
      for (const [name, value] of Object.entries(head ?? {})) checkHeader(name, value);
      status = code;
      headers = { ...headers, ...head };
    }),
    setHeader: vi.fn((name: string, value: string) => {
      checkHeader(name, value);
      headers[name] = value;
    }),
    end: vi.fn((data?: string | Buffer) => {
      if (data !== undefined) chunks.push(Buffer.from(data));
    }),
  };

  return {
    // Only the members above are used by the handlers under test
    res: fake as unknown as ServerResponse,
    writeHead: fake.writeHead,
    end: fake.end,
    status: () => status,
    header: (name: string) => headers[name],
    body: () => Buffer.concat(chunks),
    json: (): unknown => JSON.parse(Buffer.concat(chunks).toString("utf8")),
  };
}

/**
 * IncomingMessage stand-in streaming the given body
 */
export function fakeRequest(
  method: string,
  url: string,
  body?: object | string | Uint8Array
): IncomingMessage {
  let chunk: Buffer | undefined;
  if (typeof body === "string") {
    chunk = Buffer.from(body);
  } else if (body instanceof Uint8Array) {
    chunk = Buffer.from(body);
  } else if (body !== undefined) {
    chunk = Buffer.from(JSON.stringify(body));
  }
  const stream = Readable.from(chunk ? [chunk] : []);
  return Object.assign(stream, { method, url, headers: {} }) as unknown as IncomingMessage;
}
