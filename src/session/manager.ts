/**
 * Device Session Manager
 * Owns the single active ADB connection
 *
 * Every operation goes through one SerialGate, so connect, disconnect and
 * command execution never interleave. Connecting always releases the previous
 * handle before the new one is opened.
 */

import type { AdbTransportLibrary, RawHandle } from "../adb/transport";
import { DispatchedHandle } from "../adb/dispatch";
import { createLogger, errorMessage, type Logger } from "../log";
import { SessionError, wrapTransportError } from "./errors";
import { SerialGate } from "./lock";
import { describeTarget, isValidPort, resolveConnectTarget, DEFAULT_ADB_PORT } from "./request";
import {
  BRIGHTNESS_QUERY,
  FOCUS_QUERY,
  POWER_QUERY,
  parseDeviceState,
  parseFocusedPackage,
} from "./state-parser";
import type {
  ConnectRequest,
  DeviceState,
  SessionChangeCallback,
  SessionStatus,
  TransportKind,
  WirelessDebugResult,
} from "./types";

export interface SessionManagerOptions {
  transport: AdbTransportLibrary;
  defaultPort?: number;
  onChange?: SessionChangeCallback;
  logger?: Logger;
}

interface ActiveSession {
  kind: TransportKind;
  handle: DispatchedHandle;
  endpoint: string;
  connectedAt: Date;
}

/**
 * SessionManager - single-slot connection owner
 *
 * Usage:
 * ```typescript
 * const sessions = new SessionManager({ transport });
 * await sessions.connect({ kind: "usb", serial: "ABC123" });
 * const out = await sessions.execute("getprop ro.product.model");
 * await sessions.disconnect();
 * ```
 */
export class SessionManager {
  private transport: AdbTransportLibrary;
  private defaultPort: number;
  private onChange: SessionChangeCallback;
  private log: Logger;
  private gate = new SerialGate();
  private active: ActiveSession | null = null;

  constructor(options: SessionManagerOptions) {
    this.transport = options.transport;
    this.defaultPort = options.defaultPort ?? DEFAULT_ADB_PORT;
    this.onChange = options.onChange ?? (() => {});
    this.log = options.logger ?? createLogger("session");
  }

  /**
   * Current session snapshot (not gated)
   */
  status(): SessionStatus {
    if (!this.active) {
      return { state: "none" };
    }
    return {
      state: this.active.kind,
      endpoint: this.active.endpoint,
      connectedAt: this.active.connectedAt,
    };
  }

  /**
   * Close any current session, then open a new one
   * @throws SessionError InvalidRequest | ConnectionFailed
   */
  async connect(request: ConnectRequest): Promise<SessionStatus> {
    // Validated before queueing: a bad request never touches the session
    const target = resolveConnectTarget(request, this.defaultPort);
    const endpoint = describeTarget(target);

    return this.gate.run(async () => {
      await this.release();

      this.log.info(`Connecting to ${target.kind} device ${endpoint}`);
      let raw: RawHandle;
      try {
        raw =
          target.kind === "usb"
            ? await this.transport.openUsb(target.serial)
            : await this.transport.openNetwork(target.host, target.port);
      } catch (err) {
        this.log.error(`Connection to ${endpoint} failed: ${errorMessage(err)}`);
        throw wrapTransportError("ConnectionFailed", "ADB connection failed", err);
      }

      const session: ActiveSession = {
        kind: target.kind,
        handle: new DispatchedHandle(target.kind, raw),
        endpoint,
        connectedAt: new Date(),
      };
      this.active = session;
      this.watchDisconnect(session);
      this.log.info(`Connected to ${target.kind} device ${endpoint}`);

      const status = this.status();
      this.onChange(status);
      return status;
    });
  }

  /**
   * Release the current session; no-op when nothing is connected
   */
  disconnect(): Promise<void> {
    return this.gate.run(() => this.release());
  }

  /**
   * Run a shell command verbatim and return stdout
   * @throws SessionError NotConnected | CommandFailed
   */
  execute(command: string): Promise<string> {
    return this.gate.run(() => this.shell(command));
  }

  /**
   * Run a shell command and return raw stdout bytes
   */
  executeBinary(command: string): Promise<Uint8Array> {
    return this.gate.run(async () => {
      const session = this.require();
      try {
        return await session.handle.shellBytes(command);
      } catch (err) {
        throw wrapTransportError("CommandFailed", `Command '${command}' failed`, err);
      }
    });
  }

  /**
   * Screen power and brightness
   * @throws SessionError NotConnected | CommandFailed | ParseError
   */
  queryState(): Promise<DeviceState> {
    return this.gate.run(async () => {
      const power = await this.shell(POWER_QUERY);
      const brightness = await this.shell(BRIGHTNESS_QUERY);
      return parseDeviceState(power, brightness);
    });
  }

  /**
   * Package of the focused app, null if the dump has none
   */
  currentApp(): Promise<string | null> {
    return this.gate.run(async () => parseFocusedPackage(await this.shell(FOCUS_QUERY)));
  }

  /**
   * Make the device listen for ADB on a TCP port.
   * Only over USB; the session stays USB until the caller reconnects.
   * @throws SessionError NotConnected | WrongTransport | InvalidRequest | CommandFailed
   */
  enableWirelessDebug(port: number = this.defaultPort): Promise<WirelessDebugResult> {
    return this.gate.run(async () => {
      const session = this.require();
      if (session.kind !== "usb") {
        throw new SessionError(
          "WrongTransport",
          "Wireless debugging can only be enabled over a USB connection"
        );
      }
      if (!isValidPort(port)) {
        throw new SessionError("InvalidRequest", `Invalid port: ${String(port)}`);
      }

      this.log.info(`Enabling ADB over TCP/IP on port ${port}`);
      try {
        const output = await session.handle.enableTcpListener(port);
        return { port, output };
      } catch (err) {
        throw wrapTransportError("CommandFailed", "Enabling TCP/IP failed", err);
      }
    });
  }

  /**
   * Write a file to the device
   */
  push(remotePath: string, data: Uint8Array): Promise<void> {
    return this.gate.run(async () => {
      const session = this.require();
      try {
        await session.handle.push(remotePath, data);
      } catch (err) {
        throw wrapTransportError("CommandFailed", `Upload to ${remotePath} failed`, err);
      }
    });
  }

  /**
   * Read a file from the device
   */
  pull(remotePath: string): Promise<Uint8Array> {
    return this.gate.run(async () => {
      const session = this.require();
      try {
        return await session.handle.pull(remotePath);
      } catch (err) {
        throw wrapTransportError("CommandFailed", `Download of ${remotePath} failed`, err);
      }
    });
  }

  private require(): ActiveSession {
    if (!this.active) {
      throw new SessionError("NotConnected", "No device connected");
    }
    return this.active;
  }

  // Must be called with the gate held
  private async shell(command: string): Promise<string> {
    const session = this.require();
    this.log.debug(`shell: ${command}`);
    try {
      return await session.handle.shell(command);
    } catch (err) {
      throw wrapTransportError("CommandFailed", `Command '${command}' failed`, err);
    }
  }

  // Must be called with the gate held
  private async release(): Promise<void> {
    const session = this.active;
    if (!session) return;

    this.active = null;
    this.log.info(`Closing ${session.kind} connection to ${session.endpoint}`);
    try {
      await session.handle.close();
    } catch (err) {
      this.log.warn(`Error closing previous connection: ${errorMessage(err)}`);
    }
    this.onChange(this.status());
  }

  /**
   * Drop the session if the device goes away on its own
   */
  private watchDisconnect(session: ActiveSession): void {
    void session.handle.disconnected.then(
      () => this.handleLost(session),
      () => this.handleLost(session)
    );
  }

  private handleLost(session: ActiveSession): void {
    if (this.active !== session) return;
    this.active = null;
    this.log.warn(`Device ${session.endpoint} disconnected`);
    this.onChange(this.status());
  }
}
