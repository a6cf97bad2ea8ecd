/**
 * ADB Transport Interface
 * The session manager depends on this abstraction, not on the ADB library
 */

/**
 * An open, authorized ADB connection to one device
 */
export interface RawHandle {
  /** Run a shell command and return its stdout as text */
  shell(command: string): Promise<string>;
  /** Run a shell command and return its stdout as bytes */
  shellBytes(command: string): Promise<Uint8Array>;
  /** Ask adbd to listen on a TCP port (USB handles) */
  enableTcpListener(port: number): Promise<string>;
  /** Write a file through the sync protocol */
  push(remotePath: string, data: Uint8Array): Promise<void>;
  /** Read a file through the sync protocol */
  pull(remotePath: string): Promise<Uint8Array>;
  close(): Promise<void>;
  /** Settles when the device goes away */
  readonly disconnected: Promise<void>;
}

/**
 * Opens handles (injectable for testing)
 */
export interface AdbTransportLibrary {
  openUsb(serial: string): Promise<RawHandle>;
  openNetwork(host: string, port: number): Promise<RawHandle>;
}
