/**
 * ADB transport backed by the Tango libraries
 * USB through WebUSB, network through a TCP socket
 */

import { Adb, AdbDaemonTransport } from "@yume-chan/adb";
import type { AdbCredentialStore, AdbDaemonDevice } from "@yume-chan/adb";
import type { AdbDaemonWebUsbDeviceManager } from "@yume-chan/adb-daemon-webusb";
import { ReadableStream, type MaybeConsumable } from "@yume-chan/stream-extra";
import { createLogger } from "../log";
import { AdbDaemonTcpDevice } from "./tcp-device";
import type { AdbTransportLibrary, RawHandle } from "./transport";

const log = createLogger("adb");

function concatChunks(chunks: Uint8Array[], total: number): Uint8Array {
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Authorized connection wrapped as a RawHandle
 */
export class TangoHandle implements RawHandle {
  private adb: Adb;

  constructor(adb: Adb) {
    this.adb = adb;
  }

  get disconnected(): Promise<void> {
    return this.adb.disconnected;
  }

  shell(command: string): Promise<string> {
    return this.adb.subprocess.noneProtocol.spawnWaitText(command);
  }

  shellBytes(command: string): Promise<Uint8Array> {
    return this.adb.subprocess.noneProtocol.spawnWait(command);
  }

  enableTcpListener(port: number): Promise<string> {
    return this.adb.tcpip.setPort(port);
  }

  async push(remotePath: string, data: Uint8Array): Promise<void> {
    const sync = await this.adb.sync();
    try {
      await sync.write({
        filename: remotePath,
        file: new ReadableStream<MaybeConsumable<Uint8Array>>({
          start(controller) {
            controller.enqueue(data);
            controller.close();
          },
        }),
      });
    } finally {
      await sync.dispose();
    }
  }

  async pull(remotePath: string): Promise<Uint8Array> {
    const sync = await this.adb.sync();
    try {
      const reader = sync.read(remotePath).getReader();
      const chunks: Uint8Array[] = [];
      let total = 0;
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        chunks.push(value);
        total += value.length;
      }
      return concatChunks(chunks, total);
    } finally {
      await sync.dispose();
    }
  }

  close(): Promise<void> {
    return this.adb.close();
  }
}

export interface TangoTransportOptions {
  credentialStore: AdbCredentialStore;
  usbManager: AdbDaemonWebUsbDeviceManager;
}

export class TangoTransport implements AdbTransportLibrary {
  private credentialStore: AdbCredentialStore;
  private usbManager: AdbDaemonWebUsbDeviceManager;

  constructor(options: TangoTransportOptions) {
    this.credentialStore = options.credentialStore;
    this.usbManager = options.usbManager;
  }

  async openUsb(serial: string): Promise<RawHandle> {
    const devices = await this.usbManager.getDevices();
    const device = devices.find((d) => d.serial === serial);
    if (!device) {
      throw new Error(`Device with serial '${serial}' not found`);
    }
    return this.authenticate(device);
  }

  async openNetwork(host: string, port: number): Promise<RawHandle> {
    return this.authenticate(new AdbDaemonTcpDevice({ host, port }));
  }

  private async authenticate(device: AdbDaemonDevice): Promise<RawHandle> {
    const connection = await device.connect();
    log.info(`Authenticating with ${device.serial} (accept the prompt on the frame if shown)`);
    const transport = await AdbDaemonTransport.authenticate({
      serial: device.serial,
      connection,
      credentialStore: this.credentialStore,
    });
    return new TangoHandle(new Adb(transport));
  }
}
