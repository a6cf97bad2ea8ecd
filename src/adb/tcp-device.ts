/**
 * ADB daemon device over a Node.js TCP socket
 * Used for frames that have wireless debugging enabled
 */

import type { AdbDaemonDevice } from "@yume-chan/adb";
import { AdbPacket, AdbPacketSerializeStream } from "@yume-chan/adb";
import {
  Consumable,
  PushReadableStream,
  StructDeserializeStream,
  WrapWritableStream,
} from "@yume-chan/stream-extra";
import { connect as netConnect, type Socket } from "net";
import type { Duplex } from "stream";

export interface AdbDaemonTcpDeviceOptions {
  host: string;
  port: number;
  /** Socket connect timeout in ms */
  connectTimeout?: number;
}

function openSocket(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = netConnect({ host, port });
    const fail = (err: Error) => {
      socket.destroy();
      reject(err);
    };
    socket.setTimeout(timeoutMs, () => fail(new Error(`Connection to ${host}:${port} timed out`)));
    socket.once("error", fail);
    socket.once("connect", () => {
      socket.setTimeout(0);
      socket.off("error", fail);
      resolve(socket);
    });
  });
}

/**
 * Socket data as a readable stream; ends when the socket ends or closes
 */
export function socketReadable(socket: Duplex): PushReadableStream<Uint8Array> {
  return new PushReadableStream<Uint8Array>((controller) => {
    let ended = false;
    const finish = (err?: Error) => {
      if (ended) return;
      ended = true;
      if (err) {
        controller.error(err);
      } else {
        controller.close();
      }
    };

    socket.on("data", (data: Buffer) => {
      // Backpressure: hold the socket until the consumer takes the chunk
      socket.pause();
      controller.enqueue(data).then(
        () => socket.resume(),
        (err: unknown) => socket.destroy(err instanceof Error ? err : undefined)
      );
    });
    socket.on("end", () => finish());
    socket.on("error", (err: Error) => finish(err));
    // destroy() without an error emits neither "end" nor "error"
    socket.on("close", () => finish());
  });
}

export class AdbDaemonTcpDevice implements AdbDaemonDevice {
  readonly serial: string;
  readonly host: string;
  readonly port: number;
  private connectTimeout: number;

  get name(): string | undefined {
    return undefined;
  }

  constructor(options: AdbDaemonTcpDeviceOptions) {
    this.host = options.host;
    this.port = options.port;
    this.connectTimeout = options.connectTimeout ?? 9000;
    this.serial = `${this.host}:${this.port}`;
  }

  async connect() {
    const socket = await openSocket(this.host, this.port, this.connectTimeout);
    socket.setNoDelay(true);

    const readable = socketReadable(socket);

    const writable = new Consumable.WritableStream<Uint8Array>({
      write(chunk) {
        return new Promise<void>((resolve, reject) => {
          socket.write(chunk, (err) => (err ? reject(err) : resolve()));
        });
      },
      close() {
        socket.end();
      },
    });

    return {
      readable: readable.pipeThrough(new StructDeserializeStream(AdbPacket)),
      writable: new WrapWritableStream(writable).bePipedThroughFrom(
        new AdbPacketSerializeStream()
      ),
    };
  }
}
