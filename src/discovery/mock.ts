/**
 * Mock Device Discovery for Testing
 * Can replace real discovery wherever a DeviceDiscovery is expected
 */

import type { DeviceDiscovery, DiscoveryResult, UsbDeviceInfo } from "./interface";

export class MockDiscovery implements DeviceDiscovery {
  private devices: UsbDeviceInfo[];
  private failure: Error | null = null;
  public listCalls = 0;

  constructor(devices: UsbDeviceInfo[] = []) {
    this.devices = devices;
  }

  async listUsbDevices(): Promise<UsbDeviceInfo[]> {
    this.listCalls++;
    if (this.failure) {
      throw this.failure;
    }
    return [...this.devices];
  }

  async findFrameo(): Promise<DiscoveryResult> {
    const devices = await this.listUsbDevices();
    const frame = devices.find((d) => d.isFrameo);
    if (frame) {
      return { found: true, device: frame };
    }
    return { found: false, error: "No Frameo device found on USB" };
  }

  // Helpers to update mock state during a test
  setDevices(devices: UsbDeviceInfo[]): void {
    this.devices = devices;
  }

  failWith(error: Error | null): void {
    this.failure = error;
  }
}
