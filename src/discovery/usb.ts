/**
 * USB Device Discovery
 * Lists ADB-capable USB devices through the WebUSB device manager
 */

import type { DeviceDiscovery, DiscoveryResult, UsbDeviceInfo } from "./interface";
import { FRAMEO_VENDOR_IDS, isFrameoVendor, toHexId } from "./interface";

/**
 * The part of AdbDaemonWebUsbDeviceManager discovery needs
 */
export interface UsbDeviceSource {
  getDevices(): Promise<
    readonly {
      readonly serial: string;
      readonly name: string;
      readonly raw: { readonly vendorId: number; readonly productId: number };
    }[]
  >;
}

export class UsbDiscovery implements DeviceDiscovery {
  private manager: UsbDeviceSource;
  private vendorIds: string[];

  constructor(manager: UsbDeviceSource, vendorIds: string[] = FRAMEO_VENDOR_IDS) {
    this.manager = manager;
    this.vendorIds = vendorIds;
  }

  async listUsbDevices(): Promise<UsbDeviceInfo[]> {
    const devices = await this.manager.getDevices();
    return devices.map((device) => {
      const vendorId = toHexId(device.raw.vendorId);
      return {
        serial: device.serial,
        name: device.name,
        vendorId,
        productId: toHexId(device.raw.productId),
        isFrameo: isFrameoVendor(vendorId, this.vendorIds),
      };
    });
  }

  async findFrameo(): Promise<DiscoveryResult> {
    const devices = await this.listUsbDevices();
    const frame = devices.find((d) => d.isFrameo);
    if (frame) {
      return { found: true, device: frame };
    }
    return { found: false, error: "No Frameo device found on USB" };
  }
}
