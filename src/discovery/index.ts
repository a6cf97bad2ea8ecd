/**
 * Device Discovery Module
 * Re-exports all discovery components
 */

export * from "./interface";
export * from "./usb";
export * from "./mock";

import type { DeviceDiscovery } from "./interface";
import { UsbDiscovery } from "./usb";
import { getUsbManager } from "../adb/usb";

/**
 * Create the discovery instance backed by node-usb
 */
export function createDiscovery(vendorIds?: string[]): DeviceDiscovery {
  return new UsbDiscovery(getUsbManager(), vendorIds);
}
