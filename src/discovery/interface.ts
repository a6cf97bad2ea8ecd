/**
 * Device Discovery Interface
 * High-level modules depend on this abstraction, not on WebUSB
 */

export interface UsbDeviceInfo {
  serial: string;
  name?: string;
  /** 4-digit lowercase hex */
  vendorId: string;
  /** 4-digit lowercase hex */
  productId: string;
  isFrameo: boolean;
}

export interface DiscoveryResult {
  found: boolean;
  device?: UsbDeviceInfo;
  error?: string;
}

export interface DeviceDiscovery {
  /**
   * List USB devices exposing an ADB interface
   */
  listUsbDevices(): Promise<UsbDeviceInfo[]>;

  /**
   * Find the first Frameo frame on USB
   */
  findFrameo(): Promise<DiscoveryResult>;
}

// Rockchip and Google vendor ids seen on Frameo frames
export const FRAMEO_VENDOR_IDS = ["2207", "18d1"];

export function toHexId(id: number): string {
  return id.toString(16).padStart(4, "0");
}

export function isFrameoVendor(vendorId: string, vendorIds: string[] = FRAMEO_VENDOR_IDS): boolean {
  return vendorIds.includes(vendorId.toLowerCase());
}
