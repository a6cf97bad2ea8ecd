/**
 * Shared WebUSB device manager (node-usb backed)
 */

import { AdbDaemonWebUsbDeviceManager } from "@yume-chan/adb-daemon-webusb";
import { WebUSB } from "usb";

let manager: AdbDaemonWebUsbDeviceManager | null = null;

export function getUsbManager(): AdbDaemonWebUsbDeviceManager {
  if (!manager) {
    manager = new AdbDaemonWebUsbDeviceManager(new WebUSB({ allowAllDevices: true }));
  }
  return manager;
}
