/**
 * Device state parsing
 *
 * Text formats differ across firmware; these rules are a best-effort adapter
 * for the dumps Frameo frames produce, not a protocol guarantee.
 */

import { SessionError } from "./errors";
import type { DeviceState } from "./types";

export const POWER_QUERY = "dumpsys power | grep -E 'mWakefulness=|Display Power'";
export const BRIGHTNESS_QUERY = "settings get system screen_brightness";
export const FOCUS_QUERY = "dumpsys window windows | grep -E 'mCurrentFocus|mFocusedApp'";

const WAKEFULNESS = /mWakefulness=(\w+)/;
const DISPLAY_POWER = /Display Power:\s*state=(\w+)/;
const BRIGHTNESS_SETTING = /screen_brightness=(\d+)/;
const BARE_INTEGER = /^\s*(\d+)\s*$/m;
const COMPONENT = /([a-zA-Z0-9_.]+)\/([a-zA-Z0-9_.$]+)/;

/**
 * Screen on/off from a power-manager dump
 */
export function parsePowerState(output: string): boolean {
  const wake = WAKEFULNESS.exec(output);
  if (wake) {
    return wake[1] === "Awake";
  }

  const display = DISPLAY_POWER.exec(output);
  if (display) {
    return display[1] === "ON" || display[1] === "2";
  }

  throw new SessionError("ParseError", "Unrecognized power state output", { output });
}

/**
 * Brightness level 0-255 from a settings readout
 */
export function parseBrightness(output: string): number {
  const match = BRIGHTNESS_SETTING.exec(output) ?? BARE_INTEGER.exec(output);
  if (!match) {
    throw new SessionError("ParseError", "Unrecognized brightness output", { output });
  }

  const level = parseInt(match[1], 10);
  if (level < 0 || level > 255) {
    throw new SessionError("ParseError", `Brightness ${level} outside 0-255`, { output });
  }
  return level;
}

export function parseDeviceState(powerOutput: string, brightnessOutput: string): DeviceState {
  return {
    isOn: parsePowerState(powerOutput),
    brightness: parseBrightness(brightnessOutput),
  };
}

/**
 * Package name of the focused window, null when nothing matches
 */
export function parseFocusedPackage(output: string): string | null {
  const match = COMPONENT.exec(output);
  return match ? match[1] : null;
}
