/**
 * Frameo shell command builders
 * Pure functions: validate arguments, return the command line
 */

import { SessionError } from "../session/errors";

export const WAKE_COMMAND = "input keyevent KEYCODE_WAKEUP";
export const SLEEP_COMMAND = "input keyevent KEYCODE_SLEEP";
export const SCREENSHOT_COMMAND = "screencap -p";

export const DEFAULT_SWIPE_DURATION = 300;
export const APP_RESTART_DELAY = 1000;

export const INFO_COMMANDS = {
  model: "getprop ro.product.model",
  androidVersion: "getprop ro.build.version.release",
  resolution: "wm size",
  battery: "dumpsys battery | grep level",
} as const;

export interface SwipeGesture {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  duration?: number;
}

/** Horizontal swipes that page through the slideshow */
export const NEXT_PHOTO: SwipeGesture = { x1: 900, y1: 500, x2: 100, y2: 500, duration: 300 };
export const PREVIOUS_PHOTO: SwipeGesture = { x1: 100, y1: 500, x2: 900, y2: 500, duration: 300 };

const KEYCODE_PATTERN = /^KEYCODE_[A-Z0-9_]+$/;
const NUMERIC_KEY_PATTERN = /^\d+$/;
const PACKAGE_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*(\.[a-zA-Z0-9_]+)+$/;

function invalid(message: string): SessionError {
  return new SessionError("InvalidRequest", message);
}

function requireCoordinate(name: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw invalid(`Invalid ${name}: must be a non-negative integer`);
  }
  return value;
}

export function brightnessCommand(level: unknown): string {
  if (typeof level !== "number" || !Number.isInteger(level) || level < 0 || level > 255) {
    throw invalid("Brightness level must be an integer between 0 and 255");
  }
  return `settings put system screen_brightness ${level}`;
}

export function tapCommand(x: unknown, y: unknown): string {
  return `input tap ${requireCoordinate("x", x)} ${requireCoordinate("y", y)}`;
}

/** Unvalidated swipe arguments, as they arrive from a request body */
export interface SwipeInput {
  x1: unknown;
  y1: unknown;
  x2: unknown;
  y2: unknown;
  duration?: unknown;
}

export function swipeCommand(gesture: SwipeInput): string {
  const x1 = requireCoordinate("x1", gesture.x1);
  const y1 = requireCoordinate("y1", gesture.y1);
  const x2 = requireCoordinate("x2", gesture.x2);
  const y2 = requireCoordinate("y2", gesture.y2);

  const duration = gesture.duration ?? DEFAULT_SWIPE_DURATION;
  if (typeof duration !== "number" || !Number.isInteger(duration) || duration <= 0) {
    throw invalid("Invalid duration: must be a positive integer (ms)");
  }
  return `input swipe ${x1} ${y1} ${x2} ${y2} ${duration}`;
}

/**
 * Accepts `KEYCODE_HOME` style names or numeric key codes
 */
export function keyeventCommand(key: unknown): string {
  if (typeof key === "number" && Number.isInteger(key) && key >= 0) {
    return `input keyevent ${key}`;
  }
  if (typeof key !== "string" || !(KEYCODE_PATTERN.test(key) || NUMERIC_KEY_PATTERN.test(key))) {
    throw invalid(`Invalid key: ${String(key)}`);
  }
  return `input keyevent ${key}`;
}

function requirePackage(pkg: string): string {
  if (!PACKAGE_PATTERN.test(pkg)) {
    throw invalid(`Invalid package name: ${pkg}`);
  }
  return pkg;
}

export function openAppCommand(pkg: string): string {
  return `monkey -p ${requirePackage(pkg)} -c android.intent.category.LAUNCHER 1`;
}

export function forceStopCommand(pkg: string): string {
  return `am force-stop ${requirePackage(pkg)}`;
}

/**
 * Device-side upload path: only the basename of `filename` is kept
 */
export function uploadPath(destination: string, filename: string): string {
  const name = filename.trim();
  if (!name || name.includes("/") || name.includes("\\") || name === "." || name === "..") {
    throw invalid(`Invalid filename: ${filename}`);
  }
  if (!destination.startsWith("/") || destination.split("/").includes("..")) {
    throw invalid(`Invalid destination: ${destination}`);
  }
  const dir = destination.replace(/\/+$/, "");
  return `${dir}/${name}`;
}

const CONTENT_TYPES: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
};

export function contentTypeFor(path: string): string {
  const dot = path.lastIndexOf(".");
  if (dot === -1 || dot < path.lastIndexOf("/")) return "application/octet-stream";
  return CONTENT_TYPES[path.slice(dot + 1).toLowerCase()] ?? "application/octet-stream";
}

export function basename(path: string): string {
  const parts = path.split("/").filter((part) => part.length > 0);
  return parts[parts.length - 1] ?? "";
}
