/**
 * Frameo Controller
 * Device actions composed from shell commands over the active session
 */

import type { SessionManager } from "../session/manager";
import type { DeviceState } from "../session/types";
import { createLogger } from "../log";
import {
  APP_RESTART_DELAY,
  INFO_COMMANDS,
  NEXT_PHOTO,
  PREVIOUS_PHOTO,
  SCREENSHOT_COMMAND,
  SLEEP_COMMAND,
  WAKE_COMMAND,
  brightnessCommand,
  contentTypeFor,
  forceStopCommand,
  keyeventCommand,
  openAppCommand,
  swipeCommand,
  tapCommand,
  uploadPath,
  type SwipeInput,
} from "./commands";

const log = createLogger("device");

export type AppAction = "open" | "restart" | "force-stop";

export const APP_ACTIONS: readonly AppAction[] = ["open", "restart", "force-stop"];

export function isAppAction(value: unknown): value is AppAction {
  return typeof value === "string" && APP_ACTIONS.some((action) => action === value);
}

export interface DeviceInfo {
  model: string;
  androidVersion: string;
  resolution: string;
  battery: number | null;
}

export interface FrameState extends DeviceState {
  currentApp: string | null;
}

export interface DownloadedFile {
  data: Uint8Array;
  contentType: string;
}

export interface ControllerOptions {
  appPackage: string;
  uploadDir: string;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** "Physical size: 1280x800" → "1280x800" */
export function parseResolution(output: string): string {
  const override = output.match(/Override size:\s*(\d+x\d+)/);
  if (override) return override[1];
  const physical = output.match(/(\d+x\d+)/);
  return physical ? physical[1] : output.trim();
}

/** "  level: 87" → 87 */
export function parseBatteryLevel(output: string): number | null {
  const match = output.match(/level:\s*(\d+)/);
  return match ? parseInt(match[1], 10) : null;
}

export class FrameoController {
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private sessions: SessionManager,
    private options: ControllerOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get appPackage(): string {
    return this.options.appPackage;
  }

  async wake(): Promise<void> {
    await this.sessions.execute(WAKE_COMMAND);
  }

  async sleepScreen(): Promise<void> {
    await this.sessions.execute(SLEEP_COMMAND);
  }

  async setBrightness(level: unknown): Promise<void> {
    await this.sessions.execute(brightnessCommand(level));
  }

  async tap(x: unknown, y: unknown): Promise<void> {
    await this.sessions.execute(tapCommand(x, y));
  }

  async swipe(gesture: SwipeInput): Promise<void> {
    await this.sessions.execute(swipeCommand(gesture));
  }

  async keyevent(key: unknown): Promise<void> {
    await this.sessions.execute(keyeventCommand(key));
  }

  async nextPhoto(): Promise<void> {
    await this.swipe(NEXT_PHOTO);
  }

  async previousPhoto(): Promise<void> {
    await this.swipe(PREVIOUS_PHOTO);
  }

  async app(action: AppAction): Promise<void> {
    const pkg = this.options.appPackage;
    switch (action) {
      case "open":
        await this.sessions.execute(openAppCommand(pkg));
        break;
      case "force-stop":
        await this.sessions.execute(forceStopCommand(pkg));
        break;
      case "restart":
        log.info(`Restarting ${pkg}`);
        await this.sessions.execute(forceStopCommand(pkg));
        await this.sleep(APP_RESTART_DELAY);
        await this.sessions.execute(openAppCommand(pkg));
        break;
    }
  }

  async state(): Promise<FrameState> {
    const state = await this.sessions.queryState();
    const currentApp = await this.sessions.currentApp();
    return { ...state, currentApp };
  }

  async info(): Promise<DeviceInfo> {
    const model = await this.sessions.execute(INFO_COMMANDS.model);
    const androidVersion = await this.sessions.execute(INFO_COMMANDS.androidVersion);
    const resolution = await this.sessions.execute(INFO_COMMANDS.resolution);
    const battery = await this.sessions.execute(INFO_COMMANDS.battery);
    return {
      model: model.trim(),
      androidVersion: androidVersion.trim(),
      resolution: parseResolution(resolution),
      battery: parseBatteryLevel(battery),
    };
  }

  screenshot(): Promise<Uint8Array> {
    return this.sessions.executeBinary(SCREENSHOT_COMMAND);
  }

  /**
   * @returns device path the file was written to
   */
  async upload(filename: string, data: Uint8Array, destination?: string): Promise<string> {
    const remotePath = uploadPath(destination ?? this.options.uploadDir, filename);
    log.info(`Uploading ${filename} (${data.byteLength} bytes) to ${remotePath}`);
    await this.sessions.push(remotePath, data);
    return remotePath;
  }

  async download(remotePath: string): Promise<DownloadedFile> {
    log.info(`Downloading ${remotePath}`);
    const data = await this.sessions.pull(remotePath);
    return { data, contentType: contentTypeFor(remotePath) };
  }
}
