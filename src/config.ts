/**
 * Configuration from environment variables
 * CLI flags in index.ts override these at startup
 */

import { homedir } from "os";
import { join } from "path";

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

export const config = {
  /**
   * HTTP server port
   * @env FRAMEO_HTTP_PORT
   * @default 5000
   */
  HTTP_PORT: getEnvNumber("FRAMEO_HTTP_PORT", 5000),

  /**
   * HTTP bind address
   * @env FRAMEO_HOST
   * @default "0.0.0.0"
   */
  HOST: getEnvString("FRAMEO_HOST", "0.0.0.0"),

  /**
   * ADB private key location (generated on first use)
   * @env FRAMEO_ADB_KEY_PATH
   * @default "~/.frameo/adbkey"
   */
  ADB_KEY_PATH: getEnvString("FRAMEO_ADB_KEY_PATH", join(homedir(), ".frameo", "adbkey")),

  /**
   * Default TCP port for network connections and wireless debugging
   * @env FRAMEO_ADB_PORT
   * @default 5555
   */
  ADB_PORT: getEnvNumber("FRAMEO_ADB_PORT", 5555),

  /**
   * Default upload directory on the device
   * @env FRAMEO_UPLOAD_DIR
   * @default "/sdcard/Frameo"
   */
  UPLOAD_DIR: getEnvString("FRAMEO_UPLOAD_DIR", "/sdcard/Frameo"),

  /**
   * Android package of the Frameo app
   * @env FRAMEO_APP_PACKAGE
   * @default "com.frameo.app"
   */
  APP_PACKAGE: getEnvString("FRAMEO_APP_PACKAGE", "com.frameo.app"),

  /**
   * USB vendor ids (hex) treated as Frameo frames
   * @env FRAMEO_VENDOR_IDS
   * @default "2207,18d1" (Rockchip, Google)
   */
  VENDOR_IDS: getEnvList("FRAMEO_VENDOR_IDS", ["2207", "18d1"]),

  /**
   * Log level: debug, info, warn, error
   * @env FRAMEO_LOG_LEVEL
   * @default "info"
   */
  LOG_LEVEL: getEnvString("FRAMEO_LOG_LEVEL", "info"),
};

/**
 * Print current configuration (for debugging)
 */
export function printConfig(): void {
  console.log("Frameo Control Configuration:");
  console.log(`  HTTP:         ${config.HOST}:${config.HTTP_PORT}`);
  console.log(`  ADB key:      ${config.ADB_KEY_PATH}`);
  console.log(`  ADB port:     ${config.ADB_PORT}`);
  console.log(`  Upload dir:   ${config.UPLOAD_DIR}`);
  console.log(`  App package:  ${config.APP_PACKAGE}`);
  console.log(`  Vendor ids:   ${config.VENDOR_IDS.join(", ")}`);
  console.log(`  Log level:    ${config.LOG_LEVEL}`);
}
