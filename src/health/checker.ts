/**
 * Health Checker
 * Checks USB visibility, ADB key and session status with suggestions
 */

import type { DeviceDiscovery } from "../discovery/interface";
import type { SessionStatus } from "../session/types";

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface CheckResult {
  ok: boolean;
  status: HealthStatus;
  message: string;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  checks: {
    usb: CheckResult;
    key: CheckResult;
    session: CheckResult;
  };
  suggestions: string[];
}

export interface HealthDependencies {
  discovery: DeviceDiscovery;
  /** Key file exists or can be created */
  keyUsable: () => Promise<boolean>;
  keyPath: string;
  session: () => SessionStatus;
}

export class HealthChecker {
  constructor(private deps: HealthDependencies) {}

  async check(): Promise<HealthReport> {
    const [usb, key] = await Promise.all([this.checkUsb(), this.checkKey()]);
    const session = this.checkSession();

    const checks = { usb, key, session };
    const suggestions = this.generateSuggestions(checks);

    const allOk = Object.values(checks).every((c) => c.ok);
    const anyFailed = Object.values(checks).some((c) => c.status === "unhealthy");

    return {
      status: allOk ? "healthy" : anyFailed ? "unhealthy" : "degraded",
      timestamp: new Date().toISOString(),
      checks,
      suggestions,
    };
  }

  private async checkUsb(): Promise<CheckResult> {
    let result;
    try {
      result = await this.deps.discovery.findFrameo();
    } catch (err) {
      return {
        ok: false,
        status: "degraded",
        message: `USB scan failed: ${err instanceof Error ? err.message : String(err)}`,
      };
    }

    if (result.found && result.device) {
      return {
        ok: true,
        status: "healthy",
        message: `Frameo found on USB (${result.device.serial})`,
        details: {
          serial: result.device.serial,
          vendorId: result.device.vendorId,
          productId: result.device.productId,
        },
      };
    }

    // Network-only setups never see the frame on USB
    return {
      ok: false,
      status: "degraded",
      message: result.error || "No Frameo device found on USB",
    };
  }

  private async checkKey(): Promise<CheckResult> {
    if (await this.deps.keyUsable()) {
      return {
        ok: true,
        status: "healthy",
        message: "ADB key available",
        details: { path: this.deps.keyPath },
      };
    }
    return {
      ok: false,
      status: "unhealthy",
      message: `ADB key at ${this.deps.keyPath} cannot be read or created`,
      details: { path: this.deps.keyPath },
    };
  }

  private checkSession(): CheckResult {
    const status = this.deps.session();
    if (status.state === "none") {
      return {
        ok: false,
        status: "degraded",
        message: "No device connected",
      };
    }
    return {
      ok: true,
      status: "healthy",
      message: `Connected over ${status.state} to ${status.endpoint}`,
      details: { transport: status.state, endpoint: status.endpoint },
    };
  }

  private generateSuggestions(checks: HealthReport["checks"]): string[] {
    const suggestions: string[] = [];

    if (!checks.usb.ok) {
      suggestions.push("Connect the frame with a USB data cable and enable USB debugging");
      suggestions.push("Linux: add a udev rule or run with access to /dev/bus/usb");
    }

    if (!checks.key.ok) {
      suggestions.push(`Make ${checks.key.details?.path ?? "the key path"} writable or set FRAMEO_ADB_KEY_PATH`);
    }

    if (!checks.session.ok) {
      suggestions.push("Connect with: frameo connect usb <serial> or frameo connect network <host>");
    }

    return suggestions;
  }
}
