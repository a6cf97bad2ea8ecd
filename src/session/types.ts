/**
 * Device Session Type Definitions
 */

// Transport of an active session
export type TransportKind = "usb" | "network";

// Session state, "none" when nothing is connected
export type SessionState = TransportKind | "none";

// Connect request (fields validated at runtime, see request.ts)
export type ConnectRequest =
  | { kind: "usb"; serial?: string }
  | { kind: "network"; host?: string; port?: number };

// Validated connect target
export type ConnectTarget =
  | { kind: "usb"; serial: string }
  | { kind: "network"; host: string; port: number };

// Snapshot of the session slot
export type SessionStatus =
  | { state: "none" }
  | {
      state: TransportKind;
      endpoint: string;
      connectedAt: Date;
    };

// Screen power and brightness
export interface DeviceState {
  isOn: boolean;
  brightness: number;
}

// Result of enabling ADB over TCP
export interface WirelessDebugResult {
  port: number;
  output: string;
}

export type SessionChangeCallback = (status: SessionStatus) => void;
