/**
 * Connect Request Validation Tests
 */

import { describe, it, expect } from "vitest";
import {
  connectRequestFromBody,
  describeTarget,
  isValidPort,
  resolveConnectTarget,
} from "../../src/session/request";

describe("resolveConnectTarget", () => {
  it("trims the serial", () => {
    expect(resolveConnectTarget({ kind: "usb", serial: "  ABC123 " })).toEqual({
      kind: "usb",
      serial: "ABC123",
    });
  });

  it("applies the default port", () => {
    expect(resolveConnectTarget({ kind: "network", host: "frame.local" }, 5556)).toEqual({
      kind: "network",
      host: "frame.local",
      port: 5556,
    });
  });

  it("requires a serial for USB", () => {
    expect(() => resolveConnectTarget({ kind: "usb", serial: "   " })).toThrow(
      "Missing 'serial' for USB connection"
    );
  });

  it("requires a host for network", () => {
    expect(() => resolveConnectTarget({ kind: "network" })).toThrow(
      "Missing 'host' for network connection"
    );
  });

  it("rejects invalid ports", () => {
    expect(() => resolveConnectTarget({ kind: "network", host: "h", port: 0 })).toThrow("Invalid port: 0");
    expect(() => resolveConnectTarget({ kind: "network", host: "h", port: 5555.5 })).toThrow(
      "Invalid port: 5555.5"
    );
  });
});

describe("isValidPort", () => {
  it("accepts 1-65535 integers only", () => {
    expect(isValidPort(1)).toBe(true);
    expect(isValidPort(65535)).toBe(true);
    expect(isValidPort(65536)).toBe(false);
    expect(isValidPort("5555")).toBe(false);
  });
});

describe("connectRequestFromBody", () => {
  it("maps a USB body", () => {
    expect(connectRequestFromBody({ type: "usb", serial: "ABC123" })).toEqual({
      kind: "usb",
      serial: "ABC123",
    });
  });

  it("converts a numeric string port", () => {
    expect(connectRequestFromBody({ type: "network", host: "10.0.0.2", port: "5556" })).toEqual({
      kind: "network",
      host: "10.0.0.2",
      port: 5556,
    });
  });

  it("rejects a port of another type", () => {
    expect(() => connectRequestFromBody({ type: "network", host: "10.0.0.2", port: true })).toThrow(
      "Invalid port: true"
    );
  });

  it("rejects an unknown type", () => {
    expect(() => connectRequestFromBody({ type: "bluetooth" })).toThrow(
      "Invalid connection type. Use 'usb' or 'network'"
    );
  });
});

describe("describeTarget", () => {
  it("formats endpoints", () => {
    expect(describeTarget({ kind: "usb", serial: "ABC123" })).toBe("ABC123");
    expect(describeTarget({ kind: "network", host: "10.0.0.2", port: 5555 })).toBe("10.0.0.2:5555");
  });
});
