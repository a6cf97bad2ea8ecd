/**
 * Device State Parser Tests
 */

import { describe, it, expect } from "vitest";
import {
  parseBrightness,
  parseDeviceState,
  parseFocusedPackage,
  parsePowerState,
} from "../../src/session/state-parser";
import { SessionError } from "../../src/session/errors";

describe("parsePowerState", () => {
  it("reads mWakefulness", () => {
    expect(parsePowerState("mWakefulness=Awake")).toBe(true);
    expect(parsePowerState("  mWakefulness=Asleep\n")).toBe(false);
    expect(parsePowerState("mWakefulness=Dozing")).toBe(false);
  });

  it("falls back to the display power line", () => {
    expect(parsePowerState("Display Power: state=ON")).toBe(true);
    expect(parsePowerState("Display Power: state=OFF")).toBe(false);
    expect(parsePowerState("Display Power: state=2")).toBe(true);
  });

  it("prefers mWakefulness when both are present", () => {
    expect(parsePowerState("Display Power: state=ON\nmWakefulness=Asleep")).toBe(false);
  });

  it("throws ParseError with the raw text", () => {
    try {
      parsePowerState("permission denied");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SessionError);
      if (err instanceof SessionError) {
        expect(err.kind).toBe("ParseError");
        expect(err.output).toBe("permission denied");
      }
    }
  });
});

describe("parseBrightness", () => {
  it("reads key=value output", () => {
    expect(parseBrightness("screen_brightness=128")).toBe(128);
  });

  it("reads a bare integer", () => {
    expect(parseBrightness("200\n")).toBe(200);
    expect(parseBrightness("0")).toBe(0);
  });

  it("rejects values outside 0-255", () => {
    expect(() => parseBrightness("300")).toThrow("Brightness 300 outside 0-255");
  });

  it("rejects text without a number", () => {
    expect(() => parseBrightness("null")).toThrow("Unrecognized brightness output");
  });
});

describe("parseDeviceState", () => {
  it("combines both readings", () => {
    expect(parseDeviceState("mWakefulness=Awake", "screen_brightness=128")).toStrictEqual({
      isOn: true,
      brightness: 128,
    });
  });
});

describe("parseFocusedPackage", () => {
  it("extracts the package of the focused component", () => {
    expect(
      parseFocusedPackage("mFocusedApp=ActivityRecord{91e u0 com.frameo.app/.MainActivity t12}")
    ).toBe("com.frameo.app");
  });

  it("returns null when nothing is focused", () => {
    expect(parseFocusedPackage("mCurrentFocus=null")).toBeNull();
  });
});
