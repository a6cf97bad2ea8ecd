/**
 * Dispatch Strategy Tests
 */

import { describe, it, expect } from "vitest";
import { DirectDispatch, DispatchedHandle, LaneDispatch, strategyFor } from "../../src/adb/dispatch";
import { FakeTransport } from "../fakes";

describe("LaneDispatch", () => {
  it("starts tasks off the caller's tick", async () => {
    const lane = new LaneDispatch();
    let started = false;

    const done = lane.run(async () => {
      started = true;
    });
    await Promise.resolve();
    expect(started).toBe(false);

    await done;
    expect(started).toBe(true);
  });

  it("runs tasks one at a time in order", async () => {
    const lane = new LaneDispatch();
    const events: string[] = [];
    const task = (name: string, ms: number) => () =>
      new Promise<string>((resolve) => {
        events.push(`start ${name}`);
        setTimeout(() => {
          events.push(`end ${name}`);
          resolve(name);
        }, ms);
      });

    const results = await Promise.all([lane.run(task("a", 8)), lane.run(task("b", 1))]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["start a", "end a", "start b", "end b"]);
  });

  it("keeps going after a rejected task", async () => {
    const lane = new LaneDispatch();

    const failed = lane.run(async () => {
      throw new Error("usb stall");
    });
    const next = lane.run(async () => "ok");

    await expect(failed).rejects.toThrow("usb stall");
    await expect(next).resolves.toBe("ok");
    expect(lane.size()).toBe(0);
  });
});

describe("DirectDispatch", () => {
  it("runs the task immediately", async () => {
    let started = false;
    const done = new DirectDispatch().run(async () => {
      started = true;
    });
    expect(started).toBe(true);
    await done;
  });
});

describe("strategyFor", () => {
  it("uses a lane for USB and direct calls for network", () => {
    expect(strategyFor("usb").name).toBe("lane");
    expect(strategyFor("network").name).toBe("direct");
  });
});

describe("DispatchedHandle", () => {
  it("routes every call through its strategy", async () => {
    const transport = new FakeTransport();
    transport.script.responses.set("wm size", "Physical size: 1280x800");
    const raw = await transport.openUsb("ABC123");
    const handle = new DispatchedHandle("usb", raw);

    await expect(handle.shell("wm size")).resolves.toBe("Physical size: 1280x800");
    await handle.close();

    expect(handle.strategy.name).toBe("lane");
    expect(transport.log).toEqual(["openUsb ABC123", "shell usb:ABC123 wm size", "close usb:ABC123"]);
    expect(raw.closed).toBe(true);
  });
});
