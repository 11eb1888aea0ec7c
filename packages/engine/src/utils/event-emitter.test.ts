import { describe, expect, it, vi } from "vitest";
import { EventEmitter } from "./event-emitter.js";

type TestEvents = {
  ready: [port: number];
  error: [err: Error];
  done: [];
};

describe("EventEmitter", () => {
  it("passes emitted arguments to listeners", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on("ready", listener);

    expect(emitter.emit("ready", 3003)).toBe(true);
    expect(listener).toHaveBeenCalledWith(3003);
  });

  it("returns false, without throwing, for an unheard error", () => {
    const emitter = new EventEmitter<TestEvents>();

    expect(emitter.emit("error", new Error("ignored"))).toBe(false);
  });

  it("runs once listeners a single time", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.once("done", listener);

    emitter.emit("done");
    emitter.emit("done");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount("done")).toBe(0);
  });

  it("removes listeners", () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on("ready", listener);
    emitter.off("ready", listener);
    emitter.on("done", () => {});
    emitter.removeAllListeners();

    expect(emitter.emit("ready", 1)).toBe(false);
    expect(emitter.listenerCount("done")).toBe(0);
    expect(listener).not.toHaveBeenCalled();
  });
});
