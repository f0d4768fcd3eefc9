import { EventEmitter } from "node:events";
import { afterEach, describe, expect, it, vi } from "vitest";

import { createSilentLogger } from "../../observability";
import { FORCED_EXIT_CODE, ShutdownController } from "../shutdown";

function setup() {
  const target = new EventEmitter();
  const exits: number[] = [];
  const controller = new ShutdownController({
    logger: createSilentLogger(),
    forceExitTimeoutMs: 5_000,
    exit: (code) => {
      exits.push(code);
    },
    target,
  });
  return { target, exits, controller };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("ShutdownController", () => {
  it("aborts on the first interrupt and forces exit on the second", () => {
    const { target, exits, controller } = setup();
    controller.install();

    target.emit("SIGINT");
    expect(controller.requested).toBe(true);
    expect(controller.signal.aborted).toBe(true);
    expect(exits).toEqual([]);

    target.emit("SIGTERM");
    expect(exits).toEqual([FORCED_EXIT_CODE]);
    controller.dispose();
  });

  it("exits at once on SIGQUIT", () => {
    const { target, exits, controller } = setup();
    controller.install();

    target.emit("SIGQUIT");
    expect(exits).toEqual([130]);
    expect(controller.requested).toBe(false);
    controller.dispose();
  });

  it("forces exit when cleanup outlasts the timeout", () => {
    vi.useFakeTimers();
    const { exits, controller } = setup();

    controller.request("test");
    vi.advanceTimersByTime(4_999);
    expect(exits).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(exits).toEqual([FORCED_EXIT_CODE]);
    controller.dispose();
  });

  it("detaches its handlers and timer on dispose", () => {
    vi.useFakeTimers();
    const { target, exits, controller } = setup();
    controller.install();
    expect(target.listenerCount("SIGINT")).toBe(1);

    target.emit("SIGINT");
    controller.dispose();
    vi.advanceTimersByTime(10_000);

    expect(target.listenerCount("SIGINT")).toBe(0);
    expect(target.listenerCount("SIGQUIT")).toBe(0);
    expect(exits).toEqual([]);
  });
});
