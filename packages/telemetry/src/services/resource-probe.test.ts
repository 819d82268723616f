import { describe, it, expect } from "vitest";

import { NodeResourceProbe, NoopResourceProbe } from "./resource-probe.js";

describe("NodeResourceProbe", () => {
  it("skips CPU on the first sample and reports it afterwards", () => {
    const probe = new NodeResourceProbe();

    const first = probe.sample();
    expect(first.cpuPercent).toBeNull();
    expect(first.memoryMb).toBeGreaterThan(0);
    expect(Number.isInteger(first.handleCount)).toBe(true);

    const second = probe.sample();
    expect(typeof second.cpuPercent).toBe("number");
    expect(second.cpuPercent).toBeGreaterThanOrEqual(0);
  });

  it("lists active resources by type name", () => {
    const timer = setTimeout(() => undefined, 10_000);
    try {
      expect(new NodeResourceProbe().activeResources()).toContain("Timeout");
    } finally {
      clearTimeout(timer);
    }
  });
});

describe("NoopResourceProbe", () => {
  it("reports an empty snapshot", () => {
    const probe = new NoopResourceProbe();
    expect(probe.kind).toBe("noop");
    expect(probe.sample()).toEqual({ memoryMb: 0, cpuPercent: null, handleCount: 0 });
    expect(probe.activeResources()).toEqual([]);
  });
});
