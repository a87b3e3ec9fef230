import { describe, it, expect } from "vitest";
import { cpuLoad, memoryPressure, systemLoad } from "../../engine/utils/platform";

describe("cpuLoad", () => {
  it("divides the load average by the core count", () => {
    expect(cpuLoad(2, 4)).toBe(0.5);
  });

  it("clamps into [0, 1]", () => {
    expect(cpuLoad(12, 4)).toBe(1);
    expect(cpuLoad(-1, 4)).toBe(0);
    expect(cpuLoad(0.5, 0)).toBe(0.5);
  });
});

describe("memoryPressure", () => {
  it("compares used heap against the limit", () => {
    expect(memoryPressure({ used_heap_size: 256, heap_size_limit: 1024 })).toBe(0.25);
  });

  it("treats an unknown limit as no pressure", () => {
    expect(memoryPressure({ used_heap_size: 256, heap_size_limit: 0 })).toBe(0);
  });
});

describe("systemLoad", () => {
  it("stays within [0, 1]", () => {
    const load = systemLoad();

    expect(load).toBeGreaterThanOrEqual(0);
    expect(load).toBeLessThanOrEqual(1);
  });
});
