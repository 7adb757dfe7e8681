import { describe, expect, it } from "vitest";
import { classifyDirection, isDirectionCorrect } from "./direction.js";
import { runPool } from "./pool.js";

describe("classifyDirection", () => {
  it("treats the dead band as flat", () => {
    expect(classifyDirection(0.0005)).toBe("flat");
    expect(classifyDirection(-0.0005)).toBe("flat");
    expect(classifyDirection(0.0006)).toBe("up");
    expect(classifyDirection(-0.0006)).toBe("down");
    expect(classifyDirection(0.01, 0.02)).toBe("flat");
  });

  it("has no direction without a finite value", () => {
    expect(classifyDirection(null)).toBeNull();
    expect(classifyDirection(Number.NaN)).toBeNull();
    expect(isDirectionCorrect(null, "up")).toBeNull();
    expect(isDirectionCorrect("flat", "flat")).toBe(true);
    expect(isDirectionCorrect("up", "down")).toBe(false);
  });
});

describe("runPool", () => {
  it("keeps at most the configured number of workers in flight", async () => {
    let active = 0;
    let peak = 0;
    const done: number[] = [];
    const { started } = await runPool({
      items: [1, 2, 3, 4, 5, 6, 7],
      concurrency: 3,
      worker: async (item) => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        done.push(item);
        active -= 1;
      },
    });
    expect(started).toBe(7);
    expect(peak).toBe(3);
    expect([...done].sort()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("stops handing out items after an abort", async () => {
    const controller = new AbortController();
    const seen: number[] = [];
    const { started } = await runPool({
      items: [1, 2, 3, 4],
      concurrency: 1,
      signal: controller.signal,
      worker: async (item) => {
        seen.push(item);
        if (item === 2) {
          controller.abort();
        }
      },
    });
    expect(started).toBe(2);
    expect(seen).toEqual([1, 2]);
  });
});
