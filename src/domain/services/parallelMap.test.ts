import { describe, test, expect } from "vitest";
import { parallelMap } from "./parallelMap";

describe("parallelMap", () => {
  test("keeps input order regardless of completion order", async () => {
    const delays = [30, 0, 10];
    const results = await parallelMap(
      delays,
      (delay, index) =>
        new Promise<number>((resolve) => setTimeout(() => resolve(index), delay)),
      3
    );

    expect(results).toEqual([
      { success: true, value: 0 },
      { success: true, value: 1 },
      { success: true, value: 2 },
    ]);
  });

  test("records failures without stopping other items", async () => {
    const error = new Error("boom");
    const results = await parallelMap(
      ["a", "b", "c"],
      async (item) => {
        if (item === "b") throw error;
        return item.toUpperCase();
      },
      2
    );

    expect(results).toEqual([
      { success: true, value: "A" },
      { success: false, error },
      { success: true, value: "C" },
    ]);
  });

  test("never runs more than the concurrency limit at once", async () => {
    let active = 0;
    let peak = 0;

    await parallelMap(
      Array.from({ length: 10 }, (_, i) => i),
      async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        active--;
      },
      3
    );

    expect(peak).toBe(3);
  });

  test("handles an empty list", async () => {
    expect(await parallelMap([], async () => 1, 4)).toEqual([]);
  });
});
