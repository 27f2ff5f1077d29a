import { describe, expect, it } from "vitest";
import { ReadinessGate } from "../src/utils/ReadinessGate.js";

describe("ReadinessGate", () => {
  it("should suspend waiters until opened", async () => {
    const gate = new ReadinessGate();
    let woken = 0;

    const waiters = [gate.wait(), gate.wait()].map(waiting =>
      waiting.then(() => {
        woken++;
      }),
    );
    await Promise.resolve();

    expect(woken).toBe(0);
    expect(gate.getWaiterCount()).toBe(2);

    gate.open();
    await Promise.all(waiters);

    expect(woken).toBe(2);
    expect(gate.getWaiterCount()).toBe(0);
    expect(gate.isReady()).toBe(true);
  });

  it("should let callers through while open", async () => {
    const gate = new ReadinessGate();
    gate.open();

    await expect(gate.wait()).resolves.toBeUndefined();
    expect(gate.getWaiterCount()).toBe(0);
  });

  it("should close again on reset", () => {
    const gate = new ReadinessGate();
    gate.open();
    gate.reset();

    void gate.wait();

    expect(gate.isReady()).toBe(false);
    expect(gate.getWaiterCount()).toBe(1);
  });
});
