import { describe, it, expect } from "vitest";
import { createTrafficLight, isGreenFor, oppositePhase, tickLight } from "../traffic/lights";

describe("traffic lights", () => {
  it("flips phase after a full cycle and returns after two", () => {
    const light = createTrafficLight("A-center", 4);
    const flips: boolean[] = [];
    for (let i = 0; i < 4; i += 1) {
      flips.push(tickLight(light));
    }
    expect(flips).toEqual([false, false, false, true]);
    expect(light).toEqual({ id: "A-center", phase: "EW_GREEN", elapsed: 0, cycleLength: 4 });

    for (let i = 0; i < 4; i += 1) {
      tickLight(light);
    }
    expect(light.phase).toBe("NS_GREEN");
    expect(light.elapsed).toBe(0);
  });

  it("gives green to the axis of the current phase", () => {
    const light = createTrafficLight("B-center", 2, "EW_GREEN");
    expect(isGreenFor(light, "E")).toBe(true);
    expect(isGreenFor(light, "W")).toBe(true);
    expect(isGreenFor(light, "N")).toBe(false);
    expect(oppositePhase(light.phase)).toBe("NS_GREEN");
  });

  it("rejects a cycle that is not a positive whole number of steps", () => {
    expect(() => createTrafficLight("C-center", 0)).toThrow("positive integer");
    expect(() => createTrafficLight("C-center", 2.5)).toThrow("positive integer");
  });
});
