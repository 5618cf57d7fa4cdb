import type { Heading, LightPhase, TrafficLight } from "./types";

export function createTrafficLight(id: string, cycleLength: number, phase: LightPhase = "NS_GREEN"): TrafficLight {
  if (!Number.isInteger(cycleLength) || cycleLength < 1) {
    throw new Error(`Traffic light cycle length must be a positive integer, got ${cycleLength}.`);
  }
  return { id, phase, elapsed: 0, cycleLength };
}

export function oppositePhase(phase: LightPhase): LightPhase {
  return phase === "NS_GREEN" ? "EW_GREEN" : "NS_GREEN";
}

export function isGreenFor(light: TrafficLight, heading: Heading): boolean {
  const northSouth = heading === "N" || heading === "S";
  return light.phase === (northSouth ? "NS_GREEN" : "EW_GREEN");
}

/** Fixed-time control: one tick of the phase counter, flipping when the cycle completes. */
export function tickLight(light: TrafficLight): boolean {
  light.elapsed += 1;
  if (light.elapsed < light.cycleLength) {
    return false;
  }
  light.phase = oppositePhase(light.phase);
  light.elapsed = 0;
  return true;
}
