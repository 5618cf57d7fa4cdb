import type { Heading, TurnDirection } from "./types";

export const HEADINGS: readonly Heading[] = ["N", "E", "S", "W"];

export const TURN_DIRECTIONS: readonly TurnDirection[] = ["straight", "left", "right"];

const RIGHT_OF: Record<Heading, Heading> = { N: "E", E: "S", S: "W", W: "N" };
const LEFT_OF: Record<Heading, Heading> = { N: "W", W: "S", S: "E", E: "N" };

export interface ZoneGeometry {
  size: number;
  center: number;
  stopLine: number;
  intersectionExit: number;
  laneOffset: number;
}

export function buildZoneGeometry(size: number, roadWidth: number): ZoneGeometry {
  const center = size / 2;
  return {
    size,
    center,
    stopLine: center - roadWidth / 2,
    intersectionExit: center + roadWidth / 2,
    laneOffset: roadWidth / 4
  };
}

export function headingAfterTurn(heading: Heading, turn: TurnDirection): Heading {
  if (turn === "right") {
    return RIGHT_OF[heading];
  }
  if (turn === "left") {
    return LEFT_OF[heading];
  }
  return heading;
}

// Right-hand traffic: each heading drives on its own side of the centre line.
export function lanePosition(geometry: ZoneGeometry, heading: Heading, offset: number): { x: number; y: number } {
  const { size, center, laneOffset } = geometry;
  switch (heading) {
    case "E":
      return { x: round2(offset), y: round2(center + laneOffset) };
    case "W":
      return { x: round2(size - offset), y: round2(center - laneOffset) };
    case "S":
      return { x: round2(center - laneOffset), y: round2(offset) };
    case "N":
      return { x: round2(center + laneOffset), y: round2(size - offset) };
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
