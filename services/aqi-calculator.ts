import { InvalidInputError } from "./errors";

// Breakpoint: [concentrationLow, concentrationHigh, indexLow, indexHigh]
export type Breakpoint = readonly [number, number, number, number];
export type BreakpointTable = readonly Breakpoint[];

export type Pollutant = "pm25" | "pm10";

function freezeTable(rows: readonly Breakpoint[]): BreakpointTable {
  return Object.freeze(rows.map((row) => Object.freeze(row)));
}

// CPCB-style bands in µg/m³, contiguous from 0
export const PM25_BREAKPOINTS: BreakpointTable = freezeTable([
  [0, 30, 0, 50],
  [30, 60, 51, 100],
  [60, 90, 101, 200],
  [90, 120, 201, 300],
  [120, 250, 301, 400],
  [250, 350, 401, 500],
  [350, 500, 501, 999],
]);

export const PM10_BREAKPOINTS: BreakpointTable = freezeTable([
  [0, 50, 0, 50],
  [50, 100, 51, 100],
  [100, 250, 101, 200],
  [250, 350, 201, 300],
  [350, 430, 301, 400],
  [430, 500, 401, 500],
  [500, 1000, 501, 999],
]);

export const BREAKPOINT_TABLES: Readonly<Record<Pollutant, BreakpointTable>> =
  Object.freeze({
    pm25: PM25_BREAKPOINTS,
    pm10: PM10_BREAKPOINTS,
  });

export interface AqiResult {
  pm25: number | null;
  pm10: number | null;
  subIndices: Record<Pollutant, number | null>;
  aqi: number | null;
}

// Linear scaling function to map one range to another
function linearScale(
  value: number,
  fromMin: number,
  fromMax: number,
  toMin: number,
  toMax: number
): number {
  return ((value - fromMin) * (toMax - toMin)) / (fromMax - fromMin) + toMin;
}

/**
 * Maps a concentration through a single band. Returns null when the
 * concentration lies outside `[low, high]`.
 */
export function interpolate(
  concentration: number,
  [cLow, cHigh, iLow, iHigh]: Breakpoint
): number | null {
  if (!(concentration >= cLow && concentration <= cHigh)) {
    return null;
  }
  if (cHigh === cLow) {
    return iLow;
  }
  return linearScale(concentration, cLow, cHigh, iLow, iHigh);
}

/**
 * Sub-index of a concentration against a breakpoint table.
 *
 * The first band containing the concentration wins, so a value sitting on a
 * shared edge takes the lower band's top index. Above the last band the last
 * band's slope is extended without a cap. Rounds half up. A present value
 * that is not a finite number is rejected.
 */
export function subindex(
  concentration: number | null | undefined,
  table: BreakpointTable
): number | null {
  if (concentration === null || concentration === undefined) {
    return null;
  }
  if (!Number.isFinite(concentration)) {
    throw new InvalidInputError(
      `concentration is not a finite number: ${concentration}`
    );
  }
  if (table.length === 0 || concentration < table[0][0]) {
    return null;
  }

  for (const breakpoint of table) {
    const index = interpolate(concentration, breakpoint);
    if (index !== null) {
      return Math.round(index);
    }
  }

  const [cLow, cHigh, iLow, iHigh] = table[table.length - 1];
  if (cHigh === cLow) {
    return iLow;
  }
  return Math.round(linearScale(concentration, cLow, cHigh, iLow, iHigh));
}

/** Worst pollutant dominates; null when no sub-index is available. */
export function overallAqi(
  subIndices: Iterable<number | null | undefined>
): number | null {
  let worst: number | null = null;
  for (const value of subIndices) {
    if (value === null || value === undefined) continue;
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(`sub-index is not a finite number: ${value}`);
    }
    if (worst === null || value > worst) {
      worst = value;
    }
  }
  return worst;
}

/**
 * Turns a raw reading into a concentration. Missing values become null;
 * present values that are not finite non-negative numbers are rejected.
 */
export function parseConcentration(
  raw: unknown,
  pollutant: Pollutant
): number | null {
  if (raw === null || raw === undefined) {
    return null;
  }

  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && raw.trim() !== "") {
    value = Number(raw.trim());
  } else {
    throw new InvalidInputError(
      `${pollutant} concentration must be a number, got ${
        typeof raw === "string" ? "an empty string" : typeof raw
      }`
    );
  }

  if (!Number.isFinite(value)) {
    throw new InvalidInputError(
      `${pollutant} concentration is not a finite number: ${String(raw)}`
    );
  }
  if (value < 0) {
    throw new InvalidInputError(
      `${pollutant} concentration cannot be negative: ${value}`
    );
  }
  return value;
}

export function calculateAqi(readings: {
  pm25?: unknown;
  pm10?: unknown;
}): AqiResult {
  const pm25 = parseConcentration(readings.pm25, "pm25");
  const pm10 = parseConcentration(readings.pm10, "pm10");
  const subIndices = {
    pm25: subindex(pm25, PM25_BREAKPOINTS),
    pm10: subindex(pm10, PM10_BREAKPOINTS),
  };

  return {
    pm25,
    pm10,
    subIndices,
    aqi: overallAqi(Object.values(subIndices)),
  };
}
