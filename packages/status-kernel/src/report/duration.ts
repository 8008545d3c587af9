// Status Kernel - elapsed time rendering
//
// Input is in TimeTicks (1/100 s). Each band rounds up.

const BANDS_V1: ReadonlyArray<{ below: number; divisor: number; suffix: string }> = Object.freeze([
  { below: 60_000, divisor: 100, suffix: "s" },
  { below: 360_000, divisor: 60_000, suffix: "min" },
  { below: 8_640_000, divisor: 360_000, suffix: "h" }
]);

const DAY_DIVISOR = 8_640_000;

export function formatTimeTicksDurationV1(ticks: number): string {
  const t = Math.max(0, ticks);
  for (const band of BANDS_V1) {
    if (t < band.below) return `${Math.ceil(t / band.divisor)}${band.suffix}`;
  }
  return `${Math.ceil(t / DAY_DIVISOR)}d`;
}

/**
 * Elapsed ticks between an event stamp and the device uptime; never negative.
 */
export function elapsedTicksV1(uptime: number, stamp: number): number {
  return Math.max(0, uptime - stamp);
}
