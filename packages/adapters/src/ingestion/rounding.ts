/**
 * Rounds half away from zero to `digits` decimals. Non-finite input (sources
 * report NaN for "unknown") maps to null.
 */
export function roundTo(value: number, digits: number): number | null {
  if (!Number.isFinite(value)) return null;
  const factor = 10 ** digits;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}
