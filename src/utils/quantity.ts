/**
 * Lot / tick arithmetic. Quantities and prices are converted to integer step
 * units before splitting so that sums stay exact.
 */

export function decimalsOf(step: number): number {
  if (!Number.isFinite(step) || step <= 0) return 0;
  const text = step.toString();
  const exp = /e-(\d+)$/.exec(text);
  if (exp?.[1]) return Number(exp[1]);
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

/** Rounds to the number of decimals the step carries (kills float dust) */
export function roundToStep(value: number, step: number): number {
  return Number(value.toFixed(decimalsOf(step)));
}

/** `value / step` as an integer, or null when value is not a whole multiple */
export function toUnits(value: number, step: number): number | null {
  const units = Math.round(value / step);
  const tolerance = step / 1e6;
  return Math.abs(units * step - value) <= tolerance ? units : null;
}

export function fromUnits(units: number, step: number): number {
  return roundToStep(units * step, step);
}

