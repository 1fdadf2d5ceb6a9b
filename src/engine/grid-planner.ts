import { InvalidRangeError } from '../errors.js';
import { fromUnits, roundToStep, toUnits } from '../utils/quantity.js';

export interface GridPlanInput {
  readonly startPrice: number;
  readonly endPrice: number;
  readonly gridCount: number;
  readonly totalQuantity: number;
  readonly quantityStep: number;
  /** Round level prices to this tick; omitted = unrounded */
  readonly priceTick?: number;
}

export interface GridLevel {
  readonly index: number;
  readonly price: number;
  readonly quantity: number;
}

/**
 * Uniformly spaced price levels from startPrice to endPrice inclusive.
 *
 * The total quantity is split in whole lot units; every level gets
 * floor(units / gridCount) and the first level also takes the remainder,
 * so the level quantities always add up to the requested total.
 */
export function planGrid(input: GridPlanInput): GridLevel[] {
  const { startPrice, endPrice, gridCount, totalQuantity, quantityStep, priceTick } = input;

  if (!(startPrice < endPrice)) {
    throw new InvalidRangeError(`startPrice (${startPrice}) must be below endPrice (${endPrice})`);
  }
  if (!Number.isInteger(gridCount) || gridCount < 2) {
    throw new InvalidRangeError(`gridCount must be an integer >= 2, got ${gridCount}`);
  }

  const units = toUnits(totalQuantity, quantityStep);
  if (units === null) {
    throw new InvalidRangeError(`totalQuantity ${totalQuantity} is not a multiple of step ${quantityStep}`);
  }
  const perLevel = Math.floor(units / gridCount);
  if (perLevel < 1) {
    throw new InvalidRangeError(
      `totalQuantity ${totalQuantity} is too small for ${gridCount} levels at step ${quantityStep}`,
    );
  }
  const remainder = units - perLevel * gridCount;

  const spacing = (endPrice - startPrice) / (gridCount - 1);
  if (priceTick !== undefined && spacing < priceTick) {
    throw new InvalidRangeError(`level spacing ${spacing} is below the price tick ${priceTick}`);
  }

  const levels: GridLevel[] = [];
  for (let i = 0; i < gridCount; i++) {
    // pin the last level to endPrice exactly instead of accumulating spacing error
    const raw = i === gridCount - 1 ? endPrice : startPrice + spacing * i;
    const price = priceTick !== undefined ? roundToStep(Math.round(raw / priceTick) * priceTick, priceTick) : raw;
    const levelUnits = i === 0 ? perLevel + remainder : perLevel;
    levels.push({ index: i, price, quantity: fromUnits(levelUnits, quantityStep) });
  }

  for (let i = 1; i < levels.length; i++) {
    const prev = levels[i - 1];
    const cur = levels[i];
    if (prev && cur && !(cur.price > prev.price)) {
      throw new InvalidRangeError(`price tick ${priceTick} collapses levels ${i - 1} and ${i}`);
    }
  }

  return levels;
}
