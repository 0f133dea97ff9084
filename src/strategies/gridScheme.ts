import { GRID_TYPES, GridParameters, GridScheme, GridType } from '../types';
import { config, resolveGridParameters } from '../utils/config';
import { InvalidGridTypeError, ValidationError } from '../utils/errors';
import { floorToLot } from '../utils/orderUtils';

export interface GridSchemeInput {
  currentPrice: number;
  upperBound: number;
  lowerBound: number;
  volatility: number;
  levelCount: number;
  gridType: GridType;
  capital: number;
  gridSpacing?: number; // Fraction of the midpoint between volatility levels
}

export function parseGridType(value: string): GridType {
  const gridType = GRID_TYPES.find(t => t === value);
  if (!gridType) {
    throw new InvalidGridTypeError(value);
  }
  return gridType;
}

/**
 * Index of the first level at or above `price`, or the top level when the
 * price is above them all.
 */
export function findLevelIndex(levels: readonly number[], price: number): number {
  const index = levels.findIndex(level => price <= level);
  return index === -1 ? levels.length - 1 : index;
}

/**
 * Push a bound out past the current price when it does not enclose it
 */
export function widenBounds(
  currentPrice: number,
  upperBound: number,
  lowerBound: number,
  widening: number
): { upperBound: number; lowerBound: number } {
  return {
    upperBound: upperBound <= currentPrice ? currentPrice * (1 + widening) : upperBound,
    lowerBound: lowerBound >= currentPrice ? currentPrice * (1 - widening) : lowerBound,
  };
}

export function arithmeticLevels(lower: number, upper: number, count: number): number[] {
  const step = (upper - lower) / (count - 1);
  return Array.from({ length: count }, (_, i) => lower + i * step);
}

export function geometricLevels(lower: number, upper: number, count: number): number[] {
  const ratio = Math.pow(upper / lower, 1 / (count - 1));
  return Array.from({ length: count }, (_, i) => lower * Math.pow(ratio, i));
}

/**
 * Levels stepping out from the midpoint of the range by `spacing` of the
 * midpoint, trimmed or extended at the top to `count` levels.
 */
export function volatilityLevels(lower: number, upper: number, count: number, spacing: number): number[] {
  const midPrice = (upper + lower) / 2;
  const levels = [midPrice];

  for (let i = 1; i <= Math.floor(count / 2); i++) {
    levels.push(midPrice * (1 + i * spacing));
    levels.unshift(midPrice * (1 - i * spacing));
  }

  while (levels.length > count) {
    levels.pop();
  }
  while (levels.length < count) {
    levels.push(levels[levels.length - 1] * (1 + spacing));
  }

  return levels;
}

function generateLevels(
  gridType: GridType,
  lower: number,
  upper: number,
  count: number,
  spacing: number
): number[] {
  switch (gridType) {
    case 'arithmetic':
      return arithmeticLevels(lower, upper, count);
    case 'geometric':
      return geometricLevels(lower, upper, count);
    case 'volatility':
      return volatilityLevels(lower, upper, count, spacing);
  }
}

function isUsableGrid(levels: number[]): boolean {
  return levels.every((level, i) => isFinite(level) && level > 0 && (i === 0 || level > levels[i - 1]));
}

function resolveSpacing(input: GridSchemeInput, params: GridParameters): number {
  if (input.gridSpacing !== undefined && isFinite(input.gridSpacing) && input.gridSpacing > 0) {
    return input.gridSpacing;
  }

  const derived = input.volatility / params.volatilityDivisor;
  if (isFinite(derived) && derived > 0) {
    return derived;
  }

  if (input.gridType === 'volatility') {
    console.warn(`⚠️  Grid spacing ${derived} is unusable, using default ${params.fallbackSpacing}`);
  }
  return params.fallbackSpacing;
}

/**
 * Split capital over the levels with more weight on the lower ones and
 * convert each share to whole lots.
 */
export function allocateOrderSizes(
  levels: readonly number[],
  capital: number,
  params: Pick<GridParameters, 'lotSize' | 'allocationSlope'>
): number[] {
  if (!(capital > 0)) {
    return levels.map(() => 0);
  }

  const count = levels.length;
  const weights = levels.map((_, i) => Math.max(0, 1 + params.allocationSlope * (count - 1 - i)));
  const totalWeight = weights.reduce((sum, w) => sum + w, 0);

  return levels.map((price, i) => {
    const share = totalWeight > 0 ? weights[i] / totalWeight : 1 / count;
    const shares = floorToLot((capital * share) / price, params.lotSize);
    return Math.max(params.lotSize, shares);
  });
}

/**
 * Build an immutable grid scheme around the current price
 */
export function buildGridScheme(
  input: GridSchemeInput,
  params: GridParameters = resolveGridParameters()
): GridScheme {
  const { currentPrice, levelCount, gridType } = input;

  if (!Number.isInteger(levelCount) || levelCount < 3) {
    throw new ValidationError(`Grid level count must be an integer of at least 3, got ${levelCount}`, { levelCount });
  }
  parseGridType(gridType);

  const { upperBound, lowerBound } = widenBounds(currentPrice, input.upperBound, input.lowerBound, params.boundWidening);
  const spacing = resolveSpacing(input, params);

  let levels = generateLevels(gridType, lowerBound, upperBound, levelCount, spacing);
  levels.sort((a, b) => a - b);

  if (!isUsableGrid(levels)) {
    console.warn(`⚠️  ${gridType} grid produced invalid levels around ${currentPrice}, falling back to an arithmetic grid`);
    levels = arithmeticLevels(
      currentPrice * params.invalidGridLowerMultiplier,
      currentPrice * params.invalidGridUpperMultiplier,
      levelCount
    );
  }

  const orderSizes = allocateOrderSizes(levels, input.capital, params);
  const currentLevel = findLevelIndex(levels, currentPrice);

  if (config.logging.verbose) {
    console.log(
      `📐 Built ${gridType} grid: ${levels[0].toFixed(4)} - ${levels[levels.length - 1].toFixed(4)}, ` +
      `${levelCount} levels, current level ${currentLevel + 1}`
    );
  }

  return Object.freeze({
    gridType,
    levels: Object.freeze(levels),
    orderSizes: Object.freeze(orderSizes),
    currentLevel,
    upperBound,
    lowerBound,
    spacing,
  });
}
