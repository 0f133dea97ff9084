import { describe, it, expect } from 'vitest';
import {
  CostBasisTracker,
  affordableQuantity,
  cappedProfit,
  floorToLot,
  sizeBuyOrder,
} from '../../src/utils/orderUtils';

describe('floorToLot', () => {
  it('rounds down to whole lots', () => {
    expect(floorToLot(250, 100)).toBe(200);
    expect(floorToLot(99, 100)).toBe(0);
  });

  it('returns zero for unusable quantities', () => {
    expect(floorToLot(-5, 100)).toBe(0);
    expect(floorToLot(NaN, 100)).toBe(0);
    expect(floorToLot(Infinity, 100)).toBe(0);
  });
});

describe('affordableQuantity', () => {
  it('returns the lots cash can pay for', () => {
    expect(affordableQuantity(5000, 10, 100)).toBe(500);
    expect(affordableQuantity(5000, 0, 100)).toBe(0);
  });
});

describe('sizeBuyOrder', () => {
  it('keeps the plan when cash covers it', () => {
    expect(sizeBuyOrder(900, 100000, 10, 100)).toBe(900);
  });

  it('shrinks to what cash affords', () => {
    expect(sizeBuyOrder(900, 5000, 10, 100)).toBe(500);
  });

  it('never goes below a third of the plan', () => {
    expect(sizeBuyOrder(900, 2000, 10, 100)).toBe(300);
  });

  it('never goes below one lot', () => {
    expect(sizeBuyOrder(200, 500, 10, 100)).toBe(100);
  });
});

describe('cappedProfit', () => {
  it('returns the plain profit under the cap', () => {
    expect(cappedProfit(10, 9, 100, 0.2)).toBe(100);
  });

  it('caps the profit at a share of the sale amount', () => {
    expect(cappedProfit(10, 5, 100, 0.2)).toBeCloseTo(200, 10);
  });

  it('passes losses through', () => {
    expect(cappedProfit(10, 12, 100, 0.2)).toBe(-200);
  });
});

describe('CostBasisTracker', () => {
  it('averages cost over every recorded buy', () => {
    const tracker = new CostBasisTracker();
    expect(tracker.averageCost()).toBe(0);

    tracker.record(1000, 100);
    tracker.record(1800, 200);
    expect(tracker.averageCost()).toBeCloseTo(2800 / 300, 10);
  });
});
