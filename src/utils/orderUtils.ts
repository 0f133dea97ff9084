/**
 * Round a share quantity down to whole lots.
 */
export function floorToLot(quantity: number, lotSize: number): number {
  if (!isFinite(quantity) || quantity <= 0) return 0;
  return Math.floor(quantity / lotSize) * lotSize;
}

/**
 * Largest lot-rounded quantity that `cash` can pay for at `price`
 */
export function affordableQuantity(cash: number, price: number, lotSize: number): number {
  if (price <= 0) return 0;
  return floorToLot(cash / price, lotSize);
}

/**
 * Size a planned buy against available cash.
 *
 * When cash covers the plan it is returned unchanged. Otherwise the order
 * shrinks to what cash affords, but never below a third of the plan (in
 * whole lots, at least one lot). The result can still exceed cash; the
 * caller skips the order in that case.
 */
export function sizeBuyOrder(planned: number, cash: number, price: number, lotSize: number): number {
  if (cash >= planned * price) return planned;

  const minimum = Math.max(floorToLot(planned / 3, lotSize), lotSize);
  const affordable = Math.min(affordableQuantity(cash, price, lotSize), planned);
  return Math.max(minimum, affordable);
}

/**
 * Profit on a sale against a cost basis, capped at `capRatio` of the sale amount
 */
export function cappedProfit(price: number, costBasis: number, quantity: number, capRatio: number): number {
  const profit = (price - costBasis) * quantity;
  return Math.min(profit, price * quantity * capRatio);
}

/**
 * Running average purchase cost across every buy of a run.
 */
export class CostBasisTracker {
  private totalAmount = 0;
  private totalQuantity = 0;

  record(amount: number, quantity: number): void {
    this.totalAmount += amount;
    this.totalQuantity += quantity;
  }

  averageCost(): number {
    return this.totalQuantity > 0 ? this.totalAmount / this.totalQuantity : 0;
  }
}
