import { EquityPoint, PerformanceMetrics, Trade } from '../../types';
import { config } from '../../utils/config';

export interface TradeCounts {
  totalTrades: number;
  buyCount: number;
  sellCount: number;
  winCount: number;
  winRate: number;
}

export class PerformanceAnalyzer {
  private readonly tradingDaysPerYear = config.backtest.tradingDaysPerYear;
  private readonly riskFreeRate = config.backtest.riskFreeRate;

  /**
   * Calculate performance metrics from an equity curve
   */
  calculateMetrics(
    equityCurve: readonly EquityPoint[],
    initialCapital: number,
    tradingDays: number,
    trades: readonly Trade[] = []
  ): PerformanceMetrics {
    const equities = equityCurve.map(p => p.totalEquity);
    const finalEquity = equities.length > 0 ? equities[equities.length - 1] : initialCapital;

    const totalReturn = finalEquity - initialCapital;
    const totalReturnPercent = initialCapital > 0 ? (totalReturn / initialCapital) * 100 : 0;

    return {
      totalReturn,
      totalReturnPercent,
      annualReturnPercent: this.calculateAnnualReturn(finalEquity, initialCapital, tradingDays),
      sharpeRatio: this.calculateSharpeRatio(equities),
      maxDrawdownPercent: this.calculateMaxDrawdown(equities),
      gridProfitPercent: this.calculateGridProfit(equityCurve, totalReturn),
      ...this.countTrades(trades),
    };
  }

  /**
   * Compound annual return in percent, scaled from the number of trading days
   */
  calculateAnnualReturn(finalEquity: number, initialCapital: number, tradingDays: number): number {
    if (tradingDays <= 0 || initialCapital <= 0) {
      return 0;
    }
    return (Math.pow(finalEquity / initialCapital, this.tradingDaysPerYear / tradingDays) - 1) * 100;
  }

  calculateDailyReturns(equities: readonly number[]): number[] {
    const returns: number[] = [];
    for (let i = 1; i < equities.length; i++) {
      if (equities[i - 1] > 0) {
        returns.push(equities[i] / equities[i - 1] - 1);
      }
    }
    return returns;
  }

  /**
   * Annualised Sharpe ratio of daily returns over the daily risk-free rate
   */
  calculateSharpeRatio(equities: readonly number[]): number {
    const returns = this.calculateDailyReturns(equities);
    if (equities.length < 2 || returns.length === 0) {
      return 0;
    }

    const meanReturn = returns.reduce((sum, r) => sum + r, 0) / returns.length;
    const variance = returns.reduce((sum, r) => sum + Math.pow(r - meanReturn, 2), 0) / returns.length;
    const stdDev = Math.sqrt(variance);

    if (stdDev === 0) {
      return 0;
    }

    const dailyRiskFree = this.riskFreeRate / this.tradingDaysPerYear;
    return ((meanReturn - dailyRiskFree) / stdDev) * Math.sqrt(this.tradingDaysPerYear);
  }

  /**
   * Largest peak-to-trough decline in percent of the peak
   */
  calculateMaxDrawdown(equities: readonly number[]): number {
    if (equities.length === 0) {
      return 0;
    }

    let peak = equities[0];
    let maxDrawdownPercent = 0;

    for (const equity of equities) {
      if (equity > peak) {
        peak = equity;
      }
      if (peak <= 0) {
        continue;
      }

      const drawdownPercent = ((peak - equity) / peak) * 100;
      if (drawdownPercent > maxDrawdownPercent) {
        maxDrawdownPercent = drawdownPercent;
      }
    }

    return maxDrawdownPercent;
  }

  /**
   * Trade counts and win rate. A sell wins when it realised a positive
   * profit, i.e. its amount exceeded its notional at cost.
   */
  countTrades(trades: readonly Trade[]): TradeCounts {
    const sells = trades.filter(t => t.side === 'sell');
    const winCount = sells.filter(t => t.realizedProfit > 0).length;

    return {
      totalTrades: trades.length,
      buyCount: trades.length - sells.length,
      sellCount: sells.length,
      winCount,
      winRate: sells.length > 0 ? (winCount / sells.length) * 100 : 0,
    };
  }

  /**
   * Total return relative to the average capital held in the market
   */
  private calculateGridProfit(equityCurve: readonly EquityPoint[], totalReturn: number): number {
    if (equityCurve.length === 0) {
      return 0;
    }

    const averageInvested = equityCurve.reduce((sum, p) => sum + p.investedCapital, 0) / equityCurve.length;
    return averageInvested > 0 ? (totalReturn / averageInvested) * 100 : 0;
  }
}

// Singleton instance
let performanceAnalyzerInstance: PerformanceAnalyzer | null = null;

export function getPerformanceAnalyzer(): PerformanceAnalyzer {
  if (!performanceAnalyzerInstance) {
    performanceAnalyzerInstance = new PerformanceAnalyzer();
  }
  return performanceAnalyzerInstance;
}

export function analyzePerformance(
  equityCurve: readonly EquityPoint[],
  initialCapital: number,
  tradingDays: number,
  trades: readonly Trade[] = []
): PerformanceMetrics {
  return getPerformanceAnalyzer().calculateMetrics(equityCurve, initialCapital, tradingDays, trades);
}
