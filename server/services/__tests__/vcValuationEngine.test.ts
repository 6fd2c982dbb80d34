import { describe, it, expect } from 'vitest';
import {
  calculatePresentValue,
  calculateIRR,
  estimateIRR,
  solveIRR,
  toCashFlowSeries,
  calculateVCValuation,
  calculateIRRSensitivity,
  calculateScenarios,
  buildProjectionTable,
  buildInvestorFlows,
  buildValuationBreakdown,
  toSensitivityChartSeries,
  IRR_FALLBACK_RATE,
  SENSITIVITY_DISCOUNT_RATES,
  type ValuationInputs,
} from '../vcValuationEngine';

const BASE_INPUTS: ValuationInputs = {
  exitYear: 7,
  exitRevenue: 10_000_000,
  evRevenueMultiple: 10.0,
  financialDebt: 0,
  cashBalance: 0,
  discountRate: 0.25,
  equityStakeEntry: 0.10,
  dilutionEffect: 0,
};

describe('calculatePresentValue', () => {
  it('discounts by (1 + rate)^periods', () => {
    expect(calculatePresentValue(1000, 0.1, 2)).toBeCloseTo(1000 / 1.21, 10);
  });

  it('returns the future value unchanged for zero periods', () => {
    expect(calculatePresentValue(1234.5, 0.3, 0)).toBe(1234.5);
  });
});

describe('calculateIRR', () => {
  it('uses the closed form for a single investment and exit', () => {
    expect(calculateIRR([-100, 130])).toBeCloseTo(0.3, 10);
    expect(estimateIRR([-100, 130]).method).toBe('closed-form');
  });

  it('takes the holding period from year-tagged flows', () => {
    const irr = calculateIRR([
      { year: 0, amount: -100 },
      { year: 2, amount: 121 },
    ]);
    expect(irr).toBeCloseTo(0.1, 10);
  });

  it('falls back to 25% for a zero exit', () => {
    expect(calculateIRR([-100, 0])).toBe(IRR_FALLBACK_RATE);
    expect(estimateIRR([-100, 0]).method).toBe('fallback');
  });

  it('falls back to 25% for a zero investment', () => {
    expect(calculateIRR([0, 100])).toBe(0.25);
  });

  it('falls back when every flow has the same sign', () => {
    expect(estimateIRR([-100, -50, -20])).toEqual({ rate: 0.25, method: 'fallback' });
  });

  it('solves multi-period flows', () => {
    const estimate = estimateIRR([-100, 10, 110]);
    expect(estimate.method).toBe('solver');
    expect(estimate.rate).toBeCloseTo(0.1, 6);
  });

  it('falls back for a two-flow series whose exit is not positive', () => {
    expect(estimateIRR([100, -130])).toEqual({ rate: IRR_FALLBACK_RATE, method: 'fallback' });
  });

  it('falls back when the solver steps past -100%', () => {
    expect(solveIRR(toCashFlowSeries([-100, 0, 0, 0, 1]))).toBeNull();
    expect(estimateIRR([-100, 0, 0, 0, 1])).toEqual({ rate: 0.25, method: 'fallback' });
  });
});

describe('solveIRR', () => {
  it('returns null for an empty series', () => {
    expect(solveIRR([])).toBeNull();
  });

  it('indexes plain amounts by position', () => {
    expect(toCashFlowSeries([-100, 130])).toEqual([
      { year: 0, amount: -100 },
      { year: 1, amount: 130 },
    ]);
  });
});

describe('calculateVCValuation', () => {
  it('computes the base case', () => {
    const result = calculateVCValuation(BASE_INPUTS);
    const presentValue = 100_000_000 / Math.pow(1.25, 7);

    expect(result.enterpriseValue).toBe(100_000_000);
    expect(result.equityValue).toBe(100_000_000);
    expect(result.presentValue).toBeCloseTo(presentValue, 4);
    expect(result.equityStakeExit).toBeCloseTo(0.1, 12);
    expect(result.investmentAmount).toBeCloseTo(presentValue * 0.1, 4);
    expect(result.exitProceeds).toBeCloseTo(10_000_000, 4);
    expect(result.irr).toBeCloseTo(Math.pow(10_000_000 / (presentValue * 0.1), 1 / 7) - 1, 10);
    expect(result.irr).toBeCloseTo(0.25, 10);
    expect(result.cashMultiple).toBeCloseTo(4.76837158203125, 8);
  });

  it('builds a two-flow series from entry to exit year', () => {
    const result = calculateVCValuation(BASE_INPUTS);
    expect(result.cashFlows).toHaveLength(2);
    expect(result.cashFlows[0].year).toBe(0);
    expect(result.cashFlows[0].amount).toBeCloseTo(-result.investmentAmount, 6);
    expect(result.cashFlows[1]).toEqual({ year: 7, amount: result.exitProceeds });
  });

  it('bridges enterprise to equity value through debt and cash', () => {
    const result = calculateVCValuation({
      ...BASE_INPUTS,
      exitRevenue: 5_000_000,
      evRevenueMultiple: 8,
      financialDebt: 4_000_000,
      cashBalance: 1_000_000,
    });
    expect(result.enterpriseValue).toBe(40_000_000);
    expect(result.equityValue).toBe(37_000_000);
  });

  it('applies dilution to the exit stake only', () => {
    const result = calculateVCValuation({ ...BASE_INPUTS, equityStakeEntry: 0.2, dilutionEffect: 0.25 });
    expect(result.equityStakeExit).toBeCloseTo(0.15, 12);
    expect(result.investmentAmount).toBeCloseTo((100_000_000 / Math.pow(1.25, 7)) * 0.2, 4);
    expect(result.exitProceeds).toBeCloseTo(15_000_000, 4);
  });

  it('reports a zero multiple when nothing is invested', () => {
    const result = calculateVCValuation({ ...BASE_INPUTS, exitRevenue: 0 });
    expect(result.investmentAmount).toBe(0);
    expect(result.cashMultiple).toBe(0);
    expect(result.irr).toBe(0.25);
  });

  it('reports a zero multiple when debt exceeds enterprise value', () => {
    const result = calculateVCValuation({
      ...BASE_INPUTS,
      exitRevenue: 1_000_000,
      evRevenueMultiple: 1,
      financialDebt: 3_000_000,
    });
    expect(result.equityValue).toBe(-2_000_000);
    expect(result.investmentAmount).toBeLessThan(0);
    expect(result.cashMultiple).toBe(0);
    expect(result.irr).toBe(IRR_FALLBACK_RATE);
  });

  it('falls back across the sensitivity sweep when equity is negative', () => {
    const inputs = {
      ...BASE_INPUTS,
      exitRevenue: 1_000_000,
      evRevenueMultiple: 1,
      financialDebt: 3_000_000,
      dilutionEffect: 0.2,
    };
    expect(calculateVCValuation(inputs).irr).toBe(IRR_FALLBACK_RATE);
    for (const point of calculateIRRSensitivity(inputs)) {
      expect(point.irr).toBe(IRR_FALLBACK_RATE);
    }
  });

  it('throws instead of returning a partial result', () => {
    expect(() => calculateVCValuation({ ...BASE_INPUTS, discountRate: -1 })).toThrow(
      'Valuation produced a non-finite presentValue (Infinity)'
    );
  });
});

describe('calculateIRRSensitivity', () => {
  it('returns 20 ascending points from 15% to 34%', () => {
    const points = calculateIRRSensitivity(BASE_INPUTS);
    expect(points).toHaveLength(20);
    expect(points.map((p) => p.discountRate)).toEqual(SENSITIVITY_DISCOUNT_RATES);
    expect(points[0].discountRate).toBe(0.15);
    expect(points[19].discountRate).toBe(0.34);
    for (let i = 1; i < points.length; i++) {
      expect(points[i].discountRate).toBeGreaterThan(points[i - 1].discountRate);
    }
  });

  it('tracks the discount rate when there is no dilution', () => {
    for (const point of calculateIRRSensitivity(BASE_INPUTS)) {
      expect(point.irr).toBeCloseTo(point.discountRate, 10);
    }
  });

  it('holds exit proceeds at the diluted base case', () => {
    const inputs = { ...BASE_INPUTS, dilutionEffect: 0.2 };
    const [point] = calculateIRRSensitivity(inputs, calculateVCValuation(inputs), [0.2]);
    expect(point.irr).toBeCloseTo(1.2 * Math.pow(0.8, 1 / 7) - 1, 10);
  });
});

describe('calculateScenarios', () => {
  it('returns Conservative, BaseCase, Optimistic in order', () => {
    const scenarios = calculateScenarios(BASE_INPUTS);
    expect(scenarios.map((s) => s.scenario)).toEqual(['Conservative', 'BaseCase', 'Optimistic']);
  });

  it('scales revenue and multiple per scenario', () => {
    const [conservative, base, optimistic] = calculateScenarios(BASE_INPUTS);
    expect(conservative.result.enterpriseValue).toBeCloseTo(0.56 * base.result.enterpriseValue, 4);
    expect(optimistic.result.enterpriseValue).toBeCloseTo(156_000_000, 4);
    expect(base.inputs).toEqual(BASE_INPUTS);
  });

  it('holds the other inputs constant', () => {
    for (const { inputs } of calculateScenarios({ ...BASE_INPUTS, financialDebt: 1_000_000, dilutionEffect: 0.1 })) {
      expect(inputs.financialDebt).toBe(1_000_000);
      expect(inputs.cashBalance).toBe(0);
      expect(inputs.discountRate).toBe(0.25);
      expect(inputs.equityStakeEntry).toBe(0.1);
      expect(inputs.dilutionEffect).toBe(0.1);
      expect(inputs.exitYear).toBe(7);
    }
  });
});

describe('buildProjectionTable', () => {
  const result = calculateVCValuation(BASE_INPUTS);

  it('spans the anchor year through three years after exit', () => {
    const rows = buildProjectionTable(BASE_INPUTS, result);
    expect(rows).toHaveLength(11);
    expect(rows[0].year).toBe(2023);
    expect(rows[10].year).toBe(2033);
  });

  it('fills only the exit-year row', () => {
    const rows = buildProjectionTable(BASE_INPUTS, result);
    const filled = rows.filter((row) => row.revenue !== 0);
    expect(filled).toHaveLength(1);
    expect(filled[0]).toMatchObject({
      year: 2030,
      cashFlowDate: '31-Dec-2030',
      forecastYear: 'Year 7',
      revenue: 10_000_000,
      enterpriseValue: 100_000_000,
      equityValue: 100_000_000,
      presentValue: result.presentValue,
    });
    for (const row of rows.filter((r) => r.year !== 2030)) {
      expect([row.revenue, row.enterpriseValue, row.equityValue, row.presentValue]).toEqual([0, 0, 0, 0]);
    }
  });

  it('gives every row a discount factor', () => {
    const rows = buildProjectionTable(BASE_INPUTS, result);
    expect(rows[0].discountFactor).toBe(1);
    expect(rows[1].discountFactor).toBe(0.8);
    expect(rows[10].discountFactor).toBeCloseTo(1 / Math.pow(1.25, 10), 12);
  });

  it('accepts a different anchor year', () => {
    const rows = buildProjectionTable(BASE_INPUTS, result, 2026);
    expect(rows[0]).toMatchObject({ year: 2026, forecastYear: 'Year 0', cashFlowDate: '31-Dec-2026' });
  });
});

describe('buildInvestorFlows', () => {
  it('places the investment at year 0 and proceeds at exit', () => {
    const result = calculateVCValuation(BASE_INPUTS);
    const rows = buildInvestorFlows(BASE_INPUTS, result);

    expect(rows).toHaveLength(11);
    expect(rows[0].investment).toBe(-result.investmentAmount);
    expect(rows[0].netCashFlow).toBe(-result.investmentAmount);
    expect(rows[7]).toMatchObject({ year: 2030, investment: 0, exitProceeds: result.exitProceeds, netCashFlow: result.exitProceeds });
    expect(rows[3]).toMatchObject({ investment: 0, exitProceeds: 0, netCashFlow: 0, equityStake: 0.1 });
    expect(rows[8].equityStake).toBeNull();
  });
});

describe('chart series', () => {
  it('breaks valuation into enterprise value, debt and cash', () => {
    const inputs = { ...BASE_INPUTS, financialDebt: 2_000_000, cashBalance: 500_000 };
    expect(buildValuationBreakdown(inputs, calculateVCValuation(inputs))).toEqual([
      { label: 'Enterprise Value', value: 100_000_000, color: '#3498db' },
      { label: 'Debt', value: 2_000_000, color: '#e74c3c' },
      { label: 'Cash', value: 500_000, color: '#2ecc71' },
    ]);
  });

  it('expresses sensitivity in percent', () => {
    const series = toSensitivityChartSeries([{ discountRate: 0.15, irr: 0.3 }]);
    expect(series.x[0]).toBeCloseTo(15, 10);
    expect(series.y[0]).toBeCloseTo(30, 10);
  });
});
