/**
 * VC METHOD VALUATION ENGINE
 *
 * Pure functions: an immutable ValuationInputs bundle goes in, result bundles
 * come out. Nothing here keeps state between calls.
 */

// ============ TYPE DEFINITIONS ============

export interface ValuationInputs {
  readonly exitYear: number;
  readonly exitRevenue: number;
  readonly evRevenueMultiple: number;
  readonly financialDebt: number;
  readonly cashBalance: number;
  readonly discountRate: number;
  readonly equityStakeEntry: number;
  readonly dilutionEffect: number;
}

export interface CashFlow {
  year: number;
  amount: number;
}

export type CashFlowSeries = readonly CashFlow[];

export interface ValuationResult {
  enterpriseValue: number;
  equityValue: number;
  presentValue: number;
  equityStakeExit: number;
  investmentAmount: number;
  exitProceeds: number;
  cashFlows: CashFlowSeries;
  irr: number;
  cashMultiple: number;
}

export type IRRMethod = 'closed-form' | 'solver' | 'fallback';

export interface IRREstimate {
  rate: number;
  method: IRRMethod;
}

export type ScenarioName = 'Conservative' | 'BaseCase' | 'Optimistic';

export interface ScenarioResult {
  scenario: ScenarioName;
  inputs: ValuationInputs;
  result: ValuationResult;
}

export interface SensitivityPoint {
  discountRate: number;
  irr: number;
}

export interface ProjectionRow {
  year: number;
  cashFlowDate: string;
  forecastYear: string;
  revenue: number;
  enterpriseValue: number;
  equityValue: number;
  discountFactor: number;
  presentValue: number;
}

export interface InvestorFlowRow {
  year: number;
  investment: number;
  exitProceeds: number;
  netCashFlow: number;
  equityStake: number | null;
}

export interface BreakdownSlice {
  label: 'Enterprise Value' | 'Debt' | 'Cash';
  value: number;
  color: string;
}

// ============ CONSTANTS ============

// Returned whenever the IRR cannot be derived from the flows.
export const IRR_FALLBACK_RATE = 0.25;

export const PROJECTION_ANCHOR_YEAR = 2023;

// Rows kept after the exit year in the projection and investor tables.
export const PROJECTION_TRAILING_YEARS = 3;

export const SENSITIVITY_DISCOUNT_RATES: readonly number[] = Array.from(
  { length: 20 },
  (_, i) => Math.round((0.15 + i * 0.01) * 100) / 100
);

export const SCENARIO_ADJUSTMENTS: Readonly<Record<ScenarioName, { multiple: number; revenue: number }>> = {
  Conservative: { multiple: 0.7, revenue: 0.8 },
  BaseCase: { multiple: 1.0, revenue: 1.0 },
  Optimistic: { multiple: 1.3, revenue: 1.2 },
};

export const SCENARIO_ORDER: readonly ScenarioName[] = ['Conservative', 'BaseCase', 'Optimistic'];

const SOLVER_GUESS = 0.1;
const SOLVER_MAX_ITERATIONS = 100;
// Relative to the sum of absolute flows
const SOLVER_TOLERANCE = 1e-10;

// ============ DISCOUNTING ============

export function calculatePresentValue(futureValue: number, discountRate: number, periods: number): number {
  return futureValue / Math.pow(1 + discountRate, periods);
}

// ============ IRR ============

export function toCashFlowSeries(cashFlows: readonly number[] | CashFlowSeries): CashFlowSeries {
  const flows: readonly (number | CashFlow)[] = cashFlows;
  return flows.map((flow, index) => (typeof flow === 'number' ? { year: index, amount: flow } : flow));
}

/**
 * Newton-Raphson on NPV(rate) = Σ amount / (1+rate)^year.
 * Returns null when the flows never change sign or the iteration does not
 * settle on a finite rate.
 */
export function solveIRR(series: CashFlowSeries): number | null {
  if (series.length === 0) return null;
  const hasPositive = series.some((cf) => cf.amount > 0);
  const hasNegative = series.some((cf) => cf.amount < 0);
  if (!(hasPositive && hasNegative)) return null;

  const scale = series.reduce((sum, cf) => sum + Math.abs(cf.amount), 0);
  let rate = SOLVER_GUESS;
  for (let i = 0; i < SOLVER_MAX_ITERATIONS; i++) {
    let npv = 0;
    let dnpv = 0;
    for (const { year, amount } of series) {
      npv += amount / Math.pow(1 + rate, year);
      dnpv -= (year * amount) / Math.pow(1 + rate, year + 1);
    }
    if (!Number.isFinite(npv) || !Number.isFinite(dnpv)) return null;
    if (Math.abs(npv) < SOLVER_TOLERANCE * scale) return rate;
    if (dnpv === 0) return null;
    const step = npv / dnpv;
    rate -= step;
    if (!Number.isFinite(rate) || rate <= -1) return null;
    if (Math.abs(step) < 1e-12) return rate;
  }
  return null;
}

export function estimateIRR(cashFlows: readonly number[] | CashFlowSeries): IRREstimate {
  const series = toCashFlowSeries(cashFlows);

  // Two flows: closed form or fallback, never the solver.
  if (series.length === 2) {
    const [entry, exit] = series;
    const investment = Math.abs(entry.amount);
    const years = exit.year - entry.year;
    if (investment > 0 && exit.amount > 0 && years > 0) {
      return { rate: Math.pow(exit.amount / investment, 1 / years) - 1, method: 'closed-form' };
    }
    return { rate: IRR_FALLBACK_RATE, method: 'fallback' };
  }

  const solved = solveIRR(series);
  if (solved === null) {
    return { rate: IRR_FALLBACK_RATE, method: 'fallback' };
  }
  return { rate: solved, method: 'solver' };
}

export function calculateIRR(cashFlows: readonly number[] | CashFlowSeries): number {
  return estimateIRR(cashFlows).rate;
}

// ============ VALUATION ============

export function calculateEquityStakeExit(inputs: ValuationInputs): number {
  return inputs.equityStakeEntry * (1 - inputs.dilutionEffect);
}

export function calculateVCValuation(inputs: ValuationInputs): ValuationResult {
  const {
    exitYear,
    exitRevenue,
    evRevenueMultiple,
    financialDebt,
    cashBalance,
    discountRate,
    equityStakeEntry,
  } = inputs;

  const enterpriseValue = exitRevenue * evRevenueMultiple;
  const equityValue = enterpriseValue - financialDebt + cashBalance;
  const presentValue = calculatePresentValue(equityValue, discountRate, exitYear);

  const equityStakeExit = calculateEquityStakeExit(inputs);
  const investmentAmount = presentValue * equityStakeEntry;
  const exitProceeds = equityValue * equityStakeExit;

  const cashFlows: CashFlowSeries = [
    { year: 0, amount: -investmentAmount },
    { year: exitYear, amount: exitProceeds },
  ];
  const irr = calculateIRR(cashFlows);
  const cashMultiple = investmentAmount > 0 ? exitProceeds / investmentAmount : 0;

  const result: ValuationResult = {
    enterpriseValue,
    equityValue,
    presentValue,
    equityStakeExit,
    investmentAmount,
    exitProceeds,
    cashFlows,
    irr,
    cashMultiple,
  };

  for (const field of ['enterpriseValue', 'equityValue', 'presentValue', 'investmentAmount', 'exitProceeds', 'irr', 'cashMultiple'] as const) {
    if (!Number.isFinite(result[field])) {
      throw new Error(`Valuation produced a non-finite ${field} (${result[field]})`);
    }
  }

  return result;
}

// ============ SENSITIVITY ============

// Equity value and exit stake stay at the base case; only the entry price moves with the rate.
export function calculateIRRSensitivity(
  inputs: ValuationInputs,
  base: ValuationResult = calculateVCValuation(inputs),
  discountRates: readonly number[] = SENSITIVITY_DISCOUNT_RATES
): SensitivityPoint[] {
  const exitProceeds = base.equityValue * base.equityStakeExit;

  return discountRates.map((discountRate) => {
    const presentValue = calculatePresentValue(base.equityValue, discountRate, inputs.exitYear);
    const investmentAmount = presentValue * inputs.equityStakeEntry;
    const irr = calculateIRR([
      { year: 0, amount: -investmentAmount },
      { year: inputs.exitYear, amount: exitProceeds },
    ]);
    return { discountRate, irr };
  });
}

// ============ SCENARIOS ============

export function buildScenarioInputs(inputs: ValuationInputs, scenario: ScenarioName): ValuationInputs {
  const adjustment = SCENARIO_ADJUSTMENTS[scenario];
  return {
    ...inputs,
    evRevenueMultiple: inputs.evRevenueMultiple * adjustment.multiple,
    exitRevenue: inputs.exitRevenue * adjustment.revenue,
  };
}

export function calculateScenarios(inputs: ValuationInputs): ScenarioResult[] {
  return SCENARIO_ORDER.map((scenario) => {
    const scenarioInputs = buildScenarioInputs(inputs, scenario);
    return { scenario, inputs: scenarioInputs, result: calculateVCValuation(scenarioInputs) };
  });
}

// ============ TABLES ============

function tableYears(exitYear: number, anchorYear: number): number[] {
  return Array.from({ length: exitYear + PROJECTION_TRAILING_YEARS + 1 }, (_, offset) => anchorYear + offset);
}

/**
 * Sparse: only the exit-year row carries values, every row carries
 * its discount factor.
 */
export function buildProjectionTable(
  inputs: ValuationInputs,
  result: ValuationResult,
  anchorYear: number = PROJECTION_ANCHOR_YEAR
): ProjectionRow[] {
  return tableYears(inputs.exitYear, anchorYear).map((year) => {
    const offset = year - anchorYear;
    const isExit = offset === inputs.exitYear;
    return {
      year,
      cashFlowDate: `31-Dec-${year}`,
      forecastYear: `Year ${offset}`,
      revenue: isExit ? inputs.exitRevenue : 0,
      enterpriseValue: isExit ? result.enterpriseValue : 0,
      equityValue: isExit ? result.equityValue : 0,
      discountFactor: 1 / Math.pow(1 + inputs.discountRate, offset),
      presentValue: isExit ? result.presentValue : 0,
    };
  });
}

export function buildInvestorFlows(
  inputs: ValuationInputs,
  result: ValuationResult,
  anchorYear: number = PROJECTION_ANCHOR_YEAR
): InvestorFlowRow[] {
  return tableYears(inputs.exitYear, anchorYear).map((year) => {
    const offset = year - anchorYear;
    const investment = offset === 0 ? -result.investmentAmount : 0;
    const exitProceeds = offset === inputs.exitYear ? result.exitProceeds : 0;
    return {
      year,
      investment,
      exitProceeds,
      netCashFlow: offset === 0 ? investment : exitProceeds,
      equityStake: offset <= inputs.exitYear ? inputs.equityStakeEntry : null,
    };
  });
}

// ============ CHART SERIES ============

export function buildValuationBreakdown(inputs: ValuationInputs, result: ValuationResult): BreakdownSlice[] {
  return [
    { label: 'Enterprise Value', value: result.enterpriseValue, color: '#3498db' },
    { label: 'Debt', value: inputs.financialDebt, color: '#e74c3c' },
    { label: 'Cash', value: inputs.cashBalance, color: '#2ecc71' },
  ];
}

export function toSensitivityChartSeries(points: readonly SensitivityPoint[]): { x: number[]; y: number[] } {
  return {
    x: points.map((p) => p.discountRate * 100),
    y: points.map((p) => p.irr * 100),
  };
}
