/**
 * GUARANTEED VC PARSER
 *
 * Turns a plain-English deal description into a complete set of valuation
 * inputs. Every field always has a value: either extracted from the text or
 * taken from the defaults, then clamped to the input bounds.
 *
 * Flow:
 * 1. Extract values using regex patterns (deterministic)
 * 2. Merge with LLM-parsed values (supplementary, see vcModelService)
 * 3. Apply defaults for anything still missing
 * 4. Clamp every numeric field to its bound
 */

import type { ValuationInputs } from './vcValuationEngine';

// ============ TYPE DEFINITIONS ============

export type CurrencyCode = 'USD' | 'EUR' | 'GBP';

export const SUPPORTED_CURRENCIES: readonly CurrencyCode[] = ['USD', 'EUR', 'GBP'];

export interface VCGuaranteedValues {
  companyName: string;
  currency: CurrencyCode;
  valuationDate: string;

  // Exit Assumptions
  exitYear: number;
  exitRevenue: number;
  evRevenueMultiple: number;
  financialDebt: number;
  cashBalance: number;

  // Investor Assumptions
  discountRate: number;
  equityStakeEntry: number;
  dilutionEffect: number;
}

export interface InputBound {
  min: number;
  max: number;
  integer?: boolean;
}

// ============ DEFAULT VALUES ============

export const VALUATION_INPUT_DEFAULTS: ValuationInputs = {
  exitYear: 7,
  exitRevenue: 10_000_000,
  evRevenueMultiple: 10.0,
  financialDebt: 0,
  cashBalance: 0,
  discountRate: 0.25,
  equityStakeEntry: 0.10,
  dilutionEffect: 0,
};

export const VC_DEFAULTS: Omit<VCGuaranteedValues, 'valuationDate'> = {
  companyName: 'Target Company',
  currency: 'USD',
  ...VALUATION_INPUT_DEFAULTS,
};

export const VALUATION_INPUT_BOUNDS: Readonly<Record<keyof ValuationInputs, InputBound>> = {
  exitYear: { min: 1, max: 10, integer: true },
  exitRevenue: { min: 0, max: Number.POSITIVE_INFINITY },
  evRevenueMultiple: { min: 0.1, max: Number.POSITIVE_INFINITY },
  financialDebt: { min: 0, max: Number.POSITIVE_INFINITY },
  cashBalance: { min: 0, max: Number.POSITIVE_INFINITY },
  discountRate: { min: 0.05, max: 0.50 },
  equityStakeEntry: { min: 0.01, max: 1.00 },
  dilutionEffect: { min: 0, max: 0.50 },
};

// YYYY-MM-DD in local time
export function todayISODate(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}

// ============ INPUT CLAMPING ============

function clampField(key: keyof ValuationInputs, value: number | undefined): number {
  const bound = VALUATION_INPUT_BOUNDS[key];
  if (value === undefined || !Number.isFinite(value)) {
    return VALUATION_INPUT_DEFAULTS[key];
  }
  const rounded = bound.integer ? Math.round(value) : value;
  return Math.min(bound.max, Math.max(bound.min, rounded));
}

export function clampValuationInputs(raw: Partial<ValuationInputs>): ValuationInputs {
  return {
    exitYear: clampField('exitYear', raw.exitYear),
    exitRevenue: clampField('exitRevenue', raw.exitRevenue),
    evRevenueMultiple: clampField('evRevenueMultiple', raw.evRevenueMultiple),
    financialDebt: clampField('financialDebt', raw.financialDebt),
    cashBalance: clampField('cashBalance', raw.cashBalance),
    discountRate: clampField('discountRate', raw.discountRate),
    equityStakeEntry: clampField('equityStakeEntry', raw.equityStakeEntry),
    dilutionEffect: clampField('dilutionEffect', raw.dilutionEffect),
  };
}

export function pickValuationInputs(values: VCGuaranteedValues): ValuationInputs {
  return clampValuationInputs(values);
}

// ============ REGEX EXTRACTION UTILITIES ============

// Amount followed by an optional scale word; group 1 = number, group 2 = unit.
const MONEY = String.raw`(?:[$€£]|usd|eur|gbp)?\s*([\d,]*\.?\d+)\s*(thousand|million|billion|mm|bn|k|m|b)?\b`;

function unitMultiplier(unit: string | undefined): number {
  switch ((unit ?? '').toLowerCase()) {
    case 'k':
    case 'thousand':
      return 1_000;
    case 'm':
    case 'mm':
    case 'million':
      return 1_000_000;
    case 'b':
    case 'bn':
    case 'billion':
      return 1_000_000_000;
    default:
      return 1;
  }
}

function extractNumber(text: string, patterns: RegExp[]): number | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match && match[1]) {
      const value = parseFloat(match[1].replace(/,/g, ''));
      if (!isNaN(value)) {
        return value;
      }
    }
  }
  return null;
}

function extractMoney(text: string, patterns: RegExp[]): number | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match && match[1]) {
      const value = parseFloat(match[1].replace(/,/g, ''));
      if (isNaN(value)) continue;
      return value * unitMultiplier(match[2]);
    }
  }
  return null;
}

// Patterns require a literal "%", so the captured figure is always in percent.
function extractPercent(text: string, patterns: RegExp[]): number | null {
  const value = extractNumber(text, patterns);
  return value === null ? null : value / 100;
}

function extractCurrency(text: string): CurrencyCode | null {
  const code = text.match(/\b(USD|EUR|GBP)\b/i);
  if (code) {
    const upper = code[1].toUpperCase();
    return SUPPORTED_CURRENCIES.find((c) => c === upper) ?? null;
  }
  if (text.includes('€')) return 'EUR';
  if (text.includes('£')) return 'GBP';
  if (text.includes('$')) return 'USD';
  return null;
}

// ============ VC GUARANTEED PARSER ============

export function parseVCGuaranteed(text: string, now: Date = new Date()): VCGuaranteedValues {
  const result: VCGuaranteedValues = { ...VC_DEFAULTS, valuationDate: todayISODate(now) };

  console.log('[GuaranteedParser] Starting VC extraction from text...');

  const nameMatch =
    text.match(/["“]([^"”]+)["”]/) ??
    text.match(/(?:[Cc]ompany|[Ss]tartup|[Bb]usiness)\s+(?:called|named)\s+([A-Z][\w&-]*)/) ??
    text.match(/(?:[Vv]aluation|[Vv]aluing|[Vv]alue)\s+(?:for|of)\s+([A-Z][\w&-]*)/);
  if (nameMatch) {
    result.companyName = nameMatch[1];
    console.log(`[GuaranteedParser] Company name: ${result.companyName}`);
  }

  const currency = extractCurrency(text);
  if (currency !== null) {
    result.currency = currency;
    console.log(`[GuaranteedParser] Currency: ${currency}`);
  }

  const dateMatch = text.match(/(?:valuation\s+date|as\s+of)\s*:?\s*(\d{4}-\d{2}-\d{2})/i);
  if (dateMatch) {
    result.valuationDate = dateMatch[1];
    console.log(`[GuaranteedParser] Valuation date: ${result.valuationDate}`);
  }

  // ============ EXIT YEAR ============
  const exitYearPatterns = [
    /(?:exit|sell|sale)\s+(?:in\s+|at\s+)?year\s+(\d+)/i,
    /(?:exit|sell)\s+(?:after|in)\s+(\d+)\s+years?/i,
    /(\d+)[-\s]year\s+(?:hold|holding|exit)/i,
    /hold(?:ing\s+period)?\s+(?:of\s+)?(\d+)\s+years?/i,
    /year\s+(\d+)\s+exit/i,
    /\bin\s+year\s+(\d+)/i,
  ];
  const exitYear = extractNumber(text, exitYearPatterns);
  if (exitYear !== null) {
    result.exitYear = exitYear;
    console.log(`[GuaranteedParser] Exit year: ${exitYear}`);
  }

  // ============ EXIT REVENUE ============
  const revenuePatterns = [
    new RegExp(String.raw`(?:revenue|sales)\s+(?:of\s+|is\s+|was\s+|reaches\s+|=\s*|:\s*)?${MONEY}`, 'i'),
    new RegExp(String.raw`${MONEY}\s+(?:in\s+|of\s+)?(?:exit\s+)?(?:revenue|sales)`, 'i'),
  ];
  const revenue = extractMoney(text, revenuePatterns);
  if (revenue !== null) {
    result.exitRevenue = revenue;
    console.log(`[GuaranteedParser] Exit revenue: ${revenue}`);
  }

  // ============ MULTIPLE ============
  const multiplePatterns = [
    /([\d.]+)\s*[×x]\s*(?:ev\s*\/\s*)?(?:exit\s+)?(?:revenue|sales)/i,
    /(?:ev\s*\/\s*revenue|revenue\s+multiple|multiple)\s*(?:of\s+|at\s+|is\s+|=\s*|:\s*)?([\d.]+)\s*[×x]?/i,
    /exit\s+at\s+([\d.]+)\s*[×x]/i,
  ];
  const multiple = extractNumber(text, multiplePatterns);
  if (multiple !== null) {
    result.evRevenueMultiple = multiple;
    console.log(`[GuaranteedParser] EV/Revenue multiple: ${multiple}x`);
  }

  // ============ DEBT & CASH ============
  const debtPatterns = [
    new RegExp(String.raw`(?:financial\s+)?debt\s+(?:of\s+|is\s+|=\s*|:\s*)?${MONEY}`, 'i'),
    new RegExp(String.raw`${MONEY}\s+(?:of\s+)?(?:financial\s+)?debt`, 'i'),
  ];
  const debt = extractMoney(text, debtPatterns);
  if (debt !== null) {
    result.financialDebt = debt;
    console.log(`[GuaranteedParser] Financial debt: ${debt}`);
  }

  const cashPatterns = [
    new RegExp(String.raw`cash(?:\s+balance)?\s+(?:of\s+|is\s+|=\s*|:\s*)?${MONEY}`, 'i'),
    new RegExp(String.raw`${MONEY}\s+(?:of\s+)?cash`, 'i'),
  ];
  const cash = extractMoney(text, cashPatterns);
  if (cash !== null) {
    result.cashBalance = cash;
    console.log(`[GuaranteedParser] Cash balance: ${cash}`);
  }

  // ============ RATES & STAKES ============
  const discountPatterns = [
    /(?:discount\s+rate|required\s+return|target\s+return|hurdle(?:\s+rate)?)\s*(?:of\s+|is\s+|at\s+|=\s*|:\s*)?([\d.]+)\s*%/i,
    /([\d.]+)\s*%\s*(?:discount\s+rate|required\s+return|target\s+return|hurdle)/i,
  ];
  const discountRate = extractPercent(text, discountPatterns);
  if (discountRate !== null) {
    result.discountRate = discountRate;
    console.log(`[GuaranteedParser] Discount rate: ${(discountRate * 100).toFixed(1)}%`);
  }

  const stakePatterns = [
    /([\d.]+)\s*%\s*(?:equity\s+)?(?:stake|ownership)/i,
    /(?:stake|ownership)\s*(?:at\s+entry\s+)?(?:of\s+|is\s+|=\s*|:\s*)?([\d.]+)\s*%/i,
  ];
  const stake = extractPercent(text, stakePatterns);
  if (stake !== null) {
    result.equityStakeEntry = stake;
    console.log(`[GuaranteedParser] Equity stake at entry: ${(stake * 100).toFixed(1)}%`);
  }

  const dilutionPatterns = [
    /dilution(?:\s+effect)?\s*(?:of\s+|is\s+|=\s*|:\s*)?([\d.]+)\s*%/i,
    /([\d.]+)\s*%\s*dilution/i,
  ];
  const dilution = extractPercent(text, dilutionPatterns);
  if (dilution !== null) {
    result.dilutionEffect = dilution;
    console.log(`[GuaranteedParser] Dilution: ${(dilution * 100).toFixed(1)}%`);
  }

  const clamped = clampValuationInputs(result);
  const final: VCGuaranteedValues = { ...result, ...clamped };

  console.log('[GuaranteedParser] === FINAL VC VALUES ===');
  console.log(`  Exit: year ${final.exitYear}, revenue ${final.exitRevenue} at ${final.evRevenueMultiple}x`);
  console.log(`  Debt: ${final.financialDebt}, Cash: ${final.cashBalance}`);
  console.log(`  Discount rate: ${(final.discountRate * 100).toFixed(1)}%, Stake: ${(final.equityStakeEntry * 100).toFixed(1)}%, Dilution: ${(final.dilutionEffect * 100).toFixed(1)}%`);
  console.log('[GuaranteedParser] === END ===');

  return final;
}

// ============ MERGE UTILITIES ============

function preferLLM<T>(key: string, llmValue: T | undefined, guaranteedValue: T, defaultValue: T): T {
  // Only use the LLM value when the regex pass left the field at its default
  if (llmValue !== undefined && guaranteedValue === defaultValue) {
    console.log(`[Merge] Using LLM value for ${key}: ${String(llmValue)}`);
    return llmValue;
  }
  return guaranteedValue;
}

/**
 * Merge LLM-parsed values into the guaranteed ones.
 * Priority: explicit regex values > LLM parsed > defaults
 */
export function mergeVCValues(
  guaranteed: VCGuaranteedValues,
  llmParsed: Partial<VCGuaranteedValues>
): VCGuaranteedValues {
  const merged: VCGuaranteedValues = {
    companyName: preferLLM('companyName', llmParsed.companyName, guaranteed.companyName, VC_DEFAULTS.companyName),
    currency: preferLLM('currency', llmParsed.currency, guaranteed.currency, VC_DEFAULTS.currency),
    valuationDate: guaranteed.valuationDate,
    exitYear: preferLLM('exitYear', llmParsed.exitYear, guaranteed.exitYear, VC_DEFAULTS.exitYear),
    exitRevenue: preferLLM('exitRevenue', llmParsed.exitRevenue, guaranteed.exitRevenue, VC_DEFAULTS.exitRevenue),
    evRevenueMultiple: preferLLM('evRevenueMultiple', llmParsed.evRevenueMultiple, guaranteed.evRevenueMultiple, VC_DEFAULTS.evRevenueMultiple),
    financialDebt: preferLLM('financialDebt', llmParsed.financialDebt, guaranteed.financialDebt, VC_DEFAULTS.financialDebt),
    cashBalance: preferLLM('cashBalance', llmParsed.cashBalance, guaranteed.cashBalance, VC_DEFAULTS.cashBalance),
    discountRate: preferLLM('discountRate', llmParsed.discountRate, guaranteed.discountRate, VC_DEFAULTS.discountRate),
    equityStakeEntry: preferLLM('equityStakeEntry', llmParsed.equityStakeEntry, guaranteed.equityStakeEntry, VC_DEFAULTS.equityStakeEntry),
    dilutionEffect: preferLLM('dilutionEffect', llmParsed.dilutionEffect, guaranteed.dilutionEffect, VC_DEFAULTS.dilutionEffect),
  };

  return { ...merged, ...clampValuationInputs(merged) };
}
