import ExcelJS from 'exceljs';
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import {
  parseVCGuaranteed,
  mergeVCValues,
  pickValuationInputs,
  SUPPORTED_CURRENCIES,
  type CurrencyCode,
  type VCGuaranteedValues,
} from './guaranteedParser';
import {
  calculateVCValuation,
  calculateIRRSensitivity,
  calculateScenarios,
  buildProjectionTable,
  buildInvestorFlows,
  buildValuationBreakdown,
  PROJECTION_ANCHOR_YEAR,
  type ValuationInputs,
  type ValuationResult,
  type SensitivityPoint,
  type ScenarioResult,
  type ScenarioName,
  type ProjectionRow,
  type InvestorFlowRow,
  type BreakdownSlice,
} from './vcValuationEngine';
import { formatCurrency, formatPercent, formatMultiple, formatDateStamp } from './valuationFormat';

export type FinanceLLMProvider = 'openai' | 'anthropic' | 'deepseek' | 'grok';

interface ProviderConfig {
  label: string;
  envVar: string;
  model: string;
  baseURL?: string;
}

export const LLM_PROVIDERS: Readonly<Record<FinanceLLMProvider, ProviderConfig>> = {
  openai: { label: 'OpenAI', envVar: 'OPENAI_API_KEY', model: 'gpt-4o' },
  anthropic: { label: 'Anthropic', envVar: 'ANTHROPIC_API_KEY', model: 'claude-3-7-sonnet-20250219' },
  deepseek: { label: 'DeepSeek', envVar: 'DEEPSEEK_API_KEY', model: 'deepseek-chat', baseURL: 'https://api.deepseek.com/v1' },
  grok: { label: 'Grok', envVar: 'GROK_API_KEY', model: 'grok-3', baseURL: 'https://api.x.ai/v1' },
};

export function isFinanceLLMProvider(value: string): value is FinanceLLMProvider {
  return Object.prototype.hasOwnProperty.call(LLM_PROVIDERS, value);
}

const VC_PARSING_PROMPT = `You are a venture capital analyst extracting VC-method valuation assumptions from natural language descriptions.

Return a JSON object with these fields (omit any field the description does not state):
{
  "companyName": "string",
  "currency": "USD" | "EUR" | "GBP",
  "exitYear": integer number of years from investment to exit (1-10),
  "exitRevenue": number in currency units (e.g., 10000000 for $10M),
  "evRevenueMultiple": number (e.g., 10 for 10x EV/Revenue),
  "financialDebt": number in currency units at exit,
  "cashBalance": number in currency units at exit,
  "discountRate": number as decimal (e.g., 0.25 for a 25% required return),
  "equityStakeEntry": number as decimal (e.g., 0.10 for 10% ownership at entry),
  "dilutionEffect": number as decimal (e.g., 0.20 for 20% dilution by exit)
}

IMPORTANT:
- Convert K/M/B amounts to full currency units.
- Convert percentages to decimals.
- Return ONLY the JSON object, no markdown, no explanation.`;

// ============ LLM PARSING ============

export async function requestLLMCompletion(
  provider: FinanceLLMProvider,
  systemPrompt: string,
  userPrompt: string
): Promise<string> {
  if (!isFinanceLLMProvider(provider)) {
    throw new Error(`Unknown LLM provider: ${String(provider)}`);
  }
  const config = LLM_PROVIDERS[provider];
  const apiKey = process.env[config.envVar];
  if (!apiKey) {
    throw new Error(`${config.envVar} is not set; cannot use the ${config.label} provider`);
  }

  if (provider === 'anthropic') {
    const anthropic = new Anthropic({ apiKey });
    const response = await anthropic.messages.create({
      model: config.model,
      max_tokens: 2000,
      temperature: 0,
      system: systemPrompt,
      messages: [{ role: 'user', content: userPrompt }],
    });
    const content = response.content[0];
    if (!content || content.type !== 'text') {
      console.warn(`[VC Parser] Anthropic returned no text block (${content ? content.type : 'empty'}), treating as empty reply`);
      return '';
    }
    return content.text;
  }

  // OpenAI and the OpenAI-compatible providers
  const client = new OpenAI({ apiKey, baseURL: config.baseURL });
  const response = await client.chat.completions.create({
    model: config.model,
    max_tokens: 2000,
    temperature: 0,
    messages: [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userPrompt },
    ],
  });
  return response.choices[0]?.message?.content || '';
}

/**
 * Pull the JSON object out of a model reply: fenced ```json blocks, bare
 * fences, or an object embedded in conversational text.
 */
export function extractJsonText(responseText: string): string {
  let cleanedText = responseText.trim();

  if (cleanedText.includes('```json')) {
    const match = cleanedText.match(/```json\s*([\s\S]*?)\s*```/);
    if (match) cleanedText = match[1].trim();
  } else if (cleanedText.includes('```')) {
    const match = cleanedText.match(/```\s*([\s\S]*?)\s*```/);
    if (match) cleanedText = match[1].trim();
  }

  if (!cleanedText.startsWith('{')) {
    const startIdx = cleanedText.indexOf('{');
    const endIdx = cleanedText.lastIndexOf('}');
    if (startIdx !== -1 && endIdx !== -1 && endIdx > startIdx) {
      cleanedText = cleanedText.slice(startIdx, endIdx + 1);
    }
  }

  return cleanedText.trim();
}

function numberField(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

// Keeps only well-typed fields; anything else is dropped.
export function coerceLLMValues(raw: unknown): Partial<VCGuaranteedValues> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }
  const source: Record<string, unknown> = { ...raw };
  const values: Partial<VCGuaranteedValues> = {};

  if (typeof source.companyName === 'string' && source.companyName.trim() !== '') {
    values.companyName = source.companyName.trim();
  }
  const currency = source.currency;
  if (typeof currency === 'string') {
    const match = SUPPORTED_CURRENCIES.find((c) => c === currency.toUpperCase());
    if (match) values.currency = match;
  }

  values.exitYear = numberField(source, 'exitYear');
  values.exitRevenue = numberField(source, 'exitRevenue');
  values.evRevenueMultiple = numberField(source, 'evRevenueMultiple');
  values.financialDebt = numberField(source, 'financialDebt');
  values.cashBalance = numberField(source, 'cashBalance');
  values.discountRate = numberField(source, 'discountRate');
  values.equityStakeEntry = numberField(source, 'equityStakeEntry');
  values.dilutionEffect = numberField(source, 'dilutionEffect');

  return values;
}

export async function parseVCDescription(
  description: string,
  provider: FinanceLLMProvider,
  customInstructions?: string
): Promise<{ values: VCGuaranteedValues; providerUsed: string }> {
  let userPrompt = `Extract VC valuation assumptions from this description:\n\n${description}`;
  if (customInstructions) {
    userPrompt += `\n\nAdditional instructions: ${customInstructions}`;
  }

  const responseText = await requestLLMCompletion(provider, VC_PARSING_PROMPT, userPrompt);
  const providerUsed = LLM_PROVIDERS[provider].label;

  // Regex values are the base; the model only fills what the regex pass left at default
  console.log(`[VC Parser] Running guaranteed parser (regex + defaults)...`);
  const guaranteed = parseVCGuaranteed(description);

  let llmValues: Partial<VCGuaranteedValues> = {};
  try {
    llmValues = coerceLLMValues(JSON.parse(extractJsonText(responseText)));
    console.log(`[VC Parser] LLM parsing succeeded, will merge with guaranteed values`);
  } catch (error) {
    console.warn(`[VC Parser] LLM JSON parse failed, using guaranteed parser only:`, error);
  }

  const values = mergeVCValues(guaranteed, llmValues);
  console.log(`[VC Parser] Final assumptions from ${providerUsed}: exit year ${values.exitYear}, revenue ${values.exitRevenue}, ${values.evRevenueMultiple}x`);

  return { values, providerUsed };
}

// ============ ANALYSIS ============

export interface ValuationContext {
  companyName: string;
  currency: CurrencyCode;
  valuationDate: string;
}

export interface VCAnalysis {
  inputs: ValuationInputs;
  context: ValuationContext;
  result: ValuationResult;
  sensitivity: SensitivityPoint[];
  scenarios: ScenarioResult[];
  projections: ProjectionRow[];
  investorFlows: InvestorFlowRow[];
  breakdown: BreakdownSlice[];
}

export function runVCAnalysis(
  inputs: ValuationInputs,
  context: ValuationContext,
  anchorYear: number = PROJECTION_ANCHOR_YEAR
): VCAnalysis {
  const result = calculateVCValuation(inputs);

  console.log(`[VC Valuation] ${context.companyName}: EV=${result.enterpriseValue.toFixed(0)}, Equity=${result.equityValue.toFixed(0)}, PV=${result.presentValue.toFixed(0)}`);
  console.log(`[VC Valuation] Investment=${result.investmentAmount.toFixed(0)}, Exit=${result.exitProceeds.toFixed(0)}, IRR=${(result.irr * 100).toFixed(1)}%, Multiple=${result.cashMultiple.toFixed(1)}x`);

  return {
    inputs,
    context,
    result,
    sensitivity: calculateIRRSensitivity(inputs, result),
    scenarios: calculateScenarios(inputs),
    projections: buildProjectionTable(inputs, result, anchorYear),
    investorFlows: buildInvestorFlows(inputs, result, anchorYear),
    breakdown: buildValuationBreakdown(inputs, result),
  };
}

export function analyzeVCValues(values: VCGuaranteedValues, anchorYear?: number): VCAnalysis {
  const context: ValuationContext = {
    companyName: values.companyName,
    currency: values.currency,
    valuationDate: values.valuationDate,
  };
  return runVCAnalysis(pickValuationInputs(values), context, anchorYear);
}

export const SCENARIO_LABELS: Readonly<Record<ScenarioName, string>> = {
  Conservative: 'Conservative',
  BaseCase: 'Base Case',
  Optimistic: 'Optimistic',
};

export interface ScenarioDisplayRow {
  scenario: string;
  irr: string;
  multiple: string;
  investment: string;
}

export function formatScenarioRows(scenarios: readonly ScenarioResult[], currency: CurrencyCode): ScenarioDisplayRow[] {
  return scenarios.map(({ scenario, result }) => ({
    scenario: SCENARIO_LABELS[scenario],
    irr: formatPercent(result.irr),
    multiple: formatMultiple(result.cashMultiple),
    investment: formatCurrency(result.investmentAmount, currency),
  }));
}

// ============ EXPORTS ============

export function exportFileName(kind: 'excel' | 'report', date: Date = new Date()): string {
  const stamp = formatDateStamp(date);
  return kind === 'excel' ? `VC_Valuation_${stamp}.xlsx` : `VC_Report_${stamp}.md`;
}

const headerStyle: Partial<ExcelJS.Style> = {
  font: { bold: true, size: 12 },
  fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFE0E0E0' } },
  alignment: { horizontal: 'center' },
};
const percentFormat = '0.0%';
const multipleFormat = '0.0"x"';
const discountFactorFormat = '0.0000';

function styleHeader(sheet: ExcelJS.Worksheet): void {
  sheet.getRow(1).eachCell((cell) => {
    cell.style = headerStyle;
  });
}

export function generateVCWorkbook(analysis: VCAnalysis): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'VC Valuation';
  workbook.created = new Date();

  const currencyFormat = `"${analysis.context.currency} "#,##0`;

  // ============ PROJECTIONS ============
  const projectionSheet = workbook.addWorksheet('Projections');
  projectionSheet.columns = [
    { header: 'Year', key: 'year', width: 8 },
    { header: 'Cash Flow Date', key: 'cashFlowDate', width: 16 },
    { header: 'Forecast Year', key: 'forecastYear', width: 14 },
    { header: 'Revenue', key: 'revenue', width: 20, style: { numFmt: currencyFormat } },
    { header: 'Enterprise Value', key: 'enterpriseValue', width: 20, style: { numFmt: currencyFormat } },
    { header: 'Equity Value', key: 'equityValue', width: 20, style: { numFmt: currencyFormat } },
    { header: 'Discount Factor', key: 'discountFactor', width: 16, style: { numFmt: discountFactorFormat } },
    { header: 'Present Value', key: 'presentValue', width: 20, style: { numFmt: currencyFormat } },
  ];
  for (const row of analysis.projections) {
    projectionSheet.addRow({ ...row });
  }
  styleHeader(projectionSheet);

  // ============ INVESTOR FLOWS ============
  const flowsSheet = workbook.addWorksheet('Investor_Flows');
  flowsSheet.columns = [
    { header: 'Year', key: 'year', width: 8 },
    { header: 'Investment', key: 'investment', width: 20, style: { numFmt: currencyFormat } },
    { header: 'Exit Proceeds', key: 'exitProceeds', width: 20, style: { numFmt: currencyFormat } },
    { header: 'Net Cash Flow', key: 'netCashFlow', width: 20, style: { numFmt: currencyFormat } },
    { header: 'Equity Stake', key: 'equityStake', width: 14, style: { numFmt: percentFormat } },
  ];
  for (const row of analysis.investorFlows) {
    flowsSheet.addRow({ ...row, equityStake: row.equityStake ?? '' });
  }
  styleHeader(flowsSheet);

  // ============ SCENARIOS ============
  const scenarioSheet = workbook.addWorksheet('Scenarios');
  scenarioSheet.columns = [
    { header: 'Scenario', key: 'scenario', width: 16 },
    { header: 'IRR', key: 'irr', width: 10, style: { numFmt: percentFormat } },
    { header: 'Multiple', key: 'multiple', width: 10, style: { numFmt: multipleFormat } },
    { header: 'Investment', key: 'investment', width: 20, style: { numFmt: currencyFormat } },
  ];
  for (const { scenario, result } of analysis.scenarios) {
    scenarioSheet.addRow({
      scenario: SCENARIO_LABELS[scenario],
      irr: result.irr,
      multiple: result.cashMultiple,
      investment: result.investmentAmount,
    });
  }
  styleHeader(scenarioSheet);

  return workbook;
}

export async function generateVCExcel(analysis: VCAnalysis): Promise<Buffer> {
  const workbook = generateVCWorkbook(analysis);
  const buffer = await workbook.xlsx.writeBuffer();
  console.log(`[VC Export] Workbook built: ${workbook.worksheets.map((ws) => ws.name).join(', ')}`);
  return Buffer.from(buffer);
}

export function generateVCReport(analysis: VCAnalysis): string {
  const { inputs, context, result } = analysis;
  const { currency } = context;

  return [
    '# VC Valuation Report',
    '',
    `**Company:** ${context.companyName}`,
    `**Valuation Date:** ${context.valuationDate}`,
    `**Exit Year:** Year ${inputs.exitYear}`,
    `**Currency:** ${currency}`,
    '',
    '## Key Metrics',
    `- **Company Equity Value:** ${formatCurrency(result.equityValue, currency)}`,
    `- **Present Value:** ${formatCurrency(result.presentValue, currency)}`,
    `- **Investor IRR:** ${formatPercent(result.irr)}`,
    `- **Cash Multiple:** ${formatMultiple(result.cashMultiple)}`,
    `- **Investment Required:** ${formatCurrency(result.investmentAmount, currency)}`,
    '',
    '## Assumptions',
    `- **Exit Revenue:** ${formatCurrency(inputs.exitRevenue, currency)}`,
    `- **EV/Revenue Multiple:** ${formatMultiple(inputs.evRevenueMultiple)}`,
    `- **Discount Rate:** ${formatPercent(inputs.discountRate)}`,
    `- **Equity Stake:** ${formatPercent(inputs.equityStakeEntry)}`,
    '',
  ].join('\n');
}
