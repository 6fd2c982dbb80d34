/**
 * Run a VC-method valuation from a plain-English description and write the
 * workbook and Markdown report.
 * Run with: npx tsx server/run-vc-valuation.ts "Exit revenue of $10M in year 7 at 10x revenue, 25% discount rate, 10% stake" [outDir]
 *
 * Set VC_LLM_PROVIDER (openai | anthropic | deepseek | grok) to merge
 * LLM-extracted values; the provider's API key must be set as well.
 */

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { parseVCGuaranteed, type VCGuaranteedValues } from './services/guaranteedParser';
import {
  analyzeVCValues,
  exportFileName,
  formatScenarioRows,
  generateVCExcel,
  generateVCReport,
  isFinanceLLMProvider,
  parseVCDescription,
} from './services/vcModelService';
import { formatPercent } from './services/valuationFormat';

async function resolveValues(description: string): Promise<VCGuaranteedValues> {
  const provider = process.env.VC_LLM_PROVIDER;
  if (!provider) {
    return parseVCGuaranteed(description);
  }
  if (!isFinanceLLMProvider(provider)) {
    throw new Error(`Unknown LLM provider: ${provider}`);
  }
  const { values, providerUsed } = await parseVCDescription(description, provider);
  console.log(`[VC Runner] Parsed with ${providerUsed}`);
  return values;
}

async function main(): Promise<void> {
  const [description, outDir = '.'] = process.argv.slice(2);
  if (!description) {
    throw new Error('Usage: run-vc-valuation.ts "<deal description>" [outDir]');
  }

  const analysis = analyzeVCValues(await resolveValues(description));

  console.log('\n' + '='.repeat(60));
  console.log(`SCENARIOS (${analysis.context.companyName})`);
  console.log('='.repeat(60));
  console.table(formatScenarioRows(analysis.scenarios, analysis.context.currency));

  console.log('IRR SENSITIVITY');
  for (const point of analysis.sensitivity) {
    console.log(`  ${formatPercent(point.discountRate)} -> ${formatPercent(point.irr)}`);
  }

  await mkdir(outDir, { recursive: true });
  const now = new Date();
  const excelPath = path.join(outDir, exportFileName('excel', now));
  const reportPath = path.join(outDir, exportFileName('report', now));
  await writeFile(excelPath, await generateVCExcel(analysis));
  await writeFile(reportPath, generateVCReport(analysis), 'utf8');

  console.log(`[VC Runner] Wrote ${excelPath}`);
  console.log(`[VC Runner] Wrote ${reportPath}`);
}

main().catch((error: unknown) => {
  console.error('[VC Runner] Failed:', error);
  process.exitCode = 1;
});
