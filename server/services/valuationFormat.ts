import { todayISODate, type CurrencyCode } from './guaranteedParser';

const wholeNumber = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/**
 * Currency label plus thousands-separated whole amount, e.g. "USD 1,234,567".
 * Non-finite values render as "-".
 */
export function formatCurrency(value: number, currency: CurrencyCode = 'USD'): string {
  if (!Number.isFinite(value)) {
    return '-';
  }
  return `${currency} ${wholeNumber.format(value)}`;
}

export function formatPercent(value: number, decimals: number = 1): string {
  if (!Number.isFinite(value)) {
    return '-';
  }
  return `${(value * 100).toFixed(decimals)}%`;
}

export function formatMultiple(value: number): string {
  if (!Number.isFinite(value)) {
    return '-';
  }
  return `${value.toFixed(1)}x`;
}

// YYYYMMDD in local time, used in export file names
export function formatDateStamp(date: Date): string {
  return todayISODate(date).replace(/-/g, '');
}
