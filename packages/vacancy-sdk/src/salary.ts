export const NOT_SPECIFIED = 'Not specified';

// Accepted amounts: plain (`150000`, `4500.5`), a decimal comma (`1,5`), or thousands
// grouped by space, no-break space or comma (`1 200 000`, `2,500`). A group is exactly
// three digits, so two grouped amounts must be separated by more than one separator
// (`100 000 - 200 000`); `100 000 200 000` reads as a single amount.
const AMOUNT_PATTERN = /(\d{1,3}(?:[ \u00a0\u202f,]\d{3}(?!\d))+(?:\.\d+)?)|\d+(?:[.,]\d+)?/g;
const GROUP_SEPARATORS = /[ \u00a0\u202f,]/g;

function readAmount(match: RegExpMatchArray): number {
  const grouped = match[1];
  if (grouped !== undefined) {
    return Number(grouped.replace(GROUP_SEPARATORS, ''));
  }

  return Number(match[0].replace(',', '.'));
}

export interface SalaryBounds {
  from?: number | null;
  to?: number | null;
  currency?: string | null;
}

/**
 * Empty or missing salary text becomes the sentinel.
 */
export function normalizeSalaryText(salary: string | null | undefined): string {
  const trimmed = salary?.trim();
  return trimmed ? trimmed : NOT_SPECIFIED;
}

/**
 * Extract a comparable number from display text.
 * One amount is returned as is, two or more are averaged over the first pair,
 * none (or the sentinel) yields 0.
 */
export function parseSalaryValue(salary: string): number {
  if (salary === NOT_SPECIFIED) {
    return 0;
  }

  const amounts = Array.from(salary.matchAll(AMOUNT_PATTERN), readAmount).filter((amount) => Number.isFinite(amount));

  const [first, second] = amounts;
  if (first === undefined) {
    return 0;
  }

  if (second === undefined) {
    return first;
  }

  return (first + second) / 2;
}

function asAmount(value: number | null | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Render provider salary bounds as display text. Returns an empty string
 * when neither bound is known.
 */
export function formatSalaryRange(bounds: SalaryBounds | null | undefined): string {
  if (!bounds) return '';

  const from = asAmount(bounds.from);
  const to = asAmount(bounds.to);
  const currency = bounds.currency?.trim();
  const suffix = currency ? ` ${currency}` : '';

  if (from !== undefined && to !== undefined) {
    return `${from}-${to}${suffix}`;
  }

  if (from !== undefined) {
    return `from ${from}${suffix}`;
  }

  if (to !== undefined) {
    return `to ${to}${suffix}`;
  }

  return '';
}
