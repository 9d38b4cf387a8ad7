/**
 * Money helpers
 *
 * Amounts live in integer cents. Decimals from callers are rounded to the
 * nearest cent once, on the way in; comparisons afterwards are exact as long
 * as every amount stays within the safe integer range.
 */

export function dollarsToCents(dollars: number): number {
  return Math.round(dollars * 100);
}

/**
 * Whole cents that integer arithmetic on a number still represents exactly
 */
export function isSafeCents(cents: number): boolean {
  return Number.isSafeInteger(cents);
}

export function centsToDollars(cents: number): number {
  return cents / 100;
}

/**
 * Cents as a display string, e.g. 1050 -> "$10.50"
 */
export function formatCents(cents: number): string {
  return `$${centsToDollars(cents).toFixed(2)}`;
}
