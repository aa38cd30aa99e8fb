const amountFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Rounds to cents from the exact binary value, sending exact halves to the even cent.
 * Examples: 2.675 -> 2.67 (stored just below the half), 0.125 -> 0.12, 0.375 -> 0.38
 */
export const roundToCents = (amount: number): number => {
  const magnitude = Math.abs(amount);
  const cents = magnitude * 100;
  // Only multiples of 1/8 can sit exactly on a half cent
  const isExactHalf = Number.isInteger(magnitude * 8) && cents % 1 === 0.5;

  let rounded: number;
  if (isExactHalf) {
    const lower = Math.floor(cents);
    rounded = (lower % 2 === 0 ? lower : lower + 1) / 100;
  } else {
    rounded = Number(magnitude.toFixed(2));
  }
  return amount < 0 ? -rounded : rounded;
};

/**
 * Formats an amount with a currency symbol prefix, thousands separators and two decimals
 * @returns Formatted string like "₱1,234.50"
 */
export const formatCurrency = (amount: number, currencySymbol: string): string =>
  `${currencySymbol}${amountFormatter.format(roundToCents(amount))}`;

/**
 * Formats a shelf-life in months, e.g. "18 months"
 */
export const formatMonths = (months: number): string => `${months} months`;
