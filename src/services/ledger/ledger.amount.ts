/**
 * Ledger amounts
 *
 * Amounts travel as decimal strings with up to 7 fractional digits.
 * Arithmetic and comparisons happen in stroops (1 unit = 10^7 stroops).
 */

export const AMOUNT_DECIMALS = 7;
export const STROOPS_PER_UNIT = 10_000_000n;

// Largest amount an int64 stroop count can hold: 922337203685.4775807
export const MAX_STROOPS = 9_223_372_036_854_775_807n;

export const ZERO_BALANCE = '0.0000000';

const AMOUNT_PATTERN = /^(\d+)(?:\.(\d+))?$/;

export type ParsedAmount =
  | { valid: true; stroops: bigint; normalized: string }
  | { valid: false; reason: string };

export const formatStroops = (stroops: bigint): string => {
  const whole = stroops / STROOPS_PER_UNIT;
  const fraction = (stroops % STROOPS_PER_UNIT).toString().padStart(AMOUNT_DECIMALS, '0');
  return `${whole}.${fraction}`;
};

/**
 * Parse a positive ledger amount
 */
export const parseAmount = (amount: string): ParsedAmount => {
  const match = AMOUNT_PATTERN.exec(amount);
  if (!match) {
    return { valid: false, reason: 'amount must be a positive decimal number' };
  }

  const [, whole, fraction = ''] = match;
  if (fraction.length > AMOUNT_DECIMALS) {
    return {
      valid: false,
      reason: `amount can have at most ${AMOUNT_DECIMALS} decimal places`,
    };
  }

  const stroops = BigInt(whole) * STROOPS_PER_UNIT + BigInt(fraction.padEnd(AMOUNT_DECIMALS, '0'));

  if (stroops <= 0n) {
    return { valid: false, reason: 'amount must be greater than 0' };
  }
  if (stroops > MAX_STROOPS) {
    return { valid: false, reason: `amount exceeds the ledger maximum of ${formatStroops(MAX_STROOPS)}` };
  }

  return { valid: true, stroops, normalized: formatStroops(stroops) };
};
