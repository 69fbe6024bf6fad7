import Decimal from 'decimal.js';

/**
 * Canonical 2-decimal string for balances and amounts ("1500" -> "1500.00")
 */
export const formatMoney = (value: Decimal.Value): string => {
  return new Decimal(value).toFixed(2);
};
