import type { PriceQuote } from '@swaptrace/core';
import { isPriced, rawAmountToDecimal } from '@swaptrace/core';
import type { Decimal } from 'decimal.js';

/**
 * One side of a trade as the pricer sees it
 */
export interface PricedLeg {
  amount: bigint;
  decimals?: number | undefined;
  quote: PriceQuote;
}

/**
 * Price an unavailable leg from the other leg's quote.
 *
 * Both legs moved the same USD value, so
 * `price = otherPrice * otherAmount / thisAmount` in whole units. Returns
 * undefined unless exactly one leg is priced and both decimals are known.
 *
 * Example: 2 ETH at 2000 USD swapped for 5000 FOO gives FOO = 0.8 USD.
 */
export function derivePairedQuote(target: PricedLeg, other: PricedLeg): PriceQuote | undefined {
  if (isPriced(target.quote) || !isPriced(other.quote)) return undefined;
  if (target.decimals === undefined || other.decimals === undefined) return undefined;
  if (target.amount <= 0n || other.amount <= 0n) return undefined;

  const targetAmount = rawAmountToDecimal(target.amount, target.decimals);
  const otherAmount = rawAmountToDecimal(other.amount, other.decimals);

  return {
    assetSymbol: target.quote.assetSymbol,
    price: other.quote.price.times(otherAmount).dividedBy(targetAmount),
    provenance: 'paired-ratio',
    timestamp: target.quote.timestamp,
  };
}

/**
 * USD value of a leg, or undefined when its decimals or price are unknown
 */
export function computeLegValue(leg: PricedLeg): Decimal | undefined {
  if (leg.decimals === undefined || !isPriced(leg.quote)) return undefined;
  return rawAmountToDecimal(leg.amount, leg.decimals).times(leg.quote.price);
}
