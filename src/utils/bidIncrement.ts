/**
 * Bid Increment Rules
 *
 * An auction's increment is fixed by its creator as a whole number of
 * currency units. The first bid may equal the initial price; every later
 * bid must beat the leading bid by at least the increment.
 */

import { Auction, Bid } from '../types';

/**
 * Convert a whole-unit increment to cents
 *
 * @param units - Increment chosen by the creator (integer >= 1)
 */
export function incrementUnitsToCents(units: number): number {
  return units * 100;
}

/**
 * Smallest acceptable next bid in cents
 *
 * @param highestBid - Current leading bid, null when nobody has bid yet
 */
export function getMinimumNextBid(
  auction: Pick<Auction, 'initialPrice' | 'minimumBidIncrement'>,
  highestBid: Pick<Bid, 'amount'> | null
): number {
  if (!highestBid) {
    return auction.initialPrice;
  }
  return highestBid.amount + auction.minimumBidIncrement;
}
