import { Bid } from '../types';
import { DataStore, dataStore } from './dataStore';
import { logger } from '../utils/logger';
import { formatCents } from '../utils/currency';

/**
 * Bid Ledger
 *
 * Append-only record of bids per auction. It performs no validation:
 * callers append only while holding the auction's lock, after the
 * bidding rules have accepted the bid.
 */
export class BidLedger {
  constructor(private readonly store: DataStore = dataStore) {}

  /**
   * Append a bid to an auction's ledger; never overwrites
   */
  async recordBid(auctionId: string, bid: Bid): Promise<Bid> {
    const recorded = await this.store.insertBid({ ...bid, auctionId });
    logger.debug(`Bid recorded: ${recorded.id} on auction ${auctionId} for ${formatCents(recorded.amount)}`);
    return recorded;
  }

  /**
   * Leading bid: greatest amount, earliest timestamp on ties.
   * Bids with identical amount and timestamp keep insertion order.
   */
  async highestBid(auctionId: string): Promise<Bid | null> {
    const bids = await this.store.getBids(auctionId);

    if (bids.length === 0) {
      return null;
    }

    return bids.reduce((highest, current) => (compareBidPrecedence(current, highest) < 0 ? current : highest));
  }

  /**
   * All bids for display, most recent first
   */
  async bidsForAuction(auctionId: string): Promise<Bid[]> {
    const bids = await this.store.getBids(auctionId);

    // Reverse first so the stable sort lists later insertions first on equal timestamps
    return bids.reverse().sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }
}

/**
 * Negative when `a` takes precedence over `b` as the leading bid
 */
export function compareBidPrecedence(a: Bid, b: Bid): number {
  if (a.amount !== b.amount) {
    return b.amount - a.amount;
  }
  return a.timestamp.getTime() - b.timestamp.getTime();
}

// Export singleton instance
export const bidLedger = new BidLedger();
