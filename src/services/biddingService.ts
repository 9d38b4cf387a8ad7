import {
  Auction,
  AuctionStatus,
  Bid,
  Clock,
  ErrorCode,
  PlaceBidInput,
  ConflictError,
  ForbiddenError,
  ValidationError,
  systemClock,
} from '../types';
import { BidLedger, bidLedger } from './bidLedger';
import { AuctionService, auctionService } from './auctionService';
import { LockManager, lockManager, auctionLockKey } from './lockManager';
import { generateBidId } from '../utils/generateId';
import { getMinimumNextBid } from '../utils/bidIncrement';
import { centsToDollars, dollarsToCents, formatCents, isSafeCents } from '../utils/currency';
import { logger } from '../utils/logger';

/**
 * Bidding Service
 *
 * Handles bid placement with:
 * - Atomic validate-then-append via the lock manager
 * - Race condition prevention (no two bids judged against the same stale leader)
 * - Business rule enforcement
 *
 * CRITICAL: All bid operations MUST acquire the auction lock first
 */

export interface BiddingServiceDeps {
  ledger: BidLedger;
  auctions: AuctionService;
  locks: LockManager;
  clock: Clock;
}

export class BiddingService {
  private readonly ledger: BidLedger;
  private readonly auctions: AuctionService;
  private readonly locks: LockManager;
  private readonly clock: Clock;

  constructor(deps: BiddingServiceDeps) {
    this.ledger = deps.ledger;
    this.auctions = deps.auctions;
    this.locks = deps.locks;
    this.clock = deps.clock;
  }

  /**
   * Place a bid with full validation and race condition prevention
   *
   * Checks run in a fixed order and the first failure wins:
   * auction exists, is OPEN, deadline not reached, bidder is not the
   * creator, amount reaches the minimum next bid. The leading bid is
   * re-read under the lock, never taken from the client.
   */
  async placeBid(input: PlaceBidInput): Promise<Bid> {
    const { auctionId, bidderId } = input;
    const amount = this.parseAmount(input.amount);

    if (!bidderId || bidderId.trim().length === 0) {
      throw new ValidationError('Bidder user ID is required');
    }

    logger.debug(`Bid attempt: User ${bidderId} -> Auction ${auctionId} -> ${formatCents(amount)}`);

    return this.locks.withLock(auctionLockKey(auctionId), async () => {
      // 1. Get current auction state (within lock)
      const auction = await this.auctions.getAuction(auctionId);
      const now = this.clock();

      // 2. Validate auction state and timing
      this.validateAuctionState(auction, now);

      // 3. Creator can't bid on own auction
      if (auction.creatorId === bidderId) {
        throw new ForbiddenError('Cannot bid on your own auction', ErrorCode.SELF_BID, { auctionId });
      }

      // 4. Validate against the current leader
      const highestBid = await this.ledger.highestBid(auctionId);
      const minimumBid = getMinimumNextBid(auction, highestBid);

      if (amount < minimumBid) {
        throw new ValidationError(
          `Bid too low: ${formatCents(amount)} is below the minimum of ${formatCents(minimumBid)}`,
          ErrorCode.BID_TOO_LOW,
          {
            auctionId,
            amount: centsToDollars(amount),
            minimumBid: centsToDollars(minimumBid),
          }
        );
      }

      // 5. Append to the ledger
      const bid = await this.ledger.recordBid(auctionId, {
        id: generateBidId(),
        auctionId,
        bidderId,
        amount,
        timestamp: now,
      });

      logger.info(`Bid placed: ${bid.id} - Auction ${auctionId} now led by ${bidderId} at ${formatCents(amount)}`);
      return bid;
    });
  }

  /**
   * Get bid history for an auction (most recent first)
   */
  async getBidHistory(auctionId: string): Promise<Bid[]> {
    await this.auctions.getAuction(auctionId);
    return this.ledger.bidsForAuction(auctionId);
  }

  /**
   * Get current leading bid for an auction
   */
  async getHighestBid(auctionId: string): Promise<Bid | null> {
    await this.auctions.getAuction(auctionId);
    return this.ledger.highestBid(auctionId);
  }

  /**
   * Calculate minimum valid bid amount for an auction (cents), null once closed
   */
  async getMinimumBidAmount(auctionId: string): Promise<number | null> {
    const auction = await this.auctions.getAuction(auctionId);
    if (auction.status !== AuctionStatus.OPEN) {
      return null;
    }
    return getMinimumNextBid(auction, await this.ledger.highestBid(auctionId));
  }

  // ==================== VALIDATION HELPERS ====================

  /**
   * Decimal amount to cents; must be positive and within exact integer range
   */
  private parseAmount(amount: number): number {
    if (typeof amount !== 'number' || !Number.isFinite(amount)) {
      throw new ValidationError('Bid amount must be a number', ErrorCode.INVALID_PRICE, { amount });
    }

    const cents = dollarsToCents(amount);
    if (cents <= 0) {
      throw new ValidationError('Bid amount must be positive', ErrorCode.INVALID_PRICE, { amount });
    }
    if (!isSafeCents(cents)) {
      throw new ValidationError('Bid amount is too large', ErrorCode.INVALID_PRICE, { amount });
    }

    return cents;
  }

  /**
   * Validate auction is in correct state for bidding
   */
  private validateAuctionState(auction: Auction, now: Date): void {
    if (auction.status !== AuctionStatus.OPEN) {
      throw new ConflictError('Auction not open', ErrorCode.AUCTION_NOT_OPEN, {
        auctionId: auction.id,
        status: auction.status,
      });
    }

    if (now >= auction.deadline) {
      throw new ConflictError('Auction expired', ErrorCode.AUCTION_EXPIRED, {
        auctionId: auction.id,
        deadline: auction.deadline.toISOString(),
      });
    }
  }
}

// Export singleton instance
export const biddingService = new BiddingService({
  ledger: bidLedger,
  auctions: auctionService,
  locks: lockManager,
  clock: systemClock,
});
