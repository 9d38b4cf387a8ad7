import {
  Auction,
  AuctionDetails,
  AuctionStatus,
  Clock,
  CloseAuctionInput,
  CloseOutcome,
  CreateAuctionInput,
  ErrorCode,
  Item,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
  systemClock,
} from '../types';
import { config } from '../config';
import { DataStore, dataStore } from './dataStore';
import { BidLedger, bidLedger } from './bidLedger';
import { ItemCatalog, itemCatalog } from './itemCatalog';
import { LockManager, lockManager, auctionLockKey, itemLockKey } from './lockManager';
import { generateAuctionId } from '../utils/generateId';
import { getMinimumNextBid, incrementUnitsToCents } from '../utils/bidIncrement';
import { formatCents, isSafeCents } from '../utils/currency';
import { formatTimeRemaining } from '../utils/timeRemaining';
import { logger } from '../utils/logger';

/**
 * Auction Service
 *
 * Handles the auction lifecycle:
 * - Creation from a seller's available items (OPEN)
 * - Closing by the creator once the deadline has passed (OPEN -> CLOSED)
 * - Winner determination from the bid ledger
 *
 * CLOSED is terminal. Closing runs under the same per-auction lock as bid
 * admission, so a close either sees a concurrently admitted bid or the
 * bid is rejected as arriving on a closed auction.
 */

export interface AuctionServiceDeps {
  store: DataStore;
  ledger: BidLedger;
  catalog: ItemCatalog;
  locks: LockManager;
  clock: Clock;
  creationGracePeriod: number; // ms
}

export class AuctionService {
  private readonly store: DataStore;
  private readonly ledger: BidLedger;
  private readonly catalog: ItemCatalog;
  private readonly locks: LockManager;
  private readonly clock: Clock;
  private readonly creationGracePeriod: number;

  constructor(deps: AuctionServiceDeps) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.catalog = deps.catalog;
    this.locks = deps.locks;
    this.clock = deps.clock;
    this.creationGracePeriod = deps.creationGracePeriod;
  }

  /**
   * Create a new OPEN auction from the creator's available items
   *
   * The initial price is the sum of the items' base prices and never changes.
   * Items are locked for the whole check-then-insert sequence, so the same
   * item cannot end up in two concurrently created auctions.
   */
  async createAuction(input: CreateAuctionInput): Promise<Auction> {
    const now = this.clock();
    this.validateAuctionInput(input, now);

    const { creatorId, itemIds } = input;
    logger.debug(`Creating auction for ${creatorId} with items ${itemIds.join(', ')}`);

    return this.locks.withLocks(itemIds.map(itemLockKey), async () => {
      let initialPrice = 0;

      for (const itemId of itemIds) {
        const item = await this.catalog.getItem(itemId);

        if (item.ownerId !== creatorId) {
          throw new ForbiddenError(
            `Item ${itemId} does not belong to the auction creator`,
            ErrorCode.NOT_ITEM_OWNER,
            { itemId }
          );
        }

        if (!(await this.catalog.isAvailable(itemId))) {
          throw new ConflictError(
            `Item ${item.code} is already part of another auction`,
            ErrorCode.ITEM_UNAVAILABLE,
            { itemId }
          );
        }

        initialPrice += item.basePrice;
      }

      if (!isSafeCents(initialPrice)) {
        throw new ValidationError('Combined base price of the items is too large', ErrorCode.INVALID_PRICE, {
          itemIds,
        });
      }

      const auction: Auction = {
        id: generateAuctionId(),
        initialPrice,
        minimumBidIncrement: incrementUnitsToCents(input.minimumBidIncrement),
        deadline: new Date(input.deadline.getTime()),
        createdAt: now,
        creatorId,
        status: AuctionStatus.OPEN,
        winnerId: null,
        winningPrice: null,
      };

      const created = await this.store.insertAuctionWithItems(auction, itemIds);

      logger.info(
        `Auction created: ${created.id} by ${creatorId} ` +
        `(${itemIds.length} item(s), initial price ${formatCents(created.initialPrice)}, ` +
        `deadline ${created.deadline.toISOString()})`
      );
      return created;
    });
  }

  /**
   * Get auction by ID
   */
  async getAuction(auctionId: string): Promise<Auction> {
    const auction = await this.store.getAuction(auctionId);
    if (!auction) {
      throw new NotFoundError(`Auction not found: ${auctionId}`, ErrorCode.AUCTION_NOT_FOUND, { auctionId });
    }
    return auction;
  }

  async itemsForAuction(auctionId: string): Promise<Item[]> {
    await this.getAuction(auctionId);
    return this.catalog.itemsForAuction(auctionId);
  }

  /**
   * Auctions created by a user, oldest first, optionally filtered by status
   */
  async auctionsByCreator(creatorId: string, status?: AuctionStatus): Promise<Auction[]> {
    const auctions = await this.store.getAuctionsByCreator(creatorId, status);
    return auctions.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  /**
   * Closed auctions won by a user, most recently ended first
   */
  async wonAuctions(userId: string): Promise<Auction[]> {
    const auctions = await this.store.getAuctionsByWinner(userId);
    return auctions.sort((a, b) => b.deadline.getTime() - a.deadline.getTime());
  }

  /**
   * Close an auction (OPEN -> CLOSED)
   *
   * Only the creator may close, and only once the deadline has passed.
   * The winner is the leading bid at close time; with no bids both winner
   * fields stay null. The status change is a conditional write: if it does
   * not apply, another close got there first and this one reports ALREADY_CLOSED.
   */
  async closeAuction(input: CloseAuctionInput): Promise<Auction> {
    const { auctionId, requesterId } = input;

    return this.locks.withLock(auctionLockKey(auctionId), async () => {
      const now = input.now ?? this.clock();
      const auction = await this.getAuction(auctionId);

      if (auction.creatorId !== requesterId) {
        throw new ForbiddenError('Only the auction creator can close it', ErrorCode.NOT_AUCTION_CREATOR, {
          auctionId,
        });
      }

      if (auction.status !== AuctionStatus.OPEN) {
        throw new ConflictError('Auction already closed', ErrorCode.ALREADY_CLOSED, {
          auctionId,
          status: auction.status,
        });
      }

      if (auction.deadline > now) {
        throw new ConflictError('Auction deadline not reached', ErrorCode.DEADLINE_NOT_REACHED, {
          auctionId,
          deadline: auction.deadline.toISOString(),
        });
      }

      const highestBid = await this.ledger.highestBid(auctionId);
      const outcome: CloseOutcome = highestBid
        ? { winnerId: highestBid.bidderId, winningPrice: highestBid.amount }
        : { winnerId: null, winningPrice: null };

      const applied = await this.store.closeAuctionIfOpen(auctionId, outcome, now);
      if (!applied) {
        logger.warn(`Close lost race for auction ${auctionId}`);
        throw new ConflictError('Auction already closed', ErrorCode.ALREADY_CLOSED, { auctionId });
      }

      logger.info(
        `Auction closed: ${auctionId}, Winner: ${outcome.winnerId ?? 'none'}` +
        (outcome.winningPrice !== null ? `, Final price: ${formatCents(outcome.winningPrice)}` : '')
      );

      return this.getAuction(auctionId);
    });
  }

  /**
   * Auction with its items, bid history and bidding figures
   */
  async getAuctionDetails(auctionId: string): Promise<AuctionDetails> {
    const auction = await this.getAuction(auctionId);
    const items = await this.catalog.itemsForAuction(auctionId);
    const bids = await this.ledger.bidsForAuction(auctionId);
    const highestBid = await this.ledger.highestBid(auctionId);

    return {
      auction,
      items,
      bids,
      highestBid,
      minimumNextBid: auction.status === AuctionStatus.OPEN ? getMinimumNextBid(auction, highestBid) : null,
      timeRemaining: formatTimeRemaining(this.clock(), auction.deadline),
    };
  }

  /**
   * Validate auction parameters
   */
  private validateAuctionInput(input: CreateAuctionInput, now: Date): void {
    if (!input.creatorId || input.creatorId.trim().length === 0) {
      throw new ValidationError('Creator user ID is required');
    }

    if (!Array.isArray(input.itemIds) || input.itemIds.length === 0) {
      throw new ValidationError('Select at least one item for the auction');
    }

    if (new Set(input.itemIds).size !== input.itemIds.length) {
      throw new ValidationError('Each item can be selected only once', ErrorCode.VALIDATION_ERROR, {
        itemIds: input.itemIds,
      });
    }

    if (
      !Number.isInteger(input.minimumBidIncrement) ||
      input.minimumBidIncrement < 1 ||
      !isSafeCents(incrementUnitsToCents(input.minimumBidIncrement))
    ) {
      throw new ValidationError('Minimum bid increment must be a whole number of at least 1', ErrorCode.INVALID_PRICE, {
        minimumBidIncrement: input.minimumBidIncrement,
      });
    }

    if (!(input.deadline instanceof Date) || Number.isNaN(input.deadline.getTime())) {
      throw new ValidationError('Deadline must be a valid date', ErrorCode.INVALID_DEADLINE);
    }

    const earliestDeadline = now.getTime() + this.creationGracePeriod;
    if (input.deadline.getTime() <= earliestDeadline) {
      throw new ValidationError(
        `Deadline must be more than ${Math.round(this.creationGracePeriod / 60000)} minutes from now`,
        ErrorCode.INVALID_DEADLINE,
        { earliestDeadline: new Date(earliestDeadline).toISOString() }
      );
    }
  }
}

// Export singleton instance
export const auctionService = new AuctionService({
  store: dataStore,
  ledger: bidLedger,
  catalog: itemCatalog,
  locks: lockManager,
  clock: systemClock,
  creationGracePeriod: config.auction.creationGracePeriod,
});
