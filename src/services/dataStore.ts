import { Auction, AuctionStatus, Bid, CloseOutcome, Item } from '../types';
import { logger } from '../utils/logger';

/**
 * DataStore - In-memory storage for items, auctions, auction-item links and bids
 *
 * This is the single source of truth for all data in the system.
 * Every method is asynchronous so callers treat each access as a possible
 * I/O suspension point, exactly as they would against a database.
 *
 * Records are copied on the way in and out; nothing outside the store can
 * mutate stored state.
 *
 * Thread-safety: read-validate-write sequences are serialized by the
 * LockManager in the services, not here.
 */
export class DataStore {
  private items: Map<string, Item>;
  private auctions: Map<string, Auction>;
  private auctionItems: Map<string, string[]>; // Key: auctionId, Value: linked item ids
  private itemAuctions: Map<string, string[]>; // Key: itemId, Value: auctions it was linked to
  private bids: Map<string, Bid[]>;            // Key: auctionId, Value: bids in insertion order

  constructor() {
    this.items = new Map();
    this.auctions = new Map();
    this.auctionItems = new Map();
    this.itemAuctions = new Map();
    this.bids = new Map();

    logger.debug('DataStore initialized');
  }

  // ==================== ITEM OPERATIONS ====================

  async insertItem(item: Item): Promise<Item> {
    if (this.items.has(item.id)) {
      throw new Error(`Duplicate item id: ${item.id}`);
    }

    this.items.set(item.id, { ...item });
    return { ...item };
  }

  async getItem(itemId: string): Promise<Item | null> {
    const item = this.items.get(itemId);
    return item ? { ...item } : null;
  }

  async findItemByCode(code: string): Promise<Item | null> {
    for (const item of this.items.values()) {
      if (item.code === code) {
        return { ...item };
      }
    }
    return null;
  }

  async getItemsByOwner(ownerId: string): Promise<Item[]> {
    return Array.from(this.items.values())
      .filter((item) => item.ownerId === ownerId)
      .map((item) => ({ ...item }));
  }

  async getItemsForAuction(auctionId: string): Promise<Item[]> {
    const itemIds = this.auctionItems.get(auctionId) || [];
    const items: Item[] = [];

    for (const itemId of itemIds) {
      const item = this.items.get(itemId);
      if (item) {
        items.push({ ...item });
      }
    }

    return items;
  }

  /**
   * Auctions an item has ever been linked to
   */
  async getAuctionsForItem(itemId: string): Promise<Auction[]> {
    const auctionIds = this.itemAuctions.get(itemId) || [];
    const auctions: Auction[] = [];

    for (const auctionId of auctionIds) {
      const auction = this.auctions.get(auctionId);
      if (auction) {
        auctions.push({ ...auction });
      }
    }

    return auctions;
  }

  // ==================== AUCTION OPERATIONS ====================

  /**
   * Insert an auction together with its item links
   *
   * Both or neither: every check runs before the first write, so a failure
   * leaves the store exactly as it was.
   */
  async insertAuctionWithItems(auction: Auction, itemIds: string[]): Promise<Auction> {
    if (this.auctions.has(auction.id)) {
      throw new Error(`Duplicate auction id: ${auction.id}`);
    }

    if (itemIds.length === 0) {
      throw new Error('An auction must be linked to at least one item');
    }

    if (new Set(itemIds).size !== itemIds.length) {
      throw new Error(`Duplicate item link for auction ${auction.id}`);
    }

    for (const itemId of itemIds) {
      if (!this.items.has(itemId)) {
        throw new Error(`Cannot link missing item ${itemId} to auction ${auction.id}`);
      }
    }

    this.auctions.set(auction.id, { ...auction });
    this.auctionItems.set(auction.id, [...itemIds]);
    this.bids.set(auction.id, []);

    for (const itemId of itemIds) {
      const linked = this.itemAuctions.get(itemId) || [];
      linked.push(auction.id);
      this.itemAuctions.set(itemId, linked);
    }

    return { ...auction };
  }

  async getAuction(auctionId: string): Promise<Auction | null> {
    const auction = this.auctions.get(auctionId);
    return auction ? { ...auction } : null;
  }

  async getAuctionsByCreator(creatorId: string, status?: AuctionStatus): Promise<Auction[]> {
    return Array.from(this.auctions.values())
      .filter((auction) => auction.creatorId === creatorId)
      .filter((auction) => status === undefined || auction.status === status)
      .map((auction) => ({ ...auction }));
  }

  async getAuctionsByWinner(winnerId: string): Promise<Auction[]> {
    return Array.from(this.auctions.values())
      .filter((auction) => auction.status === AuctionStatus.CLOSED && auction.winnerId === winnerId)
      .map((auction) => ({ ...auction }));
  }

  /**
   * Conditional close: applies only if the auction is still OPEN and its
   * deadline is not after `now`. Returns whether the write took effect.
   */
  async closeAuctionIfOpen(auctionId: string, outcome: CloseOutcome, now: Date): Promise<boolean> {
    const auction = this.auctions.get(auctionId);

    if (!auction || auction.status !== AuctionStatus.OPEN || auction.deadline > now) {
      return false;
    }

    this.auctions.set(auctionId, {
      ...auction,
      status: AuctionStatus.CLOSED,
      winnerId: outcome.winnerId,
      winningPrice: outcome.winningPrice,
    });

    return true;
  }

  // ==================== BID OPERATIONS ====================

  async insertBid(bid: Bid): Promise<Bid> {
    const bids = this.bids.get(bid.auctionId) || [];
    bids.push({ ...bid });
    this.bids.set(bid.auctionId, bids);

    return { ...bid };
  }

  /**
   * All bids of an auction in insertion order
   */
  async getBids(auctionId: string): Promise<Bid[]> {
    return (this.bids.get(auctionId) || []).map((bid) => ({ ...bid }));
  }

  // ==================== STATISTICS & UTILITIES ====================

  async getStats(): Promise<{
    totalItems: number;
    totalBids: number;
    auctionsByStatus: Record<AuctionStatus, number>;
  }> {
    const auctions = Array.from(this.auctions.values());
    let totalBids = 0;
    for (const bids of this.bids.values()) {
      totalBids += bids.length;
    }

    return {
      totalItems: this.items.size,
      totalBids,
      auctionsByStatus: {
        [AuctionStatus.OPEN]: auctions.filter((a) => a.status === AuctionStatus.OPEN).length,
        [AuctionStatus.CLOSED]: auctions.filter((a) => a.status === AuctionStatus.CLOSED).length,
      },
    };
  }
}

// Export singleton instance
export const dataStore = new DataStore();
