import {
  Auction,
  AuctionStatus,
  CreateItemInput,
  ErrorCode,
  Item,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../types';
import { DataStore, dataStore } from './dataStore';
import { LockManager, lockManager } from './lockManager';
import { dollarsToCents, formatCents, isSafeCents } from '../utils/currency';
import { generateItemId } from '../utils/generateId';
import { logger } from '../utils/logger';

/**
 * Item Catalog
 *
 * Owns seller items and answers whether an item can go into a new auction.
 * Availability is always derived from the current auction links: an item is
 * unavailable while linked to an OPEN auction, or to a CLOSED one that has a
 * winner. An auction that closed without bids releases its items.
 */
export class ItemCatalog {
  constructor(
    private readonly store: DataStore = dataStore,
    private readonly locks: LockManager = lockManager
  ) {}

  /**
   * Register a new item for a seller
   */
  async createItem(sellerId: string, input: CreateItemInput): Promise<Item> {
    this.validateItemInput(sellerId, input);

    const code = input.code.trim();

    // Serialize on the code so two concurrent creations cannot both pass the uniqueness check
    return this.locks.withLock(`item-code:${code}`, async () => {
      const existing = await this.store.findItemByCode(code);
      if (existing) {
        throw new ConflictError(
          `Item code '${code}' already exists. Please choose a unique code.`,
          ErrorCode.ITEM_CODE_TAKEN,
          { code }
        );
      }

      const item = await this.store.insertItem({
        id: generateItemId(),
        code,
        name: input.name.trim(),
        description: input.description.trim(),
        imageRef: input.imageRef ?? null,
        basePrice: dollarsToCents(input.basePrice),
        ownerId: sellerId,
      });

      logger.info(`Item created: ${item.id} (${item.code}) by ${sellerId} at ${formatCents(item.basePrice)}`);
      return item;
    });
  }

  async getItem(itemId: string): Promise<Item> {
    const item = await this.store.getItem(itemId);
    if (!item) {
      throw new NotFoundError(`Item not found: ${itemId}`, ErrorCode.ITEM_NOT_FOUND, { itemId });
    }
    return item;
  }

  /**
   * Item exists and no OPEN or won auction holds it
   */
  async isAvailable(itemId: string): Promise<boolean> {
    const item = await this.store.getItem(itemId);
    if (!item) {
      return false;
    }

    const auctions = await this.store.getAuctionsForItem(itemId);
    return auctions.every(releasesItem);
  }

  /**
   * Items a seller can put into a new auction, ordered by code
   */
  async availableItemsForSeller(sellerId: string): Promise<Item[]> {
    const items = await this.store.getItemsByOwner(sellerId);
    const available: Item[] = [];

    for (const item of items) {
      const auctions = await this.store.getAuctionsForItem(item.id);
      if (auctions.every(releasesItem)) {
        available.push(item);
      }
    }

    return available.sort((a, b) => a.code.localeCompare(b.code));
  }

  async itemsForAuction(auctionId: string): Promise<Item[]> {
    return this.store.getItemsForAuction(auctionId);
  }

  private validateItemInput(sellerId: string, input: CreateItemInput): void {
    if (!sellerId || sellerId.trim().length === 0) {
      throw new ValidationError('Seller user ID is required');
    }

    const missing = (['code', 'name', 'description'] as const).filter(
      (field) => typeof input[field] !== 'string' || input[field].trim().length === 0
    );
    if (missing.length > 0) {
      throw new ValidationError(`Missing required fields: ${missing.join(', ')}`, ErrorCode.VALIDATION_ERROR, {
        missing,
      });
    }

    if (
      !Number.isFinite(input.basePrice) ||
      input.basePrice < 0 ||
      !isSafeCents(dollarsToCents(input.basePrice))
    ) {
      throw new ValidationError('Base price must be a non-negative amount', ErrorCode.INVALID_PRICE, {
        basePrice: input.basePrice,
      });
    }
  }
}

/**
 * An auction stops holding its items only once closed without a winner
 */
function releasesItem(auction: Auction): boolean {
  return auction.status === AuctionStatus.CLOSED && auction.winnerId === null;
}

// Export singleton instance
export const itemCatalog = new ItemCatalog();
