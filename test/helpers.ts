import { DataStore } from '../src/services/dataStore';
import { LockManager } from '../src/services/lockManager';
import { BidLedger } from '../src/services/bidLedger';
import { ItemCatalog } from '../src/services/itemCatalog';
import { AuctionService } from '../src/services/auctionService';
import { BiddingService } from '../src/services/biddingService';
import { Auction, Clock } from '../src/types';

export const T0 = new Date('2026-03-02T10:00:00.000Z');
export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

/**
 * Clock the test moves by hand
 */
export class ManualClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime());
  }

  now: Clock = () => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }
}

export function createTestServices(clock: ManualClock = new ManualClock()) {
  const store = new DataStore();
  const locks = new LockManager(1000);
  const ledger = new BidLedger(store);
  const catalog = new ItemCatalog(store, locks);
  const auctions = new AuctionService({
    store,
    ledger,
    catalog,
    locks,
    clock: clock.now,
    creationGracePeriod: 3 * MINUTE,
  });
  const bidding = new BiddingService({ ledger, auctions, locks, clock: clock.now });

  return { clock, store, locks, ledger, catalog, auctions, bidding };
}

export type TestServices = ReturnType<typeof createTestServices>;

let itemCounter = 0;

/**
 * Create items for a seller and an OPEN auction over them
 */
export async function openAuction(
  services: TestServices,
  options: { sellerId?: string; basePrices?: number[]; increment?: number; deadline?: Date } = {}
): Promise<Auction> {
  const sellerId = options.sellerId ?? 'seller-1';
  const itemIds: string[] = [];

  for (const basePrice of options.basePrices ?? [10]) {
    itemCounter++;
    const item = await services.catalog.createItem(sellerId, {
      code: `ITM-${itemCounter}`,
      name: `Item ${itemCounter}`,
      description: 'Test item',
      basePrice,
    });
    itemIds.push(item.id);
  }

  return services.auctions.createAuction({
    creatorId: sellerId,
    itemIds,
    minimumBidIncrement: options.increment ?? 1,
    deadline: options.deadline ?? new Date(services.clock.now().getTime() + HOUR),
  });
}
