import { describe, test, expect, beforeEach } from '@jest/globals';
import { DataStore } from '../src/services/dataStore';
import { BidLedger } from '../src/services/bidLedger';
import { Bid } from '../src/types';

const at = (seconds: number) => new Date(Date.UTC(2026, 2, 2, 10, 0, seconds));

const bid = (id: string, bidderId: string, amount: number, timestamp: Date): Bid => ({
  id,
  auctionId: 'auct-1',
  bidderId,
  amount,
  timestamp,
});

describe('BidLedger', () => {
  let ledger: BidLedger;

  beforeEach(() => {
    ledger = new BidLedger(new DataStore());
  });

  test('has no highest bid for an auction without bids', async () => {
    expect(await ledger.highestBid('auct-1')).toBeNull();
    expect(await ledger.bidsForAuction('auct-1')).toEqual([]);
  });

  test('breaks ties on amount by the earliest timestamp', async () => {
    // Recorded out of time order on purpose
    await ledger.recordBid('auct-1', bid('bid-late', 'buyer-2', 2000, at(2)));
    await ledger.recordBid('auct-1', bid('bid-early', 'buyer-1', 2000, at(1)));
    await ledger.recordBid('auct-1', bid('bid-low', 'buyer-3', 1500, at(3)));

    const highest = await ledger.highestBid('auct-1');

    expect(highest?.id).toBe('bid-early');
    expect(highest?.bidderId).toBe('buyer-1');
  });

  test('prefers the larger amount regardless of time', async () => {
    await ledger.recordBid('auct-1', bid('bid-1', 'buyer-1', 1000, at(1)));
    await ledger.recordBid('auct-1', bid('bid-2', 'buyer-2', 1200, at(5)));

    expect((await ledger.highestBid('auct-1'))?.id).toBe('bid-2');
  });

  test('lists bids most recent first', async () => {
    await ledger.recordBid('auct-1', bid('bid-1', 'buyer-1', 1000, at(1)));
    await ledger.recordBid('auct-1', bid('bid-3', 'buyer-3', 1200, at(3)));
    await ledger.recordBid('auct-1', bid('bid-2', 'buyer-2', 1100, at(2)));

    const bids = await ledger.bidsForAuction('auct-1');

    expect(bids.map((b) => b.id)).toEqual(['bid-3', 'bid-2', 'bid-1']);
  });

  test('keeps bids of different auctions apart', async () => {
    await ledger.recordBid('auct-1', bid('bid-1', 'buyer-1', 1000, at(1)));
    await ledger.recordBid('auct-2', { ...bid('bid-2', 'buyer-2', 5000, at(2)), auctionId: 'auct-2' });

    expect((await ledger.highestBid('auct-1'))?.id).toBe('bid-1');
    expect(await ledger.bidsForAuction('auct-2')).toHaveLength(1);
  });

  test('returned bids cannot alter the ledger', async () => {
    await ledger.recordBid('auct-1', bid('bid-1', 'buyer-1', 1000, at(1)));

    const [listed] = await ledger.bidsForAuction('auct-1');
    listed.amount = 999999;

    expect((await ledger.highestBid('auct-1'))?.amount).toBe(1000);
  });
});
