import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import { createTestServices, openAuction, HOUR, MINUTE, T0, TestServices } from './helpers';
import { AuctionStatus, ErrorCode, ForbiddenError, NotFoundError, ValidationError } from '../src/types';

describe('AuctionService', () => {
  let services: TestServices;

  beforeEach(() => {
    services = createTestServices();
  });

  const createItem = (sellerId: string, code: string, basePrice: number) =>
    services.catalog.createItem(sellerId, { code, name: code, description: 'Lot item', basePrice });

  const inOneHour = () => new Date(T0.getTime() + HOUR);

  describe('createAuction', () => {
    test('opens an auction priced at the sum of its items', async () => {
      const vase = await createItem('seller-1', 'VAS-1', 10);
      const mirror = await createItem('seller-1', 'MIR-1', 5.25);

      const auction = await services.auctions.createAuction({
        creatorId: 'seller-1',
        itemIds: [vase.id, mirror.id],
        minimumBidIncrement: 2,
        deadline: inOneHour(),
      });

      expect(auction).toMatchObject({
        initialPrice: 1525,
        minimumBidIncrement: 200,
        creatorId: 'seller-1',
        status: AuctionStatus.OPEN,
        winnerId: null,
        winningPrice: null,
      });
      expect(auction.createdAt).toEqual(T0);
      expect(auction.deadline).toEqual(inOneHour());
      expect((await services.auctions.itemsForAuction(auction.id)).map((item) => item.id)).toEqual([
        vase.id,
        mirror.id,
      ]);
    });

    test('rejects an empty item list', async () => {
      await expect(
        services.auctions.createAuction({
          creatorId: 'seller-1',
          itemIds: [],
          minimumBidIncrement: 1,
          deadline: inOneHour(),
        })
      ).rejects.toThrow('Select at least one item for the auction');
    });

    test('rejects an item selected twice', async () => {
      const vase = await createItem('seller-1', 'VAS-1', 10);

      await expect(
        services.auctions.createAuction({
          creatorId: 'seller-1',
          itemIds: [vase.id, vase.id],
          minimumBidIncrement: 1,
          deadline: inOneHour(),
        })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    test.each([0, -1, 1.5, NaN, 1e15])('rejects an increment of %p', async (increment) => {
      const vase = await createItem('seller-1', 'VAS-1', 10);

      await expect(
        services.auctions.createAuction({
          creatorId: 'seller-1',
          itemIds: [vase.id],
          minimumBidIncrement: increment,
          deadline: inOneHour(),
        })
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_PRICE });
    });

    test('requires the deadline to be strictly beyond the grace period', async () => {
      const vase = await createItem('seller-1', 'VAS-1', 10);
      const request = (deadline: Date) =>
        services.auctions.createAuction({ creatorId: 'seller-1', itemIds: [vase.id], minimumBidIncrement: 1, deadline });

      await expect(request(new Date(T0.getTime() + 3 * MINUTE))).rejects.toMatchObject({
        code: ErrorCode.INVALID_DEADLINE,
      });
      await expect(request(new Date(T0.getTime() - MINUTE))).rejects.toMatchObject({
        code: ErrorCode.INVALID_DEADLINE,
      });
      await expect(request(new Date('invalid'))).rejects.toMatchObject({ code: ErrorCode.INVALID_DEADLINE });

      const auction = await request(new Date(T0.getTime() + 3 * MINUTE + 1));
      expect(auction.status).toBe(AuctionStatus.OPEN);
    });

    test('rejects items whose combined price leaves exact cent range', async () => {
      const first = await createItem('seller-1', 'BIG-1', 50_000_000_000_000);
      const second = await createItem('seller-1', 'BIG-2', 50_000_000_000_000);

      await expect(
        services.auctions.createAuction({
          creatorId: 'seller-1',
          itemIds: [first.id, second.id],
          minimumBidIncrement: 1,
          deadline: inOneHour(),
        })
      ).rejects.toMatchObject({ code: ErrorCode.INVALID_PRICE });
      expect(await services.catalog.isAvailable(first.id)).toBe(true);
    });

    test('fails with ITEM_NOT_FOUND for an unknown item', async () => {
      await expect(
        services.auctions.createAuction({
          creatorId: 'seller-1',
          itemIds: ['item_missing'],
          minimumBidIncrement: 1,
          deadline: inOneHour(),
        })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    test('refuses items owned by someone else', async () => {
      const vase = await createItem('seller-2', 'VAS-1', 10);

      await expect(
        services.auctions.createAuction({
          creatorId: 'seller-1',
          itemIds: [vase.id],
          minimumBidIncrement: 1,
          deadline: inOneHour(),
        })
      ).rejects.toMatchObject({ code: ErrorCode.NOT_ITEM_OWNER, statusCode: 403 });
    });

    test('refuses an item already in an open auction and writes nothing', async () => {
      const vase = await createItem('seller-1', 'VAS-1', 10);
      const lamp = await createItem('seller-1', 'LMP-1', 20);
      await services.auctions.createAuction({
        creatorId: 'seller-1',
        itemIds: [vase.id],
        minimumBidIncrement: 1,
        deadline: inOneHour(),
      });

      await expect(
        services.auctions.createAuction({
          creatorId: 'seller-1',
          itemIds: [lamp.id, vase.id],
          minimumBidIncrement: 1,
          deadline: inOneHour(),
        })
      ).rejects.toMatchObject({ code: ErrorCode.ITEM_UNAVAILABLE, statusCode: 409 });

      expect(await services.auctions.auctionsByCreator('seller-1')).toHaveLength(1);
      expect(await services.catalog.isAvailable(lamp.id)).toBe(true);
    });

    test('lets only one of two concurrent auctions take the same item', async () => {
      const vase = await createItem('seller-1', 'VAS-1', 10);
      const request = () =>
        services.auctions.createAuction({
          creatorId: 'seller-1',
          itemIds: [vase.id],
          minimumBidIncrement: 1,
          deadline: inOneHour(),
        });

      const results = await Promise.allSettled([request(), request()]);

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((result) => result.status === 'rejected');
      expect(rejected).toMatchObject({ reason: { code: ErrorCode.ITEM_UNAVAILABLE } });
      expect(await services.auctions.auctionsByCreator('seller-1')).toHaveLength(1);
    });
  });

  test('getAuction fails with AUCTION_NOT_FOUND', async () => {
    await expect(services.auctions.getAuction('auct_missing')).rejects.toMatchObject({
      code: ErrorCode.AUCTION_NOT_FOUND,
      statusCode: 404,
    });
  });

  describe('closeAuction', () => {
    test('closes with the highest bidder as winner', async () => {
      const auction = await openAuction(services, { basePrices: [10] });
      await services.bidding.placeBid({ auctionId: auction.id, bidderId: 'buyer-1', amount: 10 });
      await services.bidding.placeBid({ auctionId: auction.id, bidderId: 'buyer-2', amount: 12 });

      services.clock.advance(HOUR);
      const closed = await services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' });

      expect(closed).toMatchObject({ status: AuctionStatus.CLOSED, winnerId: 'buyer-2', winningPrice: 1200 });
    });

    test('closes without a winner when nobody bid', async () => {
      const auction = await openAuction(services);

      services.clock.advance(HOUR + MINUTE);
      const closed = await services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' });

      expect(closed).toMatchObject({ status: AuctionStatus.CLOSED, winnerId: null, winningPrice: null });
    });

    test('only the creator may close', async () => {
      const auction = await openAuction(services);
      services.clock.advance(HOUR);

      await expect(
        services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'buyer-1' })
      ).rejects.toBeInstanceOf(ForbiddenError);
      expect((await services.auctions.getAuction(auction.id)).status).toBe(AuctionStatus.OPEN);
    });

    test('refuses to close before the deadline', async () => {
      const auction = await openAuction(services);
      services.clock.advance(HOUR - 1);

      await expect(
        services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' })
      ).rejects.toMatchObject({ code: ErrorCode.DEADLINE_NOT_REACHED, statusCode: 409 });
    });

    test('uses an explicit close instant over the clock', async () => {
      const auction = await openAuction(services);

      const closed = await services.auctions.closeAuction({
        auctionId: auction.id,
        requesterId: 'seller-1',
        now: new Date(T0.getTime() + HOUR),
      });

      expect(closed.status).toBe(AuctionStatus.CLOSED);
    });

    test('reports ALREADY_CLOSED on a second close', async () => {
      const auction = await openAuction(services);
      services.clock.advance(HOUR);
      await services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' });

      await expect(
        services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' })
      ).rejects.toMatchObject({ code: ErrorCode.ALREADY_CLOSED, message: 'Auction already closed' });
    });

    test('lets exactly one of two concurrent closes succeed', async () => {
      const auction = await openAuction(services);
      await services.bidding.placeBid({ auctionId: auction.id, bidderId: 'buyer-1', amount: 10 });
      services.clock.advance(HOUR);

      const results = await Promise.allSettled([
        services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' }),
        services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      expect(results[1]).toMatchObject({ reason: { code: ErrorCode.ALREADY_CLOSED } });
      expect(await services.auctions.getAuction(auction.id)).toMatchObject({ winnerId: 'buyer-1', winningPrice: 1000 });
    });

    test('a bid submitted just before a close is counted in the result', async () => {
      const auction = await openAuction(services);

      const results = await Promise.allSettled([
        services.bidding.placeBid({ auctionId: auction.id, bidderId: 'buyer-1', amount: 10 }),
        services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1', now: auction.deadline }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled']);
      expect(await services.auctions.getAuction(auction.id)).toMatchObject({
        status: AuctionStatus.CLOSED,
        winnerId: 'buyer-1',
        winningPrice: 1000,
      });
    });

    test('a bid submitted just after a close is refused and not recorded', async () => {
      const auction = await openAuction(services);

      const results = await Promise.allSettled([
        services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1', now: auction.deadline }),
        services.bidding.placeBid({ auctionId: auction.id, bidderId: 'buyer-1', amount: 10 }),
      ]);

      expect(results[0]).toMatchObject({ status: 'fulfilled', value: { winnerId: null, winningPrice: null } });
      expect(results[1]).toMatchObject({ status: 'rejected', reason: { code: ErrorCode.AUCTION_NOT_OPEN } });
      expect(await services.ledger.bidsForAuction(auction.id)).toEqual([]);
    });

    test('reports ALREADY_CLOSED when the conditional write does not apply', async () => {
      const auction = await openAuction(services);
      services.clock.advance(HOUR);
      jest.spyOn(services.store, 'closeAuctionIfOpen').mockResolvedValueOnce(false);

      await expect(
        services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' })
      ).rejects.toMatchObject({ code: ErrorCode.ALREADY_CLOSED });
    });
  });

  describe('queries', () => {
    test('lists a creator\'s auctions oldest first, filtered by status', async () => {
      const first = await openAuction(services);
      services.clock.advance(MINUTE);
      const second = await openAuction(services);
      services.clock.advance(MINUTE);
      const other = await openAuction(services, { sellerId: 'seller-2' });

      services.clock.advance(HOUR);
      await services.auctions.closeAuction({ auctionId: first.id, requesterId: 'seller-1' });

      const all = await services.auctions.auctionsByCreator('seller-1');
      const open = await services.auctions.auctionsByCreator('seller-1', AuctionStatus.OPEN);
      const closed = await services.auctions.auctionsByCreator('seller-1', AuctionStatus.CLOSED);

      expect(all.map((auction) => auction.id)).toEqual([first.id, second.id]);
      expect(open.map((auction) => auction.id)).toEqual([second.id]);
      expect(closed.map((auction) => auction.id)).toEqual([first.id]);
      expect((await services.auctions.auctionsByCreator('seller-2')).map((auction) => auction.id)).toEqual([other.id]);
    });

    test('lists won auctions with the latest deadline first', async () => {
      const early = await openAuction(services, { deadline: new Date(T0.getTime() + HOUR) });
      const late = await openAuction(services, { deadline: new Date(T0.getTime() + 2 * HOUR) });
      const lost = await openAuction(services, { deadline: new Date(T0.getTime() + HOUR) });

      await services.bidding.placeBid({ auctionId: early.id, bidderId: 'buyer-1', amount: 10 });
      await services.bidding.placeBid({ auctionId: late.id, bidderId: 'buyer-1', amount: 10 });
      await services.bidding.placeBid({ auctionId: lost.id, bidderId: 'buyer-2', amount: 10 });

      services.clock.advance(2 * HOUR);
      for (const auction of [early, late, lost]) {
        await services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' });
      }

      const won = await services.auctions.wonAuctions('buyer-1');

      expect(won.map((auction) => auction.id)).toEqual([late.id, early.id]);
    });

    test('details carry the minimum next bid and time remaining', async () => {
      const auction = await openAuction(services, { basePrices: [10], increment: 1 });

      let details = await services.auctions.getAuctionDetails(auction.id);
      expect(details.minimumNextBid).toBe(1000);
      expect(details.timeRemaining).toBe('1 hour(s)');
      expect(details.highestBid).toBeNull();

      services.clock.advance(MINUTE);
      await services.bidding.placeBid({ auctionId: auction.id, bidderId: 'buyer-1', amount: 10 });

      details = await services.auctions.getAuctionDetails(auction.id);
      expect(details.minimumNextBid).toBe(1100);
      expect(details.timeRemaining).toBe('59 minute(s)');
      expect(details.bids).toHaveLength(1);
      expect(details.items).toHaveLength(1);

      services.clock.advance(HOUR);
      await services.auctions.closeAuction({ auctionId: auction.id, requesterId: 'seller-1' });

      details = await services.auctions.getAuctionDetails(auction.id);
      expect(details.minimumNextBid).toBeNull();
      expect(details.timeRemaining).toBe('Expired');
    });
  });
});
