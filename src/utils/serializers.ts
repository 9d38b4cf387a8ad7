import { Auction, AuctionDetails, Bid, Item } from '../types';
import { centsToDollars } from './currency';

/**
 * Response shapes: identical to the entities except that money is
 * exchanged as decimal currency units instead of cents
 */

export function serializeItem(item: Item) {
  return {
    ...item,
    basePrice: centsToDollars(item.basePrice),
  };
}

export function serializeAuction(auction: Auction) {
  return {
    ...auction,
    initialPrice: centsToDollars(auction.initialPrice),
    minimumBidIncrement: centsToDollars(auction.minimumBidIncrement),
    winningPrice: auction.winningPrice === null ? null : centsToDollars(auction.winningPrice),
  };
}

export function serializeBid(bid: Bid) {
  return {
    ...bid,
    amount: centsToDollars(bid.amount),
  };
}

export function serializeAuctionDetails(details: AuctionDetails) {
  return {
    auction: serializeAuction(details.auction),
    items: details.items.map(serializeItem),
    bids: details.bids.map(serializeBid),
    highestBid: details.highestBid ? serializeBid(details.highestBid) : null,
    minimumNextBid: details.minimumNextBid === null ? null : centsToDollars(details.minimumNextBid),
    timeRemaining: details.timeRemaining,
  };
}
