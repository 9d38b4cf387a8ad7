import { Router, Request, Response } from 'express';
import { auctionService } from '../services/auctionService';
import { biddingService } from '../services/biddingService';
import { AuctionStatus, ErrorCode, ValidationError } from '../types';
import { handleError } from './handleError';
import {
  serializeAuction,
  serializeAuctionDetails,
  serializeBid,
  serializeItem,
} from '../utils/serializers';
import { optionalString, requireDate, requireNumber, requireString, requireStringArray } from '../utils/validation';

const router = Router();

function isAuctionStatus(value: string): value is AuctionStatus {
  return Object.values<string>(AuctionStatus).includes(value);
}

/**
 * POST /api/auctions
 * Create a new auction from the creator's items
 */
router.post('/', async (req: Request, res: Response) => {
  try {
    const { creatorId, itemIds, minimumBidIncrement, deadline } = req.body;

    const auction = await auctionService.createAuction({
      creatorId: requireString(creatorId, 'creatorId'),
      itemIds: requireStringArray(itemIds, 'itemIds'),
      minimumBidIncrement: requireNumber(minimumBidIncrement, 'minimumBidIncrement'),
      deadline: requireDate(deadline, 'deadline'),
    });

    res.status(201).json({
      success: true,
      data: serializeAuction(auction),
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * GET /api/auctions?creatorId=&status=
 * Auctions created by a user, oldest first
 */
router.get('/', async (req: Request, res: Response) => {
  try {
    const creatorId = requireString(req.query.creatorId, 'creatorId');
    const status = optionalString(req.query.status, 'status');

    if (status !== undefined && !isAuctionStatus(status)) {
      throw new ValidationError(
        `Invalid status. Must be one of: ${Object.values(AuctionStatus).join(', ')}`,
        ErrorCode.VALIDATION_ERROR
      );
    }

    const auctions = await auctionService.auctionsByCreator(creatorId, status);

    res.json({
      success: true,
      data: auctions.map(serializeAuction),
      count: auctions.length,
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * GET /api/auctions/won?userId=
 * Closed auctions won by a user, most recent first
 */
router.get('/won', async (req: Request, res: Response) => {
  try {
    const userId = requireString(req.query.userId, 'userId');
    const auctions = await auctionService.wonAuctions(userId);

    res.json({
      success: true,
      data: auctions.map(serializeAuction),
      count: auctions.length,
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * GET /api/auctions/:id
 * Auction with items, bid history and the current minimum bid
 */
router.get('/:id', async (req: Request, res: Response) => {
  try {
    const details = await auctionService.getAuctionDetails(req.params.id);

    res.json({
      success: true,
      data: serializeAuctionDetails(details),
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * GET /api/auctions/:id/items
 */
router.get('/:id/items', async (req: Request, res: Response) => {
  try {
    const items = await auctionService.itemsForAuction(req.params.id);

    res.json({
      success: true,
      data: items.map(serializeItem),
      count: items.length,
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * GET /api/auctions/:id/bids
 * Get all bids for an auction (most recent first)
 */
router.get('/:id/bids', async (req: Request, res: Response) => {
  try {
    const bids = await biddingService.getBidHistory(req.params.id);

    res.json({
      success: true,
      data: bids.map(serializeBid),
      count: bids.length,
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * GET /api/auctions/:id/highest-bid
 * Get current leading bid
 */
router.get('/:id/highest-bid', async (req: Request, res: Response) => {
  try {
    const highestBid = await biddingService.getHighestBid(req.params.id);

    res.json({
      success: true,
      data: highestBid ? serializeBid(highestBid) : null,
    });
  } catch (error) {
    handleError(error, res);
  }
});

/**
 * POST /api/auctions/:id/close
 * Close an auction after its deadline (creator only)
 */
router.post('/:id/close', async (req: Request, res: Response) => {
  try {
    const auction = await auctionService.closeAuction({
      auctionId: req.params.id,
      requesterId: requireString(req.body.requesterId, 'requesterId'),
    });

    res.json({
      success: true,
      data: serializeAuction(auction),
      message: auction.winnerId ? 'Auction closed with a winner' : 'Auction closed without bids',
    });
  } catch (error) {
    handleError(error, res);
  }
});

export default router;
