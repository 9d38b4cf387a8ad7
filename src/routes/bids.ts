import { Router, Request, Response } from 'express';
import { biddingService } from '../services/biddingService';
import { handleError } from './handleError';
import { serializeBid } from '../utils/serializers';
import { requireNumber, requireString } from '../utils/validation';

const router = Router();

/**
 * POST /api/bids
 * Place a new bid
 *
 * This is the CRITICAL endpoint for high-concurrency scenarios
 */
router.post('/', async (req: Request, res: Response) => {
  try {
    const { auctionId, bidderId, amount } = req.body;

    const bid = await biddingService.placeBid({
      auctionId: requireString(auctionId, 'auctionId'),
      bidderId: requireString(bidderId, 'bidderId'),
      amount: requireNumber(amount, 'amount'),
    });

    res.status(201).json({
      success: true,
      data: serializeBid(bid),
    });
  } catch (error) {
    handleError(error, res);
  }
});

export default router;
