import { Router, Request, Response } from 'express';
import { dataStore } from '../services/dataStore';
import { lockManager } from '../services/lockManager';
import { handleError } from './handleError';

const router = Router();

/**
 * @route   GET /api/admin/stats
 * @desc    Store totals and lock occupancy
 */
router.get('/stats', async (_req: Request, res: Response) => {
  try {
    const stats = await dataStore.getStats();

    res.json({
      success: true,
      data: {
        ...stats,
        locks: lockManager.getStats(),
      },
    });
  } catch (error) {
    handleError(error, res);
  }
});

export default router;
