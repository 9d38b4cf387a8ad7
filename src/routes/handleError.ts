import { Response } from 'express';
import { ApiErrorResponse, AuctionError, ErrorCode } from '../types';
import { logger } from '../utils/logger';

/**
 * Error handler helper shared by all routers
 */
export function handleError(error: unknown, res: Response): void {
  if (error instanceof AuctionError) {
    logger.warn(`API Error: ${error.message}`);
    const body: ApiErrorResponse = {
      success: false,
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    };
    res.status(error.statusCode).json(body);
  } else {
    logger.error('Unexpected error:', error);
    const body: ApiErrorResponse = {
      success: false,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
      },
    };
    res.status(500).json(body);
  }
}
