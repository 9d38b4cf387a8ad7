import express from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from './swagger';

// Import API routes
import itemsRouter from './routes/items';
import auctionsRouter from './routes/auctions';
import bidsRouter from './routes/bids';
import adminRouter from './routes/admin';

/**
 * Build the Express application (no listening socket)
 */
export function createApp(): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Swagger UI
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Lot Auction API Docs',
  }));

  // Swagger JSON spec
  app.get('/api-docs.json', (_req, res) => {
    res.setHeader('Content-Type', 'application/json');
    res.send(swaggerSpec);
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  // API Routes
  app.use('/api/items', itemsRouter);
  app.use('/api/auctions', auctionsRouter);
  app.use('/api/bids', bidsRouter);
  app.use('/api/admin', adminRouter);

  return app;
}
